/**
 * Re-export diagnostic types and verifier definitions from the shared package.
 */

import { VERIFIER_DIAGNOSTICS } from '@keeper/diagnostics'

export {
	type BorrowConflictVariant,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticKind,
	DiagnosticSeverity,
	interpolateMessage,
} from '@keeper/diagnostics'

/**
 * All valid diagnostic codes for the verifier.
 */
export type DiagnosticCode = keyof typeof VERIFIER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof VERIFIER_DIAGNOSTICS)[typeof code] {
	return VERIFIER_DIAGNOSTICS[code]
}
