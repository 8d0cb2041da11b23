/**
 * @keeper/diagnostics
 *
 * Shared diagnostic types and definitions for keeper packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	KPCLI001,
	KPCLI002,
	KPCLI003,
	KPCLI004,
	KPCLI005,
	KPCLI006,
} from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type BorrowConflictVariant,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticKind,
	DiagnosticSeverity,
} from './types.ts'
export {
	KPBORROW001,
	KPBORROW002,
	KPBORROW003,
	KPBORROW010,
	KPBORROW011,
	KPIMM001,
	KPIMM002,
	KPIMM003,
	KPIMM004,
	KPIMM005,
	KPIMM010,
	KPIMM011,
	KPIMM020,
	KPIMM030,
	KPIMM040,
	KPLIFE001,
	KPLIFE002,
	KPLIFE003,
	KPMOVE001,
	KPMOVE002,
	KPMOVE003,
	KPMOVE004,
	KPMOVE005,
	VERIFIER_DIAGNOSTICS,
	type VerifierDiagnosticCode,
} from './verifier.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import type { DiagnosticDef, DiagnosticKind } from './types.ts'
import { VERIFIER_DIAGNOSTICS } from './verifier.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...VERIFIER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}

/**
 * All catalog entries reporting the given taxonomy kind.
 */
export function diagnosticsOfKind(kind: DiagnosticKind): DiagnosticDef[] {
	return Object.values(DIAGNOSTICS).filter((def) => def.kind === kind)
}
