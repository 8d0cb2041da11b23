/**
 * CLI diagnostic definitions.
 *
 * Error code format: KPCLI<NUMBER>
 */

import { type DiagnosticDef, DiagnosticKind, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (KPCLI001-099)
// =============================================================================

export const KPCLI001: DiagnosticDef = {
	code: 'KPCLI001',
	description: "keeper couldn't find a file at this path.",
	kind: DiagnosticKind.Cli,
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const KPCLI002: DiagnosticDef = {
	code: 'KPCLI002',
	description: "The file exists but keeper can't open it.",
	kind: DiagnosticKind.Cli,
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const KPCLI003: DiagnosticDef = {
	code: 'KPCLI003',
	description: 'The input must be a resolved syntax tree serialized as JSON.',
	kind: DiagnosticKind.Cli,
	message: 'malformed unit: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a JSON program, or an object with a `program` field.',
}

export const KPCLI004: DiagnosticDef = {
	code: 'KPCLI004',
	description: "keeper doesn't know this borrow-end strategy.",
	kind: DiagnosticKind.Cli,
	message: 'unknown borrow-end strategy "{strategy}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--borrow-end lexical` or `--borrow-end last-use`.',
}

export const KPCLI005: DiagnosticDef = {
	code: 'KPCLI005',
	description: 'A verifier phase hit an internal invariant violation. This should not happen!',
	kind: DiagnosticKind.Cli,
	message: 'internal error in {phase}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'The input tree is probably not fully resolved; check the producer of this unit.',
}

export const KPCLI006: DiagnosticDef = {
	code: 'KPCLI006',
	description: "keeper doesn't recognize this output format.",
	kind: DiagnosticKind.Cli,
	message: 'unknown format "{format}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--format text` or `--format json`.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	KPCLI001,
	KPCLI002,
	KPCLI003,
	KPCLI004,
	KPCLI005,
	KPCLI006,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
