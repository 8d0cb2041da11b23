/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * The error taxonomy shared by every verifier phase.
 * Several catalog entries may map to the same kind with different wording.
 */
export const DiagnosticKind = {
	BorrowConflict: 'BorrowConflict',
	Cli: 'Cli',
	ImmutableAssignment: 'ImmutableAssignment',
	MissingMutationMarker: 'MissingMutationMarker',
	MoveWhileBorrowed: 'MoveWhileBorrowed',
	MutabilityContractMismatch: 'MutabilityContractMismatch',
	MutableSelfInImmutableMethod: 'MutableSelfInImmutableMethod',
	MutationWhileBorrowed: 'MutationWhileBorrowed',
	ReferenceOutlivesReferent: 'ReferenceOutlivesReferent',
	ReturnDanglingReference: 'ReturnDanglingReference',
	SpuriousMutationMarker: 'SpuriousMutationMarker',
	UnsafeOperationOutsideUnsafeBlock: 'UnsafeOperationOutsideUnsafeBlock',
	UseAfterMove: 'UseAfterMove',
	UseOfPartiallyMovedValue: 'UseOfPartiallyMovedValue',
} as const

export type DiagnosticKind = (typeof DiagnosticKind)[keyof typeof DiagnosticKind]

/**
 * Sub-variants of a BorrowConflict.
 */
export type BorrowConflictVariant =
	| 'MutableWhileImmutablyBorrowed'
	| 'ImmutableWhileMutablyBorrowed'
	| 'MutableWhileMutablyBorrowed'

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly kind: DiagnosticKind
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
	/** Set only on BorrowConflict entries */
	readonly variant?: BorrowConflictVariant
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number | readonly string[]>
