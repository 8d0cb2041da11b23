/**
 * Verifier diagnostic definitions.
 *
 * Error code format: KP<PHASE><NUMBER>
 * - KPIMM: Immutability checker (phase 1)
 * - KPMOVE: Move checker (phase 2)
 * - KPBORROW: Borrow checker (phase 3)
 * - KPLIFE: Lifetime checker (phase 4)
 */

import { type DiagnosticDef, DiagnosticKind, DiagnosticSeverity } from './types.ts'

// =============================================================================
// IMMUTABILITY ERRORS (KPIMM001-099)
// =============================================================================

export const KPIMM001: DiagnosticDef = {
	code: 'KPIMM001',
	description: 'Bindings are immutable unless they are declared with `let mut`.',
	kind: DiagnosticKind.ImmutableAssignment,
	message: 'cannot assign twice to immutable binding `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare the binding as mutable: `let mut {name}`.',
}

export const KPIMM002: DiagnosticDef = {
	code: 'KPIMM002',
	description: 'A field or element can only be assigned when the binding that owns it is mutable.',
	kind: DiagnosticKind.ImmutableAssignment,
	message: 'cannot assign to `{place}` because `{name}` is not mutable',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare the binding as mutable: `let mut {name}`.',
}

export const KPIMM003: DiagnosticDef = {
	code: 'KPIMM003',
	description: 'A shared reference gives read-only access to the value behind it.',
	kind: DiagnosticKind.ImmutableAssignment,
	message: 'cannot assign through `{name}`, which is a shared reference',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Take an exclusive reference instead: `&mut`.',
}

export const KPIMM004: DiagnosticDef = {
	code: 'KPIMM004',
	description: 'A mutating method changes its receiver, so the receiver must be mutable.',
	kind: DiagnosticKind.ImmutableAssignment,
	message: 'cannot call mutating method `{method}` on immutable binding `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare the binding as mutable: `let mut {name}`.',
}

export const KPIMM005: DiagnosticDef = {
	code: 'KPIMM005',
	description: 'An exclusive borrow allows mutation, so it can only be taken of a mutable binding.',
	kind: DiagnosticKind.ImmutableAssignment,
	message: 'cannot borrow `{name}` as mutable, as it is not declared as mutable',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare the binding as mutable: `let mut {name}`.',
}

export const KPIMM010: DiagnosticDef = {
	code: 'KPIMM010',
	description: 'Calls to mutating callables are marked at the call site so that mutation is visible.',
	kind: DiagnosticKind.MissingMutationMarker,
	message: 'call to mutating `{callee}` is missing the mutation marker',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the marker to the call: `{callee}(...)!`.',
}

export const KPIMM011: DiagnosticDef = {
	code: 'KPIMM011',
	description: 'The mutation marker is only allowed on calls that actually mutate.',
	kind: DiagnosticKind.SpuriousMutationMarker,
	message: '`{callee}` does not mutate, but the call carries a mutation marker',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the `!` from this call.',
}

export const KPIMM020: DiagnosticDef = {
	code: 'KPIMM020',
	description: 'A method that is not declared mutating cannot change its receiver.',
	kind: DiagnosticKind.MutableSelfInImmutableMethod,
	message: 'method `{method}` is not mutating but uses `{receiver}` mutably',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare the method as mutating: `fn {method}()!`.',
}

export const KPIMM030: DiagnosticDef = {
	code: 'KPIMM030',
	description: 'An implementation must keep the mutability declared by the contract it implements.',
	kind: DiagnosticKind.MutabilityContractMismatch,
	message: '`{contract}.{method}` is declared {expected} but implemented as {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Make `{target}.{method}` {expected} to match the contract.',
}

export const KPIMM040: DiagnosticDef = {
	code: 'KPIMM040',
	description: 'Operations on raw pointers are not checked and must be wrapped in an unsafe block.',
	kind: DiagnosticKind.UnsafeOperationOutsideUnsafeBlock,
	message: 'unsafe operation `{operation}` requires an unsafe block',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Wrap this operation in `unsafe { }`.',
}

// =============================================================================
// MOVE ERRORS (KPMOVE001-099)
// =============================================================================

export const KPMOVE001: DiagnosticDef = {
	code: 'KPMOVE001',
	description: 'Once a value has been moved, the old binding no longer owns it.',
	kind: DiagnosticKind.UseAfterMove,
	message: 'use of moved value `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Borrow the value instead of moving it, or assign `{name}` again before using it.',
}

export const KPMOVE002: DiagnosticDef = {
	code: 'KPMOVE002',
	description: 'Part of this value was moved out, so the value cannot be used as a whole.',
	kind: DiagnosticKind.UseOfPartiallyMovedValue,
	message: 'use of partially moved value `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'The moved fields are {fields}; use the remaining fields individually.',
}

export const KPMOVE003: DiagnosticDef = {
	code: 'KPMOVE003',
	description: 'On at least one path to this point the value was moved or never assigned.',
	kind: DiagnosticKind.UseAfterMove,
	message: 'use of possibly moved or uninitialized value `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Assign `{name}` on every branch before this use.',
}

export const KPMOVE004: DiagnosticDef = {
	code: 'KPMOVE004',
	description: 'A binding declared without a value must be assigned before it is read.',
	kind: DiagnosticKind.UseAfterMove,
	message: 'use of uninitialized binding `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Give `{name}` a value before this use.',
}

export const KPMOVE005: DiagnosticDef = {
	code: 'KPMOVE005',
	description: 'This field was moved out of its parent value earlier.',
	kind: DiagnosticKind.UseAfterMove,
	message: 'use of moved field `{place}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Assign `{place}` again before using it.',
}

// =============================================================================
// BORROW ERRORS (KPBORROW001-099)
// =============================================================================

export const KPBORROW001: DiagnosticDef = {
	code: 'KPBORROW001',
	description: 'An exclusive borrow cannot coexist with shared borrows of the same value.',
	kind: DiagnosticKind.BorrowConflict,
	message: 'cannot borrow `{name}` as mutable because it is also borrowed as immutable',
	severity: DiagnosticSeverity.Error,
	suggestion: 'End the shared borrow before taking `&mut {name}`.',
	variant: 'MutableWhileImmutablyBorrowed',
}

export const KPBORROW002: DiagnosticDef = {
	code: 'KPBORROW002',
	description: 'While a value is borrowed exclusively, nothing else may read it.',
	kind: DiagnosticKind.BorrowConflict,
	message: 'cannot borrow `{name}` as immutable because it is also borrowed as mutable',
	severity: DiagnosticSeverity.Error,
	suggestion: 'End the exclusive borrow before reading `{name}`.',
	variant: 'ImmutableWhileMutablyBorrowed',
}

export const KPBORROW003: DiagnosticDef = {
	code: 'KPBORROW003',
	description: 'Only one exclusive borrow of a value may be live at a time.',
	kind: DiagnosticKind.BorrowConflict,
	message: 'cannot borrow `{name}` as mutable more than once at a time',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Reuse the existing `&mut {name}` instead of taking another one.',
	variant: 'MutableWhileMutablyBorrowed',
}

export const KPBORROW010: DiagnosticDef = {
	code: 'KPBORROW010',
	description: 'A borrowed value cannot change while the borrow is live.',
	kind: DiagnosticKind.MutationWhileBorrowed,
	message: 'cannot mutate `{name}` because it is borrowed',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move the mutation after the last use of the borrow.',
}

export const KPBORROW011: DiagnosticDef = {
	code: 'KPBORROW011',
	description: 'A borrowed value cannot be moved while the borrow is live.',
	kind: DiagnosticKind.MoveWhileBorrowed,
	message: 'cannot move out of `{name}` because it is borrowed',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move the value after the last use of the borrow.',
}

// =============================================================================
// LIFETIME ERRORS (KPLIFE001-099)
// =============================================================================

export const KPLIFE001: DiagnosticDef = {
	code: 'KPLIFE001',
	description: 'Locals are dropped when the function returns, so a reference to one would dangle.',
	kind: DiagnosticKind.ReturnDanglingReference,
	message: 'cannot return reference to local binding `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Return an owned value, or take `{name}` as a reference parameter.',
}

export const KPLIFE002: DiagnosticDef = {
	code: 'KPLIFE002',
	description: 'A value that stores a reference cannot outlive the storage it points to.',
	kind: DiagnosticKind.ReferenceOutlivesReferent,
	message: 'field `{field}` stores a reference to `{name}`, which does not live long enough',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare `{name}` in an outer scope, or store an owned value.',
}

export const KPLIFE003: DiagnosticDef = {
	code: 'KPLIFE003',
	description: 'The target of this assignment outlives the value the reference points to.',
	kind: DiagnosticKind.ReferenceOutlivesReferent,
	message: '`{name}` does not live long enough to be stored in `{target}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare `{name}` in the same scope as `{target}` or further out.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all verifier diagnostics.
 */
export const VERIFIER_DIAGNOSTICS = {
	// Borrow errors
	KPBORROW001,
	KPBORROW002,
	KPBORROW003,
	KPBORROW010,
	KPBORROW011,
	// Immutability errors
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
	// Lifetime errors
	KPLIFE001,
	KPLIFE002,
	KPLIFE003,
	// Move errors
	KPMOVE001,
	KPMOVE002,
	KPMOVE003,
	KPMOVE004,
	KPMOVE005,
} as const

/**
 * All valid verifier diagnostic codes.
 */
export type VerifierDiagnosticCode = keyof typeof VERIFIER_DIAGNOSTICS
