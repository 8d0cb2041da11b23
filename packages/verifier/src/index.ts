/**
 * keeper verifier public API
 *
 * Static ownership and borrow verification over a resolved syntax tree:
 * - Flat scope arena with integer IDs (ScopeTable)
 * - Four independent phases reporting into one VerifierContext
 * - Exhaustive dispatch over a closed node set
 */

export type * from './core/ast.ts'
export { checkBorrows, type BorrowOptions, type BorrowResult } from './borrows/checker.ts'
export {
	analyzeClosure,
	Capability,
	type Capture,
	type CaptureEnv,
	type CaptureMode,
	type ClosureAnalysis,
	type ClosureReport,
	capabilityOf,
	capabilitySatisfies,
	strongerMode,
} from './borrows/closures.ts'
export {
	BORROW_END_STRATEGIES,
	type BorrowEndContext,
	type BorrowEndStrategy,
	getBorrowEndStrategy,
	lastUseBorrowEnd,
	lexicalBorrowEnd,
} from './borrows/strategy.ts'
export { type Borrow, type BorrowId, type BorrowKind, BorrowTracker, borrowId, conflictWith } from './borrows/tracker.ts'
export { type Diagnostic, type Phase, PHASES, VerifierContext, type VerifierContextOptions } from './core/context.ts'
export { type DiagnosticCode, DiagnosticKind, DiagnosticSeverity } from './core/diagnostics.ts'
export { InternalError, VerifyError } from './core/errors.ts'
export {
	buildContractTable,
	type ContractEntry,
	ContractTable,
	type CopyOracle,
	type CopyOracleOptions,
	copyOracleForProgram,
	createCopyOracle,
	PRIMITIVE_COPY_TYPES,
} from './core/oracles.ts'
export { fnType, formatType, named, ptrTo, refTo, UNIT } from './core/types.ts'
export { checkImmutability, type ImmutabilityOptions } from './immutability/checker.ts'
export { checkLifetimes, type LifetimeOptions, type Region } from './lifetimes/checker.ts'
export { checkMoves, type MoveOptions } from './moves/checker.ts'
export type { MoveReason, OwnershipState } from './moves/state.ts'
export { createGlobalTable, declareGlobals, type FunctionUnit, functionsOf, qualifiedName } from './scope/globals.ts'
export {
	type Binding,
	type BindingId,
	type BindingOrigin,
	bindingId,
	type Scope,
	type ScopeId,
	type ScopeExitCallback,
	type ScopeKind,
	ScopeTable,
	scopeId,
} from './scope/table.ts'
export { type PhaseReport, type VerifyOptions, type VerifyResult, verify, verifyOrThrow } from './verify.ts'
