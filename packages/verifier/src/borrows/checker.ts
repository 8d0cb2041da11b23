/**
 * Phase 3: borrows.
 *
 * Tracks the live borrows of every binding and enforces "many readers xor
 * one writer":
 * - `&x` conflicts with a live `&mut x`; `&mut x` with any live borrow
 * - reading `x` while `&mut x` is live is a conflict
 * - assigning `x`, or calling a mutating method on it, while borrowed
 * - moving `x` while borrowed
 *
 * A borrow is held by the binding it is stored in, or is a temporary that
 * ends with its statement. When held borrows end is up to the injected
 * BorrowEndStrategy; scope exit ends them in any case.
 */

import type {
	AssignStmt,
	Block,
	BorrowExpr,
	CallableSignature,
	ClosureExpr,
	Expr,
	ForInStmt,
	LetStmt,
	LoopStmt,
	MethodCallExpr,
	Program,
	Span,
	Stmt,
	WhileStmt,
} from '../core/ast.ts'
import type { VerifierContext } from '../core/context.ts'
import type { BorrowConflictVariant, DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import { assertNever } from '../core/errors.ts'
import type { CopyOracle } from '../core/oracles.ts'
import { aggregateElements, isOwnedPath, isOwningParam, placeOf, takesReceiverByValue } from '../core/places.ts'
import { containsReference } from '../core/types.ts'
import { mentionsName } from '../core/visit.ts'
import { createGlobalTable, type FunctionUnit, functionsOf } from '../scope/globals.ts'
import type { Binding, BindingId, ScopeId, ScopeKind, ScopeTable } from '../scope/table.ts'
import { analyzeClosure, type ClosureReport } from './closures.ts'
import type { BorrowEndContext, BorrowEndStrategy } from './strategy.ts'
import { type BorrowId, type BorrowKind, BorrowTracker, conflictWith } from './tracker.ts'

export interface BorrowOptions {
	readonly copy: CopyOracle
	readonly strategy: BorrowEndStrategy
	/** Polled between functions; true stops the phase */
	readonly shouldStop?: () => boolean
}

export interface BorrowResult {
	readonly closures: readonly ClosureReport[]
}

const MAX_LOOP_ROUNDS = 64

/**
 * A block being checked, with the position of the next statement.
 */
interface BlockFrame {
	readonly statements: readonly Stmt[]
	next: number
	readonly scopeId: ScopeId
	/** Statements that run again on the next iteration, for loop bodies */
	readonly again: readonly Stmt[] | null
}

interface BorrowState {
	readonly scopes: ScopeTable
	readonly copy: CopyOracle
	readonly strategy: BorrowEndStrategy
	tracker: BorrowTracker
	/** Temporaries of the statements being checked, innermost last */
	temps: BorrowId[]
	readonly frames: BlockFrame[]
	/** Nonzero while a loop body runs towards its fixpoint */
	silent: number
	readonly closures: ClosureReport[]
}

type UseMode = 'read' | 'move'

const CONFLICT_CODES: Record<BorrowConflictVariant, DiagnosticCode> = {
	ImmutableWhileMutablyBorrowed: 'KPBORROW002',
	MutableWhileImmutablyBorrowed: 'KPBORROW001',
	MutableWhileMutablyBorrowed: 'KPBORROW003',
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export function checkBorrows(program: Program, context: VerifierContext, options: BorrowOptions): BorrowResult {
	const state: BorrowState = {
		closures: [],
		copy: options.copy,
		frames: [],
		scopes: createGlobalTable(program),
		silent: 0,
		strategy: options.strategy,
		temps: [],
		tracker: new BorrowTracker(),
	}
	state.scopes.onScopeExit((scope) => {
		const declared = new Set<BindingId>(scope.bindings)
		state.tracker.releaseWhere(
			(b) =>
				b.scopeId === scope.id || declared.has(b.referent) || (b.holder !== null && declared.has(b.holder))
		)
	})

	for (const unit of functionsOf(program)) {
		if (options.shouldStop?.()) break
		checkFunction(unit, state, context)
	}
	return { closures: state.closures }
}

function checkFunction(unit: FunctionUnit, state: BorrowState, context: VerifierContext): void {
	const { decl } = unit
	state.tracker = new BorrowTracker()
	state.temps = []
	const fnScope = state.scopes.enterScope('function')
	if (decl.receiver) {
		const r = decl.receiver
		state.scopes.declareBinding(r.name, r.mutable, r.type, r.span, 'receiver')
	}
	for (const p of decl.params) state.scopes.declareBinding(p.name, p.mutable, p.type, p.span, 'param')
	checkBlock(decl.body, 'block', state, context)
	state.scopes.exitScope(fnScope)
}

// =============================================================================
// REPORTING AND BORROW ENDS
// =============================================================================

function report(
	code: DiagnosticCode,
	span: Span | undefined,
	args: DiagnosticArgs,
	state: BorrowState,
	context: VerifierContext
): void {
	if (state.silent > 0) return
	context.emit(code, span, args)
}

/**
 * Whether any statement still to run in the holder's scope mentions it.
 */
function isUsedLater(holder: Binding, state: BorrowState): boolean {
	for (let i = state.frames.length - 1; i >= 0; i--) {
		const frame = state.frames[i]
		if (frame === undefined) continue
		if (mentionsName(frame.statements.slice(frame.next), holder.name)) return true
		if (frame.scopeId === holder.scopeId) return false
		if (frame.again !== null && mentionsName(frame.again, holder.name)) return true
	}
	return false
}

function endContext(state: BorrowState): BorrowEndContext {
	return {
		holderOf: (borrow) => (borrow.holder === null ? null : state.scopes.binding(borrow.holder)),
		isHolderUsedLater: (holder) => isUsedLater(holder, state),
	}
}

function releaseTemps(mark: number, state: BorrowState): void {
	for (const id of state.temps.splice(mark)) state.tracker.release(id)
}

function endStatement(mark: number, state: BorrowState): void {
	releaseTemps(mark, state)
	const ctx = endContext(state)
	state.tracker.releaseWhere((b) => b.holder !== null && state.strategy.endsAfterStatement(b, ctx))
}

/**
 * Hand the temporaries created since `mark` to a holder binding.
 */
function adopt(mark: number, holder: Binding, state: BorrowState): void {
	for (const id of state.temps.splice(mark)) {
		const borrow = state.tracker.get(id)
		if (borrow === undefined) continue
		borrow.holder = holder.id
		borrow.scopeId = holder.scopeId
	}
}

function addTemporary(referent: BindingId, kind: BorrowKind, span: Span | undefined, state: BorrowState): void {
	const borrow = state.tracker.add(referent, kind, state.scopes.currentScope().id, null, span)
	state.temps.push(borrow.id)
}

/**
 * Whether the value of an initializer keeps the borrows created while
 * evaluating it.
 */
function holdsBorrows(value: Expr): boolean {
	return (
		value.kind === 'Borrow' ||
		value.kind === 'Closure' ||
		aggregateElements(value) !== null ||
		containsReference(value.type)
	)
}

// =============================================================================
// STATEMENTS
// =============================================================================

function checkBlock(
	block: Block,
	kind: ScopeKind,
	state: BorrowState,
	context: VerifierContext,
	options: { declare?: () => void; again?: readonly Stmt[] } = {}
): void {
	const scopeId = state.scopes.enterScope(kind)
	options.declare?.()
	const frame: BlockFrame = { again: options.again ?? null, next: 0, scopeId, statements: block.statements }
	state.frames.push(frame)
	block.statements.forEach((stmt, i) => {
		frame.next = i + 1
		const mark = state.temps.length
		checkStmt(stmt, state, context)
		endStatement(mark, state)
	})
	state.frames.pop()
	state.scopes.exitScope(scopeId)
}

function checkStmt(stmt: Stmt, state: BorrowState, context: VerifierContext): void {
	switch (stmt.kind) {
		case 'Let':
			checkLet(stmt, state, context)
			break
		case 'Assign':
			checkAssign(stmt, state, context)
			break
		case 'Expr':
			evalExpr(stmt.expr, 'read', state, context)
			break
		case 'Return':
			if (stmt.value) evalExpr(stmt.value, 'move', state, context)
			break
		case 'If': {
			const mark = state.temps.length
			evalExpr(stmt.condition, 'read', state, context)
			releaseTemps(mark, state)
			const before = state.tracker
			state.tracker = before.clone()
			checkBlock(stmt.then, 'block', state, context)
			const afterThen = state.tracker
			state.tracker = before.clone()
			if (stmt.else) checkBlock(stmt.else, 'block', state, context)
			afterThen.mergeFrom(state.tracker)
			state.tracker = afterThen
			break
		}
		case 'While':
		case 'Loop':
			checkLoop(stmt, state, context)
			break
		case 'ForIn':
			evalExpr(stmt.iterable, 'move', state, context)
			checkLoop(stmt, state, context)
			break
		case 'Block':
			checkBlock(stmt.body, 'block', state, context)
			break
		case 'Unsafe':
			checkBlock(stmt.body, 'unsafe', state, context)
			break
		case 'Break':
		case 'Continue':
			break
		default:
			assertNever(stmt, 'statement')
	}
}

function checkLet(stmt: LetStmt, state: BorrowState, context: VerifierContext): void {
	const mark = state.temps.length
	if (stmt.init?.kind === 'Closure') evalClosure(stmt.init, state, context, stmt.name)
	else if (stmt.init) evalExpr(stmt.init, 'move', state, context)
	const id = state.scopes.declareBinding(stmt.name, stmt.mutable, stmt.type, stmt.span)
	if (stmt.init && holdsBorrows(stmt.init)) adopt(mark, state.scopes.binding(id), state)
}

function checkAssign(stmt: AssignStmt, state: BorrowState, context: VerifierContext): void {
	const place = placeOf(stmt.target)
	const span = stmt.target.span ?? stmt.span
	const owned = place !== null && place.derefs.length === 0
	const root = owned ? state.scopes.resolve(place.root.name) : null

	if (root !== null && root.origin !== 'global') {
		if (state.tracker.of(root.id).length > 0) {
			report('KPBORROW010', span, { name: root.name }, state, context)
		}
		if (place?.path.length === 0 && !place.indexed) {
			state.tracker.releaseWhere((b) => b.holder === root.id)
		}
	}

	const mark = state.temps.length
	evalExpr(stmt.value, 'move', state, context)
	if (owned) evalPlaceInner(stmt.target, state, context)
	else evalExpr(stmt.target, 'read', state, context)

	if (root !== null && holdsBorrows(stmt.value)) adopt(mark, root, state)
}

// =============================================================================
// LOOPS
// =============================================================================

type LoopLike = WhileStmt | LoopStmt | ForInStmt

function runLoopBody(stmt: LoopLike, state: BorrowState, context: VerifierContext): void {
	const again: Stmt[] = [...stmt.body.statements]
	if (stmt.kind === 'While') {
		const mark = state.temps.length
		evalExpr(stmt.condition, 'read', state, context)
		releaseTemps(mark, state)
		again.unshift({ expr: stmt.condition, kind: 'Expr' })
	}
	checkBlock(stmt.body, 'loop', state, context, {
		again,
		declare: () => {
			if (stmt.kind === 'ForIn') state.scopes.declareBinding(stmt.name, stmt.mutable, stmt.type, stmt.span)
		},
	})
}

function sameBorrows(a: BorrowTracker, b: BorrowTracker): boolean {
	const left = a.signature()
	const right = b.signature()
	return left.size === right.size && [...left].every((key) => right.has(key))
}

/**
 * Borrows that survive one iteration are live at the start of the next:
 * run the body silently until the live set at the loop head is stable,
 * then check it once from that set.
 */
function checkLoop(stmt: LoopLike, state: BorrowState, context: VerifierContext): void {
	let entry = state.tracker.clone()
	state.silent++
	for (let round = 0; round < MAX_LOOP_ROUNDS; round++) {
		state.tracker = entry.clone()
		runLoopBody(stmt, state, context)
		const next = entry.clone()
		next.mergeFrom(state.tracker)
		if (sameBorrows(next, entry)) break
		entry = next
	}
	state.silent--

	state.tracker = entry.clone()
	runLoopBody(stmt, state, context)
	state.tracker.mergeFrom(entry)
}

// =============================================================================
// BINDING USES
// =============================================================================

function readBinding(binding: Binding, span: Span | undefined, state: BorrowState, context: VerifierContext): void {
	if (binding.origin === 'global') return
	const conflict = conflictWith(state.tracker.of(binding.id), 'Immutable')
	if (conflict !== null) report(CONFLICT_CODES[conflict], span, { name: binding.name }, state, context)
}

/**
 * Use a binding by value. Moving it while borrowed is an error; the borrows
 * it holds travel with the value (or are duplicated, for Copy values).
 */
function moveBinding(
	binding: Binding,
	isCopy: boolean,
	span: Span | undefined,
	state: BorrowState,
	context: VerifierContext
): void {
	if (binding.origin === 'global') return
	if (isCopy) {
		readBinding(binding, span, state, context)
		for (const held of state.tracker.heldBy(binding.id)) addTemporary(held.referent, held.kind, held.span, state)
		return
	}
	if (state.tracker.of(binding.id).length > 0) {
		report('KPBORROW011', span, { name: binding.name }, state, context)
	}
	const scopeId = state.scopes.currentScope().id
	for (const held of state.tracker.heldBy(binding.id)) {
		held.holder = null
		held.scopeId = scopeId
		state.temps.push(held.id)
	}
}

function createBorrow(expr: BorrowExpr, state: BorrowState, context: VerifierContext): void {
	const place = placeOf(expr.operand)
	if (place === null) {
		evalExpr(expr.operand, 'read', state, context)
		return
	}
	evalPlaceInner(expr.operand, state, context)
	const binding = state.scopes.resolve(place.root.name)
	if (binding.origin === 'global') return
	const kind: BorrowKind = expr.mutable ? 'Mutable' : 'Immutable'
	const conflict = conflictWith(state.tracker.of(binding.id), kind)
	if (conflict !== null) {
		report(CONFLICT_CODES[conflict], expr.span, { name: binding.name }, state, context)
		return
	}
	addTemporary(binding.id, kind, expr.span, state)
}

/**
 * Evaluate the parts of a place other than its root (index expressions).
 */
function evalPlaceInner(expr: Expr, state: BorrowState, context: VerifierContext): void {
	switch (expr.kind) {
		case 'Ident':
			break
		case 'Field':
			evalPlaceInner(expr.object, state, context)
			break
		case 'Index':
			evalPlaceInner(expr.object, state, context)
			evalExpr(expr.index, 'read', state, context)
			break
		case 'Deref':
			evalPlaceInner(expr.operand, state, context)
			break
		default:
			evalExpr(expr, 'read', state, context)
	}
}

// =============================================================================
// CALLS AND CLOSURES
// =============================================================================

function evalArgs(args: readonly Expr[], signature: CallableSignature, state: BorrowState, context: VerifierContext): void {
	args.forEach((arg, i) => {
		evalExpr(arg, isOwningParam(signature.params[i]) ? 'move' : 'read', state, context)
	})
}

/**
 * A method call borrows its receiver for the call: mutably if the method
 * mutates, immutably otherwise. The borrow is taken once the arguments are
 * evaluated, and is held by whatever keeps the returned reference.
 */
function evalMethodCall(expr: MethodCallExpr, state: BorrowState, context: VerifierContext): void {
	const place = placeOf(expr.receiver)
	if (takesReceiverByValue(expr.signature) || place === null) {
		evalExpr(expr.receiver, takesReceiverByValue(expr.signature) ? 'move' : 'read', state, context)
		evalArgs(expr.args, expr.signature, state, context)
		return
	}
	evalPlaceInner(expr.receiver, state, context)
	const binding = state.scopes.resolve(place.root.name)
	const span = expr.receiver.span ?? expr.span
	const owned = place.derefs.length === 0
	let clear = true
	if (binding.origin !== 'global') {
		if (expr.signature.mutating && owned) {
			if (state.tracker.of(binding.id).length > 0) {
				report('KPBORROW010', span, { name: binding.name }, state, context)
				clear = false
			}
		} else {
			const conflict = conflictWith(state.tracker.of(binding.id), 'Immutable')
			if (conflict !== null) {
				report(CONFLICT_CODES[conflict], span, { name: binding.name }, state, context)
				clear = false
			}
		}
	}
	evalArgs(expr.args, expr.signature, state, context)
	if (clear && owned && binding.origin !== 'global') {
		addTemporary(binding.id, expr.signature.mutating ? 'Mutable' : 'Immutable', span, state)
	}
}

/**
 * The body is checked against its own borrow set. Creating the closure
 * borrows every capture in the inferred mode, or moves it.
 */
function evalClosure(expr: ClosureExpr, state: BorrowState, context: VerifierContext, name?: string): void {
	const analysis = analyzeClosure(expr, { copy: state.copy, lookup: (n) => state.scopes.lookup(n) })

	const savedTracker = state.tracker
	const savedTemps = state.temps
	state.tracker = new BorrowTracker()
	state.temps = []
	const scope = state.scopes.enterScope('closure')
	for (const p of expr.params) state.scopes.declareBinding(p.name, p.mutable, p.type, p.span, 'param')
	checkBlock(expr.body, 'block', state, context)
	state.scopes.exitScope(scope)
	state.tracker = savedTracker
	state.temps = savedTemps

	for (const capture of analysis.captures) {
		const span = capture.span ?? expr.span
		if (capture.mode === 'Move') {
			moveBinding(capture.binding, state.copy.isCopy(capture.binding.type), span, state, context)
			continue
		}
		const conflict = conflictWith(state.tracker.of(capture.binding.id), capture.mode)
		if (conflict !== null) {
			report(CONFLICT_CODES[conflict], span, { name: capture.binding.name }, state, context)
			continue
		}
		addTemporary(capture.binding.id, capture.mode, span, state)
	}

	if (state.silent > 0) return
	state.closures.push({
		capability: analysis.capability,
		captures: analysis.captures.map((c) => ({ mode: c.mode, name: c.binding.name })),
		mode: analysis.mode,
		...(name !== undefined ? { name } : {}),
		...(expr.span ? { span: expr.span } : {}),
	})
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

function evalExpr(expr: Expr, mode: UseMode, state: BorrowState, context: VerifierContext): void {
	switch (expr.kind) {
		case 'Literal':
			break
		case 'Ident': {
			const binding = state.scopes.resolve(expr.name)
			if (mode === 'move') moveBinding(binding, state.copy.isCopy(expr.type), expr.span, state, context)
			else readBinding(binding, expr.span, state, context)
			break
		}
		case 'Field': {
			const place = placeOf(expr)
			if (place === null || !isOwnedPath(place)) {
				evalExpr(expr.object, 'read', state, context)
				break
			}
			const binding = state.scopes.resolve(place.root.name)
			if (mode === 'move' && !state.copy.isCopy(expr.type) && binding.origin !== 'global') {
				if (state.tracker.of(binding.id).length > 0) {
					report('KPBORROW011', expr.span, { name: binding.name }, state, context)
				}
			} else {
				readBinding(binding, expr.span, state, context)
			}
			if (mode === 'move' && containsReference(expr.type)) {
				for (const held of state.tracker.heldBy(binding.id)) {
					addTemporary(held.referent, held.kind, held.span, state)
				}
			}
			break
		}
		case 'Index':
			evalExpr(expr.object, 'read', state, context)
			evalExpr(expr.index, 'read', state, context)
			break
		case 'Borrow':
			createBorrow(expr, state, context)
			break
		case 'Deref':
		case 'Unary':
		case 'Cast':
			evalExpr(expr.operand, 'read', state, context)
			break
		case 'Call':
			evalExpr(expr.callee, 'read', state, context)
			evalArgs(expr.args, expr.signature, state, context)
			break
		case 'MethodCall':
			evalMethodCall(expr, state, context)
			break
		case 'StructLit':
			for (const field of expr.fields) evalExpr(field.value, 'move', state, context)
			break
		case 'Tuple':
		case 'Array':
			for (const element of expr.elements) evalExpr(element, 'move', state, context)
			break
		case 'Binary':
			evalExpr(expr.left, 'read', state, context)
			evalExpr(expr.right, 'read', state, context)
			break
		case 'Closure':
			evalClosure(expr, state, context)
			break
		default:
			assertNever(expr, 'expression')
	}
}
