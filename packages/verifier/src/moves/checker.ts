/**
 * Phase 2: moves.
 *
 * A single forward pass per function that tracks the ownership state of
 * every binding. Values of non-Copy types move out of their binding when
 * they appear in a value position:
 * - `let` initializers, assigned values and returned values
 * - arguments bound to owning parameters
 * - elements of struct, tuple and array literals
 * - receivers of methods that consume `self`
 *
 * Every other use is a read. Reading a moved binding, or using a partially
 * moved one as a whole, is reported.
 */

import type {
	AssignStmt,
	Block,
	CallableSignature,
	ClosureExpr,
	Expr,
	ForInStmt,
	IdentExpr,
	LetStmt,
	LoopStmt,
	Program,
	Span,
	Stmt,
	WhileStmt,
} from '../core/ast.ts'
import type { VerifierContext } from '../core/context.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import { assertNever, InternalError } from '../core/errors.ts'
import type { CopyOracle } from '../core/oracles.ts'
import { isOwnedPath, isOwningParam, placeOf, takesReceiverByValue } from '../core/places.ts'
import { analyzeClosure, Capability, type ClosureAnalysis } from '../borrows/closures.ts'
import { createGlobalTable, type FunctionUnit, functionsOf } from '../scope/globals.ts'
import type { Binding, BindingId, ScopeTable } from '../scope/table.ts'
import {
	cloneFlow,
	type FlowState,
	isWithin,
	joinFlows,
	type MoveReason,
	moved,
	OWNED,
	type OwnershipMap,
	type OwnershipState,
	pruneDead,
	sameFlow,
	stateOf,
	withFieldAssigned,
	withFieldMoved,
} from './state.ts'

export interface MoveOptions {
	readonly copy: CopyOracle
	/** Polled between functions; true stops the phase */
	readonly shouldStop?: () => boolean
}

/** Upper bound on loop fixpoint rounds; the lattice is finite so this is rarely reached */
const MAX_LOOP_ROUNDS = 64

interface LoopFrame {
	readonly breaks: OwnershipMap[]
	readonly continues: OwnershipMap[]
}

interface MoveState {
	readonly scopes: ScopeTable
	readonly copy: CopyOracle
	flow: FlowState
	loops: LoopFrame[]
	/** Nonzero while a loop body runs towards its fixpoint */
	silent: number
	/** Bindings holding a closure that can only be called once */
	readonly onceClosures: Set<BindingId>
}

type UseMode = 'read' | 'move'

// =============================================================================
// ENTRY POINT
// =============================================================================

export function checkMoves(program: Program, context: VerifierContext, options: MoveOptions): void {
	const state: MoveState = {
		copy: options.copy,
		flow: new Map(),
		loops: [],
		onceClosures: new Set(),
		scopes: createGlobalTable(program),
		silent: 0,
	}
	state.scopes.onScopeExit((scope) => {
		if (state.flow === null) return
		for (const id of scope.bindings) state.flow.delete(id)
	})

	for (const unit of functionsOf(program)) {
		if (options.shouldStop?.()) return
		checkFunction(unit, state, context)
	}
}

function checkFunction(unit: FunctionUnit, state: MoveState, context: VerifierContext): void {
	const { decl } = unit
	state.flow = new Map()
	state.loops = []
	const fnScope = state.scopes.enterScope('function')
	if (decl.receiver) {
		const r = decl.receiver
		state.scopes.declareBinding(r.name, r.mutable, r.type, r.span, 'receiver')
	}
	for (const p of decl.params) state.scopes.declareBinding(p.name, p.mutable, p.type, p.span, 'param')
	checkBlock(decl.body, state, context)
	state.scopes.exitScope(fnScope)
}

// =============================================================================
// REPORTING
// =============================================================================

function report(
	code: DiagnosticCode,
	span: Span | undefined,
	args: DiagnosticArgs,
	state: MoveState,
	context: VerifierContext
): void {
	if (state.silent > 0) return
	context.emit(code, span, args)
}

const MOVED_CODES: Record<MoveReason, DiagnosticCode> = {
	conditional: 'KPMOVE003',
	moved: 'KPMOVE001',
	uninitialized: 'KPMOVE004',
}

function setState(id: BindingId, next: OwnershipState, state: MoveState): void {
	if (state.flow === null) return
	if (next.kind === 'Owned') state.flow.delete(id)
	else state.flow.set(id, next)
}

/**
 * Report a use of `binding` (or of the field path inside it) that its
 * current ownership state does not allow.
 */
function checkUsable(
	binding: Binding,
	path: readonly string[],
	span: Span | undefined,
	state: MoveState,
	context: VerifierContext
): void {
	if (state.flow === null || binding.origin === 'global') return
	const current = stateOf(state.flow, binding.id)
	switch (current.kind) {
		case 'Owned':
			return
		case 'Moved':
			report(MOVED_CODES[current.reason], span, { name: binding.name }, state, context)
			return
		case 'PartiallyMoved': {
			const key = path.join('.')
			const fields = [...current.fields].sort()
			const qualify = (f: string): string => `${binding.name}.${f}`
			if (key === '') {
				report('KPMOVE002', span, { fields: fields.map(qualify), name: binding.name }, state, context)
				return
			}
			const movedAncestor = fields.find((f) => isWithin(key, f))
			if (movedAncestor !== undefined) {
				report('KPMOVE005', span, { place: qualify(movedAncestor) }, state, context)
				return
			}
			const inner = fields.filter((f) => isWithin(f, key))
			if (inner.length > 0) {
				report('KPMOVE002', span, { fields: inner.map(qualify), name: qualify(key) }, state, context)
			}
			return
		}
		default:
			assertNever(current, 'ownership state')
	}
}

// =============================================================================
// STATEMENTS
// =============================================================================

function checkBlock(block: Block, state: MoveState, context: VerifierContext, declare?: () => void): void {
	const id = state.scopes.enterScope('block')
	declare?.()
	for (const stmt of block.statements) {
		if (state.flow === null) break
		checkStmt(stmt, state, context)
	}
	state.scopes.exitScope(id)
}

function checkStmt(stmt: Stmt, state: MoveState, context: VerifierContext): void {
	switch (stmt.kind) {
		case 'Let':
			checkLet(stmt, state, context)
			break
		case 'Assign':
			checkAssign(stmt, state, context)
			break
		case 'Expr':
			useExpr(stmt.expr, 'read', state, context)
			break
		case 'Return':
			if (stmt.value) useExpr(stmt.value, 'move', state, context)
			state.flow = null
			break
		case 'If': {
			useExpr(stmt.condition, 'read', state, context)
			const before = state.flow
			state.flow = cloneFlow(before)
			checkBlock(stmt.then, state, context)
			const afterThen = state.flow
			state.flow = cloneFlow(before)
			if (stmt.else) checkBlock(stmt.else, state, context)
			state.flow = joinFlows([afterThen, state.flow])
			break
		}
		case 'While':
		case 'Loop':
			checkLoop(stmt, state, context)
			break
		case 'ForIn':
			useExpr(stmt.iterable, 'move', state, context)
			checkLoop(stmt, state, context)
			break
		case 'Block':
		case 'Unsafe':
			checkBlock(stmt.body, state, context)
			break
		case 'Break':
		case 'Continue': {
			const frame = state.loops.at(-1)
			if (frame === undefined) throw new InternalError(`\`${stmt.kind.toLowerCase()}\` outside of a loop`)
			const exits = stmt.kind === 'Break' ? frame.breaks : frame.continues
			if (state.flow !== null) exits.push(new Map(state.flow))
			state.flow = null
			break
		}
		default:
			assertNever(stmt, 'statement')
	}
}

function isOnceClosure(expr: Expr, state: MoveState): boolean {
	if (expr.kind === 'Closure') {
		return analyzeClosureIn(expr, state).capability === Capability.CallableOnce
	}
	if (expr.kind === 'Ident') {
		const binding = state.scopes.lookup(expr.name)
		return binding !== null && state.onceClosures.has(binding.id)
	}
	return false
}

function checkLet(stmt: LetStmt, state: MoveState, context: VerifierContext): void {
	const once = stmt.init !== undefined && isOnceClosure(stmt.init, state)
	if (stmt.init) useExpr(stmt.init, 'move', state, context)
	const id = state.scopes.declareBinding(stmt.name, stmt.mutable, stmt.type, stmt.span)
	if (!stmt.init) setState(id, moved('uninitialized', stmt.span), state)
	if (once) state.onceClosures.add(id)
}

function checkAssign(stmt: AssignStmt, state: MoveState, context: VerifierContext): void {
	const once = isOnceClosure(stmt.value, state)
	useExpr(stmt.value, 'move', state, context)

	const place = placeOf(stmt.target)
	if (place === null || !isOwnedPath(place)) {
		useExpr(stmt.target, 'read', state, context)
		return
	}

	const binding = state.scopes.resolve(place.root.name)
	const span = stmt.target.span ?? stmt.span
	if (stmt.op !== undefined) checkUsable(binding, place.path, span, state, context)

	if (place.path.length === 0) {
		setState(binding.id, OWNED, state)
		if (once) state.onceClosures.add(binding.id)
		else state.onceClosures.delete(binding.id)
		return
	}

	if (state.flow === null) return
	const current = stateOf(state.flow, binding.id)
	if (current.kind === 'Moved') {
		checkUsable(binding, [], span, state, context)
		return
	}
	setState(binding.id, withFieldAssigned(current, place.path.join('.')), state)
}

// =============================================================================
// LOOPS
// =============================================================================

type LoopLike = WhileStmt | LoopStmt | ForInStmt

interface LoopPass {
	/** State flowing back to the loop head */
	readonly backEdge: FlowState
	/** State after the loop */
	readonly exit: FlowState
}

function runLoopBody(
	stmt: LoopLike,
	entry: FlowState,
	state: MoveState,
	context: VerifierContext
): LoopPass {
	state.flow = cloneFlow(entry)
	if (stmt.kind === 'While') useExpr(stmt.condition, 'read', state, context)
	const afterHead = cloneFlow(state.flow)

	const frame: LoopFrame = { breaks: [], continues: [] }
	state.loops.push(frame)
	checkBlock(stmt.body, state, context, () => {
		if (stmt.kind === 'ForIn') state.scopes.declareBinding(stmt.name, stmt.mutable, stmt.type, stmt.span)
	})
	state.loops.pop()

	const backEdge = pruneDead(joinFlows([state.flow, ...frame.continues]), state.scopes)
	const breaks = frame.breaks.map((b) => pruneDead(b, state.scopes))
	const exit = stmt.kind === 'Loop' ? joinFlows(breaks) : joinFlows([afterHead, ...breaks])
	return { backEdge, exit }
}

/**
 * Run the body silently until the state at the loop head is stable, then
 * check it once with that state.
 */
function checkLoop(stmt: LoopLike, state: MoveState, context: VerifierContext): void {
	const initial = state.flow
	if (initial === null) return

	let entry: FlowState = initial
	state.silent++
	for (let round = 0; round < MAX_LOOP_ROUNDS; round++) {
		const { backEdge } = runLoopBody(stmt, entry, state, context)
		const next = joinFlows([initial, backEdge])
		if (sameFlow(next, entry)) break
		entry = next
	}
	state.silent--

	state.flow = runLoopBody(stmt, entry, state, context).exit
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

function useExprs(exprs: readonly Expr[], mode: UseMode, state: MoveState, context: VerifierContext): void {
	for (const expr of exprs) useExpr(expr, mode, state, context)
}

function usePlace(
	root: IdentExpr,
	path: readonly string[],
	expr: Expr,
	mode: UseMode,
	state: MoveState,
	context: VerifierContext
): void {
	const binding = state.scopes.resolve(root.name)
	const span = expr.span ?? root.span
	checkUsable(binding, path, span, state, context)
	if (mode === 'read' || binding.origin === 'global' || state.copy.isCopy(expr.type)) return
	if (state.flow === null) return
	const next =
		path.length === 0
			? moved('moved', span)
			: withFieldMoved(stateOf(state.flow, binding.id), path.join('.'), span)
	setState(binding.id, next, state)
}

function useArgs(
	args: readonly Expr[],
	signature: CallableSignature,
	state: MoveState,
	context: VerifierContext
): void {
	args.forEach((arg, i) => {
		useExpr(arg, isOwningParam(signature.params[i]) ? 'move' : 'read', state, context)
	})
}

function useCallee(callee: Expr, state: MoveState, context: VerifierContext): void {
	if (callee.kind !== 'Ident') {
		useExpr(callee, 'read', state, context)
		return
	}
	const binding = state.scopes.resolve(callee.name)
	checkUsable(binding, [], callee.span, state, context)
	if (state.onceClosures.has(binding.id)) setState(binding.id, moved('moved', callee.span), state)
}

function analyzeClosureIn(expr: ClosureExpr, state: MoveState): ClosureAnalysis {
	return analyzeClosure(expr, { copy: state.copy, lookup: (name) => state.scopes.lookup(name) })
}

/**
 * The body is checked on a copy of the current state; creating the closure
 * then moves every binding it captures by value.
 */
function useClosure(expr: ClosureExpr, state: MoveState, context: VerifierContext): void {
	const analysis = analyzeClosureIn(expr, state)

	const saved = state.flow
	const savedLoops = state.loops
	state.flow = cloneFlow(saved)
	state.loops = []
	const scope = state.scopes.enterScope('closure')
	for (const p of expr.params) state.scopes.declareBinding(p.name, p.mutable, p.type, p.span, 'param')
	checkBlock(expr.body, state, context)
	state.scopes.exitScope(scope)
	state.flow = saved
	state.loops = savedLoops

	for (const capture of analysis.captures) {
		checkUsable(capture.binding, [], capture.span ?? expr.span, state, context)
		if (capture.mode === 'Move') setState(capture.binding.id, moved('moved', expr.span), state)
	}
}

function useExpr(expr: Expr, mode: UseMode, state: MoveState, context: VerifierContext): void {
	switch (expr.kind) {
		case 'Literal':
			break
		case 'Ident':
			usePlace(expr, [], expr, mode, state, context)
			break
		case 'Field': {
			const place = placeOf(expr)
			if (place !== null && isOwnedPath(place)) usePlace(place.root, place.path, expr, mode, state, context)
			else useExpr(expr.object, 'read', state, context)
			break
		}
		case 'Index':
			useExpr(expr.object, 'read', state, context)
			useExpr(expr.index, 'read', state, context)
			break
		case 'Borrow':
		case 'Deref':
		case 'Unary':
		case 'Cast':
			useExpr(expr.operand, 'read', state, context)
			break
		case 'Call':
			useCallee(expr.callee, state, context)
			useArgs(expr.args, expr.signature, state, context)
			break
		case 'MethodCall':
			useExpr(expr.receiver, takesReceiverByValue(expr.signature) ? 'move' : 'read', state, context)
			useArgs(expr.args, expr.signature, state, context)
			break
		case 'StructLit':
			useExprs(
				expr.fields.map((f) => f.value),
				'move',
				state,
				context
			)
			break
		case 'Tuple':
		case 'Array':
			useExprs(expr.elements, 'move', state, context)
			break
		case 'Binary':
			useExpr(expr.left, 'read', state, context)
			useExpr(expr.right, 'read', state, context)
			break
		case 'Closure':
			useClosure(expr, state, context)
			break
		default:
			assertNever(expr, 'expression')
	}
}
