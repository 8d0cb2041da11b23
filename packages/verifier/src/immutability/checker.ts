/**
 * Phase 1: immutability.
 *
 * - Assignments only through mutable bindings or exclusive references
 * - Mutation markers at call sites agree with the callee's contract
 * - Non-mutating methods never use their receiver mutably
 * - Impl methods keep the mutability their contract declares
 * - Raw-pointer dereferences and unsafe callables only inside `unsafe`
 */

import type {
	AssignStmt,
	Block,
	CallableSignature,
	Expr,
	FunctionDecl,
	ImplDecl,
	MethodCallExpr,
	Program,
	Span,
	Stmt,
} from '../core/ast.ts'
import type { VerifierContext } from '../core/context.ts'
import { assertNever } from '../core/errors.ts'
import type { ContractTable } from '../core/oracles.ts'
import { derefStep, placeOf, placeText } from '../core/places.ts'
import { isMutableReference } from '../core/types.ts'
import { createGlobalTable, type FunctionUnit, functionsOf } from '../scope/globals.ts'
import type { Binding, BindingId, ScopeKind, ScopeTable } from '../scope/table.ts'
import { isRawPointerExpr } from './unsafe.ts'

export interface ImmutabilityOptions {
	readonly contracts: ContractTable
	/** Polled between functions; true stops the phase */
	readonly shouldStop?: () => boolean
}

interface MethodFrame {
	readonly decl: FunctionDecl
	readonly receiver: BindingId
}

interface ImmutabilityState {
	readonly scopes: ScopeTable
	readonly contracts: ContractTable
	method: MethodFrame | null
	unsafeDepth: number
	/** Bindings initialized from a pointer-yielding expression */
	readonly pointerBindings: Set<BindingId>
	/** Immutable bindings declared without a value and definitely not yet assigned */
	deferred: Set<BindingId>
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export function checkImmutability(program: Program, context: VerifierContext, options: ImmutabilityOptions): void {
	const state: ImmutabilityState = {
		contracts: options.contracts,
		deferred: new Set(),
		method: null,
		pointerBindings: new Set(),
		scopes: createGlobalTable(program),
		unsafeDepth: 0,
	}

	for (const item of program.items) {
		if (item.kind === 'Const') checkExpr(item.value, state, context)
		else if (item.kind === 'Impl') checkConformance(item, state, context)
	}

	for (const unit of functionsOf(program)) {
		if (options.shouldStop?.()) return
		checkFunction(unit, state, context)
	}
}

// =============================================================================
// DECLARATIONS
// =============================================================================

function mutabilityLabel(mutating: boolean): string {
	return mutating ? 'mutating' : 'non-mutating'
}

function checkConformance(impl: ImplDecl, state: ImmutabilityState, context: VerifierContext): void {
	for (const method of impl.methods) {
		const entry = state.contracts.get(impl.contract, method.name)
		if (entry === undefined || entry.mutating === method.mutating) continue
		context.emit('KPIMM030', method.span ?? impl.span, {
			contract: impl.contract,
			expected: mutabilityLabel(entry.mutating),
			found: mutabilityLabel(method.mutating),
			method: method.name,
			target: impl.target,
		})
	}
}

function checkFunction(unit: FunctionUnit, state: ImmutabilityState, context: VerifierContext): void {
	const { decl } = unit
	const scopes = state.scopes
	const fnScope = scopes.enterScope('function')
	state.method = null
	state.unsafeDepth = 0
	state.deferred = new Set()

	if (decl.receiver) {
		const receiver = decl.receiver
		const exclusive = isMutableReference(receiver.type)
		if (!decl.mutating && (receiver.mutable || exclusive)) {
			context.emit('KPIMM020', receiver.span ?? decl.span, {
				method: decl.name,
				receiver: receiver.name,
			})
		}
		const mutable = decl.mutating || receiver.mutable || exclusive
		const id = scopes.declareBinding(receiver.name, mutable, receiver.type, receiver.span, 'receiver')
		state.method = { decl, receiver: id }
	}
	for (const param of decl.params) {
		scopes.declareBinding(param.name, param.mutable, param.type, param.span, 'param')
	}

	checkBlock(decl.body, 'block', state, context)
	scopes.exitScope(fnScope)
	state.method = null
}

// =============================================================================
// STATEMENTS
// =============================================================================

function checkBlock(block: Block, kind: ScopeKind, state: ImmutabilityState, context: VerifierContext): void {
	const id = state.scopes.enterScope(kind)
	for (const stmt of block.statements) checkStmt(stmt, state, context)
	state.scopes.exitScope(id)
}

/**
 * Check a block that may run any number of times: outer bindings still
 * waiting for their first value cannot be assigned inside it.
 */
function checkRepeatedBlock(
	block: Block,
	kind: ScopeKind,
	state: ImmutabilityState,
	context: VerifierContext,
	declare?: () => void
): void {
	const saved = state.deferred
	state.deferred = new Set()
	const id = state.scopes.enterScope(kind)
	declare?.()
	for (const stmt of block.statements) checkStmt(stmt, state, context)
	state.scopes.exitScope(id)
	state.deferred = saved
}

function checkStmt(stmt: Stmt, state: ImmutabilityState, context: VerifierContext): void {
	switch (stmt.kind) {
		case 'Let': {
			if (stmt.init) checkExpr(stmt.init, state, context)
			const id = state.scopes.declareBinding(stmt.name, stmt.mutable, stmt.type, stmt.span)
			if (stmt.init && isRawPointerExpr(stmt.init, (name) => isPointerBinding(name, state))) {
				state.pointerBindings.add(id)
			}
			if (!stmt.init && !stmt.mutable) state.deferred.add(id)
			break
		}
		case 'Assign':
			checkExpr(stmt.value, state, context)
			checkExpr(stmt.target, state, context)
			checkAssignTarget(stmt, state, context)
			break
		case 'Expr':
			checkExpr(stmt.expr, state, context)
			break
		case 'Return':
			if (stmt.value) checkExpr(stmt.value, state, context)
			break
		case 'If': {
			checkExpr(stmt.condition, state, context)
			const before = state.deferred
			state.deferred = new Set(before)
			checkBlock(stmt.then, 'block', state, context)
			const afterThen = state.deferred
			state.deferred = new Set(before)
			if (stmt.else) checkBlock(stmt.else, 'block', state, context)
			const afterElse = state.deferred
			state.deferred = new Set([...afterThen].filter((id) => afterElse.has(id)))
			break
		}
		case 'While':
			checkExpr(stmt.condition, state, context)
			checkRepeatedBlock(stmt.body, 'loop', state, context)
			break
		case 'Loop':
			checkRepeatedBlock(stmt.body, 'loop', state, context)
			break
		case 'ForIn':
			checkExpr(stmt.iterable, state, context)
			checkRepeatedBlock(stmt.body, 'loop', state, context, () => {
				state.scopes.declareBinding(stmt.name, stmt.mutable, stmt.type, stmt.span)
			})
			break
		case 'Block':
			checkBlock(stmt.body, 'block', state, context)
			break
		case 'Unsafe':
			state.unsafeDepth++
			checkBlock(stmt.body, 'unsafe', state, context)
			state.unsafeDepth--
			break
		case 'Break':
		case 'Continue':
			break
		default:
			assertNever(stmt, 'statement')
	}
}

// =============================================================================
// MUTATION
// =============================================================================

function isPointerBinding(name: string, state: ImmutabilityState): boolean {
	const binding = state.scopes.lookup(name)
	return binding !== null && state.pointerBindings.has(binding.id)
}

/**
 * The receiver of a non-mutating method, used without mutable access.
 */
function isFrozenReceiver(binding: Binding, state: ImmutabilityState): boolean {
	const method = state.method
	return method !== null && method.receiver === binding.id && !method.decl.mutating && !binding.mutable
}

function isMutatingReceiver(binding: Binding, state: ImmutabilityState): boolean {
	const method = state.method
	return method !== null && method.receiver === binding.id && method.decl.mutating
}

function emitFrozenReceiver(binding: Binding, span: Span | undefined, state: ImmutabilityState, context: VerifierContext): void {
	context.emit('KPIMM020', span, {
		method: state.method?.decl.name ?? '',
		receiver: binding.name,
	})
}

function checkAssignTarget(stmt: AssignStmt, state: ImmutabilityState, context: VerifierContext): void {
	const place = placeOf(stmt.target)
	if (place === null) return
	const binding = state.scopes.resolve(place.root.name)
	const span = stmt.target.span ?? stmt.span

	if (isFrozenReceiver(binding, state)) {
		emitFrozenReceiver(binding, span, state, context)
		return
	}

	if (place.derefs.length > 0) {
		if (isMutatingReceiver(binding, state)) return
		if (place.derefs.some((step) => step.through === 'ref' && !step.mutable)) {
			context.emit('KPIMM003', span, { name: binding.name })
		}
		return
	}

	if (binding.mutable) return

	const whole = place.path.length === 0 && !place.indexed
	if (whole && state.deferred.has(binding.id)) {
		state.deferred.delete(binding.id)
		return
	}

	if (whole) context.emit('KPIMM001', span, { name: binding.name })
	else context.emit('KPIMM002', span, { name: binding.name, place: placeText(stmt.target) })
}

function checkMutatingReceiverCall(call: MethodCallExpr, state: ImmutabilityState, context: VerifierContext): void {
	const place = placeOf(call.receiver)
	if (place === null) return
	const binding = state.scopes.resolve(place.root.name)
	const span = call.receiver.span ?? call.span

	if (isFrozenReceiver(binding, state)) {
		emitFrozenReceiver(binding, span, state, context)
		return
	}

	const implied = derefStep(call.receiver.type)
	const derefs = implied ? [...place.derefs, implied] : place.derefs
	if (derefs.length > 0) {
		if (isMutatingReceiver(binding, state)) return
		if (derefs.some((step) => step.through === 'ref' && !step.mutable)) {
			context.emit('KPIMM003', span, { name: binding.name })
		}
		return
	}

	if (!binding.mutable) context.emit('KPIMM004', span, { method: call.method, name: binding.name })
}

function checkMutableBorrow(operand: Expr, span: Span | undefined, state: ImmutabilityState, context: VerifierContext): void {
	const place = placeOf(operand)
	if (place === null || place.derefs.length > 0) return
	const binding = state.scopes.resolve(place.root.name)
	if (isFrozenReceiver(binding, state)) {
		emitFrozenReceiver(binding, span, state, context)
		return
	}
	if (!binding.mutable) context.emit('KPIMM005', span, { name: binding.name })
}

// =============================================================================
// CALLS
// =============================================================================

function checkCallSite(
	signature: CallableSignature,
	marker: boolean,
	span: Span | undefined,
	state: ImmutabilityState,
	context: VerifierContext
): void {
	if (signature.mutating && !marker) context.emit('KPIMM010', span, { callee: signature.name })
	if (!signature.mutating && marker) context.emit('KPIMM011', span, { callee: signature.name })
	if (signature.unsafe === true && state.unsafeDepth === 0) {
		context.emit('KPIMM040', span, { operation: signature.name })
	}
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

function checkExprs(exprs: readonly Expr[], state: ImmutabilityState, context: VerifierContext): void {
	for (const expr of exprs) checkExpr(expr, state, context)
}

function checkExpr(expr: Expr, state: ImmutabilityState, context: VerifierContext): void {
	switch (expr.kind) {
		case 'Literal':
		case 'Ident':
			break
		case 'Field':
			checkExpr(expr.object, state, context)
			break
		case 'Index':
			checkExpr(expr.object, state, context)
			checkExpr(expr.index, state, context)
			break
		case 'Borrow':
			checkExpr(expr.operand, state, context)
			if (expr.mutable) checkMutableBorrow(expr.operand, expr.span, state, context)
			break
		case 'Deref':
			checkExpr(expr.operand, state, context)
			if (state.unsafeDepth === 0 && isRawPointerExpr(expr.operand, (name) => isPointerBinding(name, state))) {
				context.emit('KPIMM040', expr.span, { operation: placeText(expr) })
			}
			break
		case 'Call':
			checkExpr(expr.callee, state, context)
			checkExprs(expr.args, state, context)
			checkCallSite(expr.signature, expr.mutationMarker, expr.span, state, context)
			break
		case 'MethodCall':
			checkExpr(expr.receiver, state, context)
			checkExprs(expr.args, state, context)
			checkCallSite(expr.signature, expr.mutationMarker, expr.span, state, context)
			if (expr.signature.mutating) checkMutatingReceiverCall(expr, state, context)
			break
		case 'StructLit':
			checkExprs(
				expr.fields.map((f) => f.value),
				state,
				context
			)
			break
		case 'Tuple':
		case 'Array':
			checkExprs(expr.elements, state, context)
			break
		case 'Binary':
			checkExpr(expr.left, state, context)
			checkExpr(expr.right, state, context)
			break
		case 'Unary':
		case 'Cast':
			checkExpr(expr.operand, state, context)
			break
		case 'Closure':
			checkRepeatedBlock(expr.body, 'closure', state, context, () => {
				for (const param of expr.params) {
					state.scopes.declareBinding(param.name, param.mutable, param.type, param.span, 'param')
				}
			})
			break
		default:
			assertNever(expr, 'expression')
	}
}
