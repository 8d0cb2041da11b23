/**
 * Phase 4: lifetimes.
 *
 * Regions are scope depths: a reference to a binding declared at depth d is
 * valid while scopes at depth d are live. A reference may only flow into a
 * slot that dies no later than its referent:
 * - returned references must not point into the function's own locals
 * - aggregate literals must not hold references deeper than their slot
 * - a reference stored into an outer binding must not outlive its referent
 */

import type {
	AssignStmt,
	Block,
	ClosureExpr,
	Expr,
	LetStmt,
	MethodCallExpr,
	Program,
	Span,
	Stmt,
} from '../core/ast.ts'
import type { VerifierContext } from '../core/context.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import { assertNever } from '../core/errors.ts'
import type { CopyOracle } from '../core/oracles.ts'
import { aggregateElements, placeOf, placeText, takesReceiverByValue } from '../core/places.ts'
import { containsReference } from '../core/types.ts'
import { visitExpr } from '../core/visit.ts'
import { analyzeClosure } from '../borrows/closures.ts'
import { createGlobalTable, type FunctionUnit, functionsOf } from '../scope/globals.ts'
import type { Binding, BindingId, ScopeKind, ScopeTable } from '../scope/table.ts'

export interface LifetimeOptions {
	readonly copy: CopyOracle
	/** Polled between functions; true stops the phase */
	readonly shouldStop?: () => boolean
}

/**
 * The region a reference value points into, with the binding it borrows.
 */
export interface Region {
	readonly depth: number
	readonly referent: string
}

interface LifetimeState {
	readonly scopes: ScopeTable
	readonly copy: CopyOracle
	/** Region each reference-holding binding currently points into */
	readonly regions: Map<BindingId, Region>
	/** Deepest region a `return` may hand out, innermost callable last */
	readonly returnDepths: number[]
}

/** Depth of the function scope that holds receiver and parameters */
const FUNCTION_DEPTH = 1

// =============================================================================
// ENTRY POINT
// =============================================================================

export function checkLifetimes(program: Program, context: VerifierContext, options: LifetimeOptions): void {
	const state: LifetimeState = {
		copy: options.copy,
		regions: new Map(),
		returnDepths: [],
		scopes: createGlobalTable(program),
	}

	for (const unit of functionsOf(program)) {
		if (options.shouldStop?.()) return
		checkFunction(unit, state, context)
	}
}

function checkFunction(unit: FunctionUnit, state: LifetimeState, context: VerifierContext): void {
	const { decl } = unit
	const fnScope = state.scopes.enterScope('function')
	if (decl.receiver) {
		const r = decl.receiver
		state.scopes.declareBinding(r.name, r.mutable, r.type, r.span, 'receiver')
	}
	for (const p of decl.params) state.scopes.declareBinding(p.name, p.mutable, p.type, p.span, 'param')
	state.returnDepths.push(FUNCTION_DEPTH)
	checkBlock(decl.body, 'block', state, context)
	state.returnDepths.pop()
	state.scopes.exitScope(fnScope)
}

function report(code: DiagnosticCode, span: Span | undefined, args: DiagnosticArgs, context: VerifierContext): void {
	context.emit(code, span, args)
}

// =============================================================================
// REGIONS
// =============================================================================

function deeper(a: Region | null, b: Region | null): Region | null {
	if (a === null) return b
	if (b === null) return a
	return b.depth > a.depth ? b : a
}

function deepestOf(regions: ReadonlyArray<Region | null>): Region | null {
	return regions.reduce<Region | null>(deeper, null)
}

/**
 * Region recorded for a binding. Reference parameters and receivers point
 * into the caller, which outlives the function scope they are declared in.
 */
function regionOfBinding(binding: Binding, state: LifetimeState): Region | null {
	const recorded = state.regions.get(binding.id)
	if (recorded !== undefined) return recorded
	if ((binding.origin === 'param' || binding.origin === 'receiver') && containsReference(binding.type)) {
		return { depth: binding.depth, referent: binding.name }
	}
	return null
}

function regionOfBorrow(operand: Expr, state: LifetimeState): Region | null {
	const place = placeOf(operand)
	if (place === null) return regionOf(operand, state)
	const root = state.scopes.resolve(place.root.name)
	if (place.derefs.length > 0) return regionOfBinding(root, state) ?? { depth: root.depth, referent: root.name }
	return { depth: root.depth, referent: root.name }
}

function regionOfClosure(expr: ClosureExpr, state: LifetimeState): Region | null {
	const analysis = analyzeClosure(expr, { copy: state.copy, lookup: (name) => state.scopes.lookup(name) })
	return deepestOf(
		analysis.captures.map((capture) =>
			capture.mode === 'Move'
				? regionOfBinding(capture.binding, state)
				: { depth: capture.binding.depth, referent: capture.binding.name }
		)
	)
}

/**
 * A receiver taken by reference is borrowed for the call, unless it is
 * already a reference.
 */
function regionOfReceiver(expr: MethodCallExpr, state: LifetimeState): Region | null {
	if (takesReceiverByValue(expr.signature) || containsReference(expr.receiver.type)) {
		return regionOf(expr.receiver, state)
	}
	return regionOfBorrow(expr.receiver, state)
}

/**
 * The region a value points into, or null for values that hold no
 * reference to a local.
 */
function regionOf(expr: Expr, state: LifetimeState): Region | null {
	switch (expr.kind) {
		case 'Literal':
		case 'Binary':
		case 'Unary':
		case 'Cast':
			return null
		case 'Ident': {
			const binding = state.scopes.resolve(expr.name)
			return binding.origin === 'global' ? null : regionOfBinding(binding, state)
		}
		case 'Field':
		case 'Index':
			return containsReference(expr.type) ? regionOf(expr.object, state) : null
		case 'Deref':
			return containsReference(expr.type) ? regionOf(expr.operand, state) : null
		case 'Borrow':
			return regionOfBorrow(expr.operand, state)
		case 'Call':
			if (!containsReference(expr.type)) return null
			return deepestOf(expr.args.map((arg) => regionOf(arg, state))) ?? { depth: 0, referent: expr.signature.name }
		case 'MethodCall':
			if (!containsReference(expr.type)) return null
			return (
				deepestOf([
					regionOfReceiver(expr, state),
					...expr.args.map((arg) => regionOf(arg, state)),
				]) ?? { depth: 0, referent: expr.signature.name }
			)
		case 'StructLit':
		case 'Tuple':
		case 'Array':
			return deepestOf((aggregateElements(expr) ?? []).map((element) => regionOf(element.value, state)))
		case 'Closure':
			return regionOfClosure(expr, state)
		default:
			return assertNever(expr, 'expression')
	}
}

// =============================================================================
// RULES
// =============================================================================

/**
 * Every element of an aggregate literal must outlive the slot the
 * aggregate is stored in.
 */
function checkConstruction(value: Expr, slotDepth: number, state: LifetimeState, context: VerifierContext): boolean {
	const elements = aggregateElements(value)
	if (elements === null) return false
	for (const element of elements) {
		const region = regionOf(element.value, state)
		if (region !== null && region.depth > slotDepth) {
			report(
				'KPLIFE002',
				element.value.span ?? value.span,
				{ field: element.label, name: region.referent },
				context
			)
		}
	}
	return true
}

function checkReturn(value: Expr, state: LifetimeState, context: VerifierContext): void {
	const returnDepth = state.returnDepths.at(-1) ?? FUNCTION_DEPTH
	if (checkConstruction(value, returnDepth, state, context)) return
	const region = regionOf(value, state)
	if (region !== null && region.depth > returnDepth) {
		report('KPLIFE001', value.span, { name: region.referent }, context)
	}
}

function checkLet(stmt: LetStmt, state: LifetimeState, context: VerifierContext): void {
	const region = stmt.init ? regionOf(stmt.init, state) : null
	const id = state.scopes.declareBinding(stmt.name, stmt.mutable, stmt.type, stmt.span)
	if (stmt.init) checkConstruction(stmt.init, state.scopes.regionDepth(id), state, context)
	if (region !== null) state.regions.set(id, region)
}

/**
 * The slot is the target's root binding, or, when the target goes through
 * a reference, the region that reference points into.
 */
function checkAssign(stmt: AssignStmt, state: LifetimeState, context: VerifierContext): void {
	const place = placeOf(stmt.target)
	if (place === null) return
	const root = state.scopes.resolve(place.root.name)
	const slotDepth = place.derefs.length === 0 ? root.depth : (regionOfBinding(root, state)?.depth ?? root.depth)
	const region = regionOf(stmt.value, state)

	if (!checkConstruction(stmt.value, slotDepth, state, context) && region !== null && region.depth > slotDepth) {
		report(
			'KPLIFE003',
			stmt.value.span ?? stmt.span,
			{ name: region.referent, target: placeText(stmt.target) },
			context
		)
	}

	if (place.derefs.length > 0 || root.origin === 'global') return
	if (place.path.length === 0 && !place.indexed) {
		if (region === null) state.regions.delete(root.id)
		else state.regions.set(root.id, region)
		return
	}
	const widened = deeper(state.regions.get(root.id) ?? null, region)
	if (widened !== null) state.regions.set(root.id, widened)
}

// =============================================================================
// TRAVERSAL
// =============================================================================

/**
 * Closure bodies are checked where the closure occurs, with their own
 * return depth.
 */
function checkClosures(expr: Expr, state: LifetimeState, context: VerifierContext): void {
	visitExpr(expr, {
		expr: (e) => {
			if (e.kind !== 'Closure') return true
			const scope = state.scopes.enterScope('closure')
			for (const p of e.params) state.scopes.declareBinding(p.name, p.mutable, p.type, p.span, 'param')
			state.returnDepths.push(state.scopes.depth())
			checkBlock(e.body, 'block', state, context)
			state.returnDepths.pop()
			state.scopes.exitScope(scope)
			return false
		},
	})
}

function checkBlock(
	block: Block,
	kind: ScopeKind,
	state: LifetimeState,
	context: VerifierContext,
	declare?: () => void
): void {
	const id = state.scopes.enterScope(kind)
	declare?.()
	for (const stmt of block.statements) checkStmt(stmt, state, context)
	state.scopes.exitScope(id)
}

function checkStmt(stmt: Stmt, state: LifetimeState, context: VerifierContext): void {
	switch (stmt.kind) {
		case 'Let':
			if (stmt.init) checkClosures(stmt.init, state, context)
			checkLet(stmt, state, context)
			break
		case 'Assign':
			checkClosures(stmt.value, state, context)
			checkClosures(stmt.target, state, context)
			checkAssign(stmt, state, context)
			break
		case 'Expr':
			checkClosures(stmt.expr, state, context)
			break
		case 'Return':
			if (stmt.value) {
				checkClosures(stmt.value, state, context)
				checkReturn(stmt.value, state, context)
			}
			break
		case 'If':
			checkClosures(stmt.condition, state, context)
			checkBlock(stmt.then, 'block', state, context)
			if (stmt.else) checkBlock(stmt.else, 'block', state, context)
			break
		case 'While':
			checkClosures(stmt.condition, state, context)
			checkBlock(stmt.body, 'loop', state, context)
			break
		case 'Loop':
			checkBlock(stmt.body, 'loop', state, context)
			break
		case 'ForIn': {
			checkClosures(stmt.iterable, state, context)
			const region = regionOf(stmt.iterable, state)
			checkBlock(stmt.body, 'loop', state, context, () => {
				const id = state.scopes.declareBinding(stmt.name, stmt.mutable, stmt.type, stmt.span)
				if (region !== null && containsReference(stmt.type)) state.regions.set(id, region)
			})
			break
		}
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
