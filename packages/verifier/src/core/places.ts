/**
 * Places: expressions that denote storage (`x`, `s.f`, `v[i]`, `*r`).
 */

import type { CallableSignature, CallExpr, Expr, IdentExpr, ParamSig, TypeRef } from './ast.ts'
import { isRawPointer, isReference } from './types.ts'

/**
 * A reference or pointer dereferenced on the way from the root to the place,
 * either explicitly (`*r`) or by field access on a reference (`r.f`).
 */
export interface DerefStep {
	readonly through: 'ref' | 'ptr'
	readonly mutable: boolean
}

export interface Place {
	readonly root: IdentExpr
	/** Field names from the root, outermost first */
	readonly path: readonly string[]
	/** The path goes through an index */
	readonly indexed: boolean
	readonly derefs: readonly DerefStep[]
}

/**
 * The dereference implied by using a value of this type as a place.
 */
export function derefStep(type: TypeRef): DerefStep | null {
	if (isReference(type)) return { mutable: type.mutable, through: 'ref' }
	if (isRawPointer(type)) return { mutable: type.mutable, through: 'ptr' }
	return null
}

function withStep(place: Place, step: DerefStep | null): readonly DerefStep[] {
	return step ? [...place.derefs, step] : place.derefs
}

/**
 * Resolve an expression to the place it denotes, or null for values that are
 * not places (calls, literals, arithmetic).
 */
export function placeOf(expr: Expr): Place | null {
	switch (expr.kind) {
		case 'Ident':
			return { derefs: [], indexed: false, path: [], root: expr }
		case 'Field': {
			const base = placeOf(expr.object)
			if (base === null) return null
			return {
				...base,
				derefs: withStep(base, derefStep(expr.object.type)),
				path: [...base.path, expr.field],
			}
		}
		case 'Index': {
			const base = placeOf(expr.object)
			if (base === null) return null
			return { ...base, derefs: withStep(base, derefStep(expr.object.type)), indexed: true }
		}
		case 'Deref': {
			const base = placeOf(expr.operand)
			if (base === null) return null
			return { ...base, derefs: withStep(base, derefStep(expr.operand.type)) }
		}
		default:
			return null
	}
}

/**
 * A place inside the root binding's own storage: no dereference, no index.
 */
export function isOwnedPath(place: Place): boolean {
	return place.derefs.length === 0 && !place.indexed
}

/**
 * Render an expression for diagnostics.
 */
export function placeText(expr: Expr): string {
	switch (expr.kind) {
		case 'Ident':
			return expr.name
		case 'Field':
			return `${placeText(expr.object)}.${expr.field}`
		case 'Index':
			return `${placeText(expr.object)}[..]`
		case 'Deref':
			return `*${placeText(expr.operand)}`
		case 'Borrow':
			return `&${expr.mutable ? 'mut ' : ''}${placeText(expr.operand)}`
		case 'Call':
			return `${expr.signature.name}(..)`
		case 'MethodCall':
			return `${placeText(expr.receiver)}.${expr.method}(..)`
		case 'Literal':
			return String(expr.value)
		default:
			return '_'
	}
}

// =============================================================================
// CALLS
// =============================================================================

/**
 * Allocation routines whose result is a raw pointer.
 */
export const ALLOCATION_NAMES: readonly string[] = ['alloc', 'malloc', 'calloc', 'realloc']

export function calleeName(expr: CallExpr): string {
	return expr.callee.kind === 'Ident' ? expr.callee.name : expr.signature.name
}

export function isAllocationCall(expr: Expr): boolean {
	return expr.kind === 'Call' && ALLOCATION_NAMES.includes(calleeName(expr))
}

/**
 * Whether an argument bound to this parameter is passed by value. Arguments
 * beyond the declared parameters are treated as owned.
 */
export function isOwningParam(param: ParamSig | undefined): boolean {
	return param === undefined || !(isReference(param.type) || isRawPointer(param.type))
}

/**
 * Whether a method call consumes its receiver.
 */
export function takesReceiverByValue(signature: CallableSignature): boolean {
	return signature.receiver === 'value'
}

/**
 * Elements of an aggregate literal with the label each one is stored under.
 */
export function aggregateElements(expr: Expr): Array<{ label: string; value: Expr }> | null {
	switch (expr.kind) {
		case 'StructLit':
			return expr.fields.map((f) => ({ label: f.name, value: f.value }))
		case 'Tuple':
			return expr.elements.map((value, i) => ({ label: String(i), value }))
		case 'Array':
			return expr.elements.map((value, i) => ({ label: `[${i}]`, value }))
		default:
			return null
	}
}
