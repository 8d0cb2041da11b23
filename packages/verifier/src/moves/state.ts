/**
 * Ownership states and their join.
 *
 * A binding missing from an ownership map is Owned. A flow state of null
 * marks an unreachable program point, which takes no part in joins.
 */

import type { Span } from '../core/ast.ts'
import type { BindingId, ScopeTable } from '../scope/table.ts'

/**
 * Why a binding is unusable. All three mean Moved; the reason only picks the
 * diagnostic wording.
 */
export type MoveReason = 'moved' | 'uninitialized' | 'conditional'

export type OwnershipState =
	| { readonly kind: 'Owned' }
	| { readonly kind: 'Moved'; readonly reason: MoveReason; readonly at?: Span }
	| { readonly kind: 'PartiallyMoved'; readonly fields: ReadonlySet<string>; readonly at?: Span }

export type OwnershipMap = Map<BindingId, OwnershipState>

export type FlowState = OwnershipMap | null

export const OWNED: OwnershipState = { kind: 'Owned' }

export function moved(reason: MoveReason, at?: Span): OwnershipState {
	return at ? { at, kind: 'Moved', reason } : { kind: 'Moved', reason }
}

export function partiallyMoved(fields: ReadonlySet<string>, at?: Span): OwnershipState {
	return at ? { at, fields, kind: 'PartiallyMoved' } : { fields, kind: 'PartiallyMoved' }
}

export function stateOf(map: OwnershipMap, id: BindingId): OwnershipState {
	return map.get(id) ?? OWNED
}

/**
 * Join the states of one binding on two incoming paths.
 *
 * Owned survives only if Owned on both. Moved dominates; mixing it with
 * anything else, or two different reasons, gives `conditional`.
 */
export function joinStates(a: OwnershipState, b: OwnershipState): OwnershipState {
	if (a.kind === 'Owned' && b.kind === 'Owned') return OWNED
	if (a.kind === 'Moved' || b.kind === 'Moved') {
		if (a.kind === 'Moved' && b.kind === 'Moved' && a.reason === b.reason) return a
		const at = a.kind === 'Moved' ? a.at : b.kind === 'Moved' ? b.at : undefined
		return moved('conditional', at)
	}
	const fields = new Set<string>()
	for (const s of [a, b]) {
		if (s.kind === 'PartiallyMoved') for (const f of s.fields) fields.add(f)
	}
	const at = a.kind === 'PartiallyMoved' ? a.at : b.kind === 'PartiallyMoved' ? b.at : undefined
	return partiallyMoved(fields, at)
}

/**
 * Join every reachable incoming state. Returns null when none is reachable.
 */
export function joinFlows(flows: readonly FlowState[]): FlowState {
	const reachable = flows.filter((f): f is OwnershipMap => f !== null)
	const [first, ...rest] = reachable
	if (first === undefined) return null
	const result: OwnershipMap = new Map(first)
	for (const other of rest) {
		const ids = new Set([...result.keys(), ...other.keys()])
		for (const id of ids) {
			const joined = joinStates(stateOf(result, id), stateOf(other, id))
			if (joined.kind === 'Owned') result.delete(id)
			else result.set(id, joined)
		}
	}
	return result
}

function sameState(a: OwnershipState, b: OwnershipState): boolean {
	if (a.kind !== b.kind) return false
	if (a.kind === 'Moved' && b.kind === 'Moved') return a.reason === b.reason
	if (a.kind === 'PartiallyMoved' && b.kind === 'PartiallyMoved') {
		return a.fields.size === b.fields.size && [...a.fields].every((f) => b.fields.has(f))
	}
	return true
}

/**
 * Structural equality, ignoring source positions.
 */
export function sameFlow(a: FlowState, b: FlowState): boolean {
	if (a === null || b === null) return a === b
	const ids = new Set([...a.keys(), ...b.keys()])
	for (const id of ids) {
		if (!sameState(stateOf(a, id), stateOf(b, id))) return false
	}
	return true
}

export function cloneFlow(flow: FlowState): FlowState {
	return flow === null ? null : new Map(flow)
}

/**
 * Drop bindings whose scope has been exited.
 */
export function pruneDead(flow: FlowState, scopes: ScopeTable): FlowState {
	if (flow === null) return null
	const result: OwnershipMap = new Map()
	for (const [id, state] of flow) {
		if (scopes.isLive(id)) result.set(id, state)
	}
	return result
}

// =============================================================================
// FIELD PATHS
// =============================================================================

/**
 * Whether `path` is `prefix` or lies inside it (`a.b` is inside `a`).
 */
export function isWithin(path: string, prefix: string): boolean {
	return path === prefix || path.startsWith(`${prefix}.`)
}

/**
 * Mark one field path moved.
 */
export function withFieldMoved(state: OwnershipState, path: string, at?: Span): OwnershipState {
	if (state.kind === 'Moved') return state
	const fields = new Set(state.kind === 'PartiallyMoved' ? state.fields : [])
	fields.add(path)
	return partiallyMoved(fields, at)
}

/**
 * Re-initialize a field path; every moved field inside it is restored.
 */
export function withFieldAssigned(state: OwnershipState, path: string): OwnershipState {
	if (state.kind !== 'PartiallyMoved') return state
	const fields = new Set([...state.fields].filter((f) => !isWithin(f, path)))
	return fields.size === 0 ? OWNED : partiallyMoved(fields, state.at)
}
