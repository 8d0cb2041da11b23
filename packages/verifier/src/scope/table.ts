/**
 * Scope & binding table.
 *
 * Scopes live in a flat arena; a scope's parent is an index into it. The
 * stack of live scopes mirrors the lexical nesting of the walk, and every
 * binding records the depth of the scope that declared it (its region).
 *
 * Depth 0 is the module, depth 1 holds a function's receiver and
 * parameters, and depth 2 and beyond are its body and nested blocks.
 */

import type { Span, TypeRef } from '../core/ast.ts'
import { InternalError } from '../core/errors.ts'

// =============================================================================
// IDS
// =============================================================================

export type ScopeId = number & { readonly __brand: 'ScopeId' }

export function scopeId(n: number): ScopeId {
	return n as ScopeId
}

export type BindingId = number & { readonly __brand: 'BindingId' }

export function bindingId(n: number): BindingId {
	return n as BindingId
}

// =============================================================================
// RECORDS
// =============================================================================

export type ScopeKind = 'module' | 'function' | 'block' | 'loop' | 'closure' | 'unsafe'

export type BindingOrigin = 'global' | 'param' | 'receiver' | 'local'

export interface Binding {
	readonly id: BindingId
	readonly name: string
	readonly mutable: boolean
	readonly type: TypeRef
	readonly scopeId: ScopeId
	/** Region depth: depth of the declaring scope, fixed at declaration */
	readonly depth: number
	readonly origin: BindingOrigin
	readonly span?: Span
}

export interface Scope {
	readonly id: ScopeId
	/** Parent scope, or null for the module scope */
	readonly parentId: ScopeId | null
	readonly depth: number
	readonly kind: ScopeKind
	/** Bindings declared directly in this scope, in declaration order */
	readonly bindings: BindingId[]
	/** Latest binding per name; a redeclaration replaces the entry */
	readonly names: Map<string, BindingId>
	live: boolean
}

/**
 * Called with the scope being exited, before it stops being live.
 */
export type ScopeExitCallback = (scope: Scope, table: ScopeTable) => void

// =============================================================================
// TABLE
// =============================================================================

export class ScopeTable {
	private readonly scopes: Scope[] = []

	private readonly bindings: Binding[] = []

	private readonly stack: ScopeId[] = []

	private readonly exitCallbacks: ScopeExitCallback[] = []

	constructor() {
		this.push(null, 0, 'module')
	}

	private push(parentId: ScopeId | null, depth: number, kind: ScopeKind): ScopeId {
		const id = scopeId(this.scopes.length)
		this.scopes.push({ bindings: [], depth, id, kind, live: true, names: new Map(), parentId })
		this.stack.push(id)
		return id
	}

	/**
	 * Register a callback run on every scope exit.
	 */
	onScopeExit(callback: ScopeExitCallback): void {
		this.exitCallbacks.push(callback)
	}

	enterScope(kind: ScopeKind): ScopeId {
		const current = this.currentScope()
		return this.push(current.id, current.depth + 1, kind)
	}

	/**
	 * Pop the innermost scope. Exiting any other scope is a stack misuse.
	 */
	exitScope(id: ScopeId): void {
		const top = this.stack.at(-1)
		if (top !== id) {
			throw new InternalError(`cannot exit scope ${id}: innermost live scope is ${top ?? 'none'}`)
		}
		if (this.stack.length === 1) {
			throw new InternalError('cannot exit the module scope')
		}
		const scope = this.scope(id)
		for (const callback of this.exitCallbacks) callback(scope, this)
		scope.live = false
		this.stack.pop()
	}

	declareBinding(
		name: string,
		mutable: boolean,
		type: TypeRef,
		span?: Span,
		origin: BindingOrigin = 'local'
	): BindingId {
		const scope = this.currentScope()
		const id = bindingId(this.bindings.length)
		this.bindings.push({
			depth: scope.depth,
			id,
			mutable,
			name,
			origin,
			scopeId: scope.id,
			type,
			...(span ? { span } : {}),
		})
		scope.bindings.push(id)
		scope.names.set(name, id)
		return id
	}

	/**
	 * Find the binding a name refers to from the current scope.
	 * The innermost live scope wins.
	 */
	lookup(name: string): Binding | null {
		let scope: Scope | null = this.currentScope()
		while (scope !== null) {
			const id = scope.names.get(name)
			if (id !== undefined) return this.binding(id)
			scope = scope.parentId === null ? null : this.scope(scope.parentId)
		}
		return null
	}

	/**
	 * Like `lookup`, for names upstream resolution guarantees exist.
	 */
	resolve(name: string): Binding {
		const binding = this.lookup(name)
		if (binding === null) {
			throw new InternalError(`unresolved name \`${name}\``)
		}
		return binding
	}

	regionDepth(id: BindingId): number {
		return this.binding(id).depth
	}

	binding(id: BindingId): Binding {
		const binding = this.bindings[id]
		if (binding === undefined) {
			throw new InternalError(`invalid BindingId: ${id}`)
		}
		return binding
	}

	scope(id: ScopeId): Scope {
		const scope = this.scopes[id]
		if (scope === undefined) {
			throw new InternalError(`invalid ScopeId: ${id}`)
		}
		return scope
	}

	currentScope(): Scope {
		const id = this.stack.at(-1)
		if (id === undefined) {
			throw new InternalError('scope stack is empty')
		}
		return this.scope(id)
	}

	depth(): number {
		return this.currentScope().depth
	}

	isLive(id: BindingId): boolean {
		return this.scope(this.binding(id).scopeId).live
	}
}
