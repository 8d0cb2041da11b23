/**
 * Live borrows, keyed by the binding they borrow.
 */

import type { Span } from '../core/ast.ts'
import type { BorrowConflictVariant } from '../core/diagnostics.ts'
import type { BindingId, ScopeId } from '../scope/table.ts'

export type BorrowKind = 'Immutable' | 'Mutable'

export type BorrowId = number & { readonly __brand: 'BorrowId' }

export function borrowId(n: number): BorrowId {
	return n as BorrowId
}

export interface Borrow {
	readonly id: BorrowId
	/** Binding whose storage is borrowed */
	readonly referent: BindingId
	/** Binding that holds the borrow, or null for a temporary */
	holder: BindingId | null
	readonly kind: BorrowKind
	readonly span?: Span
	/** Scope whose exit ends the borrow */
	scopeId: ScopeId
}

/**
 * The conflict a new borrow of `kind` would cause against `live`, if any.
 */
export function conflictWith(live: readonly Borrow[], kind: BorrowKind): BorrowConflictVariant | null {
	const hasMutable = live.some((b) => b.kind === 'Mutable')
	if (kind === 'Immutable') return hasMutable ? 'ImmutableWhileMutablyBorrowed' : null
	if (hasMutable) return 'MutableWhileMutablyBorrowed'
	return live.length > 0 ? 'MutableWhileImmutablyBorrowed' : null
}

/**
 * Clones of a tracker share one id counter, so borrows created on different
 * branches never collide when the branches are merged.
 */
export interface IdCounter {
	next: number
}

export class BorrowTracker {
	private readonly borrows: Map<BorrowId, Borrow> = new Map()

	private readonly counter: IdCounter

	constructor(borrows: Iterable<Borrow> = [], counter: IdCounter = { next: 0 }) {
		for (const borrow of borrows) this.borrows.set(borrow.id, { ...borrow })
		this.counter = counter
	}

	add(referent: BindingId, kind: BorrowKind, scopeId: ScopeId, holder: BindingId | null, span?: Span): Borrow {
		const borrow: Borrow = {
			holder,
			id: borrowId(this.counter.next++),
			kind,
			referent,
			scopeId,
			...(span ? { span } : {}),
		}
		this.borrows.set(borrow.id, borrow)
		return borrow
	}

	get(id: BorrowId): Borrow | undefined {
		return this.borrows.get(id)
	}

	/** Live borrows of one binding */
	of(referent: BindingId): Borrow[] {
		return this.filter((b) => b.referent === referent)
	}

	/** Live borrows held by one binding */
	heldBy(holder: BindingId): Borrow[] {
		return this.filter((b) => b.holder === holder)
	}

	filter(predicate: (borrow: Borrow) => boolean): Borrow[] {
		return [...this.borrows.values()].filter(predicate)
	}

	release(id: BorrowId): void {
		this.borrows.delete(id)
	}

	releaseWhere(predicate: (borrow: Borrow) => boolean): void {
		for (const borrow of this.filter(predicate)) this.borrows.delete(borrow.id)
	}

	count(): number {
		return this.borrows.size
	}

	clone(): BorrowTracker {
		return new BorrowTracker(this.borrows.values(), this.counter)
	}

	/**
	 * Keep every borrow live in either tracker; used where control flow joins.
	 */
	mergeFrom(other: BorrowTracker): void {
		for (const borrow of other.borrows.values()) {
			if (!this.borrows.has(borrow.id)) this.borrows.set(borrow.id, { ...borrow })
		}
	}

	/**
	 * A key per live borrow that ignores ids, for fixpoint comparison.
	 */
	signature(): Set<string> {
		return new Set([...this.borrows.values()].map((b) => `${b.referent}:${b.holder ?? '_'}:${b.kind}`))
	}

	*[Symbol.iterator](): Generator<Borrow> {
		yield* this.borrows.values()
	}
}
