/**
 * When does a borrow end?
 *
 * Every borrow ends, at the latest, when the scope it belongs to exits.
 * A strategy decides which borrows end earlier, after the statement that is
 * being checked.
 */

import type { Binding } from '../scope/table.ts'
import type { Borrow } from './tracker.ts'

export interface BorrowEndContext {
	/** Whether a statement after the current one can still use the holder */
	isHolderUsedLater(holder: Binding): boolean
	/** The binding holding a borrow, or null for a temporary */
	holderOf(borrow: Borrow): Binding | null
}

export interface BorrowEndStrategy {
	readonly name: string
	/** Called after each statement for every live borrow */
	endsAfterStatement(borrow: Borrow, context: BorrowEndContext): boolean
}

/**
 * Held borrows last until their scope exits; temporaries end with their
 * statement.
 */
export const lexicalBorrowEnd: BorrowEndStrategy = {
	endsAfterStatement: (borrow) => borrow.holder === null,
	name: 'lexical',
}

/**
 * Held borrows end after the last statement that mentions their holder.
 * A loop body counts as a later statement for itself.
 */
export const lastUseBorrowEnd: BorrowEndStrategy = {
	endsAfterStatement: (borrow, context) => {
		const holder = context.holderOf(borrow)
		return holder === null || !context.isHolderUsedLater(holder)
	},
	name: 'last-use',
}

export const BORROW_END_STRATEGIES: Readonly<Record<string, BorrowEndStrategy>> = {
	'last-use': lastUseBorrowEnd,
	lexical: lexicalBorrowEnd,
}

export function getBorrowEndStrategy(name: string): BorrowEndStrategy | undefined {
	return Object.hasOwn(BORROW_END_STRATEGIES, name) ? BORROW_END_STRATEGIES[name] : undefined
}
