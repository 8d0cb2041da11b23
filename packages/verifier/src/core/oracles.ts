/**
 * External oracles the verifier consults: Copy classification and the
 * contract table. Both are read-only during a verification pass.
 */

import type { CallableSignature, Program, TypeRef } from './ast.ts'
import { assertNever } from './errors.ts'

// =============================================================================
// COPY CLASSIFICATION
// =============================================================================

/**
 * Decides whether values of a type are duplicated implicitly instead of moved.
 */
export interface CopyOracle {
	isCopy(type: TypeRef): boolean
}

/**
 * Scalar types that are always Copy.
 */
export const PRIMITIVE_COPY_TYPES: readonly string[] = [
	'bool',
	'char',
	'f32',
	'f64',
	'i8',
	'i16',
	'i32',
	'i64',
	'i128',
	'isize',
	'u8',
	'u16',
	'u32',
	'u64',
	'u128',
	'unit',
	'usize',
]

export interface CopyOracleOptions {
	/** Additional named types classified as Copy */
	copyTypes?: Iterable<string>
}

/**
 * Build the default classification: primitives, shared references, raw
 * pointers, function items, and tuples whose elements are all Copy.
 * Exclusive references, arrays (owned sequences) and closure values are
 * never Copy.
 */
export function createCopyOracle(options: CopyOracleOptions = {}): CopyOracle {
	const copyNames = new Set<string>(PRIMITIVE_COPY_TYPES)
	for (const name of options.copyTypes ?? []) copyNames.add(name)

	const isCopy = (type: TypeRef): boolean => {
		switch (type.kind) {
			case 'named':
				return copyNames.has(type.name)
			case 'ref':
				return !type.mutable
			case 'ptr':
				return true
			case 'tuple':
				return type.elements.every(isCopy)
			case 'array':
				return false
			case 'fn':
				return !type.closure
			default:
				return assertNever(type, 'type')
		}
	}

	return { isCopy }
}

/**
 * Default classification extended with every struct the program declares
 * with `copy: true`.
 */
export function copyOracleForProgram(program: Program, options: CopyOracleOptions = {}): CopyOracle {
	const declared = program.items.flatMap((item) =>
		item.kind === 'Struct' && item.copy === true ? [item.name] : []
	)
	return createCopyOracle({ copyTypes: [...(options.copyTypes ?? []), ...declared] })
}

// =============================================================================
// CONTRACT TABLE
// =============================================================================

/**
 * The declared mutability of one contract method.
 */
export interface ContractEntry {
	readonly contract: string
	readonly method: string
	readonly mutating: boolean
	readonly signature?: CallableSignature
}

/**
 * `(contract, method) -> declared mutability`, used for conformance checks.
 */
export class ContractTable {
	private readonly entries: Map<string, ContractEntry> = new Map()

	constructor(entries: Iterable<ContractEntry> = []) {
		for (const entry of entries) this.add(entry)
	}

	private static key(contract: string, method: string): string {
		return `${contract}\u0000${method}`
	}

	/** Register an entry; a later entry for the same method replaces the earlier one. */
	add(entry: ContractEntry): void {
		this.entries.set(ContractTable.key(entry.contract, entry.method), entry)
	}

	get(contract: string, method: string): ContractEntry | undefined {
		return this.entries.get(ContractTable.key(contract, method))
	}

	has(contract: string, method: string): boolean {
		return this.entries.has(ContractTable.key(contract, method))
	}

	count(): number {
		return this.entries.size
	}

	*[Symbol.iterator](): Generator<ContractEntry> {
		yield* this.entries.values()
	}
}

/**
 * Merge externally supplied contracts with the ones the program declares.
 * Declarations in the program win over external entries for the same method.
 */
export function buildContractTable(program: Program, external?: ContractTable): ContractTable {
	const table = new ContractTable(external ?? [])
	for (const item of program.items) {
		if (item.kind !== 'Contract') continue
		for (const method of item.methods) {
			table.add({
				contract: item.name,
				method: method.name,
				mutating: method.mutating,
				...(method.signature ? { signature: method.signature } : {}),
			})
		}
	}
	return table
}
