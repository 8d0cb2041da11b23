/**
 * Module-level declarations and the per-function work list.
 */

import type { FunctionDecl, ImplDecl, Program } from '../core/ast.ts'
import { fnType } from '../core/types.ts'
import { ScopeTable } from './table.ts'

/**
 * A function body to check, with the impl block it belongs to, if any.
 */
export interface FunctionUnit {
	readonly decl: FunctionDecl
	readonly impl?: ImplDecl
}

/**
 * Qualified name of a function: `Owner.method` for methods.
 */
export function qualifiedName(decl: FunctionDecl, owner?: string): string {
	const target = owner ?? decl.owner
	return target === undefined ? decl.name : `${target}.${decl.name}`
}

/**
 * Declare every function, extern, method and const at depth 0.
 */
export function declareGlobals(table: ScopeTable, program: Program): void {
	const declareFunction = (decl: FunctionDecl, owner?: string): void => {
		const type = fnType(
			decl.params.map((p) => p.type),
			decl.returns
		)
		table.declareBinding(qualifiedName(decl, owner), false, type, decl.span, 'global')
	}

	for (const item of program.items) {
		switch (item.kind) {
			case 'Function':
				declareFunction(item)
				break
			case 'Extern': {
				const type = fnType(
					item.signature.params.map((p) => p.type),
					item.signature.returns
				)
				table.declareBinding(item.name, false, type, item.span, 'global')
				break
			}
			case 'Const':
				table.declareBinding(item.name, false, item.type, item.span, 'global')
				break
			case 'Struct':
				for (const method of item.methods) declareFunction(method, item.name)
				break
			case 'Impl':
				for (const method of item.methods) declareFunction(method, item.target)
				break
			case 'Contract':
				break
		}
	}
}

/**
 * Every function body in the program, in source order. Externs have none.
 */
export function functionsOf(program: Program): FunctionUnit[] {
	const units: FunctionUnit[] = []
	for (const item of program.items) {
		if (item.kind === 'Function') units.push({ decl: item })
		else if (item.kind === 'Struct') units.push(...item.methods.map((decl) => ({ decl })))
		else if (item.kind === 'Impl') units.push(...item.methods.map((decl) => ({ decl, impl: item })))
	}
	return units
}

/**
 * Create a scope table with the program's globals declared.
 */
export function createGlobalTable(program: Program): ScopeTable {
	const table = new ScopeTable()
	declareGlobals(table, program)
	return table
}
