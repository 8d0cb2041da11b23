/**
 * Queries and constructors for resolved types.
 */

import type { FnType, NamedType, PtrType, RefType, TupleType, TypeRef } from './ast.ts'
import { assertNever } from './errors.ts'

export const UNIT: TupleType = { elements: [], kind: 'tuple' }

export function named(name: string, args?: readonly TypeRef[]): NamedType {
	return args ? { args, kind: 'named', name } : { kind: 'named', name }
}

export function refTo(inner: TypeRef, mutable = false): RefType {
	return { inner, kind: 'ref', mutable }
}

export function ptrTo(inner: TypeRef, mutable = false): PtrType {
	return { inner, kind: 'ptr', mutable }
}

export function fnType(params: readonly TypeRef[], returns: TypeRef, closure = false): FnType {
	return { closure, kind: 'fn', params, returns }
}

export function isReference(type: TypeRef): type is RefType {
	return type.kind === 'ref'
}

export function isMutableReference(type: TypeRef): boolean {
	return type.kind === 'ref' && type.mutable
}

export function isRawPointer(type: TypeRef): type is PtrType {
	return type.kind === 'ptr'
}

/**
 * Whether a value of this type can carry a reference, directly or inside a
 * tuple, array or generic argument. Closure values count: they may hold
 * borrows of captured bindings.
 */
export function containsReference(type: TypeRef): boolean {
	switch (type.kind) {
		case 'ref':
			return true
		case 'ptr':
			return false
		case 'named':
			return (type.args ?? []).some(containsReference)
		case 'tuple':
			return type.elements.some(containsReference)
		case 'array':
			return containsReference(type.element)
		case 'fn':
			return type.closure
		default:
			return assertNever(type, 'type')
	}
}

/**
 * Render a type the way diagnostics print it.
 */
export function formatType(type: TypeRef): string {
	switch (type.kind) {
		case 'named':
			return type.args && type.args.length > 0
				? `${type.name}<${type.args.map(formatType).join(', ')}>`
				: type.name
		case 'ref':
			return `&${type.mutable ? 'mut ' : ''}${formatType(type.inner)}`
		case 'ptr':
			return `*${type.mutable ? 'mut' : 'const'} ${formatType(type.inner)}`
		case 'tuple':
			return `(${type.elements.map(formatType).join(', ')})`
		case 'array':
			return `[${formatType(type.element)}]`
		case 'fn':
			return `${type.closure ? 'closure' : 'fn'}(${type.params.map(formatType).join(', ')}) -> ${formatType(type.returns)}`
		default:
			return assertNever(type, 'type')
	}
}
