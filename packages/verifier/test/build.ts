/**
 * Tree builders for tests. Types are filled in from operands where they
 * follow from them; everything else takes an explicit type.
 */

import type {
	ArrayExpr,
	AssignStmt,
	BinaryExpr,
	Block,
	BorrowExpr,
	CallableSignature,
	CallExpr,
	CastExpr,
	ClosureExpr,
	ConstDecl,
	ContractDecl,
	DerefExpr,
	Expr,
	ExternDecl,
	FieldExpr,
	FunctionDecl,
	IdentExpr,
	IfStmt,
	ImplDecl,
	IndexExpr,
	Item,
	LetStmt,
	LiteralExpr,
	MethodCallExpr,
	Param,
	ParamSig,
	Program,
	Receiver,
	Stmt,
	StructDecl,
	StructLitExpr,
	TupleExpr,
	TypeRef,
} from '../src/core/ast.ts'
import { fnType, named, refTo, UNIT } from '../src/core/types.ts'
import { type VerifyOptions, type VerifyResult, verify } from '../src/verify.ts'

// =============================================================================
// TYPES
// =============================================================================

export const i32 = named('i32')
export const bool = named('bool')
/** An owned, non-Copy type */
export const str = named('String')
export const vec = named('Vec', [i32])

// =============================================================================
// EXPRESSIONS
// =============================================================================

export function lit(value: string | number | boolean | null, type: TypeRef = i32): LiteralExpr {
	return { kind: 'Literal', type, value }
}

export function id(name: string, type: TypeRef = i32, line?: number): IdentExpr {
	return { kind: 'Ident', name, type, ...(line !== undefined ? { span: { column: 1, line } } : {}) }
}

export function field(object: Expr, name: string, type: TypeRef = i32): FieldExpr {
	return { field: name, kind: 'Field', object, type }
}

export function index(object: Expr, at: Expr, type: TypeRef = i32): IndexExpr {
	return { index: at, kind: 'Index', object, type }
}

export function ref(operand: Expr): BorrowExpr {
	return { kind: 'Borrow', mutable: false, operand, type: refTo(operand.type) }
}

export function refMut(operand: Expr): BorrowExpr {
	return { kind: 'Borrow', mutable: true, operand, type: refTo(operand.type, true) }
}

export function deref(operand: Expr): DerefExpr {
	const type = operand.type.kind === 'ref' || operand.type.kind === 'ptr' ? operand.type.inner : operand.type
	return { kind: 'Deref', operand, type }
}

export function binary(op: string, left: Expr, right: Expr, type: TypeRef = left.type): BinaryExpr {
	return { kind: 'Binary', left, op, right, type }
}

export function cast(operand: Expr, target: TypeRef): CastExpr {
	return { kind: 'Cast', operand, target, type: target }
}

export function sig(name: string, options: Partial<Omit<CallableSignature, 'name'>> = {}): CallableSignature {
	return {
		mutating: options.mutating ?? false,
		name,
		params: options.params ?? [],
		returns: options.returns ?? UNIT,
		...(options.receiver ? { receiver: options.receiver } : {}),
		...(options.unsafe !== undefined ? { unsafe: options.unsafe } : {}),
	}
}

export function p(name: string, type: TypeRef): ParamSig {
	return { name, type }
}

/**
 * A call to a function item. The parameter list defaults to owning
 * parameters matching the argument types.
 */
export function call(
	name: string,
	args: readonly Expr[] = [],
	options: Partial<Omit<CallableSignature, 'name'>> & { marker?: boolean } = {}
): CallExpr {
	const { marker, ...rest } = options
	const signature = sig(name, { params: args.map((a, i) => p(`p${i}`, a.type)), ...rest })
	return {
		args,
		callee: id(name, fnType(signature.params.map((q) => q.type), signature.returns)),
		kind: 'Call',
		mutationMarker: marker ?? signature.mutating,
		signature,
		type: signature.returns,
	}
}

/**
 * Call a callable value, such as a closure binding.
 */
export function callValue(callee: IdentExpr, args: readonly Expr[] = [], returns: TypeRef = UNIT): CallExpr {
	const signature = sig(callee.name, { params: args.map((a, i) => p(`p${i}`, a.type)), returns })
	return { args, callee, kind: 'Call', mutationMarker: false, signature, type: returns }
}

export function method(
	receiver: Expr,
	name: string,
	args: readonly Expr[] = [],
	options: Partial<Omit<CallableSignature, 'name'>> & { marker?: boolean } = {}
): MethodCallExpr {
	const { marker, ...rest } = options
	const signature = sig(name, { params: args.map((a, i) => p(`p${i}`, a.type)), ...rest })
	return {
		args,
		kind: 'MethodCall',
		method: name,
		mutationMarker: marker ?? signature.mutating,
		receiver,
		signature,
		type: signature.returns,
	}
}

export function structLit(name: string, fields: Record<string, Expr>): StructLitExpr {
	return {
		fields: Object.entries(fields).map(([fieldName, value]) => ({ name: fieldName, value })),
		kind: 'StructLit',
		name,
		type: named(name),
	}
}

export function tuple(...elements: Expr[]): TupleExpr {
	return { elements, kind: 'Tuple', type: { elements: elements.map((e) => e.type), kind: 'tuple' } }
}

export function array(elements: readonly Expr[], element: TypeRef = i32): ArrayExpr {
	return { elements, kind: 'Array', type: { element, kind: 'array' } }
}

export function closure(params: readonly Param[], body: readonly Stmt[], returns: TypeRef = UNIT): ClosureExpr {
	return {
		body: block(body),
		kind: 'Closure',
		params,
		type: fnType(
			params.map((q) => q.type),
			returns,
			true
		),
	}
}

// =============================================================================
// STATEMENTS
// =============================================================================

export function block(statements: readonly Stmt[]): Block {
	return { statements }
}

export function bind(name: string, init: Expr, type: TypeRef = init.type): LetStmt {
	return { init, kind: 'Let', mutable: false, name, type }
}

export function bindMut(name: string, init: Expr, type: TypeRef = init.type): LetStmt {
	return { init, kind: 'Let', mutable: true, name, type }
}

/** `let name;` without a value */
export function declare(name: string, type: TypeRef = i32, mutable = false): LetStmt {
	return { kind: 'Let', mutable, name, type }
}

export function assign(target: Expr, value: Expr, op?: string): AssignStmt {
	return { kind: 'Assign', target, value, ...(op !== undefined ? { op } : {}) }
}

export function expr(value: Expr): Stmt {
	return { expr: value, kind: 'Expr' }
}

export function ret(value?: Expr): Stmt {
	return value ? { kind: 'Return', value } : { kind: 'Return' }
}

export function ifElse(condition: Expr, then: readonly Stmt[], otherwise?: readonly Stmt[]): IfStmt {
	return { condition, kind: 'If', then: block(then), ...(otherwise ? { else: block(otherwise) } : {}) }
}

export function whileLoop(condition: Expr, body: readonly Stmt[]): Stmt {
	return { body: block(body), condition, kind: 'While' }
}

export function loop(body: readonly Stmt[]): Stmt {
	return { body: block(body), kind: 'Loop' }
}

export function forIn(name: string, type: TypeRef, iterable: Expr, body: readonly Stmt[]): Stmt {
	return { body: block(body), iterable, kind: 'ForIn', mutable: false, name, type }
}

export function scope(body: readonly Stmt[]): Stmt {
	return { body: block(body), kind: 'Block' }
}

export function unsafe(body: readonly Stmt[]): Stmt {
	return { body: block(body), kind: 'Unsafe' }
}

export const brk: Stmt = { kind: 'Break' }

export const cont: Stmt = { kind: 'Continue' }

// =============================================================================
// ITEMS
// =============================================================================

export function param(name: string, type: TypeRef, mutable = false): Param {
	return { mutable, name, type }
}

export interface FnOptions {
	params?: readonly Param[]
	returns?: TypeRef
	mutating?: boolean
	receiver?: Receiver
	owner?: string
}

export function fn(name: string, body: readonly Stmt[], options: FnOptions = {}): FunctionDecl {
	return {
		body: block(body),
		kind: 'Function',
		mutating: options.mutating ?? false,
		name,
		params: options.params ?? [],
		returns: options.returns ?? UNIT,
		...(options.receiver ? { receiver: options.receiver } : {}),
		...(options.owner !== undefined ? { owner: options.owner } : {}),
	}
}

/** A callable declared only so call sites resolve */
export function extern(name: string, params: readonly Param[] = [], returns: TypeRef = UNIT): ExternDecl {
	return { kind: 'Extern', name, signature: sig(name, { params: params.map((q) => p(q.name, q.type)), returns }) }
}

export function self(type: TypeRef, mutable = false): Receiver {
	return { mutable, name: 'self', type }
}

export function struct(
	name: string,
	fields: Record<string, TypeRef>,
	methods: readonly FunctionDecl[] = [],
	copy = false
): StructDecl {
	return {
		fields: Object.entries(fields).map(([fieldName, type]) => ({ name: fieldName, type })),
		kind: 'Struct',
		methods,
		name,
		...(copy ? { copy } : {}),
	}
}

export function contract(name: string, methods: Record<string, boolean>): ContractDecl {
	return {
		kind: 'Contract',
		methods: Object.entries(methods).map(([methodName, mutating]) => ({ mutating, name: methodName })),
		name,
	}
}

export function impl(contractName: string, target: string, methods: readonly FunctionDecl[]): ImplDecl {
	return { contract: contractName, kind: 'Impl', methods, target }
}

export function constant(name: string, value: Expr): ConstDecl {
	return { kind: 'Const', name, type: value.type, value }
}

export function program(...items: Item[]): Program {
	return { items }
}

// =============================================================================
// RUNNING
// =============================================================================

/**
 * Verify a `main` function with the given body, next to extra items.
 */
export function verifyBody(body: readonly Stmt[], items: readonly Item[] = [], options: VerifyOptions = {}): VerifyResult {
	return verify(program(fn('main', body), ...items), options)
}

export function codes(result: VerifyResult): string[] {
	return result.diagnostics.map((d) => d.def.code)
}

export function messages(result: VerifyResult): string[] {
	return result.diagnostics.map((d) => d.message)
}
