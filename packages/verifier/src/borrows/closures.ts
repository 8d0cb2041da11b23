/**
 * Closure capture inference.
 *
 * Each outer binding a closure body mentions is captured in the weakest mode
 * its uses allow:
 * - Immutable: only read
 * - Mutable: written, borrowed `&mut`, or the receiver of a mutating call
 * - Move: used by value while its type is not Copy
 *
 * The closure's mode is its strongest capture, and decides which call
 * capability the closure value has.
 */

import type { Block, ClosureExpr, Expr, IdentExpr, ParamSig, Span, Stmt } from '../core/ast.ts'
import { assertNever } from '../core/errors.ts'
import { isOwningParam, takesReceiverByValue } from '../core/places.ts'
import type { CopyOracle } from '../core/oracles.ts'
import type { Binding, BindingId } from '../scope/table.ts'

export type CaptureMode = 'Immutable' | 'Mutable' | 'Move'

/**
 * Call capabilities, weakest requirement first. A closure that only reads
 * its captures can be called anywhere; a consuming one only once.
 */
export const Capability = {
	Callable: 'Callable',
	CallableMut: 'CallableMut',
	CallableOnce: 'CallableOnce',
} as const

export type Capability = (typeof Capability)[keyof typeof Capability]

const CAPTURE_RANK: Record<CaptureMode, number> = { Immutable: 0, Move: 2, Mutable: 1 }

const CAPABILITY_RANK: Record<Capability, number> = { Callable: 0, CallableMut: 1, CallableOnce: 2 }

export interface Capture {
	readonly binding: Binding
	readonly mode: CaptureMode
	/** First use that decided the mode */
	readonly span?: Span
}

export interface ClosureAnalysis {
	readonly captures: readonly Capture[]
	/** Strongest capture mode; null when nothing is captured */
	readonly mode: CaptureMode | null
	readonly capability: Capability
}

/**
 * Capture summary of one closure, as returned to callers of `verify`.
 */
export interface ClosureReport {
	/** Binding the closure was stored in, if it was bound by `let` */
	readonly name?: string
	readonly span?: Span
	readonly mode: CaptureMode | null
	readonly capability: Capability
	readonly captures: ReadonlyArray<{ readonly name: string; readonly mode: CaptureMode }>
}

export interface CaptureEnv {
	/** Resolve a name in the scope enclosing the closure */
	lookup(name: string): Binding | null
	readonly copy: CopyOracle
}

export function capabilityOf(mode: CaptureMode | null): Capability {
	switch (mode) {
		case null:
		case 'Immutable':
			return Capability.Callable
		case 'Mutable':
			return Capability.CallableMut
		case 'Move':
			return Capability.CallableOnce
		default:
			return assertNever(mode, 'capture mode')
	}
}

/**
 * Whether a closure with capability `actual` can be used where `required`
 * is expected.
 */
export function capabilitySatisfies(actual: Capability, required: Capability): boolean {
	return CAPABILITY_RANK[actual] <= CAPABILITY_RANK[required]
}

export function strongerMode(a: CaptureMode, b: CaptureMode): CaptureMode {
	return CAPTURE_RANK[a] >= CAPTURE_RANK[b] ? a : b
}

type Position = 'read' | 'move' | 'mutate'

export function analyzeClosure(closure: ClosureExpr, env: CaptureEnv): ClosureAnalysis {
	const locals: Array<Set<string>> = []
	const captures = new Map<BindingId, Capture>()

	const isLocal = (name: string): boolean => locals.some((frame) => frame.has(name))

	const declareLocal = (name: string): void => {
		locals.at(-1)?.add(name)
	}

	const record = (expr: IdentExpr, position: Position): void => {
		if (isLocal(expr.name)) return
		const binding = env.lookup(expr.name)
		if (binding === null || binding.origin === 'global') return
		const mode: CaptureMode =
			position === 'mutate'
				? 'Mutable'
				: position === 'move' && !env.copy.isCopy(expr.type)
					? 'Move'
					: 'Immutable'
		const existing = captures.get(binding.id)
		if (existing !== undefined && strongerMode(existing.mode, mode) === existing.mode) return
		captures.set(binding.id, { binding, mode, ...(expr.span ? { span: expr.span } : {}) })
	}

	const useArgs = (args: readonly Expr[], params: readonly ParamSig[]): void => {
		args.forEach((arg, i) => {
			use(arg, isOwningParam(params[i]) ? 'move' : 'read')
		})
	}

	const use = (expr: Expr, position: Position): void => {
		switch (expr.kind) {
			case 'Literal':
				break
			case 'Ident':
				record(expr, position)
				break
			case 'Field': {
				const inner: Position =
					position === 'mutate' ? 'mutate' : position === 'move' && !env.copy.isCopy(expr.type) ? 'move' : 'read'
				use(expr.object, inner)
				break
			}
			case 'Index':
				use(expr.object, position === 'mutate' ? 'mutate' : 'read')
				use(expr.index, 'read')
				break
			case 'Borrow':
				use(expr.operand, expr.mutable ? 'mutate' : 'read')
				break
			case 'Deref':
				use(expr.operand, position === 'mutate' ? 'mutate' : 'read')
				break
			case 'Call':
				use(expr.callee, expr.signature.mutating ? 'mutate' : 'read')
				useArgs(expr.args, expr.signature.params)
				break
			case 'MethodCall':
				use(
					expr.receiver,
					takesReceiverByValue(expr.signature) ? 'move' : expr.signature.mutating ? 'mutate' : 'read'
				)
				useArgs(expr.args, expr.signature.params)
				break
			case 'StructLit':
				for (const field of expr.fields) use(field.value, 'move')
				break
			case 'Tuple':
			case 'Array':
				for (const element of expr.elements) use(element, 'move')
				break
			case 'Binary':
				use(expr.left, 'read')
				use(expr.right, 'read')
				break
			case 'Unary':
			case 'Cast':
				use(expr.operand, 'read')
				break
			case 'Closure':
				walkBlock(
					expr.body,
					expr.params.map((p) => p.name)
				)
				break
			default:
				assertNever(expr, 'expression')
		}
	}

	const walkStmt = (stmt: Stmt): void => {
		switch (stmt.kind) {
			case 'Let':
				if (stmt.init) use(stmt.init, 'move')
				declareLocal(stmt.name)
				break
			case 'Assign':
				use(stmt.value, 'move')
				use(stmt.target, 'mutate')
				break
			case 'Expr':
				use(stmt.expr, 'read')
				break
			case 'Return':
				if (stmt.value) use(stmt.value, 'move')
				break
			case 'If':
				use(stmt.condition, 'read')
				walkBlock(stmt.then)
				if (stmt.else) walkBlock(stmt.else)
				break
			case 'While':
				use(stmt.condition, 'read')
				walkBlock(stmt.body)
				break
			case 'ForIn':
				use(stmt.iterable, 'move')
				walkBlock(stmt.body, [stmt.name])
				break
			case 'Loop':
			case 'Block':
			case 'Unsafe':
				walkBlock(stmt.body)
				break
			case 'Break':
			case 'Continue':
				break
			default:
				assertNever(stmt, 'statement')
		}
	}

	const walkBlock = (block: Block, declared: readonly string[] = []): void => {
		locals.push(new Set(declared))
		for (const stmt of block.statements) walkStmt(stmt)
		locals.pop()
	}

	walkBlock(
		closure.body,
		closure.params.map((p) => p.name)
	)

	const list = [...captures.values()]
	const mode = list.reduce<CaptureMode | null>(
		(strongest, capture) => (strongest === null ? capture.mode : strongerMode(strongest, capture.mode)),
		null
	)
	return { capability: capabilityOf(mode), captures: list, mode }
}
