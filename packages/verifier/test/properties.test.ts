import assert from 'node:assert'
import { describe, it } from 'node:test'

import fc from 'fast-check'

import type { Stmt } from '../src/core/ast.ts'
import { named, refTo } from '../src/core/types.ts'
import { verify } from '../src/verify.ts'
import {
	assign,
	bind,
	bindMut,
	bool,
	call,
	codes,
	declare,
	expr,
	extern,
	field,
	fn,
	i32,
	id,
	ifElse,
	lit,
	param,
	program,
	ref,
	refMut,
	ret,
	str,
	struct,
	structLit,
	verifyBody,
	whileLoop,
} from './build.ts'

const cond = lit(true, bool)
const box = named('Box')
const use = extern('use', [param('value', box)])
const useInt = extern('use_int', [param('value', i32)])

describe('properties/immutable by default', () => {
	it('should reject reassigning a plain let and accept a let mut', () => {
		assert.deepStrictEqual(codes(verifyBody([bind('x', lit(1)), assign(id('x'), lit(2))])), ['KPIMM001'])
		assert.deepStrictEqual(codes(verifyBody([bindMut('x', lit(1)), assign(id('x'), lit(2))])), [])
	})
})

describe('properties/use after move', () => {
	it('should reject a moved non-Copy value and accept a copied scalar', () => {
		const moved = [bind('a', lit(1, box)), bind('b', id('a', box)), expr(call('use', [id('a', box)]))]
		assert.deepStrictEqual(codes(verifyBody(moved, [use])), ['KPMOVE001'])
		const copied = [bind('a', lit(1)), bind('b', id('a')), expr(call('use_int', [id('a')]))]
		assert.deepStrictEqual(codes(verifyBody(copied, [useInt])), [])
	})
})

describe('properties/borrow exclusivity', () => {
	const v = id('v')

	it('should accept two shared borrows', () => {
		assert.deepStrictEqual(codes(verifyBody([bindMut('v', lit(1)), bind('r1', ref(v)), bind('r2', ref(v))])), [])
	})

	it('should reject an exclusive borrow next to a shared one', () => {
		const result = verifyBody([bindMut('v', lit(1)), bind('r1', ref(v)), bind('r2', refMut(v))])
		assert.deepStrictEqual(
			result.diagnostics.map((d) => d.kind),
			['BorrowConflict']
		)
	})

	it('should reject mutating a binding while a shared borrow is live', () => {
		const result = verifyBody([bindMut('v', lit(1)), bind('r1', ref(v)), assign(v, lit(2))])
		assert.deepStrictEqual(
			result.diagnostics.map((d) => d.kind),
			['MutationWhileBorrowed']
		)
	})
})

describe('properties/dangling references', () => {
	const intRef = refTo(i32)

	it('should reject returning a reference to a local', () => {
		const result = verify(program(fn('f', [bind('x', lit(5)), ret(ref(id('x')))], { returns: intRef })))
		assert.deepStrictEqual(
			result.diagnostics.map((d) => d.kind),
			['ReturnDanglingReference']
		)
	})

	it('should accept returning a reference parameter', () => {
		const result = verify(program(fn('f', [ret(id('p', intRef))], { params: [param('p', intRef)], returns: intRef })))
		assert.strictEqual(result.succeeded, true)
	})
})

describe('properties/partial moves', () => {
	it('should allow the untouched field and reject the whole value', () => {
		const s = id('s', named('S'))
		const result = verifyBody(
			[
				bind('s', structLit('S', { a: lit(1, box), b: lit(2, box) })),
				bind('x', field(s, 'a', box)),
				expr(call('use', [field(s, 'b', box)])),
				expr(call('use', [s], { params: [param('value', named('S'))] })),
			],
			[struct('S', { a: box, b: box }), use]
		)
		assert.deepStrictEqual(
			result.diagnostics.map((d) => d.kind),
			['UseOfPartiallyMovedValue']
		)
	})
})

describe('properties/join points', () => {
	it('should reject a binding assigned on one branch only', () => {
		const result = verifyBody(
			[
				declare('x', box, true),
				ifElse(cond, [assign(id('x', box), lit(1, box))]),
				expr(call('use', [id('x', box)])),
			],
			[use]
		)
		assert.deepStrictEqual(codes(result), ['KPMOVE003'])
	})

	it('should accept a binding assigned on both branches', () => {
		const result = verifyBody(
			[
				declare('x', box, true),
				ifElse(cond, [assign(id('x', box), lit(1, box))], [assign(id('x', box), lit(2, box))]),
				expr(call('use', [id('x', box)])),
			],
			[use]
		)
		assert.deepStrictEqual(codes(result), [])
	})
})

describe('properties/idempotence', () => {
	it('should give the same zero-error result on a second run', () => {
		const unit = program(fn('main', [bindMut('x', lit(1)), bind('r', ref(id('x')))]))
		const first = verify(unit)
		const second = verify(unit)
		assert.strictEqual(first.succeeded, true)
		assert.deepStrictEqual(second.diagnostics, first.diagnostics)
		assert.deepStrictEqual(second.phases, first.phases)
	})

	// Statements over `mut a: i32`, `mut s: String` and `t: String`, so
	// every generated unit resolves.
	const a = id('a')
	const s = id('s', str)
	const t = id('t', str)
	const leaf = fc.constantFrom<Stmt>(
		assign(a, lit(2)),
		assign(s, lit('x', str)),
		assign(t, lit('y', str)),
		expr(a),
		expr(s),
		expr(ref(s)),
		bind('moved', s),
		bind('taken', t),
		bind('shared', ref(a)),
		bind('exclusive', refMut(a)),
		bind('view', ref(s))
	)
	const stmt = fc.oneof(
		{ arbitrary: leaf, weight: 4 },
		{ arbitrary: fc.array(leaf, { maxLength: 3 }).map((body) => ifElse(cond, body)), weight: 1 },
		{ arbitrary: fc.array(leaf, { maxLength: 3 }).map((body) => whileLoop(cond, body)), weight: 1 }
	)

	it('should report the same diagnostics when run twice on any unit', () => {
		fc.assert(
			fc.property(fc.array(stmt, { maxLength: 8 }), (body) => {
				const unit = program(
					fn('main', [bindMut('a', lit(1)), bindMut('s', lit('s', str)), bind('t', lit('t', str)), ...body])
				)
				const first = verify(unit)
				const second = verify(unit)
				assert.deepStrictEqual(codes(second), codes(first))
				assert.ok(first.phases.every((p) => p.internalError === undefined))
				assert.strictEqual(first.succeeded, codes(first).length === 0)
			})
		)
	})
})
