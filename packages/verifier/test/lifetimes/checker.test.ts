import assert from 'node:assert'
import { describe, it } from 'node:test'

import { named, refTo } from '../../src/core/types.ts'
import { verify } from '../../src/verify.ts'
import {
	assign,
	bind,
	closure,
	codes,
	declare,
	deref,
	expr,
	fn,
	forIn,
	i32,
	id,
	lit,
	messages,
	method,
	param,
	program,
	ref,
	ret,
	scope,
	struct,
	structLit,
	vec,
	verifyBody,
} from '../build.ts'

const intRef = refTo(i32)

describe('lifetimes/returns', () => {
	it('should reject returning a reference to a local', () => {
		const result = verify(program(fn('dangle', [bind('x', lit(1)), ret(ref(id('x')))], { returns: intRef })))
		assert.deepStrictEqual(codes(result), ['KPLIFE001'])
		assert.deepStrictEqual(messages(result), ['cannot return reference to local binding `x`'])
	})

	it('should reject returning a binding that holds a reference to a local', () => {
		const body = [bind('x', lit(1)), bind('r', ref(id('x'))), ret(id('r', intRef))]
		const result = verify(program(fn('dangle', body, { returns: intRef })))
		assert.deepStrictEqual(codes(result), ['KPLIFE001'])
		assert.deepStrictEqual(messages(result), ['cannot return reference to local binding `x`'])
	})

	it('should reject returning a reference borrowed from a local receiver', () => {
		const body = [bind('v', lit(null, vec)), ret(method(id('v', vec), 'first', [], { returns: intRef }))]
		const result = verify(program(fn('peek', body, { returns: intRef })))
		assert.deepStrictEqual(codes(result), ['KPLIFE001'])
		assert.deepStrictEqual(messages(result), ['cannot return reference to local binding `v`'])
	})

	it('should allow returning a reference borrowed through a reference receiver', () => {
		const list = refTo(vec)
		const body = [ret(method(id('v', list), 'first', [], { returns: intRef }))]
		const result = verify(program(fn('peek', body, { params: [param('v', list)], returns: intRef })))
		assert.deepStrictEqual(codes(result), [])
	})

	it('should allow returning a reference parameter', () => {
		const result = verify(
			program(fn('first', [ret(id('a', intRef))], { params: [param('a', intRef)], returns: intRef }))
		)
		assert.deepStrictEqual(codes(result), [])
	})

	it('should allow returning a reference derived from a parameter', () => {
		const holder = named('Holder')
		const body = [ret(ref(deref(id('h', refTo(holder)))))]
		const result = verify(
			program(
				struct('Holder', { value: i32 }),
				fn('view', body, { params: [param('h', refTo(holder))], returns: refTo(holder) })
			)
		)
		assert.deepStrictEqual(codes(result), [])
	})

	it('should reject returning an aggregate that holds a reference to a local', () => {
		const holder = named('Holder')
		const body = [bind('x', lit(1)), ret(structLit('Holder', { r: ref(id('x')) }))]
		const result = verify(program(struct('Holder', { r: intRef }), fn('make', body, { returns: holder })))
		assert.deepStrictEqual(codes(result), ['KPLIFE002'])
		assert.deepStrictEqual(messages(result), ['field `r` stores a reference to `x`, which does not live long enough'])
	})

	it('should reject returning a closure that borrows a local', () => {
		const reader = closure([], [expr(id('n'))])
		const result = verify(program(fn('make', [bind('n', lit(1)), ret(reader)], { returns: reader.type })))
		assert.deepStrictEqual(codes(result), ['KPLIFE001'])
		assert.deepStrictEqual(messages(result), ['cannot return reference to local binding `n`'])
	})

	it('should check returns inside a closure against the closure body', () => {
		const leaky = closure([], [bind('y', lit(1)), ret(ref(id('y')))], intRef)
		const result = verifyBody([bind('f', leaky)])
		assert.deepStrictEqual(codes(result), ['KPLIFE001'])
		assert.deepStrictEqual(messages(result), ['cannot return reference to local binding `y`'])
	})
})

describe('lifetimes/stores', () => {
	it('should reject storing a reference into a binding that outlives the referent', () => {
		const result = verifyBody([declare('r', intRef), scope([bind('x', lit(1)), assign(id('r', intRef), ref(id('x')))])])
		assert.deepStrictEqual(codes(result), ['KPLIFE003'])
		assert.deepStrictEqual(messages(result), ['`x` does not live long enough to be stored in `r`'])
	})

	it('should allow storing a reference to a binding of the same scope', () => {
		const result = verifyBody([bind('x', lit(1)), declare('r', intRef), assign(id('r', intRef), ref(id('x')))])
		assert.deepStrictEqual(codes(result), [])
	})

	it('should reject storing a local reference through an out parameter', () => {
		const out = id('out', refTo(intRef, true))
		const result = verify(
			program(
				fn('store', [bind('x', lit(1)), assign(deref(out), ref(id('x')))], {
					params: [param('out', refTo(intRef, true))],
				})
			)
		)
		assert.deepStrictEqual(codes(result), ['KPLIFE003'])
		assert.deepStrictEqual(messages(result), ['`x` does not live long enough to be stored in `*out`'])
	})

	it('should reject an aggregate that stores a reference deeper than its slot', () => {
		const holder = named('Holder')
		const result = verifyBody(
			[declare('h', holder), scope([bind('x', lit(1)), assign(id('h', holder), structLit('Holder', { r: ref(id('x')) }))])],
			[struct('Holder', { r: intRef })]
		)
		assert.deepStrictEqual(codes(result), ['KPLIFE002'])
	})

	it('should carry the region of an iterable to the loop binding', () => {
		const items = { element: i32, kind: 'array' } as const
		const body = [bind('xs', lit(null, items)), forIn('item', intRef, ref(id('xs', items)), [ret(id('item', intRef))])]
		const result = verify(program(fn('pick', body, { returns: intRef })))
		assert.deepStrictEqual(codes(result), ['KPLIFE001'])
		assert.deepStrictEqual(messages(result), ['cannot return reference to local binding `xs`'])
	})
})
