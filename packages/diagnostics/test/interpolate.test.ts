import assert from 'node:assert'
import { describe, it } from 'node:test'
import { interpolateMessage } from '../src/interpolate.ts'

describe('interpolateMessage', () => {
	it('should return the message unchanged without args', () => {
		assert.strictEqual(interpolateMessage('use of moved value `{name}`'), 'use of moved value `{name}`')
	})

	it('should replace string and number placeholders', () => {
		const result = interpolateMessage('{name} at depth {depth}', { depth: 2, name: 'x' })
		assert.strictEqual(result, 'x at depth 2')
	})

	it('should join list values as backticked names', () => {
		const result = interpolateMessage('moved fields are {fields}', { fields: ['a', 'b'] })
		assert.strictEqual(result, 'moved fields are `a`, `b`')
	})

	it('should leave unknown placeholders in place', () => {
		assert.strictEqual(interpolateMessage('{known} {unknown}', { known: 'ok' }), 'ok {unknown}')
	})
})
