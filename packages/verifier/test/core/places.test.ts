import assert from 'node:assert'
import { describe, it } from 'node:test'

import { isOwnedPath, placeOf, placeText } from '../../src/core/places.ts'
import { containsReference, fnType, formatType, named, ptrTo, refTo } from '../../src/core/types.ts'
import { mentionsName } from '../../src/core/visit.ts'
import { binary, closure, deref, expr, field, i32, id, ifElse, index, lit, ref, str, vec } from '../build.ts'

describe('core/places', () => {
	const point = named('Point')

	it('should resolve field paths to their root', () => {
		const place = placeOf(field(field(id('a', point), 'b', point), 'c'))
		assert.deepStrictEqual(place?.path, ['b', 'c'])
		assert.strictEqual(place?.root.name, 'a')
		assert.strictEqual(place !== null && isOwnedPath(place), true)
	})

	it('should record a dereference for field access through a reference', () => {
		const place = placeOf(field(id('r', refTo(point, true)), 'x'))
		assert.deepStrictEqual(place?.derefs, [{ mutable: true, through: 'ref' }])
		assert.strictEqual(place !== null && isOwnedPath(place), false)
	})

	it('should mark indexed places', () => {
		const place = placeOf(index(id('v', vec), lit(0)))
		assert.strictEqual(place?.indexed, true)
		assert.strictEqual(place !== null && isOwnedPath(place), false)
	})

	it('should not treat computed values as places', () => {
		assert.strictEqual(placeOf(lit(1)), null)
		assert.strictEqual(placeOf(binary('+', id('a'), lit(1))), null)
	})

	it('should render places for messages', () => {
		assert.strictEqual(placeText(deref(id('out', refTo(refTo(i32), true)))), '*out')
		assert.strictEqual(placeText(index(field(id('s', point), 'items', vec), lit(0))), 's.items[..]')
		assert.strictEqual(placeText(ref(id('x'))), '&x')
	})
})

describe('core/types', () => {
	it('should find references inside composite types', () => {
		assert.strictEqual(containsReference(refTo(i32)), true)
		assert.strictEqual(containsReference(named('Vec', [refTo(str)])), true)
		assert.strictEqual(containsReference({ elements: [i32, refTo(i32)], kind: 'tuple' }), true)
		assert.strictEqual(containsReference(ptrTo(i32)), false)
		assert.strictEqual(containsReference(fnType([], i32)), false)
		assert.strictEqual(containsReference(fnType([], i32, true)), true)
	})

	it('should format types', () => {
		assert.strictEqual(formatType(refTo(vec, true)), '&mut Vec<i32>')
		assert.strictEqual(formatType(ptrTo(i32)), '*const i32')
		assert.strictEqual(formatType(fnType([i32], str, true)), 'closure(i32) -> String')
	})
})

describe('core/visit', () => {
	it('should find names in nested blocks and closure bodies', () => {
		const body = [ifElse(lit(true), [expr(closure([], [expr(id('hidden'))]))])]
		assert.strictEqual(mentionsName(body, 'hidden'), true)
		assert.strictEqual(mentionsName(body, 'absent'), false)
	})
})
