import assert from 'node:assert'
import { describe, it } from 'node:test'

import { InternalError } from '../../src/core/errors.ts'
import { fnType } from '../../src/core/types.ts'
import { createGlobalTable, functionsOf, qualifiedName } from '../../src/scope/globals.ts'
import { type Scope, ScopeTable, scopeId } from '../../src/scope/table.ts'
import { extern, fn, i32, impl, program, self, str, struct } from '../build.ts'

describe('scope/ScopeTable', () => {
	describe('nesting', () => {
		it('should start in the module scope at depth 0', () => {
			const table = new ScopeTable()
			assert.strictEqual(table.depth(), 0)
			assert.strictEqual(table.currentScope().kind, 'module')
			assert.strictEqual(table.currentScope().parentId, null)
		})

		it('should nest scopes one level deeper each time', () => {
			const table = new ScopeTable()
			const fnScope = table.enterScope('function')
			const body = table.enterScope('block')
			assert.strictEqual(table.scope(fnScope).depth, 1)
			assert.strictEqual(table.scope(body).depth, 2)
			assert.strictEqual(table.scope(body).parentId, fnScope)
		})

		it('should record the declaring depth as the region', () => {
			const table = new ScopeTable()
			table.enterScope('function')
			const a = table.declareBinding('a', false, i32)
			table.enterScope('block')
			const b = table.declareBinding('b', true, i32)
			assert.strictEqual(table.regionDepth(a), 1)
			assert.strictEqual(table.regionDepth(b), 2)
			assert.strictEqual(table.binding(b).mutable, true)
			assert.strictEqual(table.binding(b).origin, 'local')
		})
	})

	describe('lookup', () => {
		it('should find bindings of enclosing scopes', () => {
			const table = new ScopeTable()
			table.enterScope('function')
			const outer = table.declareBinding('x', false, i32)
			table.enterScope('block')
			assert.strictEqual(table.lookup('x')?.id, outer)
		})

		it('should prefer the innermost binding', () => {
			const table = new ScopeTable()
			table.enterScope('function')
			table.declareBinding('x', false, i32)
			table.enterScope('block')
			const inner = table.declareBinding('x', false, str)
			assert.strictEqual(table.lookup('x')?.id, inner)
		})

		it('should give a shadowing declaration in the same scope a new id', () => {
			const table = new ScopeTable()
			table.enterScope('function')
			const first = table.declareBinding('x', false, i32)
			const second = table.declareBinding('x', true, str)
			assert.notStrictEqual(first, second)
			assert.strictEqual(table.lookup('x')?.id, second)
			assert.strictEqual(table.binding(first).type, i32)
		})

		it('should return null for unknown names', () => {
			const table = new ScopeTable()
			assert.strictEqual(table.lookup('missing'), null)
		})

		it('should throw InternalError when resolving an unknown name', () => {
			const table = new ScopeTable()
			assert.throws(() => table.resolve('missing'), InternalError)
		})

		it('should not see bindings of exited scopes', () => {
			const table = new ScopeTable()
			const block = table.enterScope('block')
			table.declareBinding('tmp', false, i32)
			table.exitScope(block)
			assert.strictEqual(table.lookup('tmp'), null)
		})
	})

	describe('exit', () => {
		it('should run exit callbacks with the scope before it dies', () => {
			const table = new ScopeTable()
			const seen: Array<{ live: boolean; bindings: number }> = []
			table.onScopeExit((scope: Scope) => {
				seen.push({ bindings: scope.bindings.length, live: scope.live })
			})
			const block = table.enterScope('block')
			const x = table.declareBinding('x', false, i32)
			table.declareBinding('y', false, i32)
			table.exitScope(block)
			assert.deepStrictEqual(seen, [{ bindings: 2, live: true }])
			assert.strictEqual(table.isLive(x), false)
		})

		it('should reject exiting a scope that is not the innermost', () => {
			const table = new ScopeTable()
			const outer = table.enterScope('function')
			table.enterScope('block')
			assert.throws(() => table.exitScope(outer), InternalError)
		})

		it('should reject exiting the module scope', () => {
			const table = new ScopeTable()
			assert.throws(() => table.exitScope(scopeId(0)), /cannot exit the module scope/)
		})

		it('should throw InternalError for invalid ids', () => {
			const table = new ScopeTable()
			assert.throws(() => table.scope(scopeId(42)), InternalError)
		})
	})
})

describe('scope/globals', () => {
	const counter = struct('Counter', { count: i32 }, [
		fn('get', [], { owner: 'Counter', receiver: self(i32), returns: i32 }),
	])
	const unit = program(
		extern('helper', [], i32),
		counter,
		impl('Show', 'Counter', [fn('show', [], { receiver: self(i32) })])
	)

	it('should declare functions and methods at depth 0', () => {
		const table = createGlobalTable(unit)
		assert.strictEqual(table.lookup('helper')?.depth, 0)
		assert.strictEqual(table.lookup('Counter.get')?.origin, 'global')
		assert.strictEqual(table.lookup('Counter.show')?.origin, 'global')
	})

	it('should list every function body in source order', () => {
		assert.deepStrictEqual(
			functionsOf(unit).map((u) => qualifiedName(u.decl, u.impl?.target)),
			['Counter.get', 'Counter.show']
		)
	})

	it('should declare an extern as a callable without a body', () => {
		const table = createGlobalTable(unit)
		assert.deepStrictEqual(table.lookup('helper')?.type, fnType([], i32))
	})
})
