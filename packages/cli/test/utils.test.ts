import assert from 'node:assert'
import { readFileSync } from 'node:fs'
import { describe, it } from 'node:test'
import { verify } from '@keeper/verifier'
import {
	formatInternalError,
	formatInvalidFormatError,
	formatInvalidStrategyError,
	formatMalformedUnitError,
	formatReadError,
	getErrorMessage,
	isNodeError,
	isValidFormat,
	MalformedUnitError,
	parseUnit,
	renderJson,
	summarize,
} from '../src/utils.ts'

function nodeError(message: string, code: string): NodeJS.ErrnoException {
	return Object.assign(new Error(message), { code })
}

const emptyProgram = { items: [] }

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		assert.strictEqual(isNodeError(nodeError('test', 'ENOENT')), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as a missing file', () => {
		const result = formatReadError('/path/to/unit.json', nodeError('no such file', 'ENOENT'))
		assert.strictEqual(result, '[KPCLI001] file not found: /path/to/unit.json')
	})

	it('should format other errors as unreadable', () => {
		const result = formatReadError('/path/to/unit.json', nodeError('permission denied', 'EACCES'))
		assert.strictEqual(result, '[KPCLI002] cannot read file: permission denied')
	})

	it('should handle plain Error', () => {
		assert.strictEqual(formatReadError('unit.json', new Error('unknown error')), '[KPCLI002] cannot read file: unknown error')
	})
})

describe('option errors', () => {
	it('should name an unknown strategy', () => {
		assert.strictEqual(formatInvalidStrategyError('eager'), '[KPCLI004] unknown borrow-end strategy "eager"')
	})

	it('should name an unknown format', () => {
		assert.strictEqual(formatInvalidFormatError('xml'), '[KPCLI006] unknown format "xml"')
	})

	it('should name the phase of an internal error', () => {
		assert.strictEqual(
			formatInternalError('moves', 'unresolved name `ghost`'),
			'[KPCLI005] internal error in moves: unresolved name `ghost`'
		)
	})

	it('should accept only the known formats', () => {
		assert.strictEqual(isValidFormat('text'), true)
		assert.strictEqual(isValidFormat('json'), true)
		assert.strictEqual(isValidFormat('JSON'), false)
		assert.strictEqual(isValidFormat(''), false)
	})
})

describe('parseUnit', () => {
	it('should accept a bare program', () => {
		const unit = parseUnit(JSON.stringify(emptyProgram))
		assert.deepStrictEqual(unit, { contracts: [], copyTypes: [], program: emptyProgram })
	})

	it('should accept a program with oracle inputs', () => {
		const unit = parseUnit(
			JSON.stringify({
				contracts: [{ contract: 'Reset', method: 'reset', mutating: true }],
				copyTypes: ['Point'],
				program: emptyProgram,
			})
		)
		assert.deepStrictEqual(unit.copyTypes, ['Point'])
		assert.deepStrictEqual(unit.contracts, [{ contract: 'Reset', method: 'reset', mutating: true }])
	})

	it('should reject JSON that is not a unit', () => {
		assert.throws(() => parseUnit('[1, 2]'), MalformedUnitError)
		assert.throws(() => parseUnit('{"items": [1]}'), MalformedUnitError)
	})

	it('should reject malformed oracle inputs', () => {
		assert.throws(() => parseUnit('{"program": {"items": []}, "copyTypes": [1]}'), {
			message: '`copyTypes` must be a list of type names',
		})
		assert.throws(() => parseUnit('{"program": {"items": []}, "contracts": [{"contract": "Reset"}]}'), {
			message: 'contract entry 0 needs `contract`, `method` and `mutating`',
		})
	})

	it('should let JSON syntax errors through', () => {
		assert.throws(() => parseUnit('{'), SyntaxError)
	})

	it('should format a malformed unit', () => {
		assert.strictEqual(
			formatMalformedUnitError(new MalformedUnitError('expected a program with an `items` list')),
			'[KPCLI003] malformed unit: expected a program with an `items` list'
		)
	})
})

const reassignUnit = readFileSync(new URL('./fixtures/reassign.json', import.meta.url), 'utf-8')

describe('renderJson', () => {
	it('should report the gate, phases and diagnostics', () => {
		const result = verify(parseUnit(reassignUnit).program)
		const report: unknown = JSON.parse(renderJson(result))
		assert.deepStrictEqual(report, {
			aborted: false,
			closures: [],
			diagnostics: [
				{
					code: 'KPIMM001',
					kind: 'ImmutableAssignment',
					message: 'cannot assign twice to immutable binding `x`',
					phase: 'immutability',
					severity: 0,
					span: { column: 1, line: 2 },
					suggestion: 'Declare the binding as mutable: `let mut x`.',
				},
			],
			phases: [
				{ errorCount: 1, phase: 'immutability', skipped: false },
				{ errorCount: 0, phase: 'moves', skipped: false },
				{ errorCount: 0, phase: 'borrows', skipped: false },
				{ errorCount: 0, phase: 'lifetimes', skipped: false },
			],
			succeeded: false,
		})
		assert.strictEqual(summarize(result), 'verification failed: 1 error')
	})

	it('should summarize a clean run', () => {
		assert.strictEqual(summarize(verify({ items: [] })), 'verification passed')
	})
})
