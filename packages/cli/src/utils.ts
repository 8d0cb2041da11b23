import type { ContractEntry, Program, VerifyResult } from '@keeper/verifier'
import {
	interpolateMessage,
	KPCLI001,
	KPCLI002,
	KPCLI003,
	KPCLI004,
	KPCLI005,
	KPCLI006,
} from '@keeper/diagnostics'

export type OutputFormat = 'text' | 'json'

/**
 * A verification unit as read from disk: the tree plus the oracle inputs
 * that travel with it.
 */
export interface VerificationUnit {
	readonly program: Program
	readonly copyTypes: readonly string[]
	readonly contracts: readonly ContractEntry[]
}

/**
 * The unit file is valid JSON but not a unit.
 */
export class MalformedUnitError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'MalformedUnitError'
	}
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

// =============================================================================
// MESSAGES
// =============================================================================

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(KPCLI001.message, { path: filePath })
		return `[${KPCLI001.code}] ${message}`
	}
	const message = interpolateMessage(KPCLI002.message, { reason: getErrorMessage(error) })
	return `[${KPCLI002.code}] ${message}`
}

export function formatMalformedUnitError(error: unknown): string {
	const message = interpolateMessage(KPCLI003.message, { reason: getErrorMessage(error) })
	return `[${KPCLI003.code}] ${message}`
}

export function formatInvalidStrategyError(strategy: string): string {
	const message = interpolateMessage(KPCLI004.message, { strategy })
	return `[${KPCLI004.code}] ${message}`
}

export function formatInternalError(phase: string, reason: string): string {
	const message = interpolateMessage(KPCLI005.message, { phase, reason })
	return `[${KPCLI005.code}] ${message}`
}

export function formatInvalidFormatError(format: string): string {
	const message = interpolateMessage(KPCLI006.message, { format })
	return `[${KPCLI006.code}] ${message}`
}

export function isValidFormat(value: string): value is OutputFormat {
	return value === 'text' || value === 'json'
}

// =============================================================================
// UNIT PARSING
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isProgram(value: unknown): value is Program {
	return (
		isRecord(value) &&
		Array.isArray(value.items) &&
		value.items.every((item: unknown) => isRecord(item) && typeof item.kind === 'string')
	)
}

function parseCopyTypes(value: unknown): string[] {
	if (value === undefined) return []
	if (!Array.isArray(value) || !value.every((name: unknown) => typeof name === 'string')) {
		throw new MalformedUnitError('`copyTypes` must be a list of type names')
	}
	return value.map(String)
}

function parseContract(value: unknown, index: number): ContractEntry {
	if (
		!isRecord(value) ||
		typeof value.contract !== 'string' ||
		typeof value.method !== 'string' ||
		typeof value.mutating !== 'boolean'
	) {
		throw new MalformedUnitError(`contract entry ${index} needs \`contract\`, \`method\` and \`mutating\``)
	}
	return { contract: value.contract, method: value.method, mutating: value.mutating }
}

function parseContracts(value: unknown): ContractEntry[] {
	if (value === undefined) return []
	if (!Array.isArray(value)) throw new MalformedUnitError('`contracts` must be a list')
	return value.map((entry: unknown, i) => parseContract(entry, i))
}

/**
 * Read a unit: either a bare program or `{ program, copyTypes?, contracts? }`.
 * Only the outer shape is checked here; node-level problems surface as
 * internal errors of the phase that meets them.
 *
 * @throws {SyntaxError} If the text is not JSON
 * @throws {MalformedUnitError} If the JSON is not a unit
 */
export function parseUnit(text: string): VerificationUnit {
	const data: unknown = JSON.parse(text)
	if (isProgram(data)) return { contracts: [], copyTypes: [], program: data }
	if (!isRecord(data) || !isProgram(data.program)) {
		throw new MalformedUnitError('expected a program with an `items` list')
	}
	return {
		contracts: parseContracts(data.contracts),
		copyTypes: parseCopyTypes(data.copyTypes),
		program: data.program,
	}
}

// =============================================================================
// OUTPUT
// =============================================================================

/**
 * Machine-readable report of one run.
 */
export function renderJson(result: VerifyResult): string {
	return JSON.stringify(
		{
			aborted: result.aborted,
			closures: result.closures,
			diagnostics: result.diagnostics.map((d) => ({
				code: d.def.code,
				kind: d.kind,
				message: d.message,
				phase: d.phase,
				severity: d.def.severity,
				...(d.span ? { span: d.span } : {}),
				...(d.suggestion ? { suggestion: d.suggestion } : {}),
			})),
			phases: result.phases,
			succeeded: result.succeeded,
		},
		null,
		2
	)
}

export function summarize(result: VerifyResult): string {
	const errors = result.context.getErrorCount()
	if (result.succeeded) return 'verification passed'
	const parts = [`${errors} error${errors === 1 ? '' : 's'}`]
	const internal = result.phases.filter((p) => p.internalError !== undefined).length
	if (internal > 0) parts.push(`${internal} phase${internal === 1 ? '' : 's'} failed internally`)
	if (result.aborted) parts.push('stopped early')
	return `verification failed: ${parts.join(', ')}`
}
