/**
 * Orchestrator: runs the four phases over one resolved tree.
 */

import { lexicalBorrowEnd, type BorrowEndStrategy } from './borrows/strategy.ts'
import { checkBorrows } from './borrows/checker.ts'
import type { ClosureReport } from './borrows/closures.ts'
import type { Program } from './core/ast.ts'
import { type Diagnostic, type Phase, PHASES, VerifierContext } from './core/context.ts'
import { InternalError, VerifyError } from './core/errors.ts'
import { buildContractTable, type ContractTable, type CopyOracle, copyOracleForProgram } from './core/oracles.ts'
import { checkImmutability } from './immutability/checker.ts'
import { checkLifetimes } from './lifetimes/checker.ts'
import { checkMoves } from './moves/checker.ts'

/**
 * Options for the verify function.
 */
export interface VerifyOptions {
	/** Unit name for error messages */
	filename?: string
	/** Original source text, for source context in formatted diagnostics */
	source?: string
	/** Replaces the default Copy classification entirely */
	copyOracle?: CopyOracle
	/** Extra named types treated as Copy by the default classification */
	copyTypes?: Iterable<string>
	/** Contracts declared outside the unit; the unit's own declarations win */
	contracts?: ContractTable
	/** When held borrows end; defaults to the end of their scope */
	borrowEnd?: BorrowEndStrategy
	/** Stop after the function during which this many errors were reached */
	maxErrors?: number
}

export interface PhaseReport {
	readonly phase: Phase
	readonly errorCount: number
	/** Set when the phase stopped on an internal invariant violation */
	readonly internalError?: string
	/** The phase did not run because verification was aborted */
	readonly skipped: boolean
}

export interface VerifyResult {
	/** True iff every phase ran to completion without errors */
	readonly succeeded: boolean
	readonly diagnostics: readonly Diagnostic[]
	readonly phases: readonly PhaseReport[]
	readonly closures: readonly ClosureReport[]
	/** The error threshold was reached before all functions were checked */
	readonly aborted: boolean
	readonly context: VerifierContext
}

/**
 * Verify one unit.
 *
 * Phases run in order over the same tree and share nothing but the
 * diagnostics sink:
 * 1. Immutability (declared mutability, mutation markers, contracts, unsafe)
 * 2. Moves (use after move, partial moves)
 * 3. Borrows (aliasing, closure captures)
 * 4. Lifetimes (dangling references)
 *
 * Later phases run even when earlier ones reported errors.
 */
export function verify(program: Program, options: VerifyOptions = {}): VerifyResult {
	const context = new VerifierContext({
		...(options.filename !== undefined ? { filename: options.filename } : {}),
		...(options.source !== undefined ? { source: options.source } : {}),
	})
	const copy = options.copyOracle ?? copyOracleForProgram(program, { copyTypes: options.copyTypes ?? [] })
	const contracts = buildContractTable(program, options.contracts)
	const strategy = options.borrowEnd ?? lexicalBorrowEnd
	const { maxErrors } = options
	const shouldStop = (): boolean => maxErrors !== undefined && maxErrors > 0 && context.getErrorCount() >= maxErrors

	let closures: readonly ClosureReport[] = []
	const run: Record<Phase, () => void> = {
		borrows: () => {
			closures = checkBorrows(program, context, { copy, shouldStop, strategy }).closures
		},
		immutability: () => checkImmutability(program, context, { contracts, shouldStop }),
		lifetimes: () => checkLifetimes(program, context, { copy, shouldStop }),
		moves: () => checkMoves(program, context, { copy, shouldStop }),
	}

	const phases: PhaseReport[] = []
	let aborted = false
	for (const phase of PHASES) {
		if (aborted) {
			phases.push({ errorCount: 0, phase, skipped: true })
			continue
		}
		context.beginPhase(phase)
		let internalError: string | undefined
		try {
			run[phase]()
		} catch (error) {
			if (!(error instanceof InternalError)) throw error
			internalError = error.message
		} finally {
			context.endPhase()
		}
		phases.push({
			errorCount: context.getPhaseErrorCount(phase),
			phase,
			skipped: false,
			...(internalError !== undefined ? { internalError } : {}),
		})
		aborted = shouldStop()
	}

	const succeeded = !context.hasErrors() && phases.every((p) => p.internalError === undefined && !p.skipped)
	return { aborted, closures, context, diagnostics: context.getDiagnostics(), phases, succeeded }
}

/**
 * Verify a unit and throw on failure.
 *
 * @throws {VerifyError} With the first formatted error as its message
 */
export function verifyOrThrow(program: Program, options: VerifyOptions = {}): VerifyResult {
	const result = verify(program, options)
	if (result.succeeded) return result
	const first = result.context.getErrors()[0]
	if (first !== undefined) throw new VerifyError(result.context.formatDiagnostic(first))
	const failed = result.phases.find((p) => p.internalError !== undefined)
	throw new VerifyError(`internal error in ${failed?.phase ?? 'verification'}: ${failed?.internalError ?? 'unknown'}`)
}
