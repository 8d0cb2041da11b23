import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type BorrowEndStrategy, ContractTable, getBorrowEndStrategy, type VerifyResult, verify } from '@keeper/verifier'
import {
	formatInternalError,
	formatInvalidFormatError,
	formatInvalidStrategyError,
	formatMalformedUnitError,
	formatReadError,
	isValidFormat,
	type OutputFormat,
	parseUnit,
	renderJson,
	summarize,
	type VerificationUnit,
} from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Verify ownership and borrowing rules of a resolved syntax tree'

	@args.string({ description: 'JSON unit to verify (a program, or { program, copyTypes, contracts })' })
	declare input: string

	@flags.number({ default: 0, description: 'Stop after the function that reaches this many errors (0 = no limit)' })
	declare maxErrors: number

	@flags.string({ default: 'lexical', description: 'When held borrows end: lexical or last-use' })
	declare borrowEnd: string

	@flags.string({ alias: 'f', default: 'text', description: 'Output format: text or json' })
	declare format: string

	@flags.string({ description: 'Original source text, shown next to diagnostics' })
	declare source?: string

	private fail(message: string): void {
		this.logger.error(message)
		this.exitCode = 1
	}

	private resolveStrategy(): BorrowEndStrategy | null {
		const strategy = getBorrowEndStrategy(this.borrowEnd)
		if (strategy === undefined) {
			this.fail(formatInvalidStrategyError(this.borrowEnd))
			return null
		}
		return strategy
	}

	private resolveFormat(): OutputFormat | null {
		if (!isValidFormat(this.format)) {
			this.fail(formatInvalidFormatError(this.format))
			return null
		}
		return this.format
	}

	private async readText(path: string): Promise<string | null> {
		try {
			return await readFile(path, 'utf-8')
		} catch (error: unknown) {
			this.fail(formatReadError(path, error))
			return null
		}
	}

	private readUnit(text: string): VerificationUnit | null {
		try {
			return parseUnit(text)
		} catch (error: unknown) {
			this.fail(formatMalformedUnitError(error))
			return null
		}
	}

	private runVerifier(unit: VerificationUnit, strategy: BorrowEndStrategy, source: string | undefined): VerifyResult | null {
		try {
			return verify(unit.program, {
				borrowEnd: strategy,
				contracts: new ContractTable(unit.contracts),
				copyTypes: unit.copyTypes,
				filename: this.input,
				maxErrors: this.maxErrors,
				...(source !== undefined ? { source } : {}),
			})
		} catch (error: unknown) {
			// Node shapes the tree walk does not expect
			this.fail(formatMalformedUnitError(error))
			return null
		}
	}

	private report(result: VerifyResult, format: OutputFormat): void {
		if (format === 'json') {
			this.logger.log(renderJson(result))
		} else {
			for (const diagnostic of result.diagnostics) {
				this.logger.error(result.context.formatDiagnostic(diagnostic))
			}
			for (const phase of result.phases) {
				if (phase.internalError !== undefined) {
					this.logger.error(formatInternalError(phase.phase, phase.internalError))
				}
			}
			if (result.succeeded) this.logger.success(summarize(result))
			else this.logger.error(summarize(result))
		}
		if (!result.succeeded) this.exitCode = 1
	}

	override async run(): Promise<void> {
		const strategy = this.resolveStrategy()
		if (strategy === null) return
		const format = this.resolveFormat()
		if (format === null) return

		const text = await this.readText(this.input)
		if (text === null) return
		const unit = this.readUnit(text)
		if (unit === null) return

		let source: string | undefined
		if (this.source !== undefined) {
			const loaded = await this.readText(this.source)
			if (loaded === null) return
			source = loaded
		}

		const result = this.runVerifier(unit, strategy, source)
		if (result === null) return
		this.report(result, format)
	}
}
