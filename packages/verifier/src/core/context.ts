/**
 * Verification context shared by the four phases.
 * Holds the unit's metadata and the append-only diagnostics sink.
 */

import type { Span } from './ast.ts'
import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	type DiagnosticKind,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'

/**
 * The four verification phases, in execution order.
 */
export const PHASES = ['immutability', 'moves', 'borrows', 'lifetimes'] as const

export type Phase = (typeof PHASES)[number]

/**
 * A diagnostic with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Taxonomy kind, copied from the definition for consumers that match on it */
	readonly kind: DiagnosticKind
	/** Phase that reported this diagnostic (null outside any phase) */
	readonly phase: Phase | null
	/** Interpolated message with arguments applied */
	readonly message: string
	readonly span?: Span
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Interpolated suggestion text, if the definition or the caller has one */
	readonly suggestion?: string
}

export interface VerifierContextOptions {
	/** Unit name for error messages */
	filename?: string
	/** Original source text; only used to print source context */
	source?: string
}

/**
 * The verification context, passed to every phase.
 *
 * - Append-only: phases add diagnostics, never remove or rewrite them
 * - No tree state: the tree is read-only, each phase keeps its own tables
 */
export class VerifierContext {
	readonly filename: string

	readonly source: string | undefined

	private readonly diagnostics: Diagnostic[] = []

	private errorCount = 0

	private readonly errorsByPhase: Map<Phase, number> = new Map()

	private activePhase: Phase | null = null

	constructor(options: VerifierContextOptions = {}) {
		this.filename = options.filename ?? '<input>'
		this.source = options.source
	}

	// ===========================================================================
	// PHASES
	// ===========================================================================

	/**
	 * Attribute subsequent diagnostics to a phase.
	 */
	beginPhase(phase: Phase): void {
		this.activePhase = phase
	}

	endPhase(): void {
		this.activePhase = null
	}

	get phase(): Phase | null {
		return this.activePhase
	}

	// ===========================================================================
	// EMIT
	// ===========================================================================

	/**
	 * Emit a diagnostic by code, optionally at a node's span.
	 */
	emit(code: DiagnosticCode, span?: Span, args?: DiagnosticArgs): void {
		this.emitWithSuggestion(code, span, undefined, args)
	}

	/**
	 * Emit a diagnostic with a custom suggestion replacing the catalog one.
	 */
	emitWithSuggestion(
		code: DiagnosticCode,
		span: Span | undefined,
		suggestionOverride: string | undefined,
		args?: DiagnosticArgs
	): void {
		const def = getDiagnostic(code)
		const suggestionText = suggestionOverride ?? def.suggestion
		this.addDiagnosticInternal({
			def,
			kind: def.kind,
			message: interpolateMessage(def.message, args),
			phase: this.activePhase,
			...(span ? { span } : {}),
			...(args ? { args } : {}),
			...(suggestionText ? { suggestion: interpolateMessage(suggestionText, args) } : {}),
		})
	}

	private addDiagnosticInternal(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity !== DiagnosticSeverity.Error) return
		this.errorCount++
		if (diagnostic.phase !== null) {
			this.errorsByPhase.set(diagnostic.phase, (this.errorsByPhase.get(diagnostic.phase) ?? 0) + 1)
		}
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getPhaseErrorCount(phase: Phase): number {
		return this.errorsByPhase.get(phase) ?? 0
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getSourceLine(line: number): string | undefined {
		return this.source?.split('\n')[line - 1]
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
			[DiagnosticSeverity.Warning]: 'warning',
			[DiagnosticSeverity.Note]: 'note',
		}
		return labels[severity]
	}

	private buildSourceContext(span: Span, sourceLine: string): { emptyPrefix: string; lines: string[] } {
		const pad = ' '.repeat(String(span.line).length)
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(span.column - 1)}${'^'.repeat(Math.max(1, span.length ?? 1))}`
		return {
			emptyPrefix,
			lines: [emptyPrefix, ` ${span.line} | ${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * error[KPMOVE001]: use of moved value `a`
	 *   --> main.kp:3:5
	 *    |
	 *  3 | use(a)
	 *    |     ^
	 *    |
	 *    = help: Borrow the value instead of moving it, or assign `a` again before using it.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const header = `${this.getSeverityLabel(diagnostic.def.severity)}[${diagnostic.def.code}]: ${diagnostic.message}`
		const { span } = diagnostic
		const location = span ? `  --> ${this.filename}:${span.line}:${span.column}` : `  --> ${this.filename}`
		const lines = [header, location]

		const sourceLine = span ? this.getSourceLine(span.line) : undefined
		if (span && sourceLine !== undefined) {
			const context = this.buildSourceContext(span, sourceLine)
			lines.push(...context.lines)
			if (diagnostic.suggestion) lines.push(context.emptyPrefix, `   = help: ${diagnostic.suggestion}`)
		} else if (diagnostic.suggestion) {
			lines.push(`   = help: ${diagnostic.suggestion}`)
		}

		return lines.join('\n')
	}
}
