/**
 * Error classes for conditions that are not user diagnostics.
 */

/**
 * An internal invariant of the verifier was violated: an unresolved name,
 * scope-stack misuse or an unknown node kind. Upstream resolution guarantees
 * these never happen for a well-formed tree, so the phase stops.
 */
export class InternalError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'InternalError'
	}
}

/**
 * Thrown by `verifyOrThrow` when a unit fails verification.
 * The message is the first formatted error.
 */
export class VerifyError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'VerifyError'
	}
}

/**
 * Exhaustiveness guard for switches over the closed node set.
 */
export function assertNever(value: never, what: string): never {
	throw new InternalError(`unhandled ${what}: ${JSON.stringify(value)}`)
}
