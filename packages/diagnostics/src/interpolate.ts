import type { DiagnosticArgs } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * `{key}` is replaced by the value of `args[key]`; list values are joined as
 * backticked names (`a`, `b`). Unknown keys are left in place.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (match, key: string) => {
		const value = args[key]
		if (value === undefined) return match
		if (typeof value === 'string' || typeof value === 'number') return String(value)
		return value.map((name) => `\`${name}\``).join(', ')
	})
}
