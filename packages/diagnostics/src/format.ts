import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys stay as written.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (_, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : `{${key}}`
	})
}

/**
 * Render a catalog entry as a single log line: `[CODE] message`.
 */
export function formatDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

/**
 * Render the suggestion of a catalog entry, if it has one.
 */
export function formatSuggestion(def: DiagnosticDef, args?: DiagnosticArgs): string | undefined {
	if (def.suggestion === undefined) return undefined
	return interpolateMessage(def.suggestion, args)
}
