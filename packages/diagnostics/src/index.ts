/**
 * @lexstream/diagnostics
 *
 * Shared diagnostic types and definitions for lexstream packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	LSCLI001,
	LSCLI002,
	LSCLI003,
	LSCLI004,
	LSCLI005,
	LSCLI006,
} from './cli.ts'
export { CORE_DIAGNOSTICS, type CoreDiagnosticCode, LSCORE001, LSCORE002 } from './core.ts'
export { formatDiagnostic, formatSuggestion, interpolateMessage } from './format.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { CORE_DIAGNOSTICS } from './core.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...CORE_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
