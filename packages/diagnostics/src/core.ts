/**
 * Core library diagnostic definitions.
 *
 * Error code format: LSCORE<NUMBER>
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

export const LSCORE001: DiagnosticDef = {
	code: 'LSCORE001',
	description: 'A lexical grammar must list reserved words and punctuators as arrays of strings.',
	message: 'invalid grammar "{name}": {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Compare the grammar file with grammars/c11.json.',
}

export const LSCORE002: DiagnosticDef = {
	code: 'LSCORE002',
	description: 'Punctuator table entries are grouped by length.',
	message: 'punctuator "{entry}" does not have {length} bytes',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move the entry to the table matching its length.',
}

export const CORE_DIAGNOSTICS = {
	LSCORE001,
	LSCORE002,
} as const

export type CoreDiagnosticCode = keyof typeof CORE_DIAGNOSTICS
