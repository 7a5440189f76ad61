/**
 * CLI diagnostic definitions.
 *
 * Error code format: LSCLI<NUMBER>
 * - LSCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (LSCLI001-099)
// =============================================================================

export const LSCLI001: DiagnosticDef = {
	code: 'LSCLI001',
	description: "lexstream couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const LSCLI002: DiagnosticDef = {
	code: 'LSCLI002',
	description: "The file exists but lexstream can't open it.",
	message: 'cannot read {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const LSCLI003: DiagnosticDef = {
	code: 'LSCLI003',
	description: "lexstream couldn't save the output file.",
	message: 'cannot write {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output location.',
}

export const LSCLI004: DiagnosticDef = {
	code: 'LSCLI004',
	description: "The output directory doesn't exist and couldn't be created.",
	message: 'cannot create directory {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the parent directory exists and is writable.',
}

export const LSCLI005: DiagnosticDef = {
	code: 'LSCLI005',
	description: 'Reconstructing files from the token stream stopped part way.',
	message: 'reassembly failed at {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Files written before the failure are closed but may be incomplete.',
}

export const LSCLI006: DiagnosticDef = {
	code: 'LSCLI006',
	description: 'Something unexpected went wrong.',
	message: 'unexpected failure: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	LSCLI001,
	LSCLI002,
	LSCLI003,
	LSCLI004,
	LSCLI005,
	LSCLI006,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
