import { mkdir, open } from 'node:fs/promises'
import { dirname } from 'node:path'
import { buffer } from 'node:stream/consumers'
import { type FileReport, type OutputTarget, ReassembleError, type ReassembledFile } from '@lexstream/core'
import {
	type DiagnosticArgs,
	type DiagnosticDef,
	formatDiagnostic,
	formatSuggestion,
	LSCLI001,
	LSCLI002,
	LSCLI003,
	LSCLI004,
	LSCLI005,
	LSCLI006,
} from '@lexstream/diagnostics'

/** Path argument standing for standard input or output */
export const STDIO_PATH = '-'

/** A catalog entry ready to log: the `[CODE] message` line and its hint. */
export interface CliDiagnostic {
	readonly line: string
	readonly suggestion: string | undefined
}

/** The two logger calls diagnostics need; ace's command logger has both. */
export interface DiagnosticLogger {
	error(message: string): void
	logError(message: string): void
}

function render(def: DiagnosticDef, args: DiagnosticArgs): CliDiagnostic {
	return { line: formatDiagnostic(def, args), suggestion: formatSuggestion(def, args) }
}

/**
 * Log the diagnostic line, then its suggestion indented below it.
 */
export function logDiagnostic(logger: DiagnosticLogger, diagnostic: CliDiagnostic): void {
	logger.error(diagnostic.line)
	if (diagnostic.suggestion !== undefined) {
		logger.logError(`  ${diagnostic.suggestion}`)
	}
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Raised by `openFileTarget` when the parent directory of an output file
 * cannot be created.
 */
export class OutputDirectoryError extends Error {
	readonly path: string

	constructor(path: string, cause: unknown) {
		super(`cannot create directory ${path}: ${getErrorMessage(cause)}`, { cause })
		this.name = 'OutputDirectoryError'
		this.path = path
	}
}

export function formatReadError(filePath: string, error: unknown): CliDiagnostic {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return render(LSCLI001, { path: filePath })
	}
	return render(LSCLI002, { path: filePath, reason: getErrorMessage(error) })
}

export function formatWriteError(filePath: string, error: unknown): CliDiagnostic {
	return render(LSCLI003, { path: filePath, reason: getErrorMessage(error) })
}

export function formatDirectoryError(dirPath: string, error: unknown): CliDiagnostic {
	return render(LSCLI004, { path: dirPath, reason: getErrorMessage(error) })
}

/**
 * Map a failure escaping `Reassembler` to its diagnostic. When closing also
 * failed, the first failure is the one reported.
 */
export function formatReassembleError(error: unknown): CliDiagnostic {
	if (error instanceof AggregateError && error.errors.length > 0) {
		return formatReassembleError(error.errors[0])
	}
	if (error instanceof ReassembleError) {
		if (error.cause instanceof OutputDirectoryError) {
			return formatDirectoryError(error.cause.path, error.cause.cause)
		}
		return render(LSCLI005, {
			path: error.path,
			reason: getErrorMessage(error.cause ?? error),
		})
	}
	return render(LSCLI006, { reason: getErrorMessage(error) })
}

export function formatFileSummary(report: FileReport): string {
	return `${report.filename}: ${report.tokenCount} tokens, ${report.bytes} bytes`
}

export function formatReconSummary(file: ReassembledFile): string {
	return `${file.path}: ${file.records} records, ${file.bytes} bytes`
}

/**
 * Whole contents of a file, or of standard input for `-`.
 */
export async function readInput(path: string): Promise<Uint8Array> {
	if (path === STDIO_PATH) {
		return await buffer(process.stdin)
	}
	const handle = await open(path, 'r')
	try {
		return await handle.readFile()
	} finally {
		await handle.close()
	}
}

function writeStdout(chunk: Uint8Array): Promise<void> {
	return new Promise((resolve, reject) => {
		process.stdout.write(chunk, (error) => {
			if (error) {
				reject(error)
			} else {
				resolve()
			}
		})
	})
}

const stdoutTarget: OutputTarget = {
	close: async () => {},
	write: writeStdout,
}

async function openFile(path: string): Promise<OutputTarget> {
	const handle = await open(path, 'w')
	return {
		close: () => handle.close(),
		write: async (chunk) => {
			let offset = 0
			while (offset < chunk.length) {
				const { bytesWritten } = await handle.write(chunk, offset)
				offset += bytesWritten
			}
		},
	}
}

/**
 * Output for `--out`: standard output when absent or `-`, otherwise the file,
 * truncated.
 */
export async function openOutput(path: string | undefined): Promise<OutputTarget> {
	if (path === undefined || path === STDIO_PATH) return stdoutTarget
	return await openFile(path)
}

/**
 * Open an output file for writing, creating its parent directories first.
 */
export async function openFileTarget(path: string): Promise<OutputTarget> {
	const dir = dirname(path)
	try {
		await mkdir(dir, { recursive: true })
	} catch (error: unknown) {
		throw new OutputDirectoryError(dir, error)
	}
	return await openFile(path)
}
