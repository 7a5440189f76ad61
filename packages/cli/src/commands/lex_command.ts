import { args, BaseCommand, flags } from '@adonisjs/ace'
import { CorpusRun, type FileReport, type OutputTarget } from '@lexstream/core'
import {
	formatFileSummary,
	formatReadError,
	formatWriteError,
	logDiagnostic,
	openOutput,
	readInput,
	STDIO_PATH,
} from '../utils.ts'

export interface SourceFile {
	name: string
	bytes: Uint8Array
}

/**
 * Shared surface of the commands that lex C sources: input files (standard
 * input when none), `--out` and `--verbose`.
 */
export default abstract class LexCommand extends BaseCommand {
	@args.spread({
		description: 'C source files (default: standard input)',
		required: false,
	})
	declare files?: string[]

	@flags.string({ alias: 'o', description: 'Output file, "-" for standard output' })
	declare out?: string

	@flags.boolean({ description: 'Log a summary line per input file' })
	declare verbose: boolean

	protected readonly corpus = new CorpusRun()

	/** Label of records and reports for standard input */
	protected get stdinLabel(): string {
		return 'stdin'
	}

	protected get outputPath(): string {
		return this.out ?? STDIO_PATH
	}

	protected inputPaths(): string[] {
		if (this.files !== undefined && this.files.length > 0) {
			return this.files
		}
		return [STDIO_PATH]
	}

	protected async readSource(path: string): Promise<SourceFile | null> {
		try {
			const bytes = await readInput(path)
			return { bytes, name: path === STDIO_PATH ? this.stdinLabel : path }
		} catch (error: unknown) {
			logDiagnostic(this.logger, formatReadError(path, error))
			this.exitCode = 1
			return null
		}
	}

	protected async openTarget(): Promise<OutputTarget | null> {
		try {
			return await openOutput(this.out)
		} catch (error: unknown) {
			logDiagnostic(this.logger, formatWriteError(this.outputPath, error))
			this.exitCode = 1
			return null
		}
	}

	protected async emit(output: OutputTarget, chunk: Uint8Array): Promise<boolean> {
		try {
			await output.write(chunk)
			return true
		} catch (error: unknown) {
			logDiagnostic(this.logger, formatWriteError(this.outputPath, error))
			this.exitCode = 1
			return false
		}
	}

	protected async closeOutput(output: OutputTarget): Promise<void> {
		try {
			await output.close()
		} catch (error: unknown) {
			logDiagnostic(this.logger, formatWriteError(this.outputPath, error))
			this.exitCode = 1
		}
	}

	/**
	 * Run `lexFile` over every input in order, writing whatever bytes it
	 * returns. Stops at the first unreadable input or failed write.
	 */
	protected async lexInputs(
		output: OutputTarget,
		lexFile: (source: SourceFile) => Uint8Array | null
	): Promise<boolean> {
		for (const path of this.inputPaths()) {
			const source = await this.readSource(path)
			if (source === null) return false

			const chunk = lexFile(source)
			if (chunk !== null && !(await this.emit(output, chunk))) return false
		}
		return true
	}

	protected logFile(report: FileReport): void {
		if (this.verbose) {
			this.logger.logError(formatFileSummary(report))
		}
	}
}
