import { BaseCommand, flags } from '@adonisjs/ace'
import { type ReassembleResult, Reassembler } from '@lexstream/core'
import {
	formatReadError,
	formatReassembleError,
	formatReconSummary,
	logDiagnostic,
	openFileTarget,
	readInput,
} from '../utils.ts'

export default class ReassembleCommand extends BaseCommand {
	static override commandName = 'reassemble'
	static override description = 'Rebuild source files from a token stream as <file>.recon'

	@flags.string({
		alias: 'i',
		description: 'Token stream to read, "-" for standard input',
		flagName: 'in',
		required: true,
	})
	declare input: string

	@flags.string({
		alias: 'd',
		description: 'Output directory (default: base names in the working directory)',
	})
	declare outdir?: string

	@flags.boolean({ description: 'Log a summary line per rebuilt file' })
	declare verbose: boolean

	private async readStream(): Promise<Uint8Array | null> {
		try {
			return await readInput(this.input)
		} catch (error: unknown) {
			logDiagnostic(this.logger, formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private async rebuild(data: Uint8Array): Promise<ReassembleResult | null> {
		try {
			return await new Reassembler(openFileTarget, { outdir: this.outdir }).reassembleStream(data)
		} catch (error: unknown) {
			logDiagnostic(this.logger, formatReassembleError(error))
			this.exitCode = 1
			return null
		}
	}

	private logResult(result: ReassembleResult): void {
		if (!this.verbose) return
		for (const file of result.files) {
			this.logger.logError(formatReconSummary(file))
		}
		if (result.skipped > 0) {
			this.logger.logError(`skipped ${result.skipped} lines without a record`)
		}
	}

	override async run(): Promise<void> {
		const data = await this.readStream()
		if (data === null) return

		const result = await this.rebuild(data)
		if (result === null) return

		this.logResult(result)
	}
}
