import { flags } from '@adonisjs/ace'
import { ChunkSink } from '@lexstream/core'
import LexCommand from './lex_command.ts'

export default class StreamCommand extends LexCommand {
	static override commandName = 'stream'
	static override description = 'Write one JSON record per token of every input file'

	@flags.string({ description: 'File label for standard input' })
	declare stdinName?: string

	protected override get stdinLabel(): string {
		return this.stdinName ?? 'stdin'
	}

	override async run(): Promise<void> {
		const output = await this.openTarget()
		if (output === null) return

		const sink = new ChunkSink()
		await this.lexInputs(output, (source) => {
			this.logFile(this.corpus.processFile(source.bytes, source.name, { stream: sink }))
			return sink.take()
		})
		await this.closeOutput(output)
	}
}
