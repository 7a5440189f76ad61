import { formatSummary, utf8Bytes } from '@lexstream/core'
import LexCommand from './lex_command.ts'

export default class StatsCommand extends LexCommand {
	static override commandName = 'stats'
	static override description = 'Print token, byte and per-kind counts as one JSON object'

	override async run(): Promise<void> {
		const output = await this.openTarget()
		if (output === null) return

		const lexed = await this.lexInputs(output, (source) => {
			this.logFile(this.corpus.processFile(source.bytes, source.name, { vocabulary: false }))
			return null
		})
		if (lexed) {
			await this.emit(output, utf8Bytes(formatSummary(this.corpus.summary())))
		}
		await this.closeOutput(output)
	}
}
