import LexCommand from './lex_command.ts'

export default class VocabCommand extends LexCommand {
	static override commandName = 'vocab'
	static override description = 'Print identifier and keyword counts, one "<lexeme>\\t<count>" line each'

	override async run(): Promise<void> {
		const output = await this.openTarget()
		if (output === null) return

		const lexed = await this.lexInputs(output, (source) => {
			this.logFile(this.corpus.processFile(source.bytes, source.name))
			return null
		})
		if (lexed) {
			await this.emit(output, this.corpus.formatVocabulary())
		}
		await this.closeOutput(output)
	}
}
