import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import ReassembleCommand from './commands/reassemble.ts'
import StatsCommand from './commands/stats.ts'
import StreamCommand from './commands/stream.ts'
import VocabCommand from './commands/vocab.ts'

export const version = '0.1.0'

export type CliKernel = ReturnType<typeof Kernel.create>

export function createKernel(): CliKernel {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'lexstream')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(
		new ListLoader([StreamCommand, StatsCommand, VocabCommand, ReassembleCommand, HelpCommand])
	)

	kernel.on('finding:command', async () => {
		console.log(`lexstream v${version}`)
		console.log('')
		console.log('Usage: lexstream [command] [options]')
		console.log('')
		console.log('Run "lexstream --help" for available commands and options.')
		return true
	})

	return kernel
}

/**
 * Run one command line and return the process exit status: the kernel's
 * exit code, which is 1 when the command or flag validation failed.
 */
export async function run(kernel: CliKernel, argv: string[]): Promise<number> {
	await kernel.handle(argv)
	return kernel.exitCode ?? 0
}
