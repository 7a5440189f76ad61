#!/usr/bin/env -S node --import tsx

import { createKernel, run } from './kernel.ts'

async function main(): Promise<void> {
	process.exitCode = await run(createKernel(), process.argv.slice(2))
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
