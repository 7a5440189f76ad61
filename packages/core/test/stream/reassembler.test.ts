import assert from 'node:assert'
import { describe, it } from 'node:test'
import { concatBytes, fromBinaryString, toBinaryString } from '../../src/core/bytes.ts'
import type { StreamRecord } from '../../src/stream/codec.ts'
import {
	type OpenTarget,
	ReassembleError,
	Reassembler,
} from '../../src/stream/reassembler.ts'

interface MemoryFile {
	chunks: Uint8Array[]
	closed: boolean
}

interface MemoryFs {
	files: Map<string, MemoryFile>
	opens: string[]
	open: OpenTarget
}

function memoryFs(fail: { open?: string; write?: string; close?: string } = {}): MemoryFs {
	const files = new Map<string, MemoryFile>()
	const opens: string[] = []
	const open: OpenTarget = async (path) => {
		opens.push(path)
		if (path === fail.open) throw new Error('permission denied')
		const file: MemoryFile = { chunks: [], closed: false }
		files.set(path, file)
		return {
			close: async () => {
				file.closed = true
				if (path === fail.close) throw new Error('disk full')
			},
			write: async (chunk) => {
				if (path === fail.write) throw new Error('disk full')
				file.chunks.push(chunk.slice())
			},
		}
	}
	return { files, open, opens }
}

function contents(fs: MemoryFs, path: string): string | undefined {
	const file = fs.files.get(path)
	return file === undefined ? undefined : toBinaryString(concatBytes(file.chunks))
}

function record(file: string, lexeme: string): StreamRecord {
	return { file, lexeme: fromBinaryString(lexeme) }
}

describe('stream/reassembler', () => {
	it('should route interleaved records to their files', async () => {
		const fs = memoryFs()
		const result = await new Reassembler(fs.open, { outdir: 'out' }).reassemble([
			record('a.c', 'int'),
			record('b.c', 'x'),
			record('a.c', ' '),
			record('b.c', ';'),
			record('a.c', 'y'),
		])

		assert.strictEqual(contents(fs, 'out/a.c.recon'), 'int y')
		assert.strictEqual(contents(fs, 'out/b.c.recon'), 'x;')
		assert.strictEqual(result.records, 5)
		assert.strictEqual(result.skipped, 0)
		assert.deepStrictEqual(result.files, [
			{ bytes: 5, path: 'out/a.c.recon', records: 3, source: 'a.c' },
			{ bytes: 2, path: 'out/b.c.recon', records: 2, source: 'b.c' },
		])
	})

	it('should close every target when done', async () => {
		const fs = memoryFs()
		await new Reassembler(fs.open).reassemble([record('a.c', 'x'), record('b.c', 'y')])
		assert.deepStrictEqual(
			[...fs.files.values()].map((file) => file.closed),
			[true, true]
		)
	})

	it('should open one target per output path', async () => {
		const fs = memoryFs()
		await new Reassembler(fs.open, { outdir: 'out' }).reassemble([
			record('a.c', 'x'),
			record('./a.c', 'y'),
		])
		assert.deepStrictEqual(fs.opens, ['out/a.c.recon'])
		assert.strictEqual(contents(fs, 'out/a.c.recon'), 'xy')
	})

	it('should accept async record sources', async () => {
		async function* source(): AsyncGenerator<StreamRecord> {
			yield record('a.c', 'a')
			yield record('a.c', 'b')
		}
		const fs = memoryFs()
		const result = await new Reassembler(fs.open).reassemble(source())
		assert.strictEqual(contents(fs, 'a.c.recon'), 'ab')
		assert.strictEqual(result.records, 2)
	})

	it('should reject with the failing path when a target cannot be opened', async () => {
		const fs = memoryFs({ open: 'out/b.c.recon' })
		const run = new Reassembler(fs.open, { outdir: 'out' }).reassemble([
			record('a.c', 'x'),
			record('b.c', 'y'),
		])
		await assert.rejects(run, (error: unknown) => {
			assert.ok(error instanceof ReassembleError)
			assert.strictEqual(error.path, 'out/b.c.recon')
			assert.strictEqual(error.message, 'cannot open out/b.c.recon: permission denied')
			return true
		})
		assert.strictEqual(fs.files.get('out/a.c.recon')?.closed, true)
	})

	it('should reject when a write fails', async () => {
		const fs = memoryFs({ write: 'a.c.recon' })
		await assert.rejects(new Reassembler(fs.open).reassemble([record('a.c', 'x')]), {
			message: 'cannot write a.c.recon: disk full',
			name: 'ReassembleError',
		})
		assert.strictEqual(fs.files.get('a.c.recon')?.closed, true)
	})

	it('should report a close failure after a successful run', async () => {
		const fs = memoryFs({ close: 'a.c.recon' })
		await assert.rejects(new Reassembler(fs.open).reassemble([record('a.c', 'x')]), {
			message: 'cannot close a.c.recon: disk full',
		})
	})

	it('should report both failures when closing after an error also fails', async () => {
		const fs = memoryFs({ close: 'a.c.recon', write: 'b.c.recon' })
		const run = new Reassembler(fs.open).reassemble([record('a.c', 'x'), record('b.c', 'y')])
		await assert.rejects(run, (error: unknown) => {
			assert.ok(error instanceof AggregateError)
			assert.strictEqual(error.message, 'cannot write b.c.recon: disk full')
			assert.strictEqual(error.errors.length, 2)
			return true
		})
	})

	it('should reuse the instance after a run', async () => {
		const fs = memoryFs()
		const reassembler = new Reassembler(fs.open)
		await reassembler.reassemble([record('a.c', 'x')])
		const second = await reassembler.reassemble([record('a.c', 'y')])
		assert.deepStrictEqual(fs.opens, ['a.c.recon', 'a.c.recon'])
		assert.strictEqual(second.files.length, 1)
	})

	describe('reassembleStream', () => {
		it('should count non-blank lines that are not records', async () => {
			const fs = memoryFs()
			const data = fromBinaryString(
				'{"file":"a.c","lexeme":"x"}\nnoise\n\n  \r\n{"file":"a.c"}\n{"file":"a.c","lexeme":"\\n"}\n'
			)
			const result = await new Reassembler(fs.open).reassembleStream(data)
			assert.strictEqual(result.records, 2)
			assert.strictEqual(result.skipped, 2)
			assert.strictEqual(contents(fs, 'a.c.recon'), 'x\n')
		})

		it('should open nothing for an empty stream', async () => {
			const fs = memoryFs()
			const result = await new Reassembler(fs.open).reassembleStream(new Uint8Array(0))
			assert.deepStrictEqual(result, { files: [], records: 0, skipped: 0 })
			assert.deepStrictEqual(fs.opens, [])
		})
	})
})
