/**
 * Rebuilds source files from a record stream.
 *
 * Records of different files may interleave in any order; each is routed by
 * its `file` label to an output target opened on first use. Targets are
 * closed when the stream ends or when anything fails.
 */

import { decodeRecord, type StreamRecord, splitLines } from './codec.ts'
import { resolveReconPath } from './paths.ts'

export interface OutputTarget {
	write(chunk: Uint8Array): Promise<void>
	close(): Promise<void>
}

/** Opens (creating parent directories as needed) the target for an output path. */
export type OpenTarget = (path: string) => Promise<OutputTarget>

export class ReassembleError extends Error {
	readonly path: string

	constructor(message: string, path: string, cause?: unknown) {
		super(message, { cause })
		this.name = 'ReassembleError'
		this.path = path
	}
}

export interface ReassembleOptions {
	/** Output directory; without one, files land in the working directory by base name */
	outdir?: string
}

export interface ReassembledFile {
	readonly path: string
	/** `file` label of the first record routed here */
	readonly source: string
	readonly bytes: number
	readonly records: number
}

export interface ReassembleResult {
	files: ReassembledFile[]
	records: number
	/** Non-empty lines that were not records */
	skipped: number
}

interface OpenHandle {
	readonly path: string
	readonly source: string
	readonly target: OutputTarget
	bytes: number
	records: number
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export class Reassembler {
	private readonly open: OpenTarget
	private readonly outdir: string | undefined
	/** Open targets keyed by output path, live for one `reassemble` call */
	private readonly handles = new Map<string, OpenHandle>()

	constructor(open: OpenTarget, options: ReassembleOptions = {}) {
		this.open = open
		this.outdir = options.outdir
	}

	private async acquire(file: string): Promise<OpenHandle> {
		const path = resolveReconPath(file, this.outdir)
		const existing = this.handles.get(path)
		if (existing !== undefined) return existing

		let target: OutputTarget
		try {
			target = await this.open(path)
		} catch (error: unknown) {
			throw new ReassembleError(`cannot open ${path}: ${describe(error)}`, path, error)
		}
		const handle: OpenHandle = { bytes: 0, path, records: 0, source: file, target }
		this.handles.set(path, handle)
		return handle
	}

	private async append(record: StreamRecord): Promise<void> {
		const handle = await this.acquire(record.file)
		try {
			await handle.target.write(record.lexeme)
		} catch (error: unknown) {
			throw new ReassembleError(
				`cannot write ${handle.path}: ${describe(error)}`,
				handle.path,
				error
			)
		}
		handle.bytes += record.lexeme.length
		handle.records++
	}

	/**
	 * Close every open target. Returns the first close failure, if any,
	 * after attempting all of them.
	 */
	private async release(): Promise<ReassembleError | null> {
		const handles = [...this.handles.values()]
		this.handles.clear()
		const outcomes = await Promise.allSettled(handles.map((handle) => handle.target.close()))
		for (const [index, outcome] of outcomes.entries()) {
			const handle = handles[index]
			if (outcome.status === 'rejected' && handle !== undefined) {
				return new ReassembleError(
					`cannot close ${handle.path}: ${describe(outcome.reason)}`,
					handle.path,
					outcome.reason
				)
			}
		}
		return null
	}

	private summarize(records: number, skipped: number): ReassembleResult {
		const files = [...this.handles.values()].map(({ bytes, path, records, source }) => ({
			bytes,
			path,
			records,
			source,
		}))
		return { files, records, skipped }
	}

	private async run(
		records: Iterable<StreamRecord> | AsyncIterable<StreamRecord>,
		skipped: number
	): Promise<ReassembleResult> {
		let count = 0
		let result: ReassembleResult
		try {
			for await (const record of records) {
				await this.append(record)
				count++
			}
			result = this.summarize(count, skipped)
		} catch (error: unknown) {
			const closeFailure = await this.release()
			if (closeFailure !== null) {
				throw new AggregateError([error, closeFailure], describe(error))
			}
			throw error
		}
		const closeFailure = await this.release()
		if (closeFailure !== null) throw closeFailure
		return result
	}

	/**
	 * Append every record's lexeme to its file, in stream order.
	 */
	reassemble(
		records: Iterable<StreamRecord> | AsyncIterable<StreamRecord>
	): Promise<ReassembleResult> {
		return this.run(records, 0)
	}

	/**
	 * Decode a whole stream buffer and reassemble it.
	 */
	async reassembleStream(data: Uint8Array): Promise<ReassembleResult> {
		const records: StreamRecord[] = []
		let skipped = 0
		for (const line of splitLines(data)) {
			const record = decodeRecord(line)
			if (record !== null) {
				records.push(record)
			} else if (line.some((byte) => byte !== 0x20 && byte !== 0x0d && byte !== 0x09)) {
				skipped++
			}
		}
		return this.run(records, skipped)
	}
}
