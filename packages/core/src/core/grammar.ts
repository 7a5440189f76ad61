/**
 * Lexical grammar configuration: reserved words and the punctuator table.
 * The lexer takes a grammar at construction instead of consulting globals,
 * so related C-family grammars can reuse the same engine.
 */

import { readFileSync } from 'node:fs'
import { formatDiagnostic, LSCORE001, LSCORE002 } from '@lexstream/diagnostics'
import { utf8Bytes } from './bytes.ts'

/**
 * Plain-data form of a grammar, as stored in `grammars/*.json`.
 */
export interface GrammarSpec {
	readonly name: string
	readonly keywords: readonly string[]
	readonly punctuators: {
		readonly three: readonly string[]
		readonly two: readonly string[]
		readonly single: readonly string[]
	}
}

export class GrammarError extends Error {
	readonly grammar: string

	constructor(message: string, grammar: string) {
		super(message)
		this.name = 'GrammarError'
		this.grammar = grammar
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function invalid(name: string, detail: string): GrammarError {
	return new GrammarError(formatDiagnostic(LSCORE001, { detail, name }), name)
}

function readStringList(source: Record<string, unknown>, key: string, name: string): string[] {
	const value = source[key]
	if (!isStringArray(value)) {
		throw invalid(name, `"${key}" must be an array of strings`)
	}
	return value
}

/**
 * Validate an unknown JSON value as a grammar spec.
 */
export function parseGrammarSpec(value: unknown, fallbackName = '<grammar>'): GrammarSpec {
	if (!isRecord(value)) {
		throw invalid(fallbackName, 'expected an object')
	}
	const name = typeof value.name === 'string' ? value.name : fallbackName
	const punctuators = value.punctuators
	if (!isRecord(punctuators)) {
		throw invalid(name, '"punctuators" must be an object')
	}
	return {
		keywords: readStringList(value, 'keywords', name),
		name,
		punctuators: {
			single: readStringList(punctuators, 'single', name),
			three: readStringList(punctuators, 'three', name),
			two: readStringList(punctuators, 'two', name),
		},
	}
}

function encodeTable(entries: readonly string[], length: number, name: string): Uint8Array[] {
	return entries.map((entry) => {
		const bytes = utf8Bytes(entry)
		if (bytes.length !== length) {
			throw new GrammarError(formatDiagnostic(LSCORE002, { entry, length }), name)
		}
		return bytes
	})
}

function startsWith(source: Uint8Array, pos: number, entry: Uint8Array): boolean {
	if (pos + entry.length > source.length) return false
	for (let i = 0; i < entry.length; i++) {
		if (source[pos + i] !== entry[i]) return false
	}
	return true
}

export class LexicalGrammar {
	readonly name: string
	private readonly keywords: ReadonlySet<string>
	/** Multi-byte punctuators, longest group first */
	private readonly tables: readonly (readonly Uint8Array[])[]
	/** Lookup by byte value for single-byte punctuators */
	private readonly singles: Uint8Array

	constructor(spec: GrammarSpec) {
		this.name = spec.name
		this.keywords = new Set(spec.keywords)
		this.tables = [
			encodeTable(spec.punctuators.three, 3, spec.name),
			encodeTable(spec.punctuators.two, 2, spec.name),
		]
		this.singles = new Uint8Array(256)
		for (const [byte] of encodeTable(spec.punctuators.single, 1, spec.name)) {
			if (byte !== undefined) this.singles[byte] = 1
		}
	}

	/** Case-sensitive reserved-word check. */
	isKeyword(text: string): boolean {
		return this.keywords.has(text)
	}

	/**
	 * Length of the longest punctuator starting at `pos`, or 0 when none does.
	 */
	matchPunctuator(source: Uint8Array, pos: number): number {
		for (const table of this.tables) {
			for (const entry of table) {
				if (startsWith(source, pos, entry)) return entry.length
			}
		}
		const byte = source[pos]
		return byte !== undefined && this.singles[byte] === 1 ? 1 : 0
	}
}

/**
 * Read and validate a grammar JSON file.
 */
export function loadGrammar(path: string | URL): LexicalGrammar {
	const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'))
	return new LexicalGrammar(parseGrammarSpec(raw, String(path)))
}

/** C11 reserved words and operators. */
export const C_GRAMMAR: LexicalGrammar = loadGrammar(
	new URL('../../grammars/c11.json', import.meta.url)
)
