/**
 * lexstream core API
 *
 * Lossless C-family lexing:
 * - Every input byte lands in exactly one token (total coverage)
 * - Tokens serialize to a JSONL stream that reassembles byte-for-byte
 * - Per-kind metrics and identifier vocabulary counts across files
 */

export {
	type ByteSink,
	bytesEqual,
	C_GRAMMAR,
	ChunkSink,
	concatBytes,
	fromBinaryString,
	GrammarError,
	type GrammarSpec,
	isCommentKind,
	isWhitespaceKind,
	isWordKind,
	LexContext,
	LexicalGrammar,
	loadGrammar,
	parseGrammarSpec,
	parseTokenKindName,
	TOKEN_KIND_NAMES,
	TOKEN_KINDS,
	type Token,
	TokenKind,
	type TokenListener,
	toBinaryString,
	tokenKindName,
	utf8Bytes,
	utf8Text,
} from './core/index.ts'
export { CorpusRun, type FileReport, type ProcessOptions } from './corpus.ts'
export { type TokenizeResult, tokenize } from './lex/index.ts'
export { formatSummary, Metrics, type StatsSummary } from './metrics/index.ts'
export {
	collectFiles,
	decodeRecord,
	encodeRecord,
	escapeBytes,
	type OpenTarget,
	type OutputTarget,
	RECON_SUFFIX,
	ReassembleError,
	type ReassembledFile,
	type ReassembleOptions,
	type ReassembleResult,
	Reassembler,
	readRecords,
	resolveReconPath,
	StreamEncoder,
	type StreamRecord,
	sanitizeRelativePath,
	splitLines,
	unescapeBytes,
} from './stream/index.ts'
export {
	BYTE_KEYS,
	type CountEntry,
	CountingMap,
	fnv1a,
	type KeyCodec,
	Vocabulary,
	type VocabularyEntry,
} from './vocab/index.ts'
