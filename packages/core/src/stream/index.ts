/**
 * Token stream serialization and file reconstruction.
 */

export {
	collectFiles,
	decodeRecord,
	encodeRecord,
	readRecords,
	StreamEncoder,
	type StreamRecord,
	splitLines,
} from './codec.ts'
export { escapeBytes, unescapeBytes } from './escape.ts'
export { RECON_SUFFIX, resolveReconPath, sanitizeRelativePath } from './paths.ts'
export {
	type OpenTarget,
	type OutputTarget,
	ReassembleError,
	type ReassembledFile,
	type ReassembleOptions,
	type ReassembleResult,
	Reassembler,
} from './reassembler.ts'
