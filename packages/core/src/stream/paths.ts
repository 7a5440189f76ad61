import { basename, join } from 'node:path'

/** Appended to every reconstructed file name. */
export const RECON_SUFFIX = '.recon'

const DRIVE_PREFIX = /^[A-Za-z]:/

/**
 * Turn a record's `file` label into a relative path that stays inside the
 * output directory: `\` becomes `/`, a drive letter is dropped, empty and `.`
 * segments go away, `..` segments become `__` and `:` becomes `_`.
 */
export function sanitizeRelativePath(name: string): string {
	const path = name.replaceAll('\\', '/').replace(DRIVE_PREFIX, '')
	const segments = path
		.split('/')
		.filter((segment) => segment !== '' && segment !== '.')
		.map((segment) => (segment === '..' ? '__' : segment.replaceAll(':', '_')))
	return segments.length > 0 ? segments.join('/') : 'unnamed'
}

/**
 * Output path for a record's `file` label. With an output directory the
 * sanitized relative path is kept below it; without one only the base name
 * is used, in the working directory.
 */
export function resolveReconPath(name: string, outdir?: string): string {
	const relative = sanitizeRelativePath(name)
	if (outdir === undefined || outdir === '') {
		return `${basename(relative)}${RECON_SUFFIX}`
	}
	return join(outdir, `${relative}${RECON_SUFFIX}`)
}
