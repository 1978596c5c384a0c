/**
 * Coercion Functions for Branded Types
 *
 * Pattern: returns the branded value on success, null on failure.
 * Use the Result-returning resolvers in core/paths when you need errors.
 */

import path from "node:path"
import type { AbsolutePath, EntryKey, NonEmptyString } from "./branded.js"

export function coerceNonEmpty(s: string): NonEmptyString | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

/**
 * Coerce a string to AbsolutePath.
 * If relative, resolves against the provided base path.
 */
export function coerceAbsolutePath(s: string, basePath?: string): AbsolutePath | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return resolved as AbsolutePath
}

/**
 * Coerce a known absolute path (no resolution needed).
 * Use when you have a path from a trusted source like process.cwd().
 */
export function coerceAbsolutePathDirect(s: string): AbsolutePath | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	if (!path.isAbsolute(trimmed)) return null
	return path.normalize(trimmed) as AbsolutePath
}

/**
 * Coerce a manifest table name to EntryKey.
 * Keys are kept verbatim apart from the emptiness check: they name files,
 * and leading or trailing spaces are legal in file names.
 */
export function coerceEntryKey(s: string): EntryKey | null {
	if (s.trim().length === 0) return null
	return s as EntryKey
}
