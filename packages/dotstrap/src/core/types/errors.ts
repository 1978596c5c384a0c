import type { AbsolutePath, EntryKey } from "./branded.js"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

/**
 * A path that cannot be expanded or escapes the repository root.
 * Only ever fails a single entry.
 */
export type InvalidPathError = BaseError & {
	type: "invalid_path"
	path: string
}

export type ManifestFormatError = BaseError & {
	type: "manifest_format"
	key?: EntryKey
	sourcePath?: AbsolutePath
}

export type ManifestNotFoundError = BaseError & {
	type: "manifest_not_found"
	path: AbsolutePath
}

export type RepositoryMissingError = BaseError & {
	type: "repository_missing"
	path: AbsolutePath
}

export type CloneError = BaseError & {
	type: "clone"
	url: string
	destination: AbsolutePath
}

export type InvalidOriginError = BaseError & {
	type: "invalid_origin"
	origin: string
}

export type IoError = BaseError & {
	type: "io"
	path: string
	operation: string
}

export type DotstrapError =
	| InvalidPathError
	| ManifestFormatError
	| ManifestNotFoundError
	| RepositoryMissingError
	| CloneError
	| InvalidOriginError
	| IoError

export type Result<T, E extends BaseError = DotstrapError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
