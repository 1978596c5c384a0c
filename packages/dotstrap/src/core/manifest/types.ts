import type { AbsolutePath, EntryKey, NonEmptyString } from "@/src/core/types/branded"
import type {
	IoError,
	ManifestFormatError,
	ManifestNotFoundError,
	Result,
} from "@/src/core/types/errors"

/**
 * One source → target linking task.
 * `key` doubles as the source path relative to the repository root.
 */
export interface ManifestEntry {
	readonly key: EntryKey
	readonly targetPath: NonEmptyString
	/** Informational only: never gates linking. */
	readonly isInstalledCmd?: NonEmptyString
}

export interface Manifest {
	readonly entries: readonly ManifestEntry[]
	readonly sourcePath: AbsolutePath
}

export type ManifestParseResult<T> = Result<T, ManifestFormatError>

export type ManifestLoadError = ManifestFormatError | ManifestNotFoundError | IoError

export type ManifestLoadResult = Result<Manifest, ManifestLoadError>
