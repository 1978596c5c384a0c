import path from "node:path"
import { readTextFile, safeLstat } from "@/src/core/io/fs"
import { parseManifest } from "@/src/core/manifest/parse"
import type { ManifestLoadResult } from "@/src/core/manifest/types"
import type { AbsolutePath } from "@/src/core/types/branded"
import { coerceAbsolutePathDirect } from "@/src/core/types/coerce"
import type { IoError, ManifestNotFoundError, Result } from "@/src/core/types/errors"

export const DEFAULT_MANIFEST_NAME = "dotstrap.toml"

/**
 * Read and parse the manifest at `manifestPath`.
 */
export async function loadManifest(manifestPath: AbsolutePath): Promise<ManifestLoadResult> {
	const exists = await safeLstat(manifestPath)
	if (!exists.ok) {
		return exists
	}

	if (!exists.value) {
		return notFound(manifestPath, `Manifest not found: ${manifestPath}`)
	}

	const contents = await readTextFile(manifestPath)
	if (!contents.ok) {
		return contents
	}

	const parsed = parseManifest(contents.value, manifestPath)
	if (!parsed.ok) {
		return parsed
	}

	return { ok: true, value: { entries: parsed.value, sourcePath: manifestPath } }
}

/**
 * Locate the manifest in the root of a repository.
 */
export async function findManifest(
	repoRoot: AbsolutePath,
	fileName: string = DEFAULT_MANIFEST_NAME,
): Promise<Result<AbsolutePath, ManifestNotFoundError | IoError>> {
	const candidate = coerceAbsolutePathDirect(path.join(repoRoot, fileName))
	if (!candidate || path.dirname(candidate) !== path.resolve(repoRoot)) {
		return notFound(repoRoot, `Invalid manifest file name: ${fileName}`)
	}

	const stats = await safeLstat(candidate)
	if (!stats.ok) {
		return stats
	}

	if (!stats.value) {
		return notFound(candidate, `No ${fileName} found in ${repoRoot}.`)
	}

	return { ok: true, value: candidate }
}

function notFound(
	manifestPath: AbsolutePath,
	message: string,
): Result<never, ManifestNotFoundError> {
	return {
		error: { message, path: manifestPath, type: "manifest_not_found" },
		ok: false,
	}
}
