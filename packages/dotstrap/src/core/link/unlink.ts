import { readlink, unlink } from "node:fs/promises"
import path from "node:path"
import { safeLstat } from "@/src/core/io/fs"
import { ensureRepository } from "@/src/core/link/link"
import type {
	LinkOptions,
	UnlinkCounts,
	UnlinkResult,
	UnlinkStatus,
} from "@/src/core/link/types"
import { NOT_A_SYMLINK, POINTS_ELSEWHERE, TARGET_MISSING } from "@/src/core/link/types"
import type { ManifestEntry } from "@/src/core/manifest/types"
import { resolveSource, resolveTarget } from "@/src/core/paths/resolve"
import type { AbsolutePath } from "@/src/core/types/branded"
import type { RepositoryMissingError, Result } from "@/src/core/types/errors"
import { formatError } from "@/src/utils/errors"

/**
 * Remove the links `linkAll` created.
 *
 * A target is removed only when it is a symlink pointing at the entry's
 * source; regular files, directories and foreign links are left alone.
 */
export async function unlinkAll(
	repoRoot: AbsolutePath,
	entries: readonly ManifestEntry[],
	options: LinkOptions,
): Promise<Result<UnlinkResult[], RepositoryMissingError>> {
	const rootReady = await ensureRepository(repoRoot)
	if (!rootReady.ok) {
		return rootReady
	}

	const results: UnlinkResult[] = []
	for (const entry of entries) {
		results.push(await unlinkEntry(repoRoot, entry, options))
	}

	return { ok: true, value: results }
}

async function unlinkEntry(
	repoRoot: AbsolutePath,
	entry: ManifestEntry,
	options: LinkOptions,
): Promise<UnlinkResult> {
	const target = resolveTarget(entry.targetPath, options.homeDir)
	if (!target.ok) {
		return { key: entry.key, status: failed(target.error.message) }
	}

	const source = resolveSource(repoRoot, entry.key)
	if (!source.ok) {
		return { key: entry.key, status: failed(source.error.message), target: target.value }
	}

	const base = { key: entry.key, source: source.value, target: target.value }

	const stats = await safeLstat(target.value)
	if (!stats.ok) {
		return { ...base, status: failed(stats.error.message) }
	}

	if (!stats.value) {
		return { ...base, status: skipped(TARGET_MISSING) }
	}

	if (!stats.value.isSymbolicLink()) {
		return { ...base, status: skipped(NOT_A_SYMLINK) }
	}

	try {
		const destination = await readlink(target.value)
		const absolute = path.resolve(path.dirname(target.value), destination)
		if (absolute !== source.value) {
			return { ...base, status: skipped(POINTS_ELSEWHERE) }
		}

		if (!options.dryRun) {
			await unlink(target.value)
		}

		return { ...base, status: { type: "removed" } }
	} catch (error) {
		return { ...base, status: failed(formatError(error)) }
	}
}

export function countUnlinkResults(results: readonly UnlinkResult[]): UnlinkCounts {
	const counts: UnlinkCounts = { failed: 0, removed: 0, skipped: 0 }
	for (const result of results) {
		counts[result.status.type] += 1
	}

	return counts
}

function skipped(reason: string): UnlinkStatus {
	return { reason, type: "skipped" }
}

function failed(reason: string): UnlinkStatus {
	return { reason, type: "failed" }
}
