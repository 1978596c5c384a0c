import type { Stats } from "node:fs"
import { symlink } from "node:fs/promises"
import path from "node:path"
import { errorCode, isNotFound, safeLstat, safeStat } from "@/src/core/io/fs"
import type {
	LinkCounts,
	LinkOptions,
	LinkResult,
	LinkStatus,
} from "@/src/core/link/types"
import { SOURCE_MISSING, TARGET_EXISTS } from "@/src/core/link/types"
import type { ManifestEntry } from "@/src/core/manifest/types"
import { resolveSource, resolveTarget } from "@/src/core/paths/resolve"
import type { AbsolutePath } from "@/src/core/types/branded"
import type { RepositoryMissingError, Result } from "@/src/core/types/errors"
import { formatError } from "@/src/utils/errors"

/**
 * Link every manifest entry into place.
 *
 * Entries are processed one at a time and independently: a skipped or
 * failed entry never stops the ones after it. An existing target is never
 * modified. The only error returned is a missing repository root.
 */
export async function linkAll(
	repoRoot: AbsolutePath,
	entries: readonly ManifestEntry[],
	options: LinkOptions,
): Promise<Result<LinkResult[], RepositoryMissingError>> {
	const rootReady = await ensureRepository(repoRoot)
	if (!rootReady.ok) {
		return rootReady
	}

	const results: LinkResult[] = []
	for (const entry of entries) {
		results.push(await linkEntry(repoRoot, entry, options))
	}

	return { ok: true, value: results }
}

async function linkEntry(
	repoRoot: AbsolutePath,
	entry: ManifestEntry,
	options: LinkOptions,
): Promise<LinkResult> {
	const target = resolveTarget(entry.targetPath, options.homeDir)
	if (!target.ok) {
		return { key: entry.key, status: failed(target.error.message) }
	}

	const source = resolveSource(repoRoot, entry.key)
	if (!source.ok) {
		return { key: entry.key, status: failed(source.error.message), target: target.value }
	}

	const base = { key: entry.key, source: source.value, target: target.value }

	const existing = await safeLstat(target.value)
	if (!existing.ok) {
		return { ...base, status: failed(existing.error.message) }
	}

	if (existing.value) {
		return { ...base, status: skipped(TARGET_EXISTS) }
	}

	const sourceStats = await safeLstat(source.value)
	if (!sourceStats.ok) {
		return { ...base, status: failed(sourceStats.error.message) }
	}

	if (!sourceStats.value) {
		return { ...base, status: failed(SOURCE_MISSING) }
	}

	const parent = path.dirname(target.value)
	const parentStats = await safeStat(parent)
	if (!parentStats.ok) {
		return { ...base, status: failed(parentStats.error.message) }
	}

	if (!parentStats.value?.isDirectory()) {
		return { ...base, status: failed(parentMissing(parent)) }
	}

	if (options.dryRun) {
		return { ...base, status: { type: "linked" } }
	}

	return { ...base, status: await createLink(source.value, target.value, sourceStats.value) }
}

export function countLinkResults(results: readonly LinkResult[]): LinkCounts {
	const counts: LinkCounts = { failed: 0, linked: 0, skipped: 0 }
	for (const result of results) {
		counts[result.status.type] += 1
	}

	return counts
}

export async function ensureRepository(
	repoRoot: AbsolutePath,
): Promise<Result<void, RepositoryMissingError>> {
	const stats = await safeStat(repoRoot)
	if (stats.ok && stats.value?.isDirectory()) {
		return { ok: true, value: undefined }
	}

	const detail = stats.ok ? "" : ` (${stats.error.message})`
	return {
		error: {
			message: `Repository root does not exist or is not a directory: ${repoRoot}${detail}`,
			path: repoRoot,
			type: "repository_missing",
		},
		ok: false,
	}
}

// symlink() refuses to replace an existing path, so a target created
// between the lstat check and here is reported, not overwritten.
async function createLink(
	source: AbsolutePath,
	target: AbsolutePath,
	sourceStats: Stats,
): Promise<LinkStatus> {
	try {
		await symlink(source, target, sourceStats.isDirectory() ? "dir" : "file")
		return { type: "linked" }
	} catch (error) {
		if (errorCode(error) === "EEXIST") {
			return skipped(TARGET_EXISTS)
		}

		if (isNotFound(error)) {
			return failed(parentMissing(path.dirname(target)))
		}

		return failed(formatError(error))
	}
}

function parentMissing(parent: string): string {
	return `parent directory missing: ${parent}`
}

function skipped(reason: string): LinkStatus {
	return { reason, type: "skipped" }
}

function failed(reason: string): LinkStatus {
	return { reason, type: "failed" }
}
