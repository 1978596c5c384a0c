import type {
	BootstrapCollaborators,
	BootstrapFailure,
	BootstrapOptions,
	BootstrapReport,
	BootstrapResult,
	BootstrapStage,
	CleanReport,
	CloneOptions,
	CloneReport,
	InstallCheck,
} from "@/src/core/bootstrap/types"
import { safeLstat } from "@/src/core/io/fs"
import { countLinkResults, ensureRepository, linkAll } from "@/src/core/link/link"
import { countUnlinkResults, unlinkAll } from "@/src/core/link/unlink"
import { findManifest, loadManifest } from "@/src/core/manifest/fs"
import type { Manifest, ManifestEntry } from "@/src/core/manifest/types"
import { resolveTarget } from "@/src/core/paths/resolve"
import type { CloneRepository } from "@/src/core/repo/clone"
import type { CheckInstalled } from "@/src/core/repo/installed"
import { resolveOrigin } from "@/src/core/repo/origin"
import type { AbsolutePath } from "@/src/core/types/branded"
import { coerceAbsolutePath } from "@/src/core/types/coerce"
import type { DotstrapError, InvalidPathError, Result } from "@/src/core/types/errors"

interface PreparedRepository {
	repoRoot: AbsolutePath
	cloned: boolean
}

/**
 * Make sure the repository is on disk, load its manifest and link every
 * entry. Per-entry problems end up in the report; only precondition
 * failures (origin, clone, manifest, repository root) are returned as errors.
 */
export async function runBootstrap(
	options: BootstrapOptions,
	collaborators: BootstrapCollaborators,
): Promise<BootstrapResult<BootstrapReport>> {
	const prepared = await prepareRepository(options, collaborators.clone)
	if (!prepared.ok) {
		return prepared
	}

	const { cloned, repoRoot } = prepared.value
	const manifest = await resolveManifest(repoRoot, options)
	if (!manifest.ok) {
		return manifest
	}

	const linked = await linkAll(repoRoot, manifest.value.entries, {
		dryRun: options.dryRun,
		homeDir: options.homeDir,
	})
	if (!linked.ok) {
		return fail("link", linked.error)
	}

	const installChecks = options.dryRun
		? []
		: await runInstallChecks(manifest.value.entries, collaborators.checkInstalled)

	return {
		ok: true,
		value: {
			cloned,
			counts: countLinkResults(linked.value),
			dryRun: options.dryRun,
			installChecks,
			manifestPath: manifest.value.sourcePath,
			repoRoot,
			results: linked.value,
		},
	}
}

/**
 * Remove the links a previous run created. Never clones.
 */
export async function runClean(
	options: BootstrapOptions,
): Promise<BootstrapResult<CleanReport>> {
	const prepared = await prepareRepository(options, null)
	if (!prepared.ok) {
		return prepared
	}

	const { repoRoot } = prepared.value
	const manifest = await resolveManifest(repoRoot, options)
	if (!manifest.ok) {
		return manifest
	}

	const unlinked = await unlinkAll(repoRoot, manifest.value.entries, {
		dryRun: options.dryRun,
		homeDir: options.homeDir,
	})
	if (!unlinked.ok) {
		return fail("clean", unlinked.error)
	}

	return {
		ok: true,
		value: {
			counts: countUnlinkResults(unlinked.value),
			dryRun: options.dryRun,
			manifestPath: manifest.value.sourcePath,
			repoRoot,
			results: unlinked.value,
		},
	}
}

/**
 * Clone a remote repository without linking. The destination must not
 * exist yet; a local directory is not a valid origin here.
 */
export async function runClone(
	options: CloneOptions,
	clone: CloneRepository,
): Promise<BootstrapResult<CloneReport>> {
	const origin = await resolveOrigin(options.repo, {
		clonePath: options.clonePath,
		cwd: options.cwd,
		homeDir: options.homeDir,
	})
	if (!origin.ok) {
		return fail("origin", origin.error)
	}

	if (origin.value.type === "directory") {
		return fail("origin", {
			message: `Not a remote repository: ${options.repo}`,
			origin: options.repo,
			type: "invalid_origin",
		})
	}

	const { destination, url } = origin.value
	const cloned = await clone(url, destination)
	if (!cloned.ok) {
		return fail("clone", cloned.error)
	}

	return { ok: true, value: { destination, url } }
}

/**
 * Resolve the origin and clone when needed. Anything already present at
 * the clone path is used as-is, never replaced.
 */
async function prepareRepository(
	options: BootstrapOptions,
	clone: CloneRepository | null,
): Promise<BootstrapResult<PreparedRepository>> {
	const origin = await resolveOrigin(options.repo, {
		clonePath: options.clonePath,
		cwd: options.cwd,
		homeDir: options.homeDir,
	})
	if (!origin.ok) {
		return fail("origin", origin.error)
	}

	let repoRoot: AbsolutePath
	let cloned = false
	if (origin.value.type === "directory") {
		repoRoot = origin.value.path
	} else {
		repoRoot = origin.value.destination
		const existing = await safeLstat(repoRoot)
		if (!existing.ok) {
			return fail("clone", existing.error)
		}

		if (!existing.value && clone) {
			const result = await clone(origin.value.url, repoRoot)
			if (!result.ok) {
				return fail("clone", result.error)
			}
			cloned = true
		}
	}

	const ready = await ensureRepository(repoRoot)
	if (!ready.ok) {
		return fail("repository", ready.error)
	}

	return { ok: true, value: { cloned, repoRoot } }
}

async function resolveManifest(
	repoRoot: AbsolutePath,
	options: BootstrapOptions,
): Promise<BootstrapResult<Manifest>> {
	let manifestPath: AbsolutePath
	if (options.manifestPath) {
		const explicit = resolveManifestPath(options.manifestPath, repoRoot, options.homeDir)
		if (!explicit.ok) {
			return fail("manifest", explicit.error)
		}
		manifestPath = explicit.value
	} else {
		const found = await findManifest(repoRoot, options.manifestName)
		if (!found.ok) {
			return fail("manifest", found.error)
		}
		manifestPath = found.value
	}

	const loaded = await loadManifest(manifestPath)
	if (!loaded.ok) {
		return fail("manifest", loaded.error)
	}

	return loaded
}

function resolveManifestPath(
	value: string,
	repoRoot: AbsolutePath,
	homeDir: string,
): Result<AbsolutePath, InvalidPathError> {
	const trimmed = value.trim()
	if (trimmed === "~" || trimmed.startsWith("~/")) {
		return resolveTarget(trimmed, homeDir)
	}

	const resolved = coerceAbsolutePath(trimmed, repoRoot)
	if (!resolved) {
		return {
			error: { message: "Manifest path must not be empty.", path: value, type: "invalid_path" },
			ok: false,
		}
	}

	return { ok: true, value: resolved }
}

async function runInstallChecks(
	entries: readonly ManifestEntry[],
	checkInstalled: CheckInstalled,
): Promise<InstallCheck[]> {
	const checks: InstallCheck[] = []
	for (const entry of entries) {
		if (!entry.isInstalledCmd) {
			continue
		}

		checks.push({
			command: entry.isInstalledCmd,
			installed: await checkInstalled(entry.isInstalledCmd),
			key: entry.key,
		})
	}

	return checks
}

function fail(stage: BootstrapStage, error: DotstrapError): BootstrapResult<never> {
	const failure: BootstrapFailure = { ...error, stage }
	return { error: failure, ok: false }
}
