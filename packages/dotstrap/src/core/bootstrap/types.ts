import type { LinkCounts, LinkResult, UnlinkCounts, UnlinkResult } from "@/src/core/link/types"
import type { CloneRepository } from "@/src/core/repo/clone"
import type { CheckInstalled } from "@/src/core/repo/installed"
import type { AbsolutePath, EntryKey } from "@/src/core/types/branded"
import type { DotstrapError, Result } from "@/src/core/types/errors"

export type BootstrapStage = "origin" | "clone" | "repository" | "manifest" | "link" | "clean"

export type BootstrapResult<T> = Result<T, BootstrapFailure>

/**
 * Fatal run errors carry the stage they stopped at.
 */
export type BootstrapFailure = DotstrapError & { stage: BootstrapStage }

export interface BootstrapOptions {
	/** Repository URL, GitHub owner/repo shorthand, or local directory. */
	repo: string
	/** Where a remote repository is cloned; `~` is expanded. */
	clonePath: string
	/** Manifest file; relative paths resolve against the repository root. */
	manifestPath?: string
	manifestName: string
	homeDir: string
	cwd: string
	dryRun: boolean
}

export type CloneOptions = Pick<BootstrapOptions, "repo" | "clonePath" | "homeDir" | "cwd">

export interface BootstrapCollaborators {
	clone: CloneRepository
	checkInstalled: CheckInstalled
}

export interface InstallCheck {
	key: EntryKey
	command: string
	installed: boolean
}

export interface BootstrapReport {
	repoRoot: AbsolutePath
	manifestPath: AbsolutePath
	cloned: boolean
	dryRun: boolean
	results: LinkResult[]
	installChecks: InstallCheck[]
	counts: LinkCounts
}

export interface CleanReport {
	repoRoot: AbsolutePath
	manifestPath: AbsolutePath
	dryRun: boolean
	results: UnlinkResult[]
	counts: UnlinkCounts
}

export interface CloneReport {
	url: string
	destination: AbsolutePath
}
