import type { AbsolutePath, EntryKey } from "@/src/core/types/branded"

export type LinkStatus =
	| { type: "linked" }
	| { type: "skipped"; reason: string }
	| { type: "failed"; reason: string }

export interface LinkResult {
	key: EntryKey
	status: LinkStatus
	/** Present once the entry's source resolved. */
	source?: AbsolutePath
	/** Present once the entry's target resolved. */
	target?: AbsolutePath
}

export type UnlinkStatus =
	| { type: "removed" }
	| { type: "skipped"; reason: string }
	| { type: "failed"; reason: string }

export interface UnlinkResult {
	key: EntryKey
	status: UnlinkStatus
	source?: AbsolutePath
	target?: AbsolutePath
}

export interface LinkOptions {
	homeDir: string
	/** Decide every outcome without touching the filesystem. */
	dryRun?: boolean
}

export interface LinkCounts {
	linked: number
	skipped: number
	failed: number
}

export const TARGET_EXISTS = "target exists"
export const SOURCE_MISSING = "source missing"

export interface UnlinkCounts {
	removed: number
	skipped: number
	failed: number
}

export const TARGET_MISSING = "target missing"
export const NOT_A_SYMLINK = "not a symlink"
export const POINTS_ELSEWHERE = "points elsewhere"
