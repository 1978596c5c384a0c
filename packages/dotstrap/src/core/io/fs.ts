import type { Stats } from "node:fs"
import { lstat, readFile, stat } from "node:fs/promises"
import type { IoResult } from "@/src/core/io/types"
import { ioFailure } from "@/src/core/io/types"
import { formatError, toError } from "@/src/utils/errors"

// Re-export types for convenience
export type { IoError, IoResult } from "@/src/core/io/types"

export async function safeStat(targetPath: string): Promise<IoResult<Stats | null>> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "stat", toError(error))
	}
}

/**
 * Like safeStat but never follows a symlink, so a dangling link still
 * reports as present.
 */
export async function safeLstat(targetPath: string): Promise<IoResult<Stats | null>> {
	try {
		const stats = await lstat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "lstat", toError(error))
	}
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "readFile", toError(error))
	}
}

export function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		const code = (error as { code?: unknown }).code
		return typeof code === "string" ? code : undefined
	}

	return undefined
}

/**
 * ENOTDIR counts as not found: a file along the path means nothing can
 * exist below it.
 */
export function isNotFound(error: unknown): boolean {
	const code = errorCode(error)
	return code === "ENOENT" || code === "ENOTDIR"
}
