import { safeStat } from "@/src/core/io/fs"
import { resolveTarget } from "@/src/core/paths/resolve"
import type { AbsolutePath } from "@/src/core/types/branded"
import { coerceAbsolutePath } from "@/src/core/types/coerce"
import type { InvalidOriginError, InvalidPathError, Result } from "@/src/core/types/errors"

/**
 * Where the dotfiles come from: a directory already on disk, or a remote
 * repository to clone into `destination`.
 */
export type RepositoryOrigin =
	| { type: "directory"; path: AbsolutePath }
	| { type: "remote"; url: string; destination: AbsolutePath }

const REMOTE_URL_PATTERN = /^(?:https?:\/\/|ssh:\/\/|git:\/\/|file:\/\/)\S+$/
const SCP_URL_PATTERN = /^[\w.-]+@[\w.-]+:\S+$/
const GITHUB_SHORTHAND_PATTERN = /^[A-Za-z0-9][\w.-]*\/[\w.-]+$/

export interface OriginOptions {
	clonePath: string
	homeDir: string
	/** Base for relative directory arguments. */
	cwd: string
}

/**
 * Classify the repository argument.
 *
 * An existing directory wins over every URL form, so `owner/repo` that is
 * also a local path is used in place.
 */
export async function resolveOrigin(
	input: string,
	options: OriginOptions,
): Promise<Result<RepositoryOrigin, InvalidOriginError | InvalidPathError>> {
	const trimmed = input.trim()
	if (!trimmed) {
		return invalidOrigin(input, "Repository must not be empty.")
	}

	const directory = await findDirectory(trimmed, options)
	if (directory) {
		return { ok: true, value: { path: directory, type: "directory" } }
	}

	const url = toRemoteUrl(trimmed)
	if (!url) {
		return invalidOrigin(input, `Not a directory, git URL or owner/repo: ${input}`)
	}

	const destination = resolveTarget(options.clonePath, options.homeDir)
	if (!destination.ok) {
		return destination
	}

	return { ok: true, value: { destination: destination.value, type: "remote", url } }
}

export function toRemoteUrl(value: string): string | null {
	if (REMOTE_URL_PATTERN.test(value) || SCP_URL_PATTERN.test(value)) {
		return value
	}

	if (GITHUB_SHORTHAND_PATTERN.test(value)) {
		return `git@github.com:${value}.git`
	}

	return null
}

async function findDirectory(
	value: string,
	options: OriginOptions,
): Promise<AbsolutePath | null> {
	const expanded = value === "~" || value.startsWith("~/")
		? resolveTarget(value, options.homeDir)
		: null
	if (expanded && !expanded.ok) {
		return null
	}

	const candidate = expanded ? expanded.value : coerceAbsolutePath(value, options.cwd)
	if (!candidate) {
		return null
	}

	const stats = await safeStat(candidate)
	return stats.ok && stats.value?.isDirectory() ? candidate : null
}

function invalidOrigin(origin: string, message: string): Result<never, InvalidOriginError> {
	return {
		error: { message, origin, type: "invalid_origin" },
		ok: false,
	}
}
