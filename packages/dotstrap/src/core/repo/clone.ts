import { execFile } from "node:child_process"
import { promisify } from "node:util"
import { safeLstat } from "@/src/core/io/fs"
import type { AbsolutePath } from "@/src/core/types/branded"
import type { CloneError, Result } from "@/src/core/types/errors"
import { formatError, toError } from "@/src/utils/errors"
import { isGitAvailable } from "@/src/utils/git"

const execFileAsync = promisify(execFile)

/**
 * Clone collaborator. Only called when `destination` does not exist.
 */
export type CloneRepository = (
	url: string,
	destination: AbsolutePath,
) => Promise<Result<void, CloneError>>

export const gitClone: CloneRepository = async (url, destination) => {
	const existing = await safeLstat(destination)
	if (!existing.ok) {
		return cloneFailure(url, destination, existing.error.message)
	}

	if (existing.value) {
		return cloneFailure(url, destination, `Target path ${destination} already exists.`)
	}

	if (!(await isGitAvailable())) {
		return cloneFailure(url, destination, "git is not installed or not in PATH.")
	}

	try {
		await execFileAsync("git", ["clone", "--", url, destination], { encoding: "utf8" })
		return { ok: true, value: undefined }
	} catch (error) {
		return cloneFailure(
			url,
			destination,
			`Failed to clone repository ${url}: ${formatError(error)}`,
			toError(error),
		)
	}
}

export function cloneFailure(
	url: string,
	destination: AbsolutePath,
	message: string,
	rawError?: Error,
): Result<never, CloneError> {
	return {
		error: { destination, message, rawError, type: "clone", url },
		ok: false,
	}
}
