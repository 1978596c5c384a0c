import path from "node:path"
import type { AbsolutePath } from "@/src/core/types/branded"
import { coerceAbsolutePathDirect } from "@/src/core/types/coerce"
import type { InvalidPathError, Result } from "@/src/core/types/errors"

type PathResult = Result<AbsolutePath, InvalidPathError>

/**
 * Expand a manifest target path to an absolute path.
 *
 * `~` and `~/rest` are expanded against `homeDir`; anything else must
 * already be absolute. `~user` forms are not supported.
 */
export function resolveTarget(raw: string, homeDir: string): PathResult {
	const trimmed = raw.trim()
	if (!trimmed) {
		return invalidPath("Target path must not be empty.", raw)
	}

	let expanded = trimmed
	if (trimmed === "~" || trimmed.startsWith("~/")) {
		const home = coerceAbsolutePathDirect(homeDir)
		if (!home) {
			return invalidPath(
				`Cannot expand "${raw}": home directory is not an absolute path.`,
				raw,
			)
		}

		expanded = path.join(home, trimmed.slice(1))
	}

	const resolved = coerceAbsolutePathDirect(expanded)
	if (!resolved) {
		return invalidPath(`Target path must be absolute or start with "~/": ${raw}`, raw)
	}

	return { ok: true, value: resolved }
}

/**
 * Join an entry key onto the repository root.
 * Nested keys such as `nested/.bashrc` are allowed; keys that resolve to
 * the root itself or outside it are rejected.
 */
export function resolveSource(repoRoot: AbsolutePath, key: string): PathResult {
	if (!key.trim()) {
		return invalidPath("Entry key must not be empty.", key)
	}

	if (path.isAbsolute(key)) {
		return invalidPath(`Entry key must be relative to the repository: ${key}`, key)
	}

	const resolved = coerceAbsolutePathDirect(path.resolve(repoRoot, key))
	if (!resolved || !isWithinRoot(repoRoot, resolved)) {
		return invalidPath(`Entry key escapes the repository root: ${key}`, key)
	}

	return { ok: true, value: resolved }
}

export function isWithinRoot(rootPath: string, targetPath: string): boolean {
	const relative = path.relative(rootPath, targetPath)
	if (!relative || path.isAbsolute(relative)) {
		return false
	}

	return relative !== ".." && !relative.startsWith(`..${path.sep}`)
}

function invalidPath(message: string, rawPath: string): PathResult {
	return {
		error: {
			message,
			path: rawPath,
			type: "invalid_path",
		},
		ok: false,
	}
}
