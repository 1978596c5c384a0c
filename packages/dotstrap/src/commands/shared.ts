import { spinner } from "@clack/prompts"
import { consola } from "consola"
import type { CloneRepository } from "@/src/core/repo/clone"

export function applyVerbosity(verbose: boolean): void {
	if (verbose) {
		consola.level = 4
	}
}

/**
 * Show clone progress: a spinner on a terminal, plain log lines otherwise.
 */
export function withCloneProgress(clone: CloneRepository): CloneRepository {
	return async (url, destination) => {
		if (!process.stdout.isTTY) {
			consola.start(`Cloning ${url} into ${destination}...`)
			return clone(url, destination)
		}

		const spin = spinner()
		spin.start(`Cloning ${url}...`)
		const result = await clone(url, destination)
		spin.stop(result.ok ? `Cloned into ${destination}` : "Clone failed")
		return result
	}
}
