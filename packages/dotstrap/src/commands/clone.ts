import { consola } from "consola"
import { describeFailure } from "@/src/commands/report"
import { applyVerbosity, withCloneProgress } from "@/src/commands/shared"
import type { CommandContext } from "@/src/commands/types"
import { runClone } from "@/src/core/bootstrap/run"
import type { BootstrapResult, CloneReport } from "@/src/core/bootstrap/types"

export async function cloneCommand(
	repo: string,
	options: { path: string; verbose: boolean },
	context: CommandContext,
): Promise<BootstrapResult<CloneReport>> {
	applyVerbosity(options.verbose)

	const result = await runClone(
		{ clonePath: options.path, cwd: context.cwd, homeDir: context.homeDir, repo },
		withCloneProgress(context.collaborators.clone),
	)

	if (!result.ok) {
		consola.error(describeFailure(result.error))
		consola.error("Clone failed.")
		process.exitCode = 1
		return result
	}

	consola.success(`Cloned ${result.value.url} into ${result.value.destination}`)
	return result
}
