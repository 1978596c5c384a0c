import { consola } from "consola"
import {
	describeFailure,
	describeUnlinkResult,
	summarizeUnlinkCounts,
} from "@/src/commands/report"
import { applyVerbosity } from "@/src/commands/shared"
import type { CommandContext, CommandOptions } from "@/src/commands/types"
import { runClean } from "@/src/core/bootstrap/run"
import type { BootstrapResult, CleanReport } from "@/src/core/bootstrap/types"

export async function cleanCommand(
	repo: string,
	options: CommandOptions & { path: string },
	context: Omit<CommandContext, "collaborators">,
): Promise<BootstrapResult<CleanReport>> {
	applyVerbosity(options.verbose)
	consola.start(options.dryRun ? "Planning cleanup..." : "Removing links...")

	const result = await runClean({
		clonePath: options.path,
		cwd: context.cwd,
		dryRun: options.dryRun,
		homeDir: context.homeDir,
		manifestName: context.manifestName,
		manifestPath: options.manifest,
		repo,
	})

	if (!result.ok) {
		consola.error(describeFailure(result.error))
		consola.error("Clean failed.")
		process.exitCode = 1
		return result
	}

	const report = result.value
	for (const entry of report.results) {
		if (entry.source && entry.target) {
			consola.debug(`${entry.key}: ${entry.target} -> ${entry.source}`)
		}

		const line = describeUnlinkResult(entry, report.dryRun)
		if (entry.status.type === "removed") {
			consola.success(line)
		} else if (entry.status.type === "skipped") {
			consola.info(line)
		} else {
			consola.error(line)
		}
	}

	consola.success(summarizeUnlinkCounts(report.counts, report.dryRun))
	return result
}
