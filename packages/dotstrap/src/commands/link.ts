import { consola } from "consola"
import {
	describeFailure,
	describeInstallCheck,
	describeLinkResult,
	summarizeLinkCounts,
} from "@/src/commands/report"
import { applyVerbosity, withCloneProgress } from "@/src/commands/shared"
import type { CommandContext, LinkCommandOptions } from "@/src/commands/types"
import { runBootstrap } from "@/src/core/bootstrap/run"
import type { BootstrapReport, BootstrapResult } from "@/src/core/bootstrap/types"

export async function linkCommand(
	repo: string,
	options: LinkCommandOptions,
	context: CommandContext,
): Promise<BootstrapResult<BootstrapReport>> {
	applyVerbosity(options.verbose)
	consola.start(options.dryRun ? "Planning links..." : "Linking dotfiles...")

	const result = await runBootstrap(
		{
			clonePath: options.path,
			cwd: context.cwd,
			dryRun: options.dryRun,
			homeDir: context.homeDir,
			manifestName: context.manifestName,
			manifestPath: options.manifest,
			repo,
		},
		{
			...context.collaborators,
			clone: withCloneProgress(context.collaborators.clone),
		},
	)

	if (!result.ok) {
		consola.error(describeFailure(result.error))
		consola.error("Bootstrap failed.")
		process.exitCode = 1
		return result
	}

	printReport(result.value)
	return result
}

function printReport(report: BootstrapReport): void {
	consola.info(`Repository: ${report.repoRoot}`)
	consola.info(`Manifest: ${report.manifestPath}`)

	for (const entry of report.results) {
		if (entry.source && entry.target) {
			consola.debug(`${entry.key}: ${entry.target} -> ${entry.source}`)
		}

		const line = describeLinkResult(entry, report.dryRun)
		if (entry.status.type === "linked") {
			consola.success(line)
		} else if (entry.status.type === "skipped") {
			consola.warn(line)
		} else {
			consola.error(line)
		}
	}

	for (const check of report.installChecks) {
		const line = describeInstallCheck(check)
		if (check.installed) {
			consola.info(line)
		} else {
			consola.warn(line)
		}
	}

	consola.success(summarizeLinkCounts(report.counts, report.dryRun))
}
