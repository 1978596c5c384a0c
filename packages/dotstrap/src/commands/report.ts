import type { BootstrapFailure, InstallCheck } from "@/src/core/bootstrap/types"
import type { LinkCounts, LinkResult, UnlinkCounts, UnlinkResult } from "@/src/core/link/types"

export function describeLinkResult(result: LinkResult, dryRun: boolean): string {
	const target = result.target ?? "?"
	switch (result.status.type) {
		case "linked":
			return `${result.key} → ${target} ${dryRun ? "(would link)" : "linked"}`
		case "skipped":
			return `${result.key} → ${target} skipped: ${result.status.reason}`
		case "failed":
			return `${result.key} failed: ${result.status.reason}`
	}
}

export function describeUnlinkResult(result: UnlinkResult, dryRun: boolean): string {
	const target = result.target ?? "?"
	switch (result.status.type) {
		case "removed":
			return `${target} ${dryRun ? "(would remove)" : "removed"}`
		case "skipped":
			return `${target} skipped: ${result.status.reason}`
		case "failed":
			return `${result.key} failed: ${result.status.reason}`
	}
}

export function describeInstallCheck(check: InstallCheck): string {
	return check.installed
		? `${check.key}: installed`
		: `${check.key}: not installed (\`${check.command}\` failed)`
}

export function summarizeLinkCounts(counts: LinkCounts, dryRun: boolean): string {
	const verb = dryRun ? "Would link" : "Linked"
	return `${verb} ${plural(counts.linked, "entry", "entries")}, skipped ${counts.skipped}, failed ${counts.failed}.`
}

export function summarizeUnlinkCounts(counts: UnlinkCounts, dryRun: boolean): string {
	const verb = dryRun ? "Would remove" : "Removed"
	return `${verb} ${plural(counts.removed, "link", "links")}, skipped ${counts.skipped}, failed ${counts.failed}.`
}

export function describeFailure(failure: BootstrapFailure): string {
	return `[${failure.stage}] ${failure.message}`
}

function plural(count: number, singular: string, pluralForm: string): string {
	return `${count} ${count === 1 ? singular : pluralForm}`
}
