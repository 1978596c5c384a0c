#!/usr/bin/env tsx

import { homedir } from "node:os"
import { Command } from "commander"
import { consola } from "consola"
import { cleanCommand } from "@/src/commands/clean"
import { cloneCommand } from "@/src/commands/clone"
import { linkCommand } from "@/src/commands/link"
import { defaultCollaborators } from "@/src/commands/types"
import { DOTSTRAP_MANIFEST, DOTSTRAP_PATH } from "@/src/env"

interface CliOptions {
	path: string
	manifest?: string
	dryRun?: boolean
	verbose?: boolean
}

async function main(): Promise<void> {
	const program = new Command()
	const context = {
		collaborators: defaultCollaborators,
		cwd: process.cwd(),
		homeDir: homedir(),
		manifestName: DOTSTRAP_MANIFEST,
	}

	program
		.name("dotstrap")
		.description("Clone a dotfiles repository and link its files into your home directory")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("link", { isDefault: true })
		.description("Clone the repository if needed and link every manifest entry")
		.argument("<repo>", "Git URL, GitHub owner/repo, or a local directory")
		.option("-p, --path <dir>", "Path where dotfiles are cloned into", DOTSTRAP_PATH)
		.option("-m, --manifest <file>", "Manifest file (default: dotstrap.toml in the repository)")
		.option("--dry-run", "Report what would be linked without touching anything")
		.option("-v, --verbose", "Print resolved paths")
		.action(async (repo: string, options: CliOptions) => {
			await linkCommand(
				repo,
				{
					dryRun: Boolean(options.dryRun),
					manifest: options.manifest,
					path: options.path,
					verbose: Boolean(options.verbose),
				},
				context,
			)
		})

	program
		.command("clean")
		.description("Remove the links created by link")
		.argument("<repo>", "Local dotfiles directory, or the repository it was cloned from")
		.option("-p, --path <dir>", "Path where dotfiles were cloned into", DOTSTRAP_PATH)
		.option("-m, --manifest <file>", "Manifest file (default: dotstrap.toml in the repository)")
		.option("--dry-run", "Report what would be removed without touching anything")
		.option("-v, --verbose", "Print resolved paths")
		.action(async (repo: string, options: CliOptions) => {
			await cleanCommand(
				repo,
				{
					dryRun: Boolean(options.dryRun),
					manifest: options.manifest,
					path: options.path,
					verbose: Boolean(options.verbose),
				},
				context,
			)
		})

	program
		.command("clone")
		.description("Clone the repository without linking anything")
		.argument("<repo>", "Git URL or GitHub owner/repo")
		.option("-p, --path <dir>", "Path to clone into", DOTSTRAP_PATH)
		.option("-v, --verbose", "Print resolved paths")
		.action(async (repo: string, options: CliOptions) => {
			await cloneCommand(
				repo,
				{ path: options.path, verbose: Boolean(options.verbose) },
				context,
			)
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

main().catch((error) => {
	consola.error(error instanceof Error ? error.message : error)
	process.exit(1)
})
