import type { BootstrapCollaborators } from "@/src/core/bootstrap/types"
import { gitClone } from "@/src/core/repo/clone"
import { shellCheckInstalled } from "@/src/core/repo/installed"

export interface CommandOptions {
	dryRun: boolean
	manifest?: string
	verbose: boolean
}

export interface LinkCommandOptions extends CommandOptions {
	path: string
}

/**
 * Ambient inputs the commands would otherwise read from the process.
 */
export interface CommandContext {
	collaborators: BootstrapCollaborators
	cwd: string
	homeDir: string
	manifestName: string
}

export const defaultCollaborators: BootstrapCollaborators = {
	checkInstalled: shellCheckInstalled,
	clone: gitClone,
}
