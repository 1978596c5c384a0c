import { execFile } from "node:child_process"
import { promisify } from "node:util"

const execFileAsync = promisify(execFile)

/**
 * Install-check collaborator: true iff `cmd` exits with status 0.
 */
export type CheckInstalled = (cmd: string) => Promise<boolean>

export const shellCheckInstalled: CheckInstalled = async (cmd) => {
	try {
		await execFileAsync("sh", ["-c", cmd])
		return true
	} catch {
		return false
	}
}
