import { execFile } from "node:child_process"
import { promisify } from "node:util"

const execFileAsync = promisify(execFile)

export async function isGitAvailable(): Promise<boolean> {
	try {
		await execFileAsync("git", ["--version"])
		return true
	} catch {
		return false
	}
}
