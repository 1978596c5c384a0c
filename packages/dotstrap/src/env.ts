import { DEFAULT_MANIFEST_NAME } from "@/src/core/manifest/fs"

export const DOTSTRAP_PATH = readSetting("DOTSTRAP_PATH") ?? "~/dotfiles"

export const DOTSTRAP_MANIFEST = readSetting("DOTSTRAP_MANIFEST") ?? DEFAULT_MANIFEST_NAME

function readSetting(name: string): string | undefined {
	const value = process.env[name]?.trim()
	return value ? value : undefined
}
