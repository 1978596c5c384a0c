import { parse, TomlError } from "smol-toml"
import { z } from "zod"
import type { ManifestEntry, ManifestParseResult } from "@/src/core/manifest/types"
import type { AbsolutePath, EntryKey } from "@/src/core/types/branded"
import { coerceEntryKey, coerceNonEmpty } from "@/src/core/types/coerce"
import type { ManifestFormatError } from "@/src/core/types/errors"

const nonEmptyString = (label: string) =>
	z
		.string({
			invalid_type_error: `${label} must be a string.`,
			required_error: `${label} is required.`,
		})
		.refine((value) => value.trim().length > 0, {
			message: `${label} must not be empty.`,
		})

// Fields other than these two are dropped, so manifests written for a
// newer format still load.
const entrySchema = z.object({
	is_installed_cmd: nonEmptyString("is_installed_cmd").optional(),
	target_path: nonEmptyString("target_path"),
})

type RawEntry = z.infer<typeof entrySchema>

/**
 * Build manifest entries from an already-deserialized mapping.
 * Entry order follows the mapping's iteration order: JavaScript lists
 * integer-like keys such as "10" first, then the rest in document order.
 *
 * @param raw - Parsed document, typically the output of a TOML parser
 */
export function parseManifestEntries(
	raw: unknown,
	sourcePath?: AbsolutePath,
): ManifestParseResult<ManifestEntry[]> {
	if (!isTable(raw)) {
		return failure("Manifest must be a table of entries.", sourcePath)
	}

	const entries: ManifestEntry[] = []
	for (const [rawKey, value] of Object.entries(raw)) {
		const key = coerceEntryKey(rawKey)
		if (!key) {
			return failure("Entry names must not be empty.", sourcePath)
		}

		if (!isTable(value)) {
			return failure(`[${rawKey}] must be a table with target_path.`, sourcePath, key)
		}

		const parsed = entrySchema.safeParse(value)
		if (!parsed.success) {
			return failure(formatZodError(key, parsed.error), sourcePath, key)
		}

		const entry = toEntry(key, parsed.data)
		if (!entry) {
			return failure(`[${rawKey}] target_path must not be empty.`, sourcePath, key)
		}

		entries.push(entry)
	}

	return { ok: true, value: entries }
}

/**
 * Parse manifest TOML text into entries.
 *
 * @param contents - Raw TOML content
 * @param sourcePath - Absolute path to the manifest file
 */
export function parseManifest(
	contents: string,
	sourcePath: AbsolutePath,
): ManifestParseResult<ManifestEntry[]> {
	let data: unknown

	try {
		data = parse(contents)
	} catch (error) {
		const message =
			error instanceof TomlError ? `Invalid TOML: ${error.message}` : "Invalid TOML."
		return failure(message, sourcePath)
	}

	return parseManifestEntries(data, sourcePath)
}

function toEntry(key: EntryKey, raw: RawEntry): ManifestEntry | null {
	const targetPath = coerceNonEmpty(raw.target_path)
	if (!targetPath) {
		return null
	}

	const isInstalledCmd =
		raw.is_installed_cmd === undefined ? null : coerceNonEmpty(raw.is_installed_cmd)

	return isInstalledCmd ? { isInstalledCmd, key, targetPath } : { key, targetPath }
}

function isTable(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) {
		return false
	}

	return !Array.isArray(value) && !(value instanceof Date)
}

function formatZodError(key: string, error: z.ZodError): string {
	const issues = error.issues.map((issue) => issue.message)
	return `Invalid entry [${key}]: ${issues.join("; ")}`
}

function failure(
	message: string,
	sourcePath?: AbsolutePath,
	key?: EntryKey,
): ManifestParseResult<never> {
	const error: ManifestFormatError = { message, type: "manifest_format" }
	if (key !== undefined) {
		error.key = key
	}
	if (sourcePath !== undefined) {
		error.sourcePath = sourcePath
	}

	return { error, ok: false }
}
