import { mkdir } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import "@/tests/helpers/assertions"
import { DEFAULT_MANIFEST_NAME, findManifest, loadManifest } from "@/src/core/manifest/fs"
import { abs, withTempDir, writeFixture } from "@/tests/helpers"

describe("loadManifest", () => {
	it("reads and parses the manifest file", async () => {
		await withTempDir(async (dir) => {
			const manifestPath = await writeFixture(
				dir,
				"dotstrap.toml",
				'["nested/.bashrc"]\ntarget_path = "~/.bashrc"\n',
			)

			const result = await loadManifest(manifestPath)

			expect(result).toEqual({
				ok: true,
				value: {
					entries: [{ key: "nested/.bashrc", targetPath: "~/.bashrc" }],
					sourcePath: manifestPath,
				},
			})
		})
	})

	it("reports a missing file as manifest_not_found", async () => {
		await withTempDir(async (dir) => {
			const manifestPath = abs(join(dir, "missing.toml"))

			const result = await loadManifest(manifestPath)

			expect(result).toBeErrOfType("manifest_not_found")
			if (!result.ok) {
				expect(result.error.message).toBe(`Manifest not found: ${manifestPath}`)
			}
		})
	})

	it("reports a directory in place of the file as an io error", async () => {
		await withTempDir(async (dir) => {
			const manifestPath = abs(join(dir, "dotstrap.toml"))
			await mkdir(manifestPath)

			expect(await loadManifest(manifestPath)).toBeErrOfType("io")
		})
	})

	it("passes format errors through", async () => {
		await withTempDir(async (dir) => {
			const manifestPath = await writeFixture(dir, "dotstrap.toml", "[vim]\n")

			const result = await loadManifest(manifestPath)

			expect(result).toBeErrOfType("manifest_format")
			if (!result.ok && result.error.type === "manifest_format") {
				expect(result.error.key).toBe("vim")
			}
		})
	})
})

describe("findManifest", () => {
	it("finds the default manifest in the repository root", async () => {
		await withTempDir(async (dir) => {
			const manifestPath = await writeFixture(dir, DEFAULT_MANIFEST_NAME, "")

			expect(await findManifest(dir)).toEqual({ ok: true, value: manifestPath })
		})
	})

	it("honors a custom file name", async () => {
		await withTempDir(async (dir) => {
			const manifestPath = await writeFixture(dir, "links.toml", "")

			expect(await findManifest(dir, "links.toml")).toEqual({ ok: true, value: manifestPath })
		})
	})

	it("fails when the repository has no manifest", async () => {
		await withTempDir(async (dir) => {
			const result = await findManifest(dir)

			expect(result).toBeErrOfType("manifest_not_found")
			if (!result.ok) {
				expect(result.error.message).toBe(`No dotstrap.toml found in ${dir}.`)
			}
		})
	})

	it("rejects file names outside the repository root", async () => {
		await withTempDir(async (dir) => {
			expect(await findManifest(dir, "../dotstrap.toml")).toBeErrOfType("manifest_not_found")
		})
	})
})
