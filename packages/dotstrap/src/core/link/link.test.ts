import { mkdir, readFile, symlink, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import "@/tests/helpers/assertions"
import { countLinkResults, linkAll } from "@/src/core/link/link"
import type { LinkResult } from "@/src/core/link/types"
import {
	abs,
	entry,
	exists,
	isSymlink,
	linkDestination,
	withLayout,
	writeFixture,
} from "@/tests/helpers"

function statusesByKey(results: LinkResult[]): Record<string, LinkResult["status"]> {
	return Object.fromEntries(results.map((result) => [result.key, result.status]))
}

describe("linkAll", () => {
	it("links a nested source to its expanded target", async () => {
		await withLayout(async ({ home, repo }) => {
			const source = await writeFixture(repo, "nested/.bashrc", "export A=1\n")

			const result = await linkAll(repo, [entry("nested/.bashrc", "~/.bashrc")], {
				homeDir: home,
			})

			const target = join(home, ".bashrc")
			expect(result).toEqual({
				ok: true,
				value: [{ key: "nested/.bashrc", source, status: { type: "linked" }, target }],
			})
			expect(await linkDestination(target)).toBe(source)
			expect(await readFile(target, "utf8")).toBe("export A=1\n")
		})
	})

	it("links a directory as a single symlink", async () => {
		await withLayout(async ({ home, repo }) => {
			await writeFixture(repo, "nvim/init.lua", "-- config\n")
			await mkdir(join(home, ".config"))

			const result = await linkAll(repo, [entry("nvim", "~/.config/nvim")], { homeDir: home })

			expect(result.ok && result.value[0]?.status).toEqual({ type: "linked" })
			expect(await isSymlink(join(home, ".config/nvim"))).toBe(true)
			expect(await linkDestination(join(home, ".config/nvim"))).toBe(join(repo, "nvim"))
		})
	})

	it("accepts absolute target paths", async () => {
		await withLayout(async ({ home, repo, root }) => {
			await writeFixture(repo, ".gitconfig")
			const target = join(root, "elsewhere.gitconfig")

			const result = await linkAll(repo, [entry(".gitconfig", target)], { homeDir: home })

			expect(result.ok && result.value[0]?.status).toEqual({ type: "linked" })
			expect(await isSymlink(target)).toBe(true)
		})
	})

	describe("existing targets", () => {
		it("skips an existing regular file and leaves it untouched", async () => {
			await withLayout(async ({ home, repo }) => {
				await writeFixture(repo, ".bashrc", "from repo\n")
				const target = await writeFixture(home, ".bashrc", "mine\n")

				const result = await linkAll(repo, [entry(".bashrc", "~/.bashrc")], {
					homeDir: home,
				})

				expect(result.ok && result.value[0]?.status).toEqual({
					reason: "target exists",
					type: "skipped",
				})
				expect(await isSymlink(target)).toBe(false)
				expect(await readFile(target, "utf8")).toBe("mine\n")
			})
		})

		it("skips an existing directory", async () => {
			await withLayout(async ({ home, repo }) => {
				await writeFixture(repo, "nvim/init.lua")
				const existing = await writeFixture(home, ".config/nvim/keep.lua", "keep\n")

				const result = await linkAll(repo, [entry("nvim", "~/.config/nvim")], {
					homeDir: home,
				})

				expect(result.ok && result.value[0]?.status.type).toBe("skipped")
				expect(await isSymlink(join(home, ".config/nvim"))).toBe(false)
				expect(await readFile(existing, "utf8")).toBe("keep\n")
			})
		})

		it("skips a symlink pointing elsewhere", async () => {
			await withLayout(async ({ home, repo, root }) => {
				await writeFixture(repo, ".vimrc")
				const other = await writeFixture(root, "other.vimrc")
				const target = join(home, ".vimrc")
				await symlink(other, target)

				const result = await linkAll(repo, [entry(".vimrc", "~/.vimrc")], { homeDir: home })

				expect(result.ok && result.value[0]?.status.type).toBe("skipped")
				expect(await linkDestination(target)).toBe(other)
			})
		})

		it("skips a dangling symlink", async () => {
			await withLayout(async ({ home, repo, root }) => {
				await writeFixture(repo, ".vimrc")
				const target = join(home, ".vimrc")
				await symlink(join(root, "gone"), target)

				const result = await linkAll(repo, [entry(".vimrc", "~/.vimrc")], { homeDir: home })

				expect(result.ok && result.value[0]?.status).toEqual({
					reason: "target exists",
					type: "skipped",
				})
				expect(await linkDestination(target)).toBe(join(root, "gone"))
			})
		})

		it("skips an existing target even when the source is missing", async () => {
			await withLayout(async ({ home, repo }) => {
				await writeFixture(home, ".bashrc", "mine\n")

				const result = await linkAll(repo, [entry(".bashrc", "~/.bashrc")], {
					homeDir: home,
				})

				expect(result.ok && result.value[0]?.status.type).toBe("skipped")
			})
		})
	})

	it("is idempotent: a second run skips what the first linked", async () => {
		await withLayout(async ({ home, repo }) => {
			const source = await writeFixture(repo, "nested/.bashrc")
			const entries = [entry("nested/.bashrc", "~/.bashrc")]

			const first = await linkAll(repo, entries, { homeDir: home })
			const second = await linkAll(repo, entries, { homeDir: home })

			expect(first.ok && first.value[0]?.status).toEqual({ type: "linked" })
			expect(second.ok && second.value[0]?.status).toEqual({
				reason: "target exists",
				type: "skipped",
			})
			expect(await linkDestination(join(home, ".bashrc"))).toBe(source)
		})
	})

	describe("isolation", () => {
		it.each([
			["missing first", ["missing", "present"]],
			["missing last", ["present", "missing"]],
		])("links valid entries when another source is missing (%s)", async (_label, order) => {
			await withLayout(async ({ home, repo }) => {
				await writeFixture(repo, ".present")
				const byName = {
					missing: entry(".missing", "~/.missing"),
					present: entry(".present", "~/.present"),
				}
				const entries = order.map((name) => (name === "missing" ? byName.missing : byName.present))

				const result = await linkAll(repo, entries, { homeDir: home })

				expect(result).toBeOk()
				if (result.ok) {
					expect(statusesByKey(result.value)).toEqual({
						".missing": { reason: "source missing", type: "failed" },
						".present": { type: "linked" },
					})
				}
				expect(await exists(join(home, ".missing"))).toBe(false)
				expect(await isSymlink(join(home, ".present"))).toBe(true)
			})
		})

		it("fails only the entry whose key escapes the repository", async () => {
			await withLayout(async ({ home, repo }) => {
				await writeFixture(repo, ".zshrc")

				const result = await linkAll(
					repo,
					[entry("../../etc/passwd", "~/passwd"), entry(".zshrc", "~/.zshrc")],
					{ homeDir: home },
				)

				expect(result).toBeOk()
				if (result.ok) {
					expect(result.value[0]?.status.type).toBe("failed")
					expect(result.value[0]?.source).toBeUndefined()
					expect(result.value[1]?.status).toEqual({ type: "linked" })
				}
				expect(await exists(join(home, "passwd"))).toBe(false)
			})
		})

		it("fails only the entry whose target cannot be expanded", async () => {
			await withLayout(async ({ home, repo }) => {
				await writeFixture(repo, ".zshrc")

				const result = await linkAll(
					repo,
					[entry(".zshrc", "relative/.zshrc"), entry(".zshrc", "~/.zshrc")],
					{ homeDir: home },
				)

				expect(result.ok && result.value.map((item) => item.status.type)).toEqual([
					"failed",
					"linked",
				])
			})
		})
	})

	it("reports a missing parent directory without creating it", async () => {
		await withLayout(async ({ home, repo }) => {
			await writeFixture(repo, "kitty.conf")
			const parent = join(home, ".config/kitty")

			const result = await linkAll(repo, [entry("kitty.conf", "~/.config/kitty/kitty.conf")], {
				homeDir: home,
			})

			expect(result.ok && result.value[0]?.status).toEqual({
				reason: `parent directory missing: ${parent}`,
				type: "failed",
			})
			expect(await exists(parent)).toBe(false)
		})
	})

	it("reports a missing parent directory in dry-run mode too", async () => {
		await withLayout(async ({ home, repo }) => {
			await writeFixture(repo, "kitty.conf")
			const parent = join(home, ".config/kitty")

			const result = await linkAll(repo, [entry("kitty.conf", "~/.config/kitty/kitty.conf")], {
				dryRun: true,
				homeDir: home,
			})

			expect(result.ok && result.value[0]?.status).toEqual({
				reason: `parent directory missing: ${parent}`,
				type: "failed",
			})
			expect(await exists(join(home, ".config"))).toBe(false)
		})
	})

	it.each([false, true])(
		"treats a file on the parent path as missing (dry run: %s)",
		async (dryRun) => {
			await withLayout(async ({ home, repo }) => {
				await writeFixture(repo, "kitty.conf")
				await writeFixture(home, ".config", "not a directory\n")

				const result = await linkAll(repo, [entry("kitty.conf", "~/.config/kitty/kitty.conf")], {
					dryRun,
					homeDir: home,
				})

				expect(result.ok && result.value[0]?.status).toEqual({
					reason: `parent directory missing: ${join(home, ".config/kitty")}`,
					type: "failed",
				})
			})
		},
	)

	it("does not touch the filesystem in dry-run mode", async () => {
		await withLayout(async ({ home, repo }) => {
			await writeFixture(repo, ".bashrc")
			await writeFile(join(home, ".profile"), "mine\n")
			await writeFixture(repo, ".profile")

			const result = await linkAll(
				repo,
				[entry(".bashrc", "~/.bashrc"), entry(".profile", "~/.profile"), entry(".nope", "~/.nope")],
				{ dryRun: true, homeDir: home },
			)

			expect(result.ok && result.value.map((item) => item.status.type)).toEqual([
				"linked",
				"skipped",
				"failed",
			])
			expect(await exists(join(home, ".bashrc"))).toBe(false)
		})
	})

	it("fails the whole call when the repository root is missing", async () => {
		await withLayout(async ({ home, root }) => {
			const missing = abs(join(root, "no-repo"))

			const result = await linkAll(missing, [entry(".bashrc", "~/.bashrc")], { homeDir: home })

			expect(result).toBeErrOfType("repository_missing")
			if (!result.ok) {
				expect(result.error.path).toBe(missing)
			}
		})
	})

	it("fails the whole call when the repository root is a file", async () => {
		await withLayout(async ({ home, root }) => {
			const file = await writeFixture(root, "not-a-dir")

			expect(await linkAll(file, [], { homeDir: home })).toBeErrOfType("repository_missing")
		})
	})
})

describe("countLinkResults", () => {
	it("tallies each outcome", () => {
		const results: LinkResult[] = [
			{ key: entry("a", "/a").key, status: { type: "linked" } },
			{ key: entry("b", "/b").key, status: { reason: "target exists", type: "skipped" } },
			{ key: entry("c", "/c").key, status: { reason: "source missing", type: "failed" } },
			{ key: entry("d", "/d").key, status: { type: "linked" } },
		]

		expect(countLinkResults(results)).toEqual({ failed: 1, linked: 2, skipped: 1 })
	})
})
