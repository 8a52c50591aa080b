import { mkdir, writeFile } from "node:fs/promises"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { readGitRemote } from "@/src/utils/git"
import { withTempDir } from "@/tests/helpers/fs"

async function writeGitConfig(dir: string, contents: string): Promise<void> {
	await mkdir(path.join(dir, ".git"), { recursive: true })
	await writeFile(path.join(dir, ".git", "config"), contents)
}

describe("readGitRemote", () => {
	it("reads the origin url", async () => {
		await withTempDir(async (dir) => {
			await writeGitConfig(
				dir,
				[
					"[core]",
					"\tbare = false",
					'[remote "upstream"]',
					"\turl = https://github.com/upstream/tool.git",
					'[remote "origin"]',
					"\turl = git@github.com:dev/tool.git",
					"\tfetch = +refs/heads/*:refs/remotes/origin/*",
					'[branch "main"]',
					"\tremote = origin",
				].join("\n"),
			)

			expect(await readGitRemote(dir)).toBe("git@github.com:dev/tool.git")
			expect(await readGitRemote(dir, "upstream")).toBe("https://github.com/upstream/tool.git")
		})
	})

	it("returns null without a remote", async () => {
		await withTempDir(async (dir) => {
			await writeGitConfig(dir, "[core]\n\tbare = false\n")

			expect(await readGitRemote(dir)).toBeNull()
		})
	})

	it("returns null outside a repository", async () => {
		await withTempDir(async (dir) => {
			expect(await readGitRemote(dir)).toBeNull()
		})
	})
})
