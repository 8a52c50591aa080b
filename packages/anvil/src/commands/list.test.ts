import path from "node:path"
import { consola } from "consola"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { runList } from "@/src/commands/list"
import { writeRecord } from "@/src/core/packages/records"
import { createTestContext, expectOk, pkg, withTempDir, writeTree } from "@/tests/helpers"

describe("runList", () => {
	const logSpy = vi.spyOn(consola, "log")

	beforeEach(() => {
		logSpy.mockImplementation(() => {})
	})

	afterEach(() => {
		logSpy.mockReset()
	})

	it("reports an empty install tree", async () => {
		await withTempDir(async (dir) => {
			expect(await runList(createTestContext(dir))).toEqual({
				reason: "No packages installed.",
				status: "unchanged",
			})
		})
	})

	it("prints one line per package", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const installPath = path.join(ctx.paths.opt, "tool", "g1")
			expectOk(
				await writeRecord(ctx.paths, {
					dependencies: [],
					ecosystem: "make",
					generation: "g1",
					installedAt: "2026-01-02T03:04:05.000Z",
					installPath,
					libraries: [],
					links: [{ name: "tool", path: path.join(ctx.paths.bin, "tool"), target: path.join(installPath, "bin", "tool") }],
					name: pkg("tool"),
					source: { type: "git", url: "https://git.example.test/tool" },
					version: "2.1.0",
				}),
			)
			expectOk(
				await writeRecord(ctx.paths, {
					dependencies: [],
					ecosystem: "cmake",
					generation: "g1",
					installedAt: "2026-01-02T03:04:05.000Z",
					installPath: path.join(ctx.paths.opt, "libz", "g1"),
					libraries: [],
					links: [],
					name: pkg("libz"),
					source: { path: "/src/libz", type: "local" },
					version: null,
				}),
			)
			await writeTree(ctx.paths.opt, { "broken/anvil-record.json": "[]" })

			const result = await runList(ctx)

			expect(result.status).toBe("completed")
			expect(logSpy.mock.calls).toEqual([["libz  cmake  (libraries only)"], ["tool@2.1.0  make  tool"]])
		})
	})
})
