import { mkdir, readFile, writeFile } from "node:fs/promises"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { checkIndex, repairIndex } from "@/src/core/index/repair"
import { createFakeCentral, createTestContext, exists, expectOk, withTempDir } from "@/tests/helpers"

async function writeStore(indexFile: string, entries: unknown[]): Promise<string> {
	const contents = JSON.stringify({ entries, version: 1 })
	await mkdir(path.dirname(indexFile), { recursive: true })
	await writeFile(indexFile, contents)
	return contents
}

const messyEntries = [
	{
		description: "first",
		name: "alpha",
		normalizedUrl: "https://Example.test/alpha.git",
		origin: "local",
		url: "https://Example.test/alpha.git",
	},
	{
		description: "",
		name: "",
		normalizedUrl: "https://example.test/nameless",
		origin: "local",
		url: "https://example.test/nameless",
	},
	{
		description: "",
		name: "alpha-central",
		normalizedUrl: "https://example.test/alpha",
		origin: "central",
		url: "https://example.test/alpha",
	},
]

describe("repairIndex", () => {
	it("backs up an unreadable store and starts a new one", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			await mkdir(ctx.paths.indexDir, { recursive: true })
			await writeFile(ctx.paths.indexFile, "{ not json")

			const report = expectOk(await repairIndex(ctx))

			expect(report.reset).toBe(true)
			expect(report.issues).toEqual([
				{ kind: "unreadable_store", reason: `Invalid JSON in ${ctx.paths.indexFile}.` },
			])
			expect(report.backupPath?.startsWith(`${ctx.paths.indexFile}.corrupt-`)).toBe(true)
			expect(await readFile(report.backupPath ?? "", "utf8")).toBe("{ not json")
			expect(JSON.parse(await readFile(ctx.paths.indexFile, "utf8"))).toEqual({ entries: [], version: 1 })
		})
	})

	it("drops malformed and duplicate entries and fixes stale URLs", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			await writeStore(ctx.paths.indexFile, messyEntries)

			const report = expectOk(await repairIndex(ctx))

			expect(report.fixed).toBe(1)
			expect(report.removed).toBe(2)
			expect(report.reset).toBe(false)
			expect(report.issues.map((issue) => issue.kind)).toEqual([
				"stale_normalized_url",
				"malformed",
				"duplicate_url",
			])
			// The central entry replaces the local one for the same repository.
			expect(JSON.parse(await readFile(ctx.paths.indexFile, "utf8"))).toEqual({
				entries: [
					{
						description: "",
						name: "alpha-central",
						normalizedUrl: "https://example.test/alpha",
						origin: "central",
						url: "https://example.test/alpha",
					},
				],
				version: 1,
			})
		})
	})

	it("backs up the store before dropping entries", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const original = await writeStore(ctx.paths.indexFile, messyEntries)

			const report = expectOk(await repairIndex(ctx))

			expect(report.backupPath?.startsWith(`${ctx.paths.indexFile}.bak-`)).toBe(true)
			expect(await readFile(report.backupPath ?? "", "utf8")).toBe(original)
		})
	})

	it("fixes stale URLs without a backup", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			await writeStore(ctx.paths.indexFile, [messyEntries[0]])

			const report = expectOk(await repairIndex(ctx))

			expect(report.fixed).toBe(1)
			expect(report.removed).toBe(0)
			expect(report.backupPath).toBeNull()
		})
	})

	it("leaves a healthy index alone", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)

			const report = expectOk(await repairIndex(ctx))

			expect(report).toEqual({
				backupPath: null,
				fixed: 0,
				issues: [],
				recloned: false,
				removed: 0,
				reset: false,
			})
			expect(await exists(ctx.paths.indexFile)).toBe(false)
		})
	})

	it("re-clones an invalid central checkout", async () => {
		await withTempDir(async (dir) => {
			const central = createFakeCentral([])
			const ctx = createTestContext(dir, { central })
			await mkdir(ctx.paths.central, { recursive: true })

			const report = expectOk(await repairIndex(ctx))

			expect(report.issues).toEqual([
				{ kind: "invalid_central_checkout", reason: `${ctx.paths.central} is not a git checkout.` },
			])
			expect(report.recloned).toBe(true)
			expect(central.syncs).toBe(1)
			expect(await exists(path.join(ctx.paths.central, ".git"))).toBe(true)
		})
	})

	it("removes an invalid checkout even when it cannot be cloned again", async () => {
		await withTempDir(async (dir) => {
			const central = createFakeCentral([])
			central.offline = true
			const ctx = createTestContext(dir, { central })
			await mkdir(ctx.paths.central, { recursive: true })

			const report = expectOk(await repairIndex(ctx))

			expect(report.recloned).toBe(false)
			expect(await exists(ctx.paths.central)).toBe(false)
		})
	})
})

describe("checkIndex", () => {
	it("reports issues without writing", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const written = await writeStore(ctx.paths.indexFile, messyEntries)

			const issues = expectOk(await checkIndex(ctx))

			expect(issues[0]).toEqual({
				expected: "https://example.test/alpha",
				kind: "stale_normalized_url",
				name: "alpha",
				position: 0,
				stored: "https://Example.test/alpha.git",
			})
			expect(issues).toHaveLength(3)
			expect(await readFile(ctx.paths.indexFile, "utf8")).toBe(written)
		})
	})

	it("reports an unreadable store", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			await mkdir(ctx.paths.indexDir, { recursive: true })
			await writeFile(ctx.paths.indexFile, JSON.stringify({ entries: [], version: 7 }))

			expect(expectOk(await checkIndex(ctx))).toEqual([
				{ kind: "unreadable_store", reason: `${ctx.paths.indexFile} is not an index store.` },
			])
		})
	})
})
