import { mkdir, readdir, symlink, utimes, writeFile } from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { describe, expect, it } from "vitest"
import type { InstalledPackageRecord } from "@/src/core/forge/types"
import { OWNER_MARKER } from "@/src/core/forge/workspace"
import { isSafeToRemove, runHousekeeping, UNMARKED_GRACE_MS } from "@/src/core/housekeeping/housekeeping"
import { writeRecord } from "@/src/core/packages/records"
import { ensureLayout } from "@/src/core/paths"
import type { AnvilContext } from "@/src/core/context"
import { createTestContext, exists, expectOk, pkg, withTempDir, writeExecutable } from "@/tests/helpers"

// Above any pid_max, so never a live process.
const DEAD_PID = 999_999_999

async function workspace(ctx: AnvilContext, name: string, pid: number | null): Promise<string> {
	const dir = path.join(ctx.paths.build, name)
	await mkdir(dir, { recursive: true })
	if (pid !== null) {
		await writeFile(
			path.join(dir, OWNER_MARKER),
			JSON.stringify({ createdAt: new Date().toISOString(), operationId: name, pid }),
		)
	}
	return dir
}

async function install(ctx: AnvilContext, name: string, generation: string): Promise<InstalledPackageRecord> {
	const installPath = path.join(ctx.paths.opt, name, generation)
	const target = path.join(installPath, "bin", name)
	await writeExecutable(target)
	const linkPath = path.join(ctx.paths.bin, name)
	await symlink(target, linkPath)
	const record: InstalledPackageRecord = {
		dependencies: [],
		ecosystem: "make",
		generation,
		installedAt: new Date().toISOString(),
		installPath,
		libraries: [],
		links: [{ name, path: linkPath, target }],
		name: pkg(name),
		source: { type: "git", url: `https://example.test/${name}` },
		version: null,
	}
	expectOk(await writeRecord(ctx.paths, record))
	return record
}

describe("runHousekeeping", () => {
	it("removes abandoned workspaces and keeps live ones", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			expectOk(await ensureLayout(ctx.paths))
			const live = await workspace(ctx, "live-1", process.pid)
			const dead = await workspace(ctx, "dead-1", DEAD_PID)
			const fresh = await workspace(ctx, "fresh-1", null)
			const stale = await workspace(ctx, "stale-1", null)
			const old = new Date(Date.now() - 2 * UNMARKED_GRACE_MS)
			await utimes(stale, old, old)
			const running = await workspace(ctx, "running-1", null)
			await utimes(running, old, old)
			ctx.workspaces.add(running)

			const report = expectOk(await runHousekeeping(ctx))

			expect(report.removedWorkspaces.sort()).toEqual([dead, stale].sort())
			expect(await exists(live)).toBe(true)
			expect(await exists(fresh)).toBe(true)
			expect(await exists(running)).toBe(true)
		})
	})

	it("removes orphaned bin entries and reports them", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			expectOk(await ensureLayout(ctx.paths))
			await install(ctx, "tool", "g2")
			await symlink(path.join(ctx.paths.opt, "gone", "g1", "bin", "gone"), path.join(ctx.paths.bin, "gone"))
			await writeFile(path.join(ctx.paths.bin, "stray.txt"), "left behind")

			const report = expectOk(await runHousekeeping(ctx))

			expect(report.removedOrphanBinaries).toEqual(["gone", "stray.txt"])
			expect(await readdir(ctx.paths.bin)).toEqual(["tool"])
		})
	})

	it("removes generations no record points at", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			expectOk(await ensureLayout(ctx.paths))
			const record = await install(ctx, "tool", "g2")
			const previous = path.join(ctx.paths.opt, "tool", "g1")
			await mkdir(previous, { recursive: true })
			const old = new Date(Date.now() - 2 * UNMARKED_GRACE_MS)
			await utimes(previous, old, old)
			const building = path.join(ctx.paths.opt, "tool", "g3")
			await mkdir(building, { recursive: true })
			await writeFile(
				path.join(building, OWNER_MARKER),
				JSON.stringify({ createdAt: new Date().toISOString(), operationId: "g3", pid: process.pid }),
			)

			const report = expectOk(await runHousekeeping(ctx))

			expect(report.removedGenerations).toEqual([previous])
			expect(await exists(record.installPath)).toBe(true)
			expect(await exists(building)).toBe(true)
		})
	})

	it("keeps a new generation that has no owner marker yet", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			expectOk(await ensureLayout(ctx.paths))
			await install(ctx, "tool", "g2")
			const unmarked = path.join(ctx.paths.opt, "tool", "g3")
			await mkdir(unmarked, { recursive: true })

			const report = expectOk(await runHousekeeping(ctx))

			expect(report.removedGenerations).toEqual([])
			expect(await exists(unmarked)).toBe(true)

			const later = expectOk(await runHousekeeping(ctx, { now: Date.now() + 2 * UNMARKED_GRACE_MS }))

			expect(later.removedGenerations).toEqual([unmarked])
		})
	})

	it("leaves packages with an unreadable record alone", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			expectOk(await ensureLayout(ctx.paths))
			await install(ctx, "tool", "g2")
			await writeFile(path.join(ctx.paths.opt, "tool", "anvil-record.json"), "{ truncated")

			const report = expectOk(await runHousekeeping(ctx))

			expect(report).toEqual({ removedGenerations: [], removedOrphanBinaries: [], removedWorkspaces: [] })
			expect(await readdir(ctx.paths.bin)).toEqual(["tool"])
		})
	})
})

describe("isSafeToRemove", () => {
	it("only allows paths strictly inside the root", async () => {
		await withTempDir(async (dir) => {
			const { paths } = createTestContext(dir)

			expect(isSafeToRemove(paths, path.join(paths.build, "ws"))).toBe(true)
			expect(isSafeToRemove(paths, paths.root)).toBe(false)
			expect(isSafeToRemove(paths, path.parse(paths.root).root)).toBe(false)
			expect(isSafeToRemove(paths, os.homedir())).toBe(false)
			expect(isSafeToRemove(paths, path.join(paths.root, "..", "elsewhere"))).toBe(false)
		})
	})
})
