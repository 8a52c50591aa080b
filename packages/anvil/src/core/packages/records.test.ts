import { mkdir, writeFile } from "node:fs/promises"
import path from "node:path"
import { describe, expect, it } from "vitest"
import type { InstalledPackageRecord } from "@/src/core/forge/types"
import { isInstalled, listRecords, readRecord, writeRecord } from "@/src/core/packages/records"
import { createTestContext, expectErr, expectOk, pkg, withTempDir } from "@/tests/helpers"

function record(name: string, opt: string): InstalledPackageRecord {
	const installPath = path.join(opt, name, "g1")
	return {
		dependencies: [pkg("zlib")],
		ecosystem: "cmake",
		generation: "g1",
		installedAt: "2026-01-02T03:04:05.000Z",
		installPath,
		libraries: [{ class: "static", fileName: "libz.a", path: path.join(installPath, "lib", "libz.a") }],
		links: [{ name, path: path.join("/bin", name), target: path.join(installPath, "bin", name) }],
		name: pkg(name),
		source: { type: "git", url: `https://example.test/${name}` },
		version: "1.0.0",
	}
}

describe("install records", () => {
	it("round-trips through the package directory", async () => {
		await withTempDir(async (dir) => {
			const { paths } = createTestContext(dir)
			const written = record("tool", paths.opt)

			expectOk(await writeRecord(paths, written))

			expect(expectOk(await readRecord(paths, "tool"))).toEqual(written)
			expect(expectOk(await isInstalled(paths, pkg("tool")))).toBe(true)
			expect(expectOk(await isInstalled(paths, pkg("other")))).toBe(false)
		})
	})

	it("rejects a record that does not match the schema", async () => {
		await withTempDir(async (dir) => {
			const { paths } = createTestContext(dir)
			await mkdir(path.join(paths.opt, "tool"), { recursive: true })
			await writeFile(path.join(paths.opt, "tool", "anvil-record.json"), JSON.stringify({ name: "tool" }))

			const error = expectErr(await readRecord(paths, "tool"), "validation")

			expect(error.message).toBe(`Invalid install record ${path.join(paths.opt, "tool", "anvil-record.json")}.`)
		})
	})

	it("lists records and collects unreadable ones", async () => {
		await withTempDir(async (dir) => {
			const { paths } = createTestContext(dir)
			expectOk(await writeRecord(paths, record("beta", paths.opt)))
			expectOk(await writeRecord(paths, record("alpha", paths.opt)))
			await mkdir(path.join(paths.opt, "broken"), { recursive: true })
			await writeFile(path.join(paths.opt, "broken", "anvil-record.json"), "nope")
			await mkdir(path.join(paths.opt, "empty"), { recursive: true })

			const listing = expectOk(await listRecords(paths))

			expect(listing.records.map((entry) => entry.name)).toEqual(["alpha", "beta"])
			expect(listing.invalid.map((entry) => entry.name)).toEqual(["broken"])
		})
	})
})
