import { execFile } from "node:child_process"
import { readdir, readlink } from "node:fs/promises"
import path from "node:path"
import { promisify } from "node:util"
import { describe, expect, it } from "vitest"
import { forge } from "@/src/core/forge/forge"
import { autoSubmitHook } from "@/src/core/forge/hooks"
import { OWNER_MARKER } from "@/src/core/forge/workspace"
import { listEntries } from "@/src/core/index/repo-index"
import { readRecord } from "@/src/core/packages/records"
import {
	createFakeGit,
	createTestContext,
	exists,
	expectErr,
	expectOk,
	formulaJson,
	installScript,
	isDirectory,
	withTempDir,
	writeTree,
} from "@/tests/helpers"

const execFileAsync = promisify(execFile)

async function writeProject(root: string, name: string, formula: string): Promise<string> {
	const dir = path.join(root, "projects", name)
	await writeTree(dir, { "anvil.json": formula })
	return dir
}

describe("forge", () => {
	it("builds an explicit formula and links its binary", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const project = await writeProject(
				dir,
				"hello",
				formulaJson({ binaries: ["hello"], build: { common: installScript("hello", "hi there") }, name: "hello" }),
			)

			const record = expectOk(await forge(ctx, project))

			const linkPath = path.join(ctx.paths.bin, "hello")
			expect(record.name).toBe("hello")
			expect(record.ecosystem).toBe("formula")
			expect(record.source).toEqual({ path: project, type: "local" })
			expect(record.installPath).toBe(path.join(ctx.paths.opt, "hello", record.generation))
			expect(record.links).toEqual([
				{ name: "hello", path: linkPath, target: path.join(record.installPath, "bin", "hello") },
			])
			expect(await readlink(linkPath)).toBe(path.join(record.installPath, "bin", "hello"))
			expect((await execFileAsync(linkPath)).stdout).toBe("hi there\n")

			expect(expectOk(await readRecord(ctx.paths, "hello"))).toEqual(record)
			expect(await exists(path.join(record.installPath, OWNER_MARKER))).toBe(false)
			expect(await readdir(ctx.paths.build)).toEqual([])
		})
	})

	it("records nothing for a malformed formula", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const project = await writeProject(dir, "broken", "{ not json")

			const error = expectErr(await forge(ctx, project), "formula_parse")

			expect(error.path).toBe(path.join(project, "anvil.json"))
			expect(expectOk(await readRecord(ctx.paths, "broken"))).toBeNull()
			expect(await exists(path.join(ctx.paths.opt, "broken"))).toBe(false)
		})
	})

	it("keeps the previous install when a rebuild fails", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const project = await writeProject(
				dir,
				"hello",
				formulaJson({ binaries: ["hello"], build: { common: installScript("hello", "v1") }, name: "hello" }),
			)
			const first = expectOk(await forge(ctx, project))

			await writeTree(project, {
				"anvil.json": formulaJson({
					binaries: ["hello"],
					build: { common: ["echo compiling", "exit 7"] },
					name: "hello",
				}),
			})
			const error = expectErr(await forge(ctx, project), "build_command_failed")

			expect(error.command).toBe("exit 7")
			expect(error.exitCode).toBe(7)
			expect(await isDirectory(error.workspace)).toBe(true)
			expect(await exists(path.join(error.workspace, OWNER_MARKER))).toBe(false)

			expect(expectOk(await readRecord(ctx.paths, "hello"))).toEqual(first)
			expect((await execFileAsync(path.join(ctx.paths.bin, "hello"))).stdout).toBe("v1\n")
			expect((await readdir(path.join(ctx.paths.opt, "hello"))).sort()).toEqual(
				["anvil-record.json", first.generation].sort(),
			)
		})
	})

	it("replaces the previous generation after a successful rebuild", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const formula = (output: string) =>
				formulaJson({ binaries: ["hello"], build: { common: installScript("hello", output) }, name: "hello" })
			const project = await writeProject(dir, "hello", formula("v1"))
			const first = expectOk(await forge(ctx, project))

			await writeTree(project, { "anvil.json": formula("v2") })
			const second = expectOk(await forge(ctx, project))

			expect(second.generation).not.toBe(first.generation)
			expect(await exists(first.installPath)).toBe(false)
			expect((await execFileAsync(path.join(ctx.paths.bin, "hello"))).stdout).toBe("v2\n")
		})
	})

	it("reports missing binaries without recording the package", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const project = await writeProject(
				dir,
				"ghostly",
				formulaJson({ binaries: ["ghost"], build: { common: ["true"] }, name: "ghostly" }),
			)

			const error = expectErr(await forge(ctx, project), "no_artifacts")

			expect(error.message).toBe("Build finished but did not produce ghost.")
			expect(expectOk(await readRecord(ctx.paths, "ghostly"))).toBeNull()
			expect(await readdir(path.join(ctx.paths.opt, "ghostly"))).toEqual([])
			expect(await readdir(ctx.paths.bin)).toEqual([])
		})
	})

	it("installs a library plan without touching bin", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const project = await writeProject(
				dir,
				"libwidget",
				formulaJson({
					build: { common: ["mkdir -p out", "printf archive > out/libwidget.a"] },
					libraries: { classes: ["static"], output_dir: "out" },
					name: "libwidget",
				}),
			)

			const record = expectOk(await forge(ctx, project))

			expect(record.links).toEqual([])
			expect(record.libraries).toEqual([
				{ class: "static", fileName: "libwidget.a", path: path.join(record.installPath, "lib", "libwidget.a") },
			])
			expect(await readdir(ctx.paths.bin)).toEqual([])
		})
	})

	it("kills a build that exceeds the timeout", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const project = await writeProject(
				dir,
				"slow",
				formulaJson({ binaries: ["slow"], build: { common: ["sleep 10"] }, name: "slow" }),
			)

			const error = expectErr(await forge(ctx, project, { timeoutMs: 200 }), "build_timeout")

			expect(error.command).toBe("sleep 10")
			expect(expectOk(await readRecord(ctx.paths, "slow"))).toBeNull()
		})
	})

	it("builds dependencies first", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const liba = path.join(dir, "projects", "liba")
			const app = path.join(dir, "projects", "app")
			await writeTree(dir, { "projects/liba/README": "", "projects/app/README": "" })
			await writeTree(ctx.paths.hammers, {
				"local/app.json": formulaJson({
					binaries: ["app"],
					build: { common: installScript("app") },
					dependencies: ["liba"],
					name: "app",
					path: app,
				}),
				"local/liba.json": formulaJson({
					binaries: ["liba-tool"],
					build: { common: installScript("liba-tool") },
					name: "liba",
					path: liba,
				}),
			})

			const record = expectOk(await forge(ctx, "app"))

			expect(record.name).toBe("app")
			expect(record.dependencies).toEqual(["liba"])
			expect(expectOk(await readRecord(ctx.paths, "liba"))?.links.map((link) => link.name)).toEqual(["liba-tool"])
			expect((await readdir(ctx.paths.bin)).sort()).toEqual(["app", "liba-tool"])
		})
	})

	it("reuses an installed dependency named like the root directory", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const lib = path.join(dir, "projects", "lib")
			await writeTree(dir, { "projects/lib/README": "" })
			await writeTree(ctx.paths.hammers, {
				"local/tools-src.json": formulaJson({
					binaries: ["tools-src"],
					build: { common: installScript("tools-src") },
					name: "tools-src",
					path: lib,
				}),
			})
			const dependency = expectOk(await forge(ctx, "tools-src"))
			const project = await writeProject(
				dir,
				"tools-src",
				formulaJson({
					binaries: ["app"],
					build: { common: installScript("app") },
					dependencies: ["tools-src"],
					name: "app",
				}),
			)

			const record = expectOk(await forge(ctx, project))

			expect(record.name).toBe("app")
			expect(expectOk(await readRecord(ctx.paths, "tools-src"))?.generation).toBe(dependency.generation)
		})
	})

	it("rejects a dependency cycle before building anything", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const a = path.join(dir, "projects", "a")
			const b = path.join(dir, "projects", "b")
			await writeTree(dir, { "projects/a/README": "", "projects/b/README": "" })
			await writeTree(ctx.paths.hammers, {
				"local/a.json": formulaJson({
					binaries: ["a"],
					build: { common: ["touch built"] },
					dependencies: ["b"],
					name: "a",
					path: a,
				}),
				"local/b.json": formulaJson({
					binaries: ["b"],
					build: { common: ["touch built"] },
					dependencies: ["a"],
					name: "b",
					path: b,
				}),
			})

			const error = expectErr(await forge(ctx, "a"), "dependency_cycle")

			expect(error.cycle).toEqual(["a", "b", "a"])
			expect(error.message).toBe("Dependency cycle: a -> b -> a.")
			expect(await exists(path.join(a, "built"))).toBe(false)
			expect(await exists(path.join(b, "built"))).toBe(false)
			expect(await readdir(ctx.paths.opt)).toEqual([])
		})
	})

	it("rejects a package that depends on itself", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			const project = await writeProject(
				dir,
				"selfish",
				formulaJson({ build: { common: ["true"] }, dependencies: ["selfish"], name: "selfish" }),
			)

			const error = expectErr(await forge(ctx, project), "dependency_cycle")

			expect(error.cycle).toEqual(["selfish", "selfish"])
		})
	})
})

describe("auto-submission", () => {
	const url = "https://example.test/dev/greeter.git"
	const repository = {
		"anvil.json": formulaJson({ binaries: ["greeter"], build: { common: installScript("greeter") }, name: "greeter" }),
	}

	it("adds a forged remote to the local index", async () => {
		await withTempDir(async (dir) => {
			const git = createFakeGit({ [url]: repository })
			const ctx = createTestContext(dir, { config: { autoSubmit: true }, git: git.run, hooks: [autoSubmitHook] })

			const record = expectOk(await forge(ctx, url))

			expect(record.source).toEqual({ type: "git", url })
			expect(git.calls[0]?.slice(0, 4)).toEqual(["clone", "--depth", "1", url])
			expect(expectOk(await listEntries(ctx))).toEqual([
				{
					description: "User added",
					name: "greeter",
					normalizedUrl: "https://example.test/dev/greeter",
					origin: "local",
					url,
				},
			])
		})
	})

	it("does nothing when disabled", async () => {
		await withTempDir(async (dir) => {
			const git = createFakeGit({ [url]: repository })
			const ctx = createTestContext(dir, { config: { autoSubmit: false }, git: git.run, hooks: [autoSubmitHook] })

			expectOk(await forge(ctx, url))

			expect(expectOk(await listEntries(ctx))).toEqual([])
		})
	})

	it("does not fail the install when a hook fails", async () => {
		await withTempDir(async (dir) => {
			const git = createFakeGit({ [url]: repository })
			const ctx = createTestContext(dir, {
				git: git.run,
				hooks: [
					{
						name: "broken",
						run: async () => ({
							error: { message: "hook exploded", operation: "write", path: dir, type: "io" },
							ok: false,
						}),
					},
				],
			})

			const record = expectOk(await forge(ctx, url))

			expect(expectOk(await readRecord(ctx.paths, "greeter"))).toEqual(record)
		})
	})
})
