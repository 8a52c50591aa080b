import { chmod, mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { classifyLibrary, collectLibraries, findBinary, findExecutables } from "./artifacts"

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
	const dir = await mkdtemp(path.join(tmpdir(), "core-artifacts-"))
	try {
		return await fn(dir)
	} finally {
		await rm(dir, { force: true, recursive: true })
	}
}

async function touch(filePath: string, mode = 0o644): Promise<void> {
	await mkdir(path.dirname(filePath), { recursive: true })
	await writeFile(filePath, "")
	await chmod(filePath, mode)
}

describe("classifyLibrary", () => {
	const none = new Set<string>()

	it("classifies by extension", () => {
		expect(classifyLibrary("libz.a", none)).toBe("static")
		expect(classifyLibrary("libparse.rlib", none)).toBe("static")
		expect(classifyLibrary("libz.so", none)).toBe("dynamic")
		expect(classifyLibrary("libz.so.1.3", none)).toBe("dynamic")
		expect(classifyLibrary("libz.dylib", none)).toBe("dynamic")
		expect(classifyLibrary("z.dll", none)).toBe("dynamic")
		expect(classifyLibrary("libz.dll.a", none)).toBe("import")
		expect(classifyLibrary("README.md", none)).toBeNull()
	})

	it("treats a .lib beside a same-named .dll as an import library", () => {
		expect(classifyLibrary("zlib.lib", new Set(["zlib.lib", "ZLIB.dll"]))).toBe("import")
		expect(classifyLibrary("zlib.lib", new Set(["zlib.lib"]))).toBe("static")
	})
})

describe("collectLibraries", () => {
	it("returns wanted classes in name order", async () => {
		await withTempDir(async (dir) => {
			for (const name of [
				"libfoo.a",
				"libfoo.so.1.2",
				"foo.dll",
				"foo.lib",
				"bar.lib",
				"libbaz.dll.a",
				"notes.txt",
			]) {
				await touch(path.join(dir, name))
			}

			const artifacts = await collectLibraries(dir, ["static", "import"])

			expect(artifacts.map((artifact) => [artifact.fileName, artifact.class])).toEqual([
				["bar.lib", "static"],
				["foo.lib", "import"],
				["libbaz.dll.a", "import"],
				["libfoo.a", "static"],
			])
		})
	})

	it("returns nothing for a missing directory", async () => {
		await withTempDir(async (dir) => {
			expect(await collectLibraries(path.join(dir, "target/release"), ["static"])).toEqual([])
		})
	})
})

describe.skipIf(process.platform === "win32")("findExecutables", () => {
	it("keeps executable programs and skips scripts and data", async () => {
		await withTempDir(async (dir) => {
			await touch(path.join(dir, "tool"), 0o755)
			await touch(path.join(dir, "build.sh"), 0o755)
			await touch(path.join(dir, "data"), 0o644)
			await touch(path.join(dir, "sub", "inner"), 0o755)

			expect(await findExecutables(dir, "linux", false)).toEqual([path.join(dir, "tool")])
			expect(await findExecutables(dir, "linux", true)).toEqual([
				path.join(dir, "sub", "inner"),
				path.join(dir, "tool"),
			])
		})
	})
})

describe("findBinary", () => {
	it("prefers the shallowest match", async () => {
		await withTempDir(async (dir) => {
			await touch(path.join(dir, "deep", "x", "rg"), 0o755)
			await touch(path.join(dir, "bin", "rg"), 0o755)

			expect(await findBinary(dir, "rg", "linux")).toBe(path.join(dir, "bin", "rg"))
		})
	})

	it("matches an .exe on windows", async () => {
		await withTempDir(async (dir) => {
			await touch(path.join(dir, "release", "rg.exe"))

			expect(await findBinary(dir, "rg", "windows")).toBe(path.join(dir, "release", "rg.exe"))
		})
	})

	it.skipIf(process.platform === "win32" || process.getuid?.() === 0)(
		"skips directories it cannot read",
		async () => {
			await withTempDir(async (dir) => {
				const locked = path.join(dir, "locked")
				await touch(path.join(locked, "other"), 0o755)
				await touch(path.join(dir, "out", "rg"), 0o755)
				await chmod(locked, 0o000)
				try {
					expect(await findBinary(dir, "rg", "linux")).toBe(path.join(dir, "out", "rg"))
				} finally {
					await chmod(locked, 0o755)
				}
			})
		},
	)

	it.skipIf(process.platform === "win32")("finds nothing under a symlink loop", async () => {
		await withTempDir(async (dir) => {
			const loop = path.join(dir, "loop")
			await symlink(loop, loop)

			expect(await findBinary(loop, "rg", "linux")).toBeNull()
		})
	})

	it("skips version control directories", async () => {
		await withTempDir(async (dir) => {
			await touch(path.join(dir, ".git", "rg"), 0o755)

			expect(await findBinary(dir, "rg", "linux")).toBeNull()
		})
	})
})
