import { writeFile } from "node:fs/promises"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { runBuildCommand } from "@/src/core/forge/exec"
import { expectErr, expectOk, exists, silentLogger, withTempDir } from "@/tests/helpers"

function options(dir: string) {
	return { cwd: dir, env: { ...process.env, GREETING: "hello" }, logger: silentLogger(), workspace: dir }
}

describe("runBuildCommand", () => {
	it("runs in the given directory with the given environment", async () => {
		await withTempDir(async (dir) => {
			expectOk(await runBuildCommand('printf "%s" "$GREETING" > out.txt', options(dir)))

			expect(await exists(path.join(dir, "out.txt"))).toBe(true)
		})
	})

	it("reports the failing command and its exit code", async () => {
		await withTempDir(async (dir) => {
			const error = expectErr(await runBuildCommand("exit 3", options(dir)), "build_command_failed")

			expect(error.message).toBe('"exit 3" exited with code 3.')
			expect(error.exitCode).toBe(3)
			expect(error.workspace).toBe(dir)
			expect(error.diagnostics).toEqual([])
		})
	})

	it("attaches link diagnostics from the output", async () => {
		await withTempDir(async (dir) => {
			await writeFile(
				path.join(dir, "link.log"),
				"ld: relocation R_X86_64_32 against .rodata; recompile with -fPIC\n",
			)

			const error = expectErr(
				await runBuildCommand("cat link.log >&2; exit 1", options(dir)),
				"build_command_failed",
			)

			expect(error.diagnostics[0]).toBe("Relocation errors at link time: the objects need to be built with -fPIC.")
		})
	})

	it("kills a command that runs past the timeout", async () => {
		await withTempDir(async (dir) => {
			const started = Date.now()
			const error = expectErr(
				await runBuildCommand("sleep 10", { ...options(dir), timeoutMs: 200 }),
				"build_timeout",
			)

			expect(error.message).toBe('"sleep 10" did not finish within 200ms.')
			expect(error.timeoutMs).toBe(200)
			expect(Date.now() - started).toBeLessThan(5000)
		})
	})

	it("stops when the signal aborts", async () => {
		await withTempDir(async (dir) => {
			const controller = new AbortController()
			setTimeout(() => controller.abort(), 100)

			const error = expectErr(
				await runBuildCommand("sleep 10", { ...options(dir), signal: controller.signal }),
				"build_cancelled",
			)

			expect(error.command).toBe("sleep 10")
		})
	})

	it("does not start after the signal has aborted", async () => {
		await withTempDir(async (dir) => {
			const controller = new AbortController()
			controller.abort()

			expectErr(
				await runBuildCommand("touch ran", { ...options(dir), signal: controller.signal }),
				"build_cancelled",
			)
			expect(await exists(path.join(dir, "ran"))).toBe(false)
		})
	})
})
