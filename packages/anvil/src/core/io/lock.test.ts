import { readFile, writeFile } from "node:fs/promises"
import path from "node:path"
import type { IoError, Result } from "@anvil/core"
import { describe, expect, it } from "vitest"
import { withLock } from "@/src/core/io/lock"
import { exists, expectErr, expectOk, silentLogger, withTempDir } from "@/tests/helpers"

const released = async (): Promise<Result<void, IoError>> => ({ ok: true, value: undefined })

describe("withLock", () => {
	it("holds the lock while the callback runs and releases it after", async () => {
		await withTempDir(async (dir) => {
			const lockPath = path.join(dir, "locks", ".lock")

			const value = expectOk(
				await withLock(lockPath, "test", async (): Promise<Result<string, IoError>> => {
					const owner: { purpose: string } = JSON.parse(await readFile(lockPath, "utf8"))
					return { ok: true, value: owner.purpose }
				}),
			)

			expect(value).toBe("test")
			expect(await exists(lockPath)).toBe(false)
		})
	})

	it("serializes concurrent holders", async () => {
		await withTempDir(async (dir) => {
			const lockPath = path.join(dir, ".lock")
			const events: string[] = []
			const hold = (name: string) =>
				withLock(lockPath, name, async (): Promise<Result<void, IoError>> => {
					events.push(`${name} start`)
					await new Promise((resolve) => setTimeout(resolve, 50))
					events.push(`${name} end`)
					return { ok: true, value: undefined }
				})

			const results = await Promise.all([hold("a"), hold("b")])

			expect(results.every((result) => result.ok)).toBe(true)
			expect(events[1]).toBe(`${events[0]?.split(" ")[0]} end`)
		})
	})

	it("takes over a lock whose owner is dead", async () => {
		await withTempDir(async (dir) => {
			const lockPath = path.join(dir, ".lock")
			await writeFile(lockPath, JSON.stringify({ pid: 999_999_999, purpose: "crashed", startedMs: Date.now() }))

			expectOk(
				await withLock(lockPath, "test", released, { logger: silentLogger() }),
			)
		})
	})

	it("gives up on a live holder after the timeout", async () => {
		await withTempDir(async (dir) => {
			const lockPath = path.join(dir, ".lock")
			await writeFile(lockPath, JSON.stringify({ pid: process.pid, purpose: "busy", startedMs: Date.now() }))

			const error = expectErr(
				await withLock(lockPath, "test", released, { timeoutMs: 100 }),
				"lock",
			)

			expect(error.holder).toBe(process.pid)
			expect(error.message).toBe(`Lock ${lockPath} is held by process ${process.pid} (busy).`)
		})
	})
})
