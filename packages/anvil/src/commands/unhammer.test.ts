import { beforeEach, describe, expect, it, vi } from "vitest"

vi.mock("@clack/prompts", () => ({
	confirm: vi.fn(),
	isCancel: () => false,
}))

import { confirm } from "@clack/prompts"
import { runUnhammer } from "@/src/commands/unhammer"
import type { AnvilContext } from "@/src/core/context"
import { createHammer, hammerDir } from "@/src/core/hammers/hammers"
import { insert, listEntries } from "@/src/core/index/repo-index"
import { createTestContext, exists, expectOk, pkg, withTempDir } from "@/tests/helpers"

const confirmMock = vi.mocked(confirm)

async function seed(ctx: AnvilContext): Promise<void> {
	expectOk(await createHammer(ctx.paths, ctx.git, "mine"))
	expectOk(await insert(ctx, { hammer: "mine", name: pkg("widget"), url: "https://git.example.test/widget" }))
	expectOk(await insert(ctx, { name: pkg("gadget"), url: "https://git.example.test/gadget" }))
}

describe("runUnhammer", () => {
	beforeEach(() => {
		confirmMock.mockReset()
		process.exitCode = undefined
	})

	it("removes the hammer and its entries after confirmation", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			await seed(ctx)
			confirmMock.mockResolvedValue(true)

			const result = await runUnhammer(ctx, "mine", { yes: false })

			expect(result).toEqual({ status: "completed", value: { removedDirectory: true, removedEntries: 1 } })
			expect(confirmMock).toHaveBeenCalledTimes(1)
			expect(await exists(hammerDir(ctx.paths, "mine"))).toBe(false)
			expect(expectOk(await listEntries(ctx)).map((entry) => entry.name)).toEqual(["gadget"])
		})
	})

	it("changes nothing when the prompt is declined", async () => {
		await withTempDir(async (dir) => {
			const ctx = createTestContext(dir)
			await seed(ctx)
			confirmMock.mockResolvedValue(false)

			const result = await runUnhammer(ctx, "mine", { yes: false })

			expect(result.status).toBe("cancelled")
			expect(await exists(hammerDir(ctx.paths, "mine"))).toBe(true)
			expect(expectOk(await listEntries(ctx))).toHaveLength(2)
		})
	})

	it("skips the prompt with --yes and reports an unknown hammer", async () => {
		await withTempDir(async (dir) => {
			const result = await runUnhammer(createTestContext(dir), "ghost", { yes: true })

			expect(result).toEqual({ reason: 'No hammer named "ghost".', status: "unchanged" })
			expect(confirmMock).not.toHaveBeenCalled()
		})
	})
})
