import type { IoError, Result } from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import { centralCheckoutProblem } from "@/src/core/index/central"
import { dropsEntries, emptyStore, loadIndex, saveIndex } from "@/src/core/index/store"
import type { IndexIssue, RepairReport } from "@/src/core/index/types"
import { readTextFile, removePath, renamePath, writeTextFile } from "@/src/core/io/fs"
import { withLock } from "@/src/core/io/lock"
import type { LockError } from "@/src/types/errors"

export type RepairContext = Pick<AnvilContext, "paths" | "logger" | "central">

/**
 * Report what repair would change, without changing anything.
 */
export async function checkIndex(ctx: RepairContext): Promise<Result<IndexIssue[], IoError>> {
	const issues: IndexIssue[] = []

	const loaded = await loadIndex(ctx.paths.indexFile)
	if (loaded.ok) {
		issues.push(...loaded.value.issues)
	} else if (loaded.error.type === "index_corruption") {
		issues.push({ kind: "unreadable_store", reason: loaded.error.message })
	} else {
		return { ok: false, error: loaded.error }
	}

	const checkout = await centralCheckoutProblem(ctx.paths.central)
	if (!checkout.ok) {
		return checkout
	}
	if (checkout.value) {
		issues.push({ kind: "invalid_central_checkout", reason: checkout.value })
	}

	return { ok: true, value: issues }
}

export async function repairIndex(ctx: RepairContext): Promise<Result<RepairReport, IoError | LockError>> {
	return withLock(ctx.paths.indexLock, "index repair", () => repairUnlocked(ctx), {
		logger: ctx.logger,
	})
}

/**
 * Repair with the index lock already held by the caller.
 */
export async function repairUnlocked(ctx: RepairContext): Promise<Result<RepairReport, IoError>> {
	const report: RepairReport = {
		backupPath: null,
		fixed: 0,
		issues: [],
		recloned: false,
		removed: 0,
		reset: false,
	}

	const loaded = await loadIndex(ctx.paths.indexFile)
	if (!loaded.ok) {
		if (loaded.error.type !== "index_corruption") {
			return { ok: false, error: loaded.error }
		}

		const backupPath = `${ctx.paths.indexFile}.corrupt-${timestamp()}`
		const moved = await renamePath(ctx.paths.indexFile, backupPath)
		if (!moved.ok) {
			return moved
		}
		const saved = await saveIndex(ctx.paths.indexFile, emptyStore())
		if (!saved.ok) {
			return saved
		}

		ctx.logger.warn(`Index store was unreadable; saved it as ${backupPath} and started a new one.`)
		report.issues.push({ kind: "unreadable_store", reason: loaded.error.message })
		report.backupPath = backupPath
		report.reset = true
	} else if (loaded.value.issues.length > 0) {
		if (dropsEntries(loaded.value.issues)) {
			const backupPath = `${ctx.paths.indexFile}.bak-${timestamp()}`
			const original = await readTextFile(ctx.paths.indexFile)
			if (!original.ok) {
				return original
			}
			const backedUp = await writeTextFile(backupPath, original.value)
			if (!backedUp.ok) {
				return backedUp
			}
			report.backupPath = backupPath
		}

		const saved = await saveIndex(ctx.paths.indexFile, loaded.value.store)
		if (!saved.ok) {
			return saved
		}

		for (const issue of loaded.value.issues) {
			if (issue.kind === "stale_normalized_url") {
				report.fixed += 1
			} else if (issue.kind === "malformed" || issue.kind === "duplicate_url") {
				report.removed += 1
			}
		}
		report.issues.push(...loaded.value.issues)
	}

	const checkout = await centralCheckoutProblem(ctx.paths.central)
	if (!checkout.ok) {
		return checkout
	}
	if (checkout.value) {
		report.issues.push({ kind: "invalid_central_checkout", reason: checkout.value })
		const removed = await removePath(ctx.paths.central)
		if (!removed.ok) {
			return removed
		}

		const synced = await ctx.central.sync(ctx.paths.central)
		if (synced.ok) {
			report.recloned = true
		} else {
			ctx.logger.warn(`Removed the invalid central checkout but could not clone it again: ${synced.error.message}`)
		}
	}

	return { ok: true, value: report }
}

function timestamp(): string {
	return new Date().toISOString().replace(/[:.]/g, "-")
}
