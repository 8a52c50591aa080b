import {
	coercePackageName,
	type IoError,
	normalizeUrl,
	type Result,
} from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import { type CentralSnapshot, readCentralEntries } from "@/src/core/index/central"
import { readAllHammerFormulas } from "@/src/core/hammers/hammers"
import { repairUnlocked } from "@/src/core/index/repair"
import { dropsEntries, loadIndex, saveIndex } from "@/src/core/index/store"
import type { IndexEntry, IndexStore, UpdateReport } from "@/src/core/index/types"
import { ensureDir } from "@/src/core/io/fs"
import { withLock } from "@/src/core/io/lock"
import type { LockError } from "@/src/types/errors"

export type UpdateContext = Pick<AnvilContext, "paths" | "logger" | "central">

/**
 * Refresh the central checkout and merge it into the index. Central entries
 * upsert by normalized URL and win over local ones; hammer formulas are
 * registered as local entries; then the store is repaired.
 */
export async function updateIndex(ctx: UpdateContext): Promise<Result<UpdateReport, IoError | LockError>> {
	const ensured = await ensureDir(ctx.paths.indexDir)
	if (!ensured.ok) {
		return ensured
	}

	const synced = await ctx.central.sync(ctx.paths.central)
	if (!synced.ok) {
		ctx.logger.warn(`Unable to refresh the central index from ${ctx.central.url}: ${synced.error.message}`)
	}

	// An unreadable checkout leaves nothing to merge; repair below re-clones it.
	const read = await readCentralEntries(ctx.paths.central)
	if (!read.ok) {
		ctx.logger.warn(`Unable to read the central checkout: ${read.error.message}`)
	}
	const snapshot: CentralSnapshot = read.ok ? read.value : { entries: [], skipped: [] }
	for (const skipped of snapshot.skipped) {
		ctx.logger.warn(`Skipping unreadable central submission ${skipped}.`)
	}

	const hammerFormulas = await readAllHammerFormulas(ctx.paths)
	if (!hammerFormulas.ok) {
		return hammerFormulas
	}
	for (const invalid of hammerFormulas.value.invalid) {
		ctx.logger.warn(invalid.message)
	}

	return withLock(
		ctx.paths.indexLock,
		"index update",
		async (): Promise<Result<UpdateReport, IoError>> => {
			const store = await loadForMerge(ctx)
			if (!store.ok) {
				return store
			}

			const report: UpdateReport = {
				added: 0,
				localAdded: 0,
				repair: null,
				synced: synced.ok,
				total: 0,
				updated: 0,
			}
			const entries = store.value.entries

			for (const central of snapshot.entries) {
				const name = coercePackageName(central.name)
				if (!name) {
					ctx.logger.warn(`Skipping central entry with invalid name "${central.name}".`)
					continue
				}

				const incoming: IndexEntry = {
					description: central.description,
					name,
					normalizedUrl: normalizeUrl(central.url),
					origin: "central",
					url: central.url,
				}
				const position = entries.findIndex((entry) => entry.normalizedUrl === incoming.normalizedUrl)
				if (position === -1) {
					entries.push(incoming)
					report.added += 1
					continue
				}

				const current = entries[position]
				if (current && !sameEntry(current, incoming)) {
					entries[position] = incoming
					report.updated += 1
				}
			}

			for (const { formula, hammer } of hammerFormulas.value.formulas) {
				const source = formula.source
				if (!source || source.type === "local") {
					continue
				}
				const normalizedUrl = normalizeUrl(source.url)
				if (entries.some((entry) => entry.normalizedUrl === normalizedUrl)) {
					continue
				}
				entries.push({
					description: formula.description ?? "",
					hammer,
					name: formula.name,
					normalizedUrl,
					origin: "local",
					url: source.url,
				})
				report.localAdded += 1
			}

			const saved = await saveIndex(ctx.paths.indexFile, store.value)
			if (!saved.ok) {
				return saved
			}
			report.total = entries.length

			const repaired = await repairUnlocked(ctx)
			if (repaired.ok) {
				report.repair = repaired.value
			} else {
				ctx.logger.warn(`Index repair after update failed: ${repaired.error.message}`)
			}

			return { ok: true, value: report }
		},
		{ logger: ctx.logger },
	)
}

// An unreadable store, or one with entries that saving would drop, is
// repaired (and backed up) before merging into it.
async function loadForMerge(ctx: UpdateContext): Promise<Result<IndexStore, IoError>> {
	const loaded = await loadIndex(ctx.paths.indexFile)
	if (loaded.ok) {
		if (!dropsEntries(loaded.value.issues)) {
			return { ok: true, value: loaded.value.store }
		}
		ctx.logger.warn(`Repairing ${ctx.paths.indexFile} before merging.`)
	} else if (loaded.error.type !== "index_corruption") {
		return { ok: false, error: loaded.error }
	} else {
		ctx.logger.warn(loaded.error.message)
	}

	const repaired = await repairUnlocked(ctx)
	if (!repaired.ok) {
		return repaired
	}
	const reloaded = await loadIndex(ctx.paths.indexFile)
	if (!reloaded.ok) {
		return reloaded.error.type === "io"
			? { ok: false, error: reloaded.error }
			: { error: { message: reloaded.error.message, operation: "read", path: reloaded.error.path, type: "io" }, ok: false }
	}
	return { ok: true, value: reloaded.value.store }
}

function sameEntry(a: IndexEntry, b: IndexEntry): boolean {
	return (
		a.name === b.name &&
		a.url === b.url &&
		a.description === b.description &&
		a.origin === b.origin &&
		a.hammer === b.hammer
	)
}
