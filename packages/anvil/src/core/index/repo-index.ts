import {
	coerceAbsolutePath,
	coerceNonEmpty,
	type Formula,
	type FormulaParseError,
	type FormulaSource,
	type IoError,
	isArchiveUrl,
	isRemoteLocator,
	normalizeUrl,
	type NotFoundError,
	type PackageName,
	type Result,
} from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import { findHammerFormula, readAllHammerFormulas } from "@/src/core/hammers/hammers"
import { intactStore, loadIndex, saveIndex } from "@/src/core/index/store"
import type { IndexEntry, IndexOrigin, InsertOutcome } from "@/src/core/index/types"
import { withLock } from "@/src/core/io/lock"
import type { IndexCorruptionError, LockError } from "@/src/types/errors"

export type IndexContext = Pick<AnvilContext, "paths" | "logger">

type ReadError = IndexCorruptionError | IoError

export interface NewEntry {
	name: PackageName
	url: string
	description?: string
	origin?: IndexOrigin
	hammer?: string
}

export async function listEntries(ctx: IndexContext): Promise<Result<IndexEntry[], ReadError>> {
	const loaded = await loadIndex(ctx.paths.indexFile)
	if (!loaded.ok) {
		return loaded
	}
	if (loaded.value.issues.length > 0) {
		ctx.logger.debug(`Index has ${loaded.value.issues.length} issue(s); run "anvil index repair".`)
	}
	return { ok: true, value: loaded.value.store.entries }
}

/**
 * Case-insensitive substring match over name and description.
 */
export async function searchEntries(
	ctx: IndexContext,
	term: string,
): Promise<Result<IndexEntry[], ReadError>> {
	const entries = await listEntries(ctx)
	if (!entries.ok) {
		return entries
	}

	const needle = term.trim().toLowerCase()
	return {
		ok: true,
		value: entries.value.filter(
			(entry) =>
				entry.name.toLowerCase().includes(needle) ||
				entry.description.toLowerCase().includes(needle),
		),
	}
}

export async function findByUrl(
	ctx: IndexContext,
	url: string,
): Promise<Result<IndexEntry | null, ReadError>> {
	const entries = await listEntries(ctx)
	if (!entries.ok) {
		return entries
	}
	const normalized = normalizeUrl(url)
	return { ok: true, value: entries.value.find((entry) => entry.normalizedUrl === normalized) ?? null }
}

/**
 * Resolve a package name to a formula. Hammer formulas carry an explicit
 * plan; plain index entries become a source-only formula and the plan is
 * detected at forge time.
 */
export async function lookup(
	ctx: IndexContext,
	name: PackageName,
): Promise<Result<Formula, NotFoundError | FormulaParseError | ReadError>> {
	const fromHammer = await findHammerFormula(ctx.paths, name)
	if (!fromHammer.ok) {
		return fromHammer
	}
	if (fromHammer.value) {
		return { ok: true, value: fromHammer.value.formula }
	}

	const entries = await listEntries(ctx)
	if (!entries.ok) {
		return entries
	}

	const entry = entries.value.find((candidate) => candidate.name === name)
	const source = entry ? sourceFromUrl(entry.url) : null
	if (!entry || !source) {
		return {
			error: {
				message: `Package "${name}" is not in the index. Run "anvil update" or forge it by URL.`,
				target: name,
				type: "not_found",
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: {
			binaries: [],
			build: null,
			dependencies: [],
			description: entry.description,
			name: entry.name,
			source,
		},
	}
}

/**
 * A hammer formula whose source is the same repository as `url`.
 */
export async function findFormulaByUrl(
	ctx: IndexContext,
	url: string,
): Promise<Result<Formula | null, IoError>> {
	const all = await readAllHammerFormulas(ctx.paths)
	if (!all.ok) {
		return all
	}
	for (const invalid of all.value.invalid) {
		ctx.logger.warn(invalid.message)
	}

	const normalized = normalizeUrl(url)
	const match = all.value.formulas.find(({ formula }) => {
		const source = formula.source
		return source !== undefined && source.type !== "local" && normalizeUrl(source.url) === normalized
	})
	return { ok: true, value: match?.formula ?? null }
}

/**
 * Add an entry unless its normalized URL is already indexed.
 */
export async function insert(
	ctx: IndexContext,
	entry: NewEntry,
): Promise<Result<InsertOutcome, ReadError | LockError>> {
	return withLock(
		ctx.paths.indexLock,
		"index insert",
		async (): Promise<Result<InsertOutcome, ReadError>> => {
			const loaded = await loadIndex(ctx.paths.indexFile)
			if (!loaded.ok) {
				return loaded
			}
			const intact = intactStore(ctx.paths.indexFile, loaded.value)
			if (!intact.ok) {
				return intact
			}

			const store = intact.value
			const normalizedUrl = normalizeUrl(entry.url)
			if (store.entries.some((existing) => existing.normalizedUrl === normalizedUrl)) {
				return { ok: true, value: "alreadyPresent" }
			}

			store.entries.push({
				description: entry.description ?? "",
				name: entry.name,
				normalizedUrl,
				origin: entry.origin ?? "local",
				url: entry.url.trim(),
				...(entry.hammer ? { hammer: entry.hammer } : {}),
			})

			const saved = await saveIndex(ctx.paths.indexFile, store)
			if (!saved.ok) {
				return saved
			}
			return { ok: true, value: "inserted" }
		},
		{ logger: ctx.logger },
	)
}

/**
 * Remove every entry matching `predicate`; returns the removed entries.
 */
export async function removeEntries(
	ctx: IndexContext,
	predicate: (entry: IndexEntry) => boolean,
): Promise<Result<IndexEntry[], ReadError | LockError>> {
	return withLock(
		ctx.paths.indexLock,
		"index remove",
		async (): Promise<Result<IndexEntry[], ReadError>> => {
			const loaded = await loadIndex(ctx.paths.indexFile)
			if (!loaded.ok) {
				return loaded
			}
			const intact = intactStore(ctx.paths.indexFile, loaded.value)
			if (!intact.ok) {
				return intact
			}

			const store = intact.value
			const removed = store.entries.filter(predicate)
			if (removed.length === 0) {
				return { ok: true, value: [] }
			}

			const saved = await saveIndex(ctx.paths.indexFile, {
				...store,
				entries: store.entries.filter((entry) => !predicate(entry)),
			})
			if (!saved.ok) {
				return saved
			}
			return { ok: true, value: removed }
		},
		{ logger: ctx.logger },
	)
}

export function sourceFromUrl(url: string): FormulaSource | null {
	const locator = coerceNonEmpty(url)
	if (!locator) {
		return null
	}
	if (isRemoteLocator(locator)) {
		return isArchiveUrl(locator) ? { type: "archive", url: locator } : { type: "git", url: locator }
	}
	const localPath = coerceAbsolutePath(locator, process.cwd())
	return localPath ? { path: localPath, type: "local" } : null
}
