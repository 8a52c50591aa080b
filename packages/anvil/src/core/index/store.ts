import {
	coercePackageName,
	type IoError,
	normalizeUrl,
	type Result,
} from "@anvil/core"
import { z } from "zod"
import { readTextFileIfExists, writeJsonAtomic } from "@/src/core/io/fs"
import type { IndexEntry, IndexIssue, IndexStore } from "@/src/core/index/types"
import type { IndexCorruptionError } from "@/src/types/errors"
import { toError } from "@/src/utils/errors"

export const INDEX_VERSION = 1

const storeSchema = z.object({
	entries: z.array(z.unknown()),
	version: z.literal(INDEX_VERSION),
})

const entrySchema = z.object({
	description: z.string().default(""),
	hammer: z.string().min(1).optional(),
	name: z.string().transform((value, ctx) => {
		const name = coercePackageName(value)
		if (!name) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Invalid package name "${value}".`,
			})
			return z.NEVER
		}
		return name
	}),
	normalizedUrl: z.string(),
	origin: z.enum(["central", "local"]),
	url: z.string().trim().min(1),
})

export interface LoadedIndex {
	store: IndexStore
	/** Problems found while loading; affected entries are left out of `store`. */
	issues: IndexIssue[]
}

export type LoadIndexResult = Result<LoadedIndex, IndexCorruptionError | IoError>

export function emptyStore(): IndexStore {
	return { entries: [], version: INDEX_VERSION }
}

/**
 * Load the index store. A missing file is an empty index; a file that is not
 * a store at all is an IndexCorruptionError. Malformed, stale and duplicate
 * entries are reported as issues and resolved in the returned store.
 */
export async function loadIndex(indexFile: string): Promise<LoadIndexResult> {
	const contents = await readTextFileIfExists(indexFile)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: { issues: [], store: emptyStore() } }
	}

	let data: unknown
	try {
		data = JSON.parse(contents.value)
	} catch (error) {
		return corruption(indexFile, `Invalid JSON in ${indexFile}.`, error)
	}

	const parsed = storeSchema.safeParse(data)
	if (!parsed.success) {
		return corruption(indexFile, `${indexFile} is not an index store.`)
	}

	return { ok: true, value: analyzeEntries(parsed.data.entries) }
}

export function analyzeEntries(rawEntries: readonly unknown[]): LoadedIndex {
	const issues: IndexIssue[] = []
	const entries: IndexEntry[] = []
	const positions = new Map<string, number>()

	rawEntries.forEach((raw, position) => {
		const parsed = entrySchema.safeParse(raw)
		if (!parsed.success) {
			issues.push({
				kind: "malformed",
				position,
				reason: parsed.error.issues.map((issue) => issue.message).join("; "),
			})
			return
		}

		const { hammer, ...fields } = parsed.data
		const normalizedUrl = normalizeUrl(fields.url)
		if (fields.normalizedUrl !== normalizedUrl) {
			issues.push({
				expected: normalizedUrl,
				kind: "stale_normalized_url",
				name: fields.name,
				position,
				stored: fields.normalizedUrl,
			})
		}

		const entry: IndexEntry = {
			...fields,
			normalizedUrl,
			...(hammer ? { hammer } : {}),
		}

		const existing = positions.get(normalizedUrl)
		if (existing === undefined) {
			positions.set(normalizedUrl, entries.length)
			entries.push(entry)
			return
		}

		issues.push({ kind: "duplicate_url", name: entry.name, normalizedUrl, position })
		// A central entry outranks a local one for the same repository.
		const kept = entries[existing]
		if (kept && kept.origin === "local" && entry.origin === "central") {
			entries[existing] = entry
		}
	})

	return { issues, store: { entries, version: INDEX_VERSION } }
}

export function dropsEntries(issues: readonly IndexIssue[]): boolean {
	return issues.some((issue) => issue.kind === "malformed" || issue.kind === "duplicate_url")
}

/**
 * The store of `loaded`, unless saving it would silently drop malformed or
 * duplicate entries. Those are only removed by repair, which backs them up.
 */
export function intactStore(indexFile: string, loaded: LoadedIndex): Result<IndexStore, IndexCorruptionError> {
	if (!dropsEntries(loaded.issues)) {
		return { ok: true, value: loaded.store }
	}
	return corruption(indexFile, `${indexFile} has malformed or duplicate entries; run "anvil index repair" first.`)
}

export async function saveIndex(indexFile: string, store: IndexStore) {
	return writeJsonAtomic(indexFile, {
		entries: store.entries.map((entry) => ({
			description: entry.description,
			...(entry.hammer ? { hammer: entry.hammer } : {}),
			name: entry.name,
			normalizedUrl: entry.normalizedUrl,
			origin: entry.origin,
			url: entry.url,
		})),
		version: store.version,
	})
}

function corruption(
	indexFile: string,
	message: string,
	error?: unknown,
): { ok: false; error: IndexCorruptionError } {
	return {
		error: {
			message,
			path: indexFile,
			rawError: toError(error),
			type: "index_corruption",
		},
		ok: false,
	}
}
