import type { IoError, NormalizedUrl, PackageName, Result } from "@anvil/core"
import type { GitError } from "@/src/types/errors"

export type IndexOrigin = "central" | "local"

export interface IndexEntry {
	name: PackageName
	url: string
	normalizedUrl: NormalizedUrl
	description: string
	origin: IndexOrigin
	/** Hammer that registered a local entry */
	hammer?: string
}

export interface IndexStore {
	version: 1
	entries: IndexEntry[]
}

export type InsertOutcome = "inserted" | "alreadyPresent"

export type IndexIssue =
	| { kind: "malformed"; position: number; reason: string }
	| {
			kind: "stale_normalized_url"
			position: number
			name: string
			stored: string
			expected: string
	  }
	| { kind: "duplicate_url"; position: number; name: string; normalizedUrl: string }
	| { kind: "unreadable_store"; reason: string }
	| { kind: "invalid_central_checkout"; reason: string }

export interface RepairReport {
	/** Entries dropped as malformed or duplicate */
	removed: number
	/** Entries whose normalized URL was recomputed */
	fixed: number
	/** The store could not be read and was reset */
	reset: boolean
	backupPath: string | null
	recloned: boolean
	issues: IndexIssue[]
}

export interface UpdateReport {
	/** False when the central checkout could not be refreshed */
	synced: boolean
	/** Central entries new to the store */
	added: number
	/** Existing entries replaced by their central version */
	updated: number
	/** Hammer formulas registered as local entries */
	localAdded: number
	total: number
	/** null when repair failed; the failure is logged */
	repair: RepairReport | null
}

/** A record in the central index checkout. */
export interface CentralEntry {
	name: string
	url: string
	description: string
}

/**
 * Transport for the central formula set: clones the checkout on first use,
 * pulls afterwards.
 */
export interface CentralIndexSource {
	readonly url: string
	sync(checkoutDir: string): Promise<Result<void, GitError | IoError>>
}
