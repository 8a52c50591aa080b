import path from "node:path"
import type { IoError, Result } from "@anvil/core"
import { z } from "zod"
import { ensureDir, listDir, readTextFile, safeStat } from "@/src/core/io/fs"
import type { CentralEntry, CentralIndexSource } from "@/src/core/index/types"
import type { GitError } from "@/src/types/errors"
import { cloneShallow, type GitRunner } from "@/src/utils/git"

export const SUBMISSIONS_DIR = "submissions"

const centralEntrySchema = z.object({
	description: z.string().default(""),
	name: z.string().trim().min(1),
	url: z.string().trim().min(1),
})

/**
 * Central index over git: a shallow clone on first use, a fast-forward pull
 * afterwards.
 */
export function createGitCentralSource(url: string, git: GitRunner): CentralIndexSource {
	return {
		async sync(checkoutDir: string): Promise<Result<void, GitError | IoError>> {
			const gitDir = await safeStat(path.join(checkoutDir, ".git"))
			if (!gitDir.ok) {
				return gitDir
			}

			if (gitDir.value?.isDirectory()) {
				const pulled = await git(["pull", "--ff-only"], { cwd: checkoutDir })
				return pulled.ok ? { ok: true, value: undefined } : pulled
			}

			const parent = await ensureDir(path.dirname(checkoutDir))
			if (!parent.ok) {
				return parent
			}
			return cloneShallow(git, url, checkoutDir)
		},
		url,
	}
}

export interface CentralSnapshot {
	entries: CentralEntry[]
	/** Submission files that could not be read as entries */
	skipped: string[]
}

/**
 * Read the submission files of a central checkout. A checkout without a
 * submissions directory has no entries.
 */
export async function readCentralEntries(checkoutDir: string): Promise<Result<CentralSnapshot, IoError>> {
	const submissionsDir = path.join(checkoutDir, SUBMISSIONS_DIR)
	const listing = await listDir(submissionsDir)
	if (!listing.ok) {
		return listing
	}

	const entries: CentralEntry[] = []
	const skipped: string[] = []
	for (const entry of listing.value) {
		if (!entry.isFile() || !entry.name.endsWith(".json")) {
			continue
		}
		const filePath = path.join(submissionsDir, entry.name)
		const contents = await readTextFile(filePath)
		if (!contents.ok) {
			return contents
		}

		const parsed = centralEntrySchema.safeParse(parseJson(contents.value))
		if (!parsed.success) {
			skipped.push(filePath)
			continue
		}
		entries.push(parsed.data)
	}

	return { ok: true, value: { entries, skipped } }
}

/**
 * Why the checkout at `checkoutDir` cannot be used, or null when it can.
 * A missing checkout is fine: update clones it.
 */
export async function centralCheckoutProblem(checkoutDir: string): Promise<Result<string | null, IoError>> {
	const root = await safeStat(checkoutDir)
	if (!root.ok) {
		return root
	}
	if (!root.value) {
		return { ok: true, value: null }
	}
	if (!root.value.isDirectory()) {
		return { ok: true, value: `${checkoutDir} is not a directory.` }
	}

	const gitDir = await safeStat(path.join(checkoutDir, ".git"))
	if (!gitDir.ok) {
		return gitDir
	}
	if (!gitDir.value?.isDirectory()) {
		return { ok: true, value: `${checkoutDir} is not a git checkout.` }
	}

	return { ok: true, value: null }
}

function parseJson(contents: string): unknown {
	try {
		return JSON.parse(contents)
	} catch {
		return null
	}
}
