import os from "node:os"
import path from "node:path"
import type { IoError, Result } from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import { linkTarget } from "@/src/core/forge/links"
import type { InstalledPackageRecord } from "@/src/core/forge/types"
import { readOwnerMarker } from "@/src/core/forge/workspace"
import { ioFailure, isWithin, listDir, removePath, safeLstat } from "@/src/core/io/fs"
import { isProcessAlive, withLock } from "@/src/core/io/lock"
import { readRecord } from "@/src/core/packages/records"
import type { AnvilPaths } from "@/src/core/paths"
import type { LockError } from "@/src/types/errors"

/** Unmarked workspaces younger than this may still be getting their marker. */
export const UNMARKED_GRACE_MS = 60_000

export interface HousekeepingReport {
	removedWorkspaces: string[]
	removedOrphanBinaries: string[]
	removedGenerations: string[]
}

export interface HousekeepingOptions {
	unmarkedGraceMs?: number
	now?: number
}

type HousekeepingContext = Pick<AnvilContext, "paths" | "logger" | "workspaces">

/**
 * Remove what no live operation or install record accounts for:
 * abandoned workspaces, bin entries no record links, and generations no
 * record points at.
 */
export async function runHousekeeping(
	ctx: HousekeepingContext,
	options: HousekeepingOptions = {},
): Promise<Result<HousekeepingReport, IoError | LockError>> {
	return withLock(
		ctx.paths.installLock,
		"housekeeping",
		async (): Promise<Result<HousekeepingReport, IoError>> => {
			const now = options.now ?? Date.now()
			const grace = options.unmarkedGraceMs ?? UNMARKED_GRACE_MS
			const workspaces = await sweepWorkspaces(ctx, now, grace)
			if (!workspaces.ok) {
				return workspaces
			}
			const installs = await sweepInstalls(ctx, now, grace)
			if (!installs.ok) {
				return installs
			}
			const binaries = await sweepBin(ctx, installs.value.records, installs.value.unreadable)
			if (!binaries.ok) {
				return binaries
			}

			return {
				ok: true,
				value: {
					removedGenerations: installs.value.removed,
					removedOrphanBinaries: binaries.value,
					removedWorkspaces: workspaces.value,
				},
			}
		},
		{ logger: ctx.logger },
	)
}

/**
 * Only paths strictly inside the Anvil root may be deleted, and never the
 * root itself, the home directory or a filesystem root.
 */
export function isSafeToRemove(paths: AnvilPaths, target: string): boolean {
	const resolved = path.resolve(target)
	if (resolved === path.parse(resolved).root) return false
	if (resolved === path.resolve(os.homedir())) return false
	if (resolved === path.resolve(paths.root)) return false
	return isWithin(paths.root, resolved)
}

async function remove(ctx: HousekeepingContext, target: string): Promise<Result<void, IoError>> {
	if (!isSafeToRemove(ctx.paths, target)) {
		return ioFailure(`Refusing to remove ${target}.`, target, "rm")
	}
	return removePath(target)
}

/**
 * A directory is in use while a live process owns it, or while it is too
 * young to have received its owner marker.
 */
async function inUse(dir: string, now: number, grace: number): Promise<Result<boolean, IoError>> {
	const owner = await readOwnerMarker(dir)
	if (owner) {
		return { ok: true, value: isProcessAlive(owner.pid) }
	}
	const stats = await safeLstat(dir)
	if (!stats.ok) {
		return stats
	}
	return { ok: true, value: stats.value !== null && now - stats.value.mtimeMs < grace }
}

async function sweepWorkspaces(
	ctx: HousekeepingContext,
	now: number,
	grace: number,
): Promise<Result<string[], IoError>> {
	const listing = await listDir(ctx.paths.build)
	if (!listing.ok) {
		return listing
	}

	const removed: string[] = []

	for (const entry of listing.value) {
		const dir = path.join(ctx.paths.build, entry.name)
		if (!entry.isDirectory() || ctx.workspaces.has(dir)) {
			continue
		}

		const busy = await inUse(dir, now, grace)
		if (!busy.ok) {
			return busy
		}
		if (busy.value) {
			continue
		}

		const result = await remove(ctx, dir)
		if (!result.ok) {
			return result
		}
		ctx.logger.debug(`Removed workspace ${dir}`)
		removed.push(dir)
	}

	return { ok: true, value: removed }
}

interface InstallSweep {
	records: InstalledPackageRecord[]
	removed: string[]
	/** Package directories left alone because their record is unreadable */
	unreadable: string[]
}

async function sweepInstalls(
	ctx: HousekeepingContext,
	now: number,
	grace: number,
): Promise<Result<InstallSweep, IoError>> {
	const packages = await listDir(ctx.paths.opt)
	if (!packages.ok) {
		return packages
	}

	const sweep: InstallSweep = { records: [], removed: [], unreadable: [] }

	for (const entry of packages.value) {
		if (!entry.isDirectory()) {
			continue
		}
		const packagePath = path.join(ctx.paths.opt, entry.name)
		const record = await readRecord(ctx.paths, entry.name)
		if (!record.ok) {
			ctx.logger.warn(`Skipping ${entry.name}: ${record.error.message}`)
			sweep.unreadable.push(packagePath)
			continue
		}
		if (record.value) {
			sweep.records.push(record.value)
		}

		const generations = await listDir(packagePath)
		if (!generations.ok) {
			return generations
		}

		let remaining = 0
		for (const generation of generations.value) {
			if (!generation.isDirectory()) {
				remaining += generation.isFile() ? 1 : 0
				continue
			}
			const generationPath = path.join(packagePath, generation.name)
			if (generation.name === record.value?.generation) {
				remaining += 1
				continue
			}
			const busy = await inUse(generationPath, now, grace)
			if (!busy.ok) {
				return busy
			}
			if (busy.value) {
				remaining += 1
				continue
			}

			const result = await remove(ctx, generationPath)
			if (!result.ok) {
				return result
			}
			sweep.removed.push(generationPath)
		}

		if (!record.value && remaining === 0) {
			const result = await remove(ctx, packagePath)
			if (!result.ok) {
				return result
			}
		}
	}

	return { ok: true, value: sweep }
}

async function sweepBin(
	ctx: HousekeepingContext,
	records: readonly InstalledPackageRecord[],
	unreadable: readonly string[],
): Promise<Result<string[], IoError>> {
	const listing = await listDir(ctx.paths.bin)
	if (!listing.ok) {
		return listing
	}

	const expected = new Map<string, string>()
	for (const record of records) {
		for (const link of record.links) {
			expected.set(path.resolve(link.path), path.resolve(link.target))
		}
	}

	const removed: string[] = []
	for (const entry of listing.value) {
		const entryPath = path.join(ctx.paths.bin, entry.name)
		const wanted = expected.get(path.resolve(entryPath))
		const actual = await linkTarget(entryPath)
		if (wanted && actual && path.resolve(actual) === wanted) {
			continue
		}
		if (actual && unreadable.some((dir) => isWithin(dir, actual))) {
			continue
		}

		const result = await remove(ctx, entryPath)
		if (!result.ok) {
			return result
		}
		ctx.logger.debug(`Removed orphaned bin entry ${entryPath}`)
		removed.push(entry.name)
	}

	return { ok: true, value: removed }
}
