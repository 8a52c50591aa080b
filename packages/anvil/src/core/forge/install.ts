import path from "node:path"
import type { IoError, Result } from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import {
	type LinkState,
	linkTarget,
	readLinkState,
	restoreLinkState,
	writeLink,
} from "@/src/core/forge/links"
import type { InstalledPackageRecord } from "@/src/core/forge/types"
import { removePath } from "@/src/core/io/fs"
import { withLock } from "@/src/core/io/lock"
import { writeRecord } from "@/src/core/packages/records"
import type { LockError } from "@/src/types/errors"

type InstallContext = Pick<AnvilContext, "paths" | "logger" | "platform">

/**
 * Publish a built generation: write its bin entries and its record under
 * the install lock. If any step fails the bin entries are put back as they
 * were and the previous record stays in place.
 */
export async function commitInstall(
	ctx: InstallContext,
	record: InstalledPackageRecord,
	previous: InstalledPackageRecord | null,
): Promise<Result<void, IoError | LockError>> {
	return withLock(
		ctx.paths.installLock,
		`install ${record.name}`,
		async (): Promise<Result<void, IoError>> => {
			const snapshots: LinkState[] = []
			for (const link of record.links) {
				const state = await readLinkState(link.path)
				if (!state.ok) {
					return state
				}
				snapshots.push(state.value)
			}

			const published = await publish(ctx, record)
			if (!published.ok) {
				await rollback(ctx, snapshots)
				return published
			}

			if (previous) {
				await retire(ctx, previous, record)
			}
			return { ok: true, value: undefined }
		},
		{ logger: ctx.logger },
	)
}

async function publish(ctx: InstallContext, record: InstalledPackageRecord): Promise<Result<void, IoError>> {
	for (const link of record.links) {
		const written = await writeLink(link.path, link.target, ctx.platform)
		if (!written.ok) {
			return written
		}
	}
	return writeRecord(ctx.paths, record)
}

async function rollback(ctx: InstallContext, snapshots: readonly LinkState[]): Promise<void> {
	for (const snapshot of snapshots) {
		const restored = await restoreLinkState(snapshot)
		if (!restored.ok) {
			ctx.logger.error(`Unable to restore ${snapshot.path}: ${restored.error.message}`)
		}
	}
}

// Entries the new generation no longer provides are removed only while they
// still lead into the old generation; anything else now owns them.
async function retire(
	ctx: InstallContext,
	previous: InstalledPackageRecord,
	current: InstalledPackageRecord,
): Promise<void> {
	const kept = new Set(current.links.map((link) => link.path))
	for (const link of previous.links) {
		if (kept.has(link.path)) {
			continue
		}
		const target = await linkTarget(link.path)
		if (target !== null && path.resolve(target) === path.resolve(link.target)) {
			const removed = await removePath(link.path)
			if (!removed.ok) {
				ctx.logger.warn(`Unable to remove stale link ${link.path}: ${removed.error.message}`)
			}
		}
	}

	if (previous.installPath !== current.installPath) {
		const removed = await removePath(previous.installPath)
		if (!removed.ok) {
			ctx.logger.warn(`Unable to remove previous generation ${previous.installPath}: ${removed.error.message}`)
		}
	}
}
