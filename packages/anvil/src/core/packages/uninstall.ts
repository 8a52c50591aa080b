import path from "node:path"
import {
	coercePackageName,
	type IoError,
	type NotFoundError,
	type Result,
	type ValidationError,
} from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import { linkPointsInto } from "@/src/core/forge/links"
import { listDir, removePath, safeStat } from "@/src/core/io/fs"
import { withLock } from "@/src/core/io/lock"
import { packageDir } from "@/src/core/paths"
import type { LockError } from "@/src/types/errors"

export interface UninstallReport {
	name: string
	removedLinks: string[]
}

type UninstallError = IoError | LockError | NotFoundError | ValidationError

/**
 * Remove a package: the bin entries leading into it, its generations and
 * its record.
 */
export async function uninstall(
	ctx: Pick<AnvilContext, "paths" | "logger">,
	name: string,
): Promise<Result<UninstallReport, UninstallError>> {
	const packageName = coercePackageName(name)
	if (!packageName) {
		return {
			error: { field: "name", message: `Invalid package name "${name}".`, source: "manual", type: "validation" },
			ok: false,
		}
	}

	const dir = packageDir(ctx.paths, packageName)
	return withLock(
		ctx.paths.installLock,
		`uninstall ${packageName}`,
		async (): Promise<Result<UninstallReport, IoError | NotFoundError>> => {
			const stats = await safeStat(dir)
			if (!stats.ok) {
				return stats
			}
			if (!stats.value?.isDirectory()) {
				return {
					error: { message: `Package "${packageName}" is not installed.`, target: packageName, type: "not_found" },
					ok: false,
				}
			}

			const entries = await listDir(ctx.paths.bin)
			if (!entries.ok) {
				return entries
			}

			const removedLinks: string[] = []
			for (const entry of entries.value) {
				const entryPath = path.join(ctx.paths.bin, entry.name)
				if (!(await linkPointsInto(entryPath, dir))) {
					continue
				}
				const removed = await removePath(entryPath)
				if (!removed.ok) {
					return removed
				}
				removedLinks.push(entry.name)
			}

			const removed = await removePath(dir)
			if (!removed.ok) {
				return removed
			}
			return { ok: true, value: { name: packageName, removedLinks } }
		},
		{ logger: ctx.logger },
	)
}
