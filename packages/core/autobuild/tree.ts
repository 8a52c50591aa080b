import { readdir, readFile, stat } from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath } from "../types/branded"
import type { DetectionError, IoError, Result } from "../types/error"
import type { SourceTree } from "./types"

/**
 * Read the root listing of a source directory once, so ecosystem matchers
 * can test markers without touching the filesystem again.
 */
export async function openSourceTree(
	root: AbsolutePath,
): Promise<Result<SourceTree, DetectionError | IoError>> {
	const rootStat = await safeStat(root)
	if (!rootStat.ok) {
		return rootStat
	}

	if (!rootStat.value) {
		return {
			error: {
				message: `Source path does not exist: ${root}`,
				path: root,
				type: "detection",
			},
			ok: false,
		}
	}

	if (!rootStat.value.isDirectory()) {
		return {
			error: {
				message: `Source path is not a directory: ${root}`,
				path: root,
				type: "detection",
			},
			ok: false,
		}
	}

	let names: string[]
	try {
		names = (await readdir(root)).sort()
	} catch (error) {
		return {
			error: {
				message: `Unable to read ${root}.`,
				operation: "readdir",
				path: root,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}

	const entries = new Set(names)

	return {
		ok: true,
		value: {
			async exists(relativePath) {
				const stats = await safeStat(path.join(root, relativePath))
				return stats.ok && stats.value !== null
			},
			find(pattern) {
				return names.find((name) => pattern.test(name)) ?? null
			},
			has(entry) {
				return entries.has(entry)
			},
			async list(relativePath) {
				try {
					return (await readdir(path.join(root, relativePath))).sort()
				} catch {
					return []
				}
			},
			name: path.basename(root),
			async read(relativePath) {
				try {
					return await readFile(path.join(root, relativePath), "utf-8")
				} catch {
					return null
				}
			},
			root,
		},
	}
}

async function safeStat(
	targetPath: string,
): Promise<Result<Awaited<ReturnType<typeof stat>> | null, IoError>> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return {
			error: {
				message: `Unable to access ${targetPath}.`,
				operation: "stat",
				path: targetPath,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

function isNotFound(error: unknown): boolean {
	return (
		error instanceof Error &&
		"code" in error &&
		(error.code === "ENOENT" || error.code === "ENOTDIR")
	)
}
