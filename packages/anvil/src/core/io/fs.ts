import { randomBytes } from "node:crypto"
import type { Dirent, Stats } from "node:fs"
import { lstat, mkdir, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises"
import path from "node:path"
import type { IoError, Result } from "@anvil/core"
import { formatError, isNotFound, toError } from "@/src/utils/errors"

export type IoResult<T> = Result<T, IoError>

type StatResult = IoResult<Stats | null>
type LStatResult = IoResult<Stats | null>

export function ioFailure(
	message: string,
	targetPath: string,
	operation: string,
	error?: unknown,
): { ok: false; error: IoError } {
	return {
		error: {
			message,
			operation,
			path: targetPath,
			rawError: toError(error),
			type: "io",
		},
		ok: false,
	}
}

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "stat", error)
	}
}

export async function safeLstat(targetPath: string): Promise<LStatResult> {
	try {
		const stats = await lstat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "lstat", error)
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return ioFailure(`Expected directory at ${targetPath}.`, targetPath, "mkdir")
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(formatError(error), targetPath, "mkdir", error)
		}
	}

	return { ok: true, value: undefined }
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "readFile", error)
	}
}

/**
 * Read a file, mapping a missing file to null.
 */
export async function readTextFileIfExists(targetPath: string): Promise<IoResult<string | null>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}
		return ioFailure(formatError(error), targetPath, "readFile", error)
	}
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents, "utf8")
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "writeFile", error)
	}
}

/**
 * Write through a sibling temp file and rename over the target, so readers
 * see either the old contents or the new ones.
 */
export async function writeFileAtomic(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	const ensured = await ensureDir(path.dirname(targetPath))
	if (!ensured.ok) {
		return ensured
	}

	const tempPath = `${targetPath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`
	const written = await writeTextFile(tempPath, contents)
	if (!written.ok) {
		return written
	}

	try {
		await rename(tempPath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		await rm(tempPath, { force: true })
		return ioFailure(formatError(error), targetPath, "rename", error)
	}
}

export async function writeJsonAtomic(targetPath: string, value: unknown): Promise<IoResult<void>> {
	return writeFileAtomic(targetPath, `${JSON.stringify(value, null, 2)}\n`)
}

export async function renamePath(from: string, to: string): Promise<IoResult<void>> {
	try {
		await rename(from, to)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), from, "rename", error)
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "rm", error)
	}
}

/**
 * Directory entries sorted by name; a missing directory has none.
 */
export async function listDir(targetPath: string): Promise<IoResult<Dirent[]>> {
	try {
		const entries = await readdir(targetPath, { withFileTypes: true })
		return { ok: true, value: entries.sort((a, b) => a.name.localeCompare(b.name)) }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: [] }
		}
		return ioFailure(formatError(error), targetPath, "readdir", error)
	}
}

export function isWithin(parent: string, child: string): boolean {
	const relative = path.relative(parent, child)
	return relative.length > 0 && !relative.startsWith("..") && !path.isAbsolute(relative)
}
