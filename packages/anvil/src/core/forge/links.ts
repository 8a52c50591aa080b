import { readFile, readlink, rm, symlink, writeFile } from "node:fs/promises"
import path from "node:path"
import type { IoError, Result, TargetPlatform } from "@anvil/core"
import { ioFailure, isWithin, safeLstat } from "@/src/core/io/fs"
import { formatError } from "@/src/utils/errors"

/**
 * State of a bin entry before it is replaced, enough to put it back.
 */
export type LinkState =
	| { kind: "absent"; path: string }
	| { kind: "symlink"; path: string; target: string }
	| { kind: "file"; path: string; contents: Buffer }

/**
 * Name of the bin entry for an executable: the file name on POSIX, a
 * `.cmd` shim named after the stem on Windows.
 */
export function linkName(executable: string, platform: TargetPlatform): string {
	const base = path.basename(executable)
	return platform === "windows" ? `${path.parse(base).name}.cmd` : base
}

export function shimContents(target: string): string {
	return `@echo off\r\n"${target}" %*\r\n`
}

export async function readLinkState(entryPath: string): Promise<Result<LinkState, IoError>> {
	const stats = await safeLstat(entryPath)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return { ok: true, value: { kind: "absent", path: entryPath } }
	}

	try {
		if (stats.value.isSymbolicLink()) {
			return { ok: true, value: { kind: "symlink", path: entryPath, target: await readlink(entryPath) } }
		}
		return { ok: true, value: { contents: await readFile(entryPath), kind: "file", path: entryPath } }
	} catch (error) {
		return ioFailure(formatError(error), entryPath, "readLink", error)
	}
}

/**
 * Point the bin entry at `target`, replacing whatever is there.
 */
export async function writeLink(
	entryPath: string,
	target: string,
	platform: TargetPlatform,
): Promise<Result<void, IoError>> {
	try {
		await rm(entryPath, { force: true })
		if (platform === "windows") {
			await writeFile(entryPath, shimContents(target), "utf8")
		} else {
			await symlink(target, entryPath)
		}
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), entryPath, "link", error)
	}
}

export async function restoreLinkState(state: LinkState): Promise<Result<void, IoError>> {
	try {
		await rm(state.path, { force: true })
		if (state.kind === "symlink") {
			await symlink(state.target, state.path)
		} else if (state.kind === "file") {
			await writeFile(state.path, state.contents)
		}
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), state.path, "restoreLink", error)
	}
}

/**
 * Where a bin entry leads: the symlink target, or the program a shim runs.
 * null for anything else.
 */
export async function linkTarget(entryPath: string): Promise<string | null> {
	const state = await readLinkState(entryPath)
	if (!state.ok) {
		return null
	}
	switch (state.value.kind) {
		case "absent":
			return null
		case "symlink":
			return path.resolve(path.dirname(entryPath), state.value.target)
		case "file": {
			const match = /"([^"]+)" %\*/.exec(state.value.contents.toString("utf8"))
			return match?.[1] ?? null
		}
	}
}

export async function linkPointsInto(entryPath: string, dir: string): Promise<boolean> {
	const target = await linkTarget(entryPath)
	return target !== null && isWithin(dir, target)
}
