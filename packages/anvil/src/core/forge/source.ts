import { execFile } from "node:child_process"
import path from "node:path"
import { promisify } from "node:util"
import {
	type AbsolutePath,
	ARCHIVE_EXTENSIONS,
	coerceAbsolutePathDirect,
	type FormulaSource,
	type IoError,
	type NotFoundError,
	type Result,
	type TargetPlatform,
} from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import type { RecordSource } from "@/src/core/forge/types"
import type { Workspace } from "@/src/core/forge/workspace"
import { ensureDir, ioFailure, listDir, safeStat } from "@/src/core/io/fs"
import type { GitError } from "@/src/types/errors"
import { formatError } from "@/src/utils/errors"
import { cloneShallow, readGitRemote } from "@/src/utils/git"

const execFileAsync = promisify(execFile)

const SOURCE_DIR = "src"

export interface AcquiredSource {
	dir: AbsolutePath
	/** Remote repository, used for auto-submission */
	remoteUrl: string | null
	record: RecordSource
}

export type AcquireError = GitError | IoError | NotFoundError

type SourceContext = Pick<AnvilContext, "git" | "download" | "logger" | "platform">

/**
 * Make the source available locally: clone a repository or fetch and
 * unpack an archive into the workspace; a local tree is used in place.
 */
export async function acquireSource(
	ctx: SourceContext,
	source: FormulaSource,
	workspace: Workspace,
): Promise<Result<AcquiredSource, AcquireError>> {
	switch (source.type) {
		case "local":
			return useLocal(source.path)
		case "git":
			return cloneInto(ctx, source.url, workspace)
		case "archive":
			return fetchArchive(ctx, source.url, workspace)
	}
}

async function useLocal(dir: AbsolutePath): Promise<Result<AcquiredSource, AcquireError>> {
	const stats = await safeStat(dir)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value?.isDirectory()) {
		return {
			error: {
				message: `Source directory ${dir} does not exist.`,
				path: dir,
				target: dir,
				type: "not_found",
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: { dir, record: { path: dir, type: "local" }, remoteUrl: await readGitRemote(dir) },
	}
}

async function cloneInto(
	ctx: SourceContext,
	url: string,
	workspace: Workspace,
): Promise<Result<AcquiredSource, AcquireError>> {
	const dir = sourceDirOf(workspace)
	if (!dir.ok) {
		return dir
	}

	ctx.logger.info(`Cloning ${url}`)
	const cloned = await cloneShallow(ctx.git, url, dir.value)
	if (!cloned.ok) {
		return cloned
	}

	return { ok: true, value: { dir: dir.value, record: { type: "git", url }, remoteUrl: url } }
}

async function fetchArchive(
	ctx: SourceContext,
	url: string,
	workspace: Workspace,
): Promise<Result<AcquiredSource, AcquireError>> {
	const dir = sourceDirOf(workspace)
	if (!dir.ok) {
		return dir
	}
	const ensured = await ensureDir(dir.value)
	if (!ensured.ok) {
		return ensured
	}

	const archivePath = path.join(workspace.dir, archiveFileName(url))
	ctx.logger.info(`Downloading ${url}`)
	const downloaded = await ctx.download(url, archivePath)
	if (!downloaded.ok) {
		return downloaded
	}

	const extracted = await extractArchive(archivePath, dir.value, ctx.platform)
	if (!extracted.ok) {
		return extracted
	}

	const root = await singleTopLevelDir(dir.value)
	if (!root.ok) {
		return root
	}

	return { ok: true, value: { dir: root.value, record: { type: "archive", url }, remoteUrl: null } }
}

export function archiveFileName(url: string): string {
	const withoutQuery = url.split(/[?#]/)[0] ?? url
	const base = withoutQuery.replace(/\/+$/, "").split("/").pop() ?? ""
	return base.length > 0 ? base : "source.tar.gz"
}

/**
 * Unpack with the system tools: tar for tarballs (and zip on Windows,
 * where bsdtar reads it), unzip for zip, 7z for 7z.
 */
export function extractCommand(
	archivePath: string,
	destination: string,
	platform: TargetPlatform,
): { file: string; args: string[] } {
	const lowered = archivePath.toLowerCase()
	if (lowered.endsWith(".7z")) {
		return { args: ["x", "-y", `-o${destination}`, archivePath], file: "7z" }
	}
	if (lowered.endsWith(".zip") && platform !== "windows") {
		return { args: ["-q", "-o", archivePath, "-d", destination], file: "unzip" }
	}
	return { args: ["-xf", archivePath, "-C", destination], file: "tar" }
}

async function extractArchive(
	archivePath: string,
	destination: string,
	platform: TargetPlatform,
): Promise<Result<void, IoError>> {
	if (!ARCHIVE_EXTENSIONS.some((extension) => archivePath.toLowerCase().endsWith(extension))) {
		return ioFailure(`Unsupported archive format: ${path.basename(archivePath)}.`, archivePath, "extract")
	}

	const { file, args } = extractCommand(archivePath, destination, platform)
	try {
		await execFileAsync(file, args)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(`Unable to extract ${archivePath}: ${formatError(error)}`, archivePath, "extract", error)
	}
}

// Most release archives wrap the tree in a single `<name>-<version>/` directory.
async function singleTopLevelDir(dir: AbsolutePath): Promise<Result<AbsolutePath, IoError>> {
	const listing = await listDir(dir)
	if (!listing.ok) {
		return listing
	}
	const [only] = listing.value
	if (listing.value.length === 1 && only?.isDirectory()) {
		return { ok: true, value: coerceAbsolutePathDirect(path.join(dir, only.name)) ?? dir }
	}
	return { ok: true, value: dir }
}

function sourceDirOf(workspace: Workspace): Result<AbsolutePath, IoError> {
	const dir = coerceAbsolutePathDirect(path.join(workspace.dir, SOURCE_DIR))
	if (!dir) {
		return ioFailure(`Workspace ${workspace.dir} is not an absolute path.`, workspace.dir, "resolve")
	}
	return { ok: true, value: dir }
}
