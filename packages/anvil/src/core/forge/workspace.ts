import { randomBytes } from "node:crypto"
import path from "node:path"
import type { IoError, Result } from "@anvil/core"
import { z } from "zod"
import type { AnvilContext } from "@/src/core/context"
import { ensureDir, readTextFileIfExists, removePath, writeJsonAtomic } from "@/src/core/io/fs"

export const OWNER_MARKER = ".anvil-owner"

export interface OwnerMarker {
	pid: number
	operationId: string
	createdAt: string
}

const ownerSchema = z.object({
	createdAt: z.string(),
	operationId: z.string(),
	pid: z.number().int(),
})

export interface Workspace {
	dir: string
	operationId: string
}

type WorkspaceContext = Pick<AnvilContext, "paths" | "workspaces" | "logger">

export function newOperationId(): string {
	return randomBytes(6).toString("hex")
}

export async function writeOwnerMarker(dir: string, operationId: string): Promise<Result<void, IoError>> {
	const marker: OwnerMarker = {
		createdAt: new Date().toISOString(),
		operationId,
		pid: process.pid,
	}
	return writeJsonAtomic(path.join(dir, OWNER_MARKER), marker)
}

/**
 * The owner marker of `dir`; null when absent or unreadable.
 */
export async function readOwnerMarker(dir: string): Promise<OwnerMarker | null> {
	const contents = await readTextFileIfExists(path.join(dir, OWNER_MARKER))
	if (!contents.ok || contents.value === null) {
		return null
	}
	try {
		const parsed = ownerSchema.safeParse(JSON.parse(contents.value))
		return parsed.success ? parsed.data : null
	} catch {
		return null
	}
}

/**
 * Create `build/<name>-<random>` owned by this process.
 */
export async function createWorkspace(
	ctx: WorkspaceContext,
	name: string,
	operationId: string,
): Promise<Result<Workspace, IoError>> {
	const dir = path.join(ctx.paths.build, `${name}-${randomBytes(4).toString("hex")}`)
	ctx.workspaces.add(dir)

	const ensured = await ensureDir(dir)
	if (!ensured.ok) {
		ctx.workspaces.delete(dir)
		return ensured
	}
	const marked = await writeOwnerMarker(dir, operationId)
	if (!marked.ok) {
		ctx.workspaces.delete(dir)
		return marked
	}

	return { ok: true, value: { dir, operationId } }
}

/**
 * Remove a finished workspace. A failed one is kept for inspection but
 * loses its owner marker, so housekeeping may collect it later.
 */
export async function releaseWorkspace(
	ctx: WorkspaceContext,
	workspace: Workspace,
	keep: boolean,
): Promise<void> {
	const removed = keep
		? await removePath(path.join(workspace.dir, OWNER_MARKER))
		: await removePath(workspace.dir)
	ctx.workspaces.delete(workspace.dir)
	if (!removed.ok) {
		ctx.logger.warn(`Unable to clean up ${workspace.dir}: ${removed.error.message}`)
	}
}
