import os from "node:os"
import type { Result } from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import { buildNode } from "@/src/core/forge/build"
import { resolveGraph, resolveTarget } from "@/src/core/forge/graph"
import type { ForgeCompleted, ForgeOptions, InstalledPackageRecord } from "@/src/core/forge/types"
import { newOperationId, releaseWorkspace, type Workspace } from "@/src/core/forge/workspace"
import { ensureLayout } from "@/src/core/paths"
import type { ForgeError } from "@/src/types/errors"

/**
 * Acquire, plan, build and install `locator` and any dependencies that are
 * not installed yet. Returns the record of the requested package.
 */
export async function forge(
	ctx: AnvilContext,
	locator: string,
	options: ForgeOptions = {},
): Promise<Result<InstalledPackageRecord, ForgeError>> {
	const layout = await ensureLayout(ctx.paths)
	if (!layout.ok) {
		return layout
	}

	const target = await resolveTarget(ctx, locator)
	if (!target.ok) {
		return target
	}

	const operationId = newOperationId()
	const platform = options.platform ?? ctx.platform
	const msvcRuntime = options.msvcRuntime ?? ctx.config.msvcRuntime
	const workspaces: Workspace[] = []

	const graph = await resolveGraph(ctx, target.value, { msvcRuntime, operationId, platform, workspaces })
	if (!graph.ok) {
		await releaseAll(ctx, workspaces, true)
		return graph
	}

	const settings = {
		forcePic: options.forcePic ?? ctx.config.forcePic,
		jobs: os.availableParallelism(),
		msvcRuntime,
		operationId,
		platform,
		signal: options.signal,
		timeoutMs: options.timeoutMs === undefined ? ctx.config.buildTimeoutMs : options.timeoutMs,
	}

	let installed: InstalledPackageRecord | null = null
	for (const [position, node] of graph.value.entries()) {
		ctx.logger.start(`Forging ${node.name}`)
		const built = await buildNode(ctx, node, settings)
		if (!built.ok) {
			await releaseWorkspace(ctx, node.workspace, true)
			await releaseAll(ctx, graph.value.slice(position + 1).map((pending) => pending.workspace), false)
			return built
		}

		await releaseWorkspace(ctx, node.workspace, false)
		ctx.logger.success(`Forged ${node.name} (${built.value.links.length} link(s), ${built.value.libraries.length} library file(s))`)
		await runHooks(ctx, { locator: node.locator, record: built.value, remoteUrl: node.source.remoteUrl })
		installed = built.value
	}

	if (!installed) {
		return {
			error: { message: `Nothing was forged for ${locator}.`, target: locator, type: "not_found" },
			ok: false,
		}
	}
	return { ok: true, value: installed }
}

async function releaseAll(ctx: AnvilContext, workspaces: readonly Workspace[], keep: boolean): Promise<void> {
	for (const workspace of workspaces) {
		await releaseWorkspace(ctx, workspace, keep)
	}
}

async function runHooks(ctx: AnvilContext, event: ForgeCompleted): Promise<void> {
	for (const hook of ctx.hooks) {
		const result = await hook.run(ctx, event)
		if (!result.ok) {
			ctx.logger.warn(`Post-forge step "${hook.name}" failed: ${result.error.message}`)
		}
	}
}
