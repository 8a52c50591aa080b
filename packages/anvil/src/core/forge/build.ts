import path from "node:path"
import {
	type MsvcRuntime,
	type Result,
	renderCommand,
	resolveCommands,
	type TargetPlatform,
} from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import { locateArtifacts, stageArtifacts } from "@/src/core/forge/artifacts"
import { applyMsvcRuntime, buildEnvironment } from "@/src/core/forge/build-env"
import { runBuildCommand } from "@/src/core/forge/exec"
import type { GraphNode } from "@/src/core/forge/graph"
import { commitInstall } from "@/src/core/forge/install"
import { linkName } from "@/src/core/forge/links"
import type { InstalledPackageRecord } from "@/src/core/forge/types"
import { OWNER_MARKER, writeOwnerMarker } from "@/src/core/forge/workspace"
import { ensureDir, removePath } from "@/src/core/io/fs"
import { readRecord } from "@/src/core/packages/records"
import { packageDir } from "@/src/core/paths"
import type { ForgeError } from "@/src/types/errors"

export interface BuildSettings {
	operationId: string
	platform: TargetPlatform
	jobs: number
	msvcRuntime: MsvcRuntime
	forcePic: boolean
	timeoutMs: number | null
	signal?: AbortSignal
}

/**
 * Build one resolved node into a fresh generation and commit it. Nothing is
 * published unless every command succeeds and artifacts are found; the
 * generation directory is discarded on any failure.
 */
export async function buildNode(
	ctx: AnvilContext,
	node: GraphNode,
	settings: BuildSettings,
): Promise<Result<InstalledPackageRecord, ForgeError>> {
	const previous = await readRecord(ctx.paths, node.name)
	if (!previous.ok) {
		ctx.logger.warn(`Replacing unreadable install record of ${node.name}: ${previous.error.message}`)
	}

	const generation = `${Date.now().toString(36)}-${settings.operationId}`
	const generationDir = path.join(packageDir(ctx.paths, node.name), generation)
	const created = await ensureDir(generationDir)
	if (!created.ok) {
		return created
	}
	const marked = await writeOwnerMarker(generationDir, settings.operationId)
	if (!marked.ok) {
		return discard(ctx, generationDir, marked)
	}

	const record = await buildInto(ctx, node, settings, generationDir, generation)
	if (!record.ok) {
		return discard(ctx, generationDir, record)
	}

	const committed = await commitInstall(ctx, record.value, previous.ok ? previous.value : null)
	if (!committed.ok) {
		return discard(ctx, generationDir, committed)
	}

	const unmarked = await removePath(path.join(generationDir, OWNER_MARKER))
	if (!unmarked.ok) {
		ctx.logger.warn(unmarked.error.message)
	}
	return record
}

async function buildInto(
	ctx: AnvilContext,
	node: GraphNode,
	settings: BuildSettings,
	generationDir: string,
	generation: string,
): Promise<Result<InstalledPackageRecord, ForgeError>> {
	const { plan } = node
	const msvcRuntime = plan.msvcRuntime ?? settings.msvcRuntime
	const env = buildEnvironment({
		forcePic: plan.forcePic ?? settings.forcePic,
		msvcRuntime,
		platform: settings.platform,
	})

	const commands = resolveCommands(plan.build, settings.platform).map((template) => {
		const rendered = renderCommand(template, { JOBS: settings.jobs, PREFIX: generationDir })
		return settings.platform === "windows" ? applyMsvcRuntime(rendered, msvcRuntime) : rendered
	})

	for (const command of commands) {
		ctx.logger.info(`Running: ${command}`)
		const ran = await runBuildCommand(command, {
			cwd: node.source.dir,
			env,
			logger: ctx.logger,
			signal: settings.signal,
			timeoutMs: settings.timeoutMs,
			workspace: node.workspace.dir,
		})
		if (!ran.ok) {
			if (ran.error.type === "build_command_failed") {
				for (const suggestion of ran.error.diagnostics) {
					ctx.logger.warn(suggestion)
				}
			}
			return ran
		}
	}

	const located = await locateArtifacts(plan, {
		platform: settings.platform,
		prefix: generationDir,
		sourceDir: node.source.dir,
		workspace: node.workspace.dir,
	})
	if (!located.ok) {
		return located
	}

	const staged = await stageArtifacts(located.value, generationDir)
	if (!staged.ok) {
		return staged
	}

	return {
		ok: true,
		value: {
			dependencies: [...plan.dependencies],
			ecosystem: plan.metadata.ecosystem,
			generation,
			installedAt: new Date().toISOString(),
			installPath: generationDir,
			libraries: staged.value.libraries,
			links: staged.value.binaries.map((binary) => {
				const name = linkName(binary, settings.platform)
				return { name, path: path.join(ctx.paths.bin, name), target: binary }
			}),
			name: node.name,
			source: node.source.record,
			version: node.version,
		},
	}
}

async function discard<T extends { ok: false }>(ctx: AnvilContext, generationDir: string, failure: T): Promise<T> {
	const removed = await removePath(generationDir)
	if (!removed.ok) {
		ctx.logger.warn(`Unable to remove ${generationDir}: ${removed.error.message}`)
	}
	return failure
}
