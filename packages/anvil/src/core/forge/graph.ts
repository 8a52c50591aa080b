import path from "node:path"
import {
	coerceAbsolutePath,
	coercePackageName,
	type DetectedPlan,
	detect,
	type Formula,
	type FormulaSource,
	isRemoteLocator,
	type MsvcRuntime,
	type PackageName,
	packageNameFromLocator,
	planFromFormula,
	type Result,
	type TargetPlatform,
	type ValidationError,
} from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import { type AcquiredSource, acquireSource } from "@/src/core/forge/source"
import { createWorkspace, type Workspace } from "@/src/core/forge/workspace"
import { findFormulaByUrl, lookup, sourceFromUrl } from "@/src/core/index/repo-index"
import { safeStat } from "@/src/core/io/fs"
import { isInstalled } from "@/src/core/packages/records"
import type { ForgeError } from "@/src/types/errors"

export interface ForgeTarget {
	name: PackageName
	/** Explicit formula from a hammer or the index, if any */
	formula: Formula | null
	source: FormulaSource
	locator: string
}

export interface GraphNode {
	name: PackageName
	locator: string
	workspace: Workspace
	source: AcquiredSource
	plan: DetectedPlan
	version: string | null
}

export interface ResolveOptions {
	operationId: string
	platform: TargetPlatform
	msvcRuntime: MsvcRuntime
	/** Receives every workspace created, so the caller can release them */
	workspaces: Workspace[]
}

/**
 * Interpret a forge locator: a remote URL, an existing directory, or a
 * package name known to the index.
 */
export async function resolveTarget(
	ctx: AnvilContext,
	locator: string,
): Promise<Result<ForgeTarget, ForgeError>> {
	const trimmed = locator.trim()

	if (isRemoteLocator(trimmed)) {
		const formula = await findFormulaByUrl(ctx, trimmed)
		if (!formula.ok) {
			return formula
		}
		const source = formula.value?.source ?? sourceFromUrl(trimmed)
		const name = formula.value?.name ?? packageNameFromLocator(trimmed)
		if (!source || !name) {
			return invalidLocator(locator, `Cannot derive a package name from ${trimmed}.`)
		}
		return { ok: true, value: { formula: formula.value, locator: trimmed, name, source } }
	}

	const localPath = coerceAbsolutePath(trimmed, process.cwd())
	if (localPath) {
		const stats = await safeStat(localPath)
		if (!stats.ok) {
			return stats
		}
		if (stats.value?.isDirectory()) {
			const name = coercePackageName(path.basename(localPath))
			if (!name) {
				return invalidLocator(locator, `Cannot derive a package name from ${localPath}.`)
			}
			return {
				ok: true,
				value: { formula: null, locator: trimmed, name, source: { path: localPath, type: "local" } },
			}
		}
	}

	const name = coercePackageName(trimmed)
	if (!name) {
		return invalidLocator(locator, `"${locator}" is not a URL, a directory or a package name.`)
	}
	return targetFromIndex(ctx, name)
}

/**
 * Acquire and plan the target and everything it depends on, depth-first.
 * Returns the nodes in build order, dependencies first. The whole graph is
 * resolved, and checked for cycles, before anything is built.
 */
export async function resolveGraph(
	ctx: AnvilContext,
	root: ForgeTarget,
	options: ResolveOptions,
): Promise<Result<GraphNode[], ForgeError>> {
	const order: GraphNode[] = []
	const done = new Set<string>()

	const visit = async (target: ForgeTarget, stack: readonly PackageName[]): Promise<Result<void, ForgeError>> => {
		const position = stack.indexOf(target.name)
		if (position !== -1) {
			return cycle([...stack.slice(position), target.name])
		}
		if (done.has(target.name)) {
			return { ok: true, value: undefined }
		}

		const node = await prepare(ctx, target, options)
		if (!node.ok) {
			return node
		}
		const trail = [...stack, node.value.name]

		for (const dependency of node.value.plan.dependencies) {
			if (dependency === node.value.name) {
				return cycle([dependency, dependency])
			}
			if (done.has(dependency)) {
				continue
			}
			// The trail holds resolved names from the root down, so a dependency
			// back on any of them is a cycle rather than an installed package.
			if (!trail.includes(dependency) && (await installed(ctx, dependency))) {
				continue
			}

			const dependencyTarget = await targetFromIndex(ctx, dependency)
			if (!dependencyTarget.ok) {
				return dependencyTarget
			}
			const visited = await visit(dependencyTarget.value, trail)
			if (!visited.ok) {
				return visited
			}
		}

		done.add(node.value.name)
		order.push(node.value)
		return { ok: true, value: undefined }
	}

	const visited = await visit(root, [])
	if (!visited.ok) {
		return visited
	}
	return { ok: true, value: order }
}

async function prepare(
	ctx: AnvilContext,
	target: ForgeTarget,
	options: ResolveOptions,
): Promise<Result<GraphNode, ForgeError>> {
	const workspace = await createWorkspace(ctx, target.name, options.operationId)
	if (!workspace.ok) {
		return workspace
	}
	options.workspaces.push(workspace.value)

	const source = await acquireSource(ctx, target.source, workspace.value)
	if (!source.ok) {
		return source
	}

	const plan = await planFor(ctx, target, source.value, options)
	if (!plan.ok) {
		return plan
	}

	// A local tree's own anvil.json names the package.
	const name =
		target.source.type === "local" && plan.value.metadata.ecosystem === "formula"
			? (coercePackageName(plan.value.metadata.packageName) ?? target.name)
			: target.name

	ctx.logger.info(
		`${name}: ${plan.value.metadata.ecosystem}${plan.value.metadata.manifest ? ` (${plan.value.metadata.manifest})` : ""}`,
	)

	return {
		ok: true,
		value: {
			locator: target.locator,
			name,
			plan: plan.value,
			source: source.value,
			version: target.formula?.version ?? null,
			workspace: workspace.value,
		},
	}
}

async function planFor(
	ctx: AnvilContext,
	target: ForgeTarget,
	source: AcquiredSource,
	options: ResolveOptions,
): Promise<Result<DetectedPlan, ForgeError>> {
	const formula = target.formula
	if (formula?.build) {
		return {
			ok: true,
			value: planFromFormula(formula, {
				ecosystem: "formula",
				kind: "formula",
				manifest: null,
				packageName: formula.name,
				tool: null,
			}),
		}
	}

	const detected = await detect(source.dir, options.platform, {
		msvcRuntime: options.msvcRuntime,
		probe: ctx.probe,
	})
	if (!detected.ok || !formula) {
		return detected
	}

	// A formula without a plan still contributes what it declares.
	const plan = detected.value
	return {
		ok: true,
		value: {
			...plan,
			binaries: formula.binaries.length > 0 ? formula.binaries : plan.binaries,
			collect: formula.binaries.length > 0 ? [] : plan.collect,
			dependencies: [...new Set([...formula.dependencies, ...plan.dependencies])],
			forcePic: plan.forcePic ?? formula.forcePic,
			libraries: formula.libraries ?? plan.libraries,
			msvcRuntime: plan.msvcRuntime ?? formula.msvcRuntime,
		},
	}
}

async function targetFromIndex(ctx: AnvilContext, name: PackageName): Promise<Result<ForgeTarget, ForgeError>> {
	const formula = await lookup(ctx, name)
	if (!formula.ok) {
		return formula
	}
	if (!formula.value.source) {
		return invalidLocator(name, `Formula "${name}" does not say where its source is.`)
	}
	return { ok: true, value: { formula: formula.value, locator: name, name, source: formula.value.source } }
}

async function installed(ctx: AnvilContext, name: PackageName): Promise<boolean> {
	const result = await isInstalled(ctx.paths, name)
	if (!result.ok) {
		ctx.logger.warn(result.error.message)
		return false
	}
	if (result.value) {
		ctx.logger.info(`${name} is already installed.`)
	}
	return result.value
}

function cycle(names: string[]): { ok: false; error: ForgeError } {
	return {
		error: {
			cycle: names,
			message: `Dependency cycle: ${names.join(" -> ")}.`,
			type: "dependency_cycle",
		},
		ok: false,
	}
}

function invalidLocator(locator: string, message: string): { ok: false; error: ValidationError } {
	return {
		error: { field: "locator", message, source: "manual", type: "validation" },
		ok: false,
	}
}
