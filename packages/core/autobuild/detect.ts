import { FORMULA_FILENAME } from "../constants"
import { parseFormula } from "../formula/parse"
import type { BuildPlan, Formula } from "../formula/types"
import { coerceAbsolutePath } from "../types/coerce"
import type { AbsolutePath } from "../types/branded"
import type { DetectionFailure, Result } from "../types/error"
import type { TargetPlatform } from "../types/platform"
import { ECOSYSTEMS } from "./ecosystems"
import { firstAvailable } from "./tools"
import { openSourceTree } from "./tree"
import type {
	ArtifactRule,
	DetectedPlan,
	DetectOptions,
	Ecosystem,
	EcosystemPlan,
	PlanMetadata,
	SourceTree,
} from "./types"

const PREFIX_BIN: readonly ArtifactRule[] = [
	{ dir: "bin", recursive: false, root: "prefix", select: "executables" },
]

/**
 * Decide how to build the tree at `sourceDir`.
 *
 * An explicit formula file wins outright; a malformed one is an error, never
 * a reason to fall back to heuristics.
 */
export async function detect(
	sourceDir: AbsolutePath,
	platform: TargetPlatform,
	options: DetectOptions,
	ecosystems: readonly Ecosystem[] = ECOSYSTEMS,
): Promise<Result<DetectedPlan, DetectionFailure>> {
	const treeResult = await openSourceTree(sourceDir)
	if (!treeResult.ok) {
		return treeResult
	}
	const tree = treeResult.value

	if (tree.has(FORMULA_FILENAME)) {
		return detectExplicit(tree)
	}

	for (const ecosystem of ecosystems) {
		const marker = ecosystem.matches(tree)
		if (!marker) {
			continue
		}

		const tool = await selectTool(ecosystem, tree, marker, platform, options)
		if (!tool.ok) {
			return tool
		}

		const plan = await ecosystem.plan({
			marker,
			msvcRuntime: options.msvcRuntime ?? "MD",
			platform,
			tool: tool.value,
			tree,
		})
		if (!plan.ok) {
			return plan
		}

		return {
			ok: true,
			value: assemble(plan.value, {
				ecosystem: ecosystem.id,
				kind: ecosystem.kind,
				manifest: marker,
				packageName: plan.value.packageName ?? tree.name,
				tool: tool.value,
			}),
		}
	}

	return {
		error: {
			message: `No build system detected in ${sourceDir}. Add an ${FORMULA_FILENAME} describing the build.`,
			path: sourceDir,
			type: "detection",
		},
		ok: false,
	}
}

async function detectExplicit(tree: SourceTree): Promise<Result<DetectedPlan, DetectionFailure>> {
	const formulaPath = coerceAbsolutePath(FORMULA_FILENAME, tree.root) ?? tree.root
	const contents = await tree.read(FORMULA_FILENAME)
	if (contents === null) {
		return {
			error: {
				message: `Unable to read ${formulaPath}.`,
				operation: "readFile",
				path: formulaPath,
				type: "io",
			},
			ok: false,
		}
	}

	const formula = parseFormula(contents, formulaPath)
	if (!formula.ok) {
		return formula
	}

	return {
		ok: true,
		value: planFromFormula(formula.value, {
			ecosystem: "formula",
			kind: "formula",
			manifest: FORMULA_FILENAME,
			packageName: formula.value.name,
			tool: null,
		}),
	}
}

async function selectTool(
	ecosystem: Ecosystem,
	tree: SourceTree,
	marker: string,
	platform: TargetPlatform,
	options: DetectOptions,
): Promise<Result<string | null, DetectionFailure>> {
	const local = ecosystem.localTool ? await ecosystem.localTool(tree, platform) : null
	if (local) {
		return { ok: true, value: local }
	}

	const candidates = ecosystem.tools(marker, platform)
	if (candidates.length === 0) {
		return { ok: true, value: null }
	}

	const found = await firstAvailable(options.probe, candidates)
	if (!found) {
		return {
			error: {
				candidates: [...candidates],
				ecosystem: ecosystem.id,
				message: `Detected ${ecosystem.id} (${marker}) but none of ${candidates.join(", ")} is on PATH.`,
				path: tree.root,
				type: "tool_not_found",
			},
			ok: false,
		}
	}

	return { ok: true, value: found }
}

function assemble(plan: EcosystemPlan, metadata: PlanMetadata): DetectedPlan {
	const steps: BuildPlan["steps"] = plan.windows
		? { common: plan.common, windows: plan.windows }
		: { common: plan.common }
	const binaries = plan.binaries ?? []

	return {
		binaries,
		build: { override: plan.windows ? ["windows"] : [], steps },
		collect: plan.collect ?? defaultCollect(binaries, plan.libraries !== undefined),
		dependencies: [],
		libraries: plan.libraries,
		metadata,
	}
}

function defaultCollect(binaries: readonly string[], libraryOnly: boolean): readonly ArtifactRule[] {
	return binaries.length === 0 && !libraryOnly ? PREFIX_BIN : []
}

/**
 * Turn an explicit formula into a plan. A formula without a build section
 * runs nothing and links what its binaries name.
 */
export function planFromFormula(formula: Formula, metadata: PlanMetadata): DetectedPlan {
	return {
		binaries: formula.binaries,
		build: formula.build ?? { override: [], steps: {} },
		collect: defaultCollect(formula.binaries, formula.libraries !== undefined),
		dependencies: formula.dependencies,
		forcePic: formula.forcePic,
		libraries: formula.libraries,
		metadata,
		msvcRuntime: formula.msvcRuntime,
	}
}
