import type { PlatformKey, TargetPlatform } from "../types/platform"
import type { BuildPlan } from "./types"

export interface TemplateVars {
	/** Absolute install path. Rendered with forward slashes. */
	readonly PREFIX: string
	readonly JOBS: number
}

/**
 * Merge the `common` sequence with the target platform's sequence.
 * A platform listed in `override` replaces `common`; any other platform
 * sequence is appended after it.
 */
export function resolveCommands(plan: BuildPlan, platform: TargetPlatform): string[] {
	const common = plan.steps.common ?? []
	const specific = plan.steps[platform] ?? []

	if (isOverridden(plan, platform) && plan.steps[platform]) {
		return [...specific]
	}

	return [...common, ...specific]
}

function isOverridden(plan: BuildPlan, platform: PlatformKey): boolean {
	return plan.override.includes(platform)
}

/**
 * Textual placeholder substitution. Unknown placeholders are left as written.
 */
export function renderCommand(template: string, vars: TemplateVars): string {
	return template
		.replaceAll("{PREFIX}", vars.PREFIX.replaceAll("\\", "/"))
		.replaceAll("{JOBS}", String(vars.JOBS))
}

