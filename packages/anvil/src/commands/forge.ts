import {
	coerceTargetPlatform,
	type MsvcRuntime,
	type Result,
	type ValidationError,
} from "@anvil/core"
import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import { forge } from "@/src/core/forge/forge"
import type { ForgeOptions, InstalledPackageRecord } from "@/src/core/forge/types"

export interface ForgeCommandOptions {
	platform?: string
	timeout?: string
	msvcRuntime?: string
	forcePic?: boolean
}

export async function forgeCommand(locator: string, options: ForgeCommandOptions): Promise<void> {
	consola.info("anvil forge")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}

	const controller = new AbortController()
	const onInterrupt = () => controller.abort()
	process.once("SIGINT", onInterrupt)
	try {
		printOutcome(await runForge(context.value, locator, options, controller.signal))
	} finally {
		process.off("SIGINT", onInterrupt)
	}
}

export async function runForge(
	ctx: AnvilContext,
	locator: string,
	options: ForgeCommandOptions,
	signal?: AbortSignal,
): Promise<CommandResult<InstalledPackageRecord>> {
	const trimmed = locator.trim()
	if (!trimmed) {
		return CommandResult.failed({
			field: "locator",
			message: "A package name, URL or path is required.",
			source: "manual",
			type: "validation",
		})
	}

	const forgeOptions = parseForgeOptions(options)
	if (!forgeOptions.ok) {
		return CommandResult.failed(forgeOptions.error)
	}

	consola.start(`Forging ${trimmed}...`)
	const result = await forge(ctx, trimmed, { ...forgeOptions.value, signal })
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	const record = result.value
	consola.success(`Installed ${record.name} into ${record.installPath}.`)
	for (const link of record.links) {
		consola.info(`Linked ${link.name} -> ${link.target}`)
	}
	for (const library of record.libraries) {
		consola.info(`Library (${library.class}): ${library.path}`)
	}
	if (record.links.length > 0 && !onPath(ctx.paths.bin)) {
		consola.warn(`Add ${ctx.paths.bin} to your PATH.`)
	}

	return CommandResult.completed(record)
}

export function parseForgeOptions(options: ForgeCommandOptions): Result<ForgeOptions, ValidationError> {
	const parsed: ForgeOptions = {}

	if (options.platform !== undefined) {
		const platform = coerceTargetPlatform(options.platform)
		if (!platform) {
			return invalidOption("platform", `Unknown platform "${options.platform}".`)
		}
		parsed.platform = platform
	}

	if (options.timeout !== undefined) {
		const trimmed = options.timeout.trim()
		const timeoutMs = Number(trimmed)
		if (!/^\d+$/.test(trimmed) || timeoutMs <= 0) {
			return invalidOption("timeout", `Timeout must be a positive number of milliseconds, got "${options.timeout}".`)
		}
		parsed.timeoutMs = timeoutMs
	}

	if (options.msvcRuntime !== undefined) {
		const runtime = options.msvcRuntime.trim().toUpperCase()
		if (!isMsvcRuntime(runtime)) {
			return invalidOption("msvc-runtime", `MSVC runtime must be MD or MT, got "${options.msvcRuntime}".`)
		}
		parsed.msvcRuntime = runtime
	}

	if (options.forcePic !== undefined) {
		parsed.forcePic = options.forcePic
	}

	return { ok: true, value: parsed }
}

function isMsvcRuntime(value: string): value is MsvcRuntime {
	return value === "MD" || value === "MT"
}

function onPath(dir: string): boolean {
	const separator = process.platform === "win32" ? ";" : ":"
	return (process.env.PATH ?? "").split(separator).includes(dir)
}

function invalidOption(field: string, message: string): { ok: false; error: ValidationError } {
	return { error: { field, message, source: "manual", type: "validation" }, ok: false }
}
