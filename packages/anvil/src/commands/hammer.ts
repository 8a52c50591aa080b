import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import { createHammer, hammerDir } from "@/src/core/hammers/hammers"

export async function hammerCommand(name: string, url: string | undefined): Promise<void> {
	consola.info("anvil hammer")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	printOutcome(await runHammer(context.value, name, url))
}

export async function runHammer(
	ctx: AnvilContext,
	name: string,
	url: string | undefined,
): Promise<CommandResult<string>> {
	if (url) {
		consola.start(`Cloning hammer ${name} from ${url}...`)
	}
	const result = await createHammer(ctx.paths, ctx.git, name, url)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	const dir = hammerDir(ctx.paths, name.trim())
	if (result.value === "exists") {
		return CommandResult.unchanged(`Hammer "${name}" already exists at ${dir}.`)
	}
	consola.success(result.value === "cloned" ? `Cloned hammer into ${dir}.` : `Created hammer at ${dir}.`)
	consola.info('Run "anvil update" to index its formulas.')
	return CommandResult.completed(dir)
}
