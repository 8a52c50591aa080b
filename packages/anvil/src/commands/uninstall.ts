import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import { type UninstallReport, uninstall } from "@/src/core/packages/uninstall"

export async function uninstallCommand(name: string): Promise<void> {
	consola.info("anvil uninstall")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	printOutcome(await runUninstall(context.value, name))
}

export async function runUninstall(ctx: AnvilContext, name: string): Promise<CommandResult<UninstallReport>> {
	consola.start(`Uninstalling ${name}...`)
	const result = await uninstall(ctx, name)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	for (const link of result.value.removedLinks) {
		consola.info(`Removed link: ${link}`)
	}
	consola.success(`Uninstalled ${result.value.name}.`)
	return CommandResult.completed(result.value)
}
