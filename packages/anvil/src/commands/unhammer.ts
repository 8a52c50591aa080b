import { confirm, isCancel } from "@clack/prompts"
import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import { removeHammer } from "@/src/core/hammers/hammers"
import { removeEntries } from "@/src/core/index/repo-index"

export interface UnhammerResult {
	removedDirectory: boolean
	removedEntries: number
}

export async function unhammerCommand(name: string, options: { yes: boolean }): Promise<void> {
	consola.info("anvil unhammer")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	printOutcome(await runUnhammer(context.value, name, options))
}

export async function runUnhammer(
	ctx: AnvilContext,
	name: string,
	options: { yes: boolean },
): Promise<CommandResult<UnhammerResult>> {
	const hammer = name.trim()

	if (!options.yes) {
		const confirmed = await confirm({
			initialValue: false,
			message: `Remove hammer "${hammer}" and its index entries?`,
		})
		if (isCancel(confirmed) || !confirmed) {
			return CommandResult.cancelled()
		}
	}

	const removed = await removeHammer(ctx.paths, hammer)
	if (!removed.ok) {
		return CommandResult.failed(removed.error)
	}

	const entries = await removeEntries(ctx, (entry) => entry.hammer === hammer)
	if (!entries.ok) {
		return CommandResult.failed(entries.error)
	}

	if (!removed.value && entries.value.length === 0) {
		return CommandResult.unchanged(`No hammer named "${hammer}".`)
	}

	consola.success(`Removed hammer "${hammer}" (${entries.value.length} index entr${entries.value.length === 1 ? "y" : "ies"}).`)
	return CommandResult.completed({ removedDirectory: removed.value, removedEntries: entries.value.length })
}
