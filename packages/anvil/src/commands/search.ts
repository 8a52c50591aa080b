import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import { searchEntries } from "@/src/core/index/repo-index"
import type { IndexEntry } from "@/src/core/index/types"

export async function searchCommand(term: string): Promise<void> {
	consola.info("anvil search")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}

	const result = await runSearch(context.value, term)
	if (result.status === "completed") {
		return
	}
	printOutcome(result)
}

export async function runSearch(ctx: AnvilContext, term: string): Promise<CommandResult<IndexEntry[]>> {
	const results = await searchEntries(ctx, term)
	if (!results.ok) {
		return CommandResult.failed(results.error)
	}
	if (results.value.length === 0) {
		return CommandResult.unchanged(`No packages found matching "${term}".`)
	}

	consola.info(`Found ${results.value.length} package(s):`)
	for (const entry of results.value) {
		const description = entry.description ? ` - ${entry.description}` : ""
		consola.log(`${entry.name}${description} (${entry.url})`)
	}
	return CommandResult.completed(results.value)
}
