import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import type { UpdateReport } from "@/src/core/index/types"
import { updateIndex } from "@/src/core/index/update"

export async function updateCommand(): Promise<void> {
	consola.info("anvil update")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	printOutcome(await runUpdate(context.value))
}

export async function runUpdate(ctx: AnvilContext): Promise<CommandResult<UpdateReport>> {
	consola.start(`Syncing the central index from ${ctx.central.url}...`)
	const result = await updateIndex(ctx)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	const report = result.value
	if (!report.synced) {
		consola.warn("Central index not refreshed; merged the existing checkout.")
	}
	consola.success(
		`Index updated: ${report.added} added, ${report.updated} updated, ${report.localAdded} from hammers, ${report.total} total.`,
	)
	if (report.repair && report.repair.issues.length > 0) {
		consola.info(`Repair: ${report.repair.removed} removed, ${report.repair.fixed} fixed.`)
	}
	return CommandResult.completed(report)
}
