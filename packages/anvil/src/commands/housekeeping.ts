import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import { type HousekeepingReport, runHousekeeping } from "@/src/core/housekeeping/housekeeping"

export async function housekeepingCommand(): Promise<void> {
	consola.info("anvil housekeeping")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	printOutcome(await runHousekeepingCommand(context.value))
}

export async function runHousekeepingCommand(ctx: AnvilContext): Promise<CommandResult<HousekeepingReport>> {
	consola.start("Running housekeeping...")
	const result = await runHousekeeping(ctx)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	const report = result.value
	for (const name of report.removedOrphanBinaries) {
		consola.info(`Removed orphaned binary: ${name}`)
	}
	const total =
		report.removedWorkspaces.length + report.removedOrphanBinaries.length + report.removedGenerations.length
	if (total === 0) {
		return CommandResult.unchanged("Nothing to clean up.")
	}

	consola.success(
		`Removed ${report.removedWorkspaces.length} workspace(s), ${report.removedOrphanBinaries.length} orphaned binary(ies), ${report.removedGenerations.length} stale generation(s).`,
	)
	return CommandResult.completed(report)
}
