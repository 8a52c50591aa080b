import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import { checkIndex, repairIndex } from "@/src/core/index/repair"
import type { IndexIssue, RepairReport } from "@/src/core/index/types"

export async function indexRepairCommand(): Promise<void> {
	consola.info("anvil index repair")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	printOutcome(await runIndexRepair(context.value))
}

export async function indexCheckCommand(): Promise<void> {
	consola.info("anvil index check")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}

	const result = await runIndexCheck(context.value)
	printOutcome(result)
	if (result.status === "completed") {
		// Issues found: report them like a failed check.
		process.exitCode = 1
	}
}

export async function runIndexRepair(ctx: AnvilContext): Promise<CommandResult<RepairReport>> {
	consola.start("Repairing the index...")
	const result = await repairIndex(ctx)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	const report = result.value
	if (report.issues.length === 0) {
		return CommandResult.unchanged("Index is healthy.")
	}
	for (const issue of report.issues) {
		consola.info(describeIssue(issue))
	}
	if (report.backupPath) {
		consola.warn(`Unreadable store saved as ${report.backupPath}.`)
	}
	consola.success(`Removed ${report.removed} entr${report.removed === 1 ? "y" : "ies"}, fixed ${report.fixed}.`)
	return CommandResult.completed(report)
}

export async function runIndexCheck(ctx: AnvilContext): Promise<CommandResult<IndexIssue[]>> {
	const result = await checkIndex(ctx)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}
	if (result.value.length === 0) {
		return CommandResult.unchanged("Index is healthy.")
	}

	for (const issue of result.value) {
		consola.warn(describeIssue(issue))
	}
	consola.info('Run "anvil index repair" to fix these.')
	return CommandResult.completed(result.value)
}

export function describeIssue(issue: IndexIssue): string {
	switch (issue.kind) {
		case "malformed":
			return `Entry ${issue.position} is malformed: ${issue.reason}`
		case "stale_normalized_url":
			return `Entry ${issue.position} (${issue.name}) has normalized URL ${issue.stored}, expected ${issue.expected}`
		case "duplicate_url":
			return `Entry ${issue.position} (${issue.name}) duplicates ${issue.normalizedUrl}`
		case "unreadable_store":
			return `Index store is unreadable: ${issue.reason}`
		case "invalid_central_checkout":
			return `Central checkout is invalid: ${issue.reason}`
	}
}
