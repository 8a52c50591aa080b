import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import type { InstalledPackageRecord } from "@/src/core/forge/types"
import { listRecords } from "@/src/core/packages/records"

export async function listCommand(): Promise<void> {
	consola.info("anvil list")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}

	const result = await runList(context.value)
	if (result.status !== "completed") {
		printOutcome(result)
	}
}

export async function runList(ctx: AnvilContext): Promise<CommandResult<InstalledPackageRecord[]>> {
	const result = await listRecords(ctx.paths)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}
	for (const invalid of result.value.invalid) {
		consola.warn(`${invalid.name}: ${invalid.error.message}`)
	}
	if (result.value.records.length === 0) {
		return CommandResult.unchanged("No packages installed.")
	}

	for (const record of result.value.records) {
		const version = record.version ? `@${record.version}` : ""
		const links = record.links.map((link) => link.name).join(", ")
		consola.log(`${record.name}${version}  ${record.ecosystem}  ${links || "(libraries only)"}`)
	}
	return CommandResult.completed(result.value.records)
}
