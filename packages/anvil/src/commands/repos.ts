import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import { type HammerInfo, listHammers } from "@/src/core/hammers/hammers"
import { readGitRemote } from "@/src/utils/git"

export interface ReposResult {
	central: { path: string; url: string; remote: string | null }
	hammers: HammerInfo[]
}

export async function reposCommand(): Promise<void> {
	consola.info("anvil repos")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}

	const result = await runRepos(context.value)
	if (result.status !== "completed") {
		printOutcome(result)
	}
}

export async function runRepos(ctx: AnvilContext): Promise<CommandResult<ReposResult>> {
	const hammers = await listHammers(ctx.paths)
	if (!hammers.ok) {
		return CommandResult.failed(hammers.error)
	}

	const remote = await readGitRemote(ctx.paths.central)
	consola.log(`central  ${ctx.central.url}${remote ? "" : " (not fetched yet)"}`)
	for (const hammer of hammers.value) {
		const origin = hammer.remote ? ` from ${hammer.remote}` : ""
		consola.log(`${hammer.name}  ${hammer.formulas.length} formula(s)${origin}`)
	}

	return CommandResult.completed({
		central: { path: ctx.paths.central, remote, url: ctx.central.url },
		hammers: hammers.value,
	})
}
