import { coercePackageName, packageNameFromLocator } from "@anvil/core"
import { consola } from "consola"
import { loadCommandContext } from "@/src/commands/context"
import { CommandResult, printOutcome } from "@/src/commands/types"
import type { AnvilContext } from "@/src/core/context"
import { submissionLink } from "@/src/core/forge/submission"
import { writeFormulaStub } from "@/src/core/hammers/hammers"
import { insert } from "@/src/core/index/repo-index"

export interface SubmitResult {
	name: string
	formulaPath: string
	link: string
}

export async function submitCommand(
	hammer: string,
	url: string,
	description: string | undefined,
	options: { name?: string },
): Promise<void> {
	consola.info("anvil submit")

	const context = loadCommandContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	printOutcome(await runSubmit(context.value, hammer, url, description, options))
}

/**
 * Add `url` to a hammer and the local index, and print the link proposing
 * it for the central index.
 */
export async function runSubmit(
	ctx: AnvilContext,
	hammer: string,
	url: string,
	description: string | undefined,
	options: { name?: string } = {},
): Promise<CommandResult<SubmitResult>> {
	const hammerName = coercePackageName(hammer)
	if (!hammerName) {
		return CommandResult.failed({
			field: "hammer",
			message: `Invalid hammer name "${hammer}".`,
			source: "manual",
			type: "validation",
		})
	}

	const trimmedUrl = url.trim()
	const name = options.name ? coercePackageName(options.name) : packageNameFromLocator(trimmedUrl)
	if (!trimmedUrl || !name) {
		return CommandResult.failed({
			field: options.name ? "name" : "url",
			message: `Cannot derive a package name from "${options.name ?? url}".`,
			source: "manual",
			type: "validation",
		})
	}

	const stub = await writeFormulaStub(ctx.paths, hammerName, {
		description: description ?? "",
		name,
		url: trimmedUrl,
	})
	if (!stub.ok) {
		return CommandResult.failed(stub.error)
	}
	if (stub.value.written) {
		consola.success(`Wrote ${stub.value.path}.`)
	} else {
		consola.info(`${stub.value.path} already exists; left unchanged.`)
	}

	const inserted = await insert(ctx, {
		description: description ?? "",
		hammer: hammerName,
		name,
		origin: "local",
		url: trimmedUrl,
	})
	if (!inserted.ok) {
		return CommandResult.failed(inserted.error)
	}
	if (inserted.value === "inserted") {
		consola.success(`Added "${name}" to the local index.`)
	} else {
		consola.info(`${trimmedUrl} is already indexed.`)
	}

	const link = submissionLink(ctx.config.indexUrl, { name, url: trimmedUrl })
	consola.box(`Submit to the central index:\n${link}`)
	return CommandResult.completed({ formulaPath: stub.value.path, link, name })
}
