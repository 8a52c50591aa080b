#!/usr/bin/env tsx

import { Command } from "commander"
import { consola } from "consola"
import { forgeCommand } from "@/src/commands/forge"
import { hammerCommand } from "@/src/commands/hammer"
import { housekeepingCommand } from "@/src/commands/housekeeping"
import { indexCheckCommand, indexRepairCommand } from "@/src/commands/index-repair"
import { listCommand } from "@/src/commands/list"
import { reposCommand } from "@/src/commands/repos"
import { searchCommand } from "@/src/commands/search"
import { submitCommand } from "@/src/commands/submit"
import { unhammerCommand } from "@/src/commands/unhammer"
import { uninstallCommand } from "@/src/commands/uninstall"
import { updateCommand } from "@/src/commands/update"
import { formatError } from "@/src/utils/errors"
import pkg from "../package.json" with { type: "json" }

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("anvil")
		.description("Build and install packages from source")
		.version(pkg.version, "-V, --version", "Output the version number")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("forge")
		.description("Build and install a package by name, URL or local path")
		.argument("<locator>", "Index name, repository or archive URL, or local directory")
		.option("--platform <platform>", "Target platform (linux, macos, windows)")
		.option("--timeout <ms>", "Kill a build command after this many milliseconds")
		.option("--msvc-runtime <runtime>", "MSVC runtime for Windows builds (MD or MT)")
		.option("--force-pic", "Compile position-independent code on POSIX")
		.action(
			async (
				locator: string,
				options: {
					platform?: string
					timeout?: string
					msvcRuntime?: string
					forcePic?: boolean
				},
			) => {
				await forgeCommand(locator, {
					forcePic: options.forcePic,
					msvcRuntime: options.msvcRuntime,
					platform: options.platform,
					timeout: options.timeout,
				})
			},
		)

	program
		.command("search")
		.description("Search the index by name or description")
		.argument("<term>", "Search term")
		.action(async (term: string) => {
			await searchCommand(term)
		})

	program
		.command("list")
		.description("List installed packages")
		.action(async () => {
			await listCommand()
		})

	program
		.command("uninstall")
		.description("Remove an installed package and its links")
		.argument("<name>", "Package name")
		.action(async (name: string) => {
			await uninstallCommand(name)
		})

	program
		.command("update")
		.description("Sync the central index and merge hammer formulas")
		.action(async () => {
			await updateCommand()
		})

	program
		.command("submit")
		.description("Add a repository to a hammer and propose it for the central index")
		.argument("<hammer>", "Hammer name")
		.argument("<url>", "Repository URL")
		.argument("[description]", "Package description")
		.option("--name <name>", "Package name (defaults to the repository name)")
		.action(
			async (
				hammer: string,
				url: string,
				description: string | undefined,
				options: { name?: string },
			) => {
				await submitCommand(hammer, url, description, { name: options.name })
			},
		)

	program
		.command("hammer")
		.description("Create a hammer, or clone one from a URL")
		.argument("<name>", "Hammer name")
		.argument("[url]", "Git repository to clone")
		.action(async (name: string, url: string | undefined) => {
			await hammerCommand(name, url)
		})

	program
		.command("unhammer")
		.description("Remove a hammer and its index entries")
		.argument("<name>", "Hammer name")
		.option("-y, --yes", "Skip the confirmation prompt")
		.action(async (name: string, options: { yes?: boolean }) => {
			await unhammerCommand(name, { yes: Boolean(options.yes) })
		})

	program
		.command("repos")
		.description("List hammers and the central index")
		.action(async () => {
			await reposCommand()
		})

	program
		.command("housekeeping")
		.description("Remove abandoned workspaces, orphaned links and stale builds")
		.action(async () => {
			await housekeepingCommand()
		})

	const indexCmd = program.command("index").description("Inspect and repair the local index")

	indexCmd
		.command("repair")
		.description("Fix malformed, stale and duplicate entries")
		.action(async () => {
			await indexRepairCommand()
		})

	indexCmd
		.command("check")
		.description("Report index problems without changing anything")
		.action(async () => {
			await indexCheckCommand()
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

main().catch((error: unknown) => {
	consola.error(formatError(error))
	process.exit(1)
})
