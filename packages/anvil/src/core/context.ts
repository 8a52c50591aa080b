import {
	createPathProbe,
	currentPlatform,
	type TargetPlatform,
	type ToolProbe,
} from "@anvil/core"
import { type ConsolaInstance, createConsola, LogLevels } from "consola"
import type { AnvilConfig } from "@/src/env"
import { createGitCentralSource } from "@/src/core/index/central"
import type { CentralIndexSource } from "@/src/core/index/types"
import { autoSubmitHook } from "@/src/core/forge/hooks"
import type { PostForgeHook } from "@/src/core/forge/types"
import { type Downloader, fetchDownloader } from "@/src/core/forge/download"
import { type AnvilPaths, resolvePaths } from "@/src/core/paths"
import { type GitRunner, runGit } from "@/src/utils/git"

/**
 * Everything an operation needs, passed explicitly. Tests build one over a
 * temporary root with fakes for the network-facing parts.
 */
export interface AnvilContext {
	paths: AnvilPaths
	config: AnvilConfig
	logger: ConsolaInstance
	platform: TargetPlatform
	probe: ToolProbe
	git: GitRunner
	download: Downloader
	central: CentralIndexSource
	hooks: readonly PostForgeHook[]
	/** Workspaces owned by operations running in this process */
	workspaces: Set<string>
}

export function createContext(
	config: AnvilConfig,
	overrides: Partial<AnvilContext> = {},
): AnvilContext {
	const platform = overrides.platform ?? currentPlatform()
	const git = overrides.git ?? runGit

	return {
		central: overrides.central ?? createGitCentralSource(config.indexUrl, git),
		config,
		download: overrides.download ?? fetchDownloader,
		git,
		hooks: overrides.hooks ?? [autoSubmitHook],
		logger: overrides.logger ?? createLogger(config),
		paths: overrides.paths ?? resolvePaths(config.home),
		platform,
		probe:
			overrides.probe ??
			createPathProbe({
				pathExt: process.env.PATHEXT,
				platform,
				searchPath: process.env.PATH,
			}),
		workspaces: overrides.workspaces ?? new Set(),
	}
}

export function createLogger(config: Pick<AnvilConfig, "logLevel">): ConsolaInstance {
	return createConsola({ level: LogLevels[config.logLevel] })
}
