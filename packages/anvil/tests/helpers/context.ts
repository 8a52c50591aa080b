/**
 * Test context factory
 *
 * Builds an AnvilContext over a temporary root, with a silent logger and
 * in-process stand-ins for git, downloads, the central index and PATH.
 */

import { mkdir, writeFile } from "node:fs/promises"
import path from "node:path"
import { assertAbsolutePathDirect, normalizeUrl, type ToolProbe } from "@anvil/core"
import { createConsola, LogLevels } from "consola"
import { type AnvilContext, createContext } from "@/src/core/context"
import { SUBMISSIONS_DIR } from "@/src/core/index/central"
import type { CentralEntry, CentralIndexSource } from "@/src/core/index/types"
import type { AnvilConfig } from "@/src/env"
import type { GitRunner } from "@/src/utils/git"

export const TEST_INDEX_URL = "https://git.example.test/anvil/index.git"

export function silentLogger() {
	return createConsola({ level: LogLevels.silent })
}

export function testConfig(root: string, overrides: Partial<AnvilConfig> = {}): AnvilConfig {
	return {
		autoSubmit: false,
		buildTimeoutMs: null,
		forcePic: false,
		home: assertAbsolutePathDirect(root),
		indexUrl: TEST_INDEX_URL,
		logLevel: "silent",
		msvcRuntime: "MD",
		...overrides,
	}
}

export interface TestContextOptions extends Partial<Omit<AnvilContext, "config">> {
	config?: Partial<AnvilConfig>
}

/**
 * A context rooted at `<dir>/anvil`. Git and the central index are fakes
 * unless given; no hooks run unless given.
 */
export function createTestContext(dir: string, options: TestContextOptions = {}): AnvilContext {
	const { config, ...overrides } = options
	return createContext(testConfig(path.join(dir, "anvil"), config), {
		central: createFakeCentral([]),
		download: async (url) => ({
			error: { message: `No network in tests: ${url}`, operation: "download", path: url, type: "io" },
			ok: false,
		}),
		git: createFakeGit({}).run,
		hooks: [],
		logger: silentLogger(),
		probe: createFakeProbe([]),
		...overrides,
	})
}

export function createFakeProbe(tools: readonly string[]): ToolProbe {
	return async (tool) => (tools.includes(tool) ? `/usr/bin/${tool}` : null)
}

export type RepoFiles = Record<string, string>

export interface FakeGit {
	run: GitRunner
	calls: string[][]
}

/**
 * Git that "clones" from an in-memory set of repositories keyed by URL.
 * A clone writes the files and a `.git/config` naming the origin.
 */
export function createFakeGit(repositories: Record<string, RepoFiles>): FakeGit {
	const calls: string[][] = []
	const byUrl = new Map(Object.entries(repositories).map(([url, files]) => [normalizeUrl(url), files]))

	const run: GitRunner = async (args, options = {}) => {
		calls.push(args)
		const [command] = args
		if (command === "clone") {
			const url = args[args.length - 2] ?? ""
			const destination = args[args.length - 1] ?? ""
			const files = byUrl.get(normalizeUrl(url))
			if (!files) {
				return {
					error: { message: `repository ${url} not found`, operation: "clone", target: url, type: "git" },
					ok: false,
				}
			}
			await writeRepository(destination, url, files)
			return { ok: true, value: "" }
		}
		if (command === "pull") {
			return { ok: true, value: "Already up to date." }
		}
		return {
			error: {
				message: `unexpected git ${args.join(" ")}`,
				operation: command ?? "git",
				target: options.cwd ?? "",
				type: "git",
			},
			ok: false,
		}
	}

	return { calls, run }
}

async function writeRepository(destination: string, url: string, files: RepoFiles): Promise<void> {
	await mkdir(path.join(destination, ".git"), { recursive: true })
	await writeFile(path.join(destination, ".git", "config"), `[remote "origin"]\n\turl = ${url}\n`)
	for (const [relative, contents] of Object.entries(files)) {
		const target = path.join(destination, relative)
		await mkdir(path.dirname(target), { recursive: true })
		await writeFile(target, contents)
	}
}

export interface FakeCentral extends CentralIndexSource {
	/** Entries the next sync publishes */
	entries: CentralEntry[]
	/** Make the next syncs fail */
	offline: boolean
	syncs: number
}

/**
 * Central index that writes its entries as submission files on sync.
 */
export function createFakeCentral(entries: CentralEntry[]): FakeCentral {
	const central: FakeCentral = {
		entries,
		offline: false,
		async sync(checkoutDir) {
			central.syncs += 1
			if (central.offline) {
				return {
					error: { message: "could not resolve host", operation: "pull", target: checkoutDir, type: "git" },
					ok: false,
				}
			}
			const submissions = path.join(checkoutDir, SUBMISSIONS_DIR)
			await mkdir(path.join(checkoutDir, ".git"), { recursive: true })
			await mkdir(submissions, { recursive: true })
			for (const entry of central.entries) {
				await writeFile(path.join(submissions, `${entry.name}.json`), JSON.stringify(entry))
			}
			return { ok: true, value: undefined }
		},
		syncs: 0,
		url: TEST_INDEX_URL,
	}
	return central
}
