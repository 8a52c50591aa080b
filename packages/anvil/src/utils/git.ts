import { execFile } from "node:child_process"
import path from "node:path"
import { promisify } from "node:util"
import type { Result } from "@anvil/core"
import { readTextFileIfExists } from "@/src/core/io/fs"
import type { GitError } from "@/src/types/errors"
import { formatErrorMessage, toError } from "@/src/utils/errors"

const execFileAsync = promisify(execFile)

export interface GitRunOptions {
	cwd?: string
}

/**
 * Runs git with the given arguments and returns trimmed stdout.
 */
export type GitRunner = (args: string[], options?: GitRunOptions) => Promise<Result<string, GitError>>

export const runGit: GitRunner = async (args, options = {}) => {
	try {
		const { stdout } = await execFileAsync("git", args, {
			cwd: options.cwd,
			encoding: "utf8",
			env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
		})
		return { ok: true, value: stdout.trim() }
	} catch (error) {
		return {
			error: {
				message: formatErrorMessage(error, `git ${args.join(" ")} failed.`),
				operation: args[0] ?? "git",
				rawError: toError(error),
				target: options.cwd ?? args[args.length - 1] ?? "",
				type: "git",
			},
			ok: false,
		}
	}
}

export async function cloneShallow(
	git: GitRunner,
	url: string,
	destination: string,
): Promise<Result<void, GitError>> {
	const cloned = await git(["clone", "--depth", "1", url, destination])
	if (!cloned.ok) {
		return cloned
	}
	return { ok: true, value: undefined }
}

const REMOTE_SECTION = /^\s*\[remote\s+"([^"]+)"\]\s*$/
const SECTION = /^\s*\[/
const URL_LINE = /^\s*url\s*=\s*(.+?)\s*$/

/**
 * Read a remote's URL from `.git/config` without invoking git.
 * Returns null for a tree that is not a repository or has no such remote.
 */
export async function readGitRemote(repoDir: string, remote = "origin"): Promise<string | null> {
	const config = await readTextFileIfExists(path.join(repoDir, ".git", "config"))
	if (!config.ok || config.value === null) {
		return null
	}

	let inRemote = false
	for (const line of config.value.split(/\r?\n/)) {
		const section = line.match(REMOTE_SECTION)
		if (section) {
			inRemote = section[1] === remote
			continue
		}
		if (SECTION.test(line)) {
			inRemote = false
			continue
		}
		const url = inRemote ? line.match(URL_LINE) : null
		if (url?.[1]) {
			return url[1]
		}
	}

	return null
}
