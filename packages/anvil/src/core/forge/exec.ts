import { spawn } from "node:child_process"
import type { Result } from "@anvil/core"
import type { ConsolaInstance } from "consola"
import { diagnoseLinkErrors } from "@/src/core/forge/diagnostics"
import type { BuildError } from "@/src/types/errors"
import { formatError } from "@/src/utils/errors"

const OUTPUT_TAIL_BYTES = 64 * 1024

export interface RunCommandOptions {
	cwd: string
	env: NodeJS.ProcessEnv
	workspace: string
	logger: ConsolaInstance
	timeoutMs?: number | null
	signal?: AbortSignal
}

type Outcome =
	| { kind: "exit"; code: number | null }
	| { kind: "timeout" }
	| { kind: "cancelled" }
	| { kind: "spawn_error"; error: Error }

/**
 * Run one shell command to completion. Output is streamed to the logger at
 * debug level; the tail is kept for diagnostics. A timeout or abort kills
 * the whole process group.
 */
export async function runBuildCommand(
	command: string,
	options: RunCommandOptions,
): Promise<Result<void, BuildError>> {
	if (options.signal?.aborted) {
		return cancelled(command, options.workspace)
	}

	const groupKill = process.platform !== "win32"
	const child = spawn(command, {
		cwd: options.cwd,
		detached: groupKill,
		env: options.env,
		shell: true,
		stdio: ["ignore", "pipe", "pipe"],
	})

	let tail = ""
	const capture = (chunk: Buffer) => {
		const text = chunk.toString("utf8")
		tail = (tail + text).slice(-OUTPUT_TAIL_BYTES)
		for (const line of text.split(/\r?\n/)) {
			if (line.length > 0) {
				options.logger.debug(line)
			}
		}
	}
	child.stdout.on("data", capture)
	child.stderr.on("data", capture)

	const outcome = await new Promise<Outcome>((resolve) => {
		let settled = false
		const settle = (value: Outcome) => {
			if (settled) return
			settled = true
			if (timer) clearTimeout(timer)
			options.signal?.removeEventListener("abort", onAbort)
			resolve(value)
		}
		const kill = () => {
			try {
				if (groupKill && child.pid !== undefined) {
					process.kill(-child.pid, "SIGKILL")
				} else {
					child.kill("SIGKILL")
				}
			} catch (error) {
				options.logger.debug(`Unable to kill "${command}": ${formatError(error)}`)
			}
		}
		const onAbort = () => {
			kill()
			settle({ kind: "cancelled" })
		}

		const timer =
			options.timeoutMs && options.timeoutMs > 0
				? setTimeout(() => {
						kill()
						settle({ kind: "timeout" })
					}, options.timeoutMs)
				: null
		options.signal?.addEventListener("abort", onAbort, { once: true })

		child.once("error", (error) => settle({ error, kind: "spawn_error" }))
		child.once("close", (code) => settle({ code, kind: "exit" }))
	})

	switch (outcome.kind) {
		case "exit":
			if (outcome.code === 0) {
				return { ok: true, value: undefined }
			}
			return failed(command, outcome.code, options.workspace, tail)
		case "spawn_error":
			return {
				error: {
					command,
					diagnostics: [],
					exitCode: null,
					message: `Unable to run "${command}": ${outcome.error.message}`,
					rawError: outcome.error,
					type: "build_command_failed",
					workspace: options.workspace,
				},
				ok: false,
			}
		case "timeout":
			return {
				error: {
					command,
					message: `"${command}" did not finish within ${options.timeoutMs}ms.`,
					timeoutMs: options.timeoutMs ?? 0,
					type: "build_timeout",
					workspace: options.workspace,
				},
				ok: false,
			}
		case "cancelled":
			return cancelled(command, options.workspace)
	}
}

function failed(
	command: string,
	exitCode: number | null,
	workspace: string,
	output: string,
): Result<void, BuildError> {
	return {
		error: {
			command,
			diagnostics: diagnoseLinkErrors(output),
			exitCode,
			message:
				exitCode === null
					? `"${command}" was terminated by a signal.`
					: `"${command}" exited with code ${exitCode}.`,
			type: "build_command_failed",
			workspace,
		},
		ok: false,
	}
}

function cancelled(command: string, workspace: string): Result<void, BuildError> {
	return {
		error: {
			command,
			message: `Build cancelled while running "${command}".`,
			type: "build_cancelled",
			workspace,
		},
		ok: false,
	}
}
