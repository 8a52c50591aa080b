import type { BaseError } from "@anvil/core"
import { consola } from "consola"
import type { ZodError } from "zod"
import type { AnvilError } from "@/src/types/errors"

// CommandResult models user-facing flow outcomes; core operations keep { ok, value } results.
export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "unchanged"; reason: string }
	| { status: "cancelled" }
	| { status: "failed"; error: AnvilError }

export const CommandResult = {
	cancelled: (): CommandResult<never> => ({ status: "cancelled" }),
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (error: AnvilError): CommandResult<never> => ({ error, status: "failed" }),
	unchanged: (reason: string): CommandResult<never> => ({
		reason,
		status: "unchanged",
	}),
} as const

export function printOutcome(result: CommandResult<unknown>): void {
	switch (result.status) {
		case "completed":
			consola.success("Done.")
			break
		case "unchanged":
			consola.info(result.reason)
			break
		case "cancelled":
			consola.info("Canceled.")
			break
		case "failed":
			consola.error(formatErrorChain(result.error))
			for (const hint of hintsFor(result.error)) {
				consola.warn(hint)
			}
			printRawErrors(result.error)
			process.exitCode = 1
			break
	}
}

/**
 * Follow-up advice for errors the user can act on.
 */
export function hintsFor(error: AnvilError): string[] {
	switch (error.type) {
		case "build_command_failed":
			return [...error.diagnostics, `Build output kept in ${error.workspace}.`]
		case "build_timeout":
			return [`Raise the limit with --timeout or ANVIL_BUILD_TIMEOUT_MS (was ${error.timeoutMs}ms).`]
		case "index_corruption":
			return ['Run "anvil index repair" to rebuild the index.']
		case "lock":
			return error.holder === undefined
				? []
				: [`Another anvil process (${error.holder}) is running; retry when it finishes.`]
		case "tool_not_found":
			return [`Install one of: ${error.candidates.join(", ")}.`]
		case "dependency_cycle":
			return ["Remove one of the dependencies in the cycle from its formula."]
		default:
			return []
	}
}

export function formatErrorChain(error: BaseError): string {
	const lines: string[] = []
	let current: BaseError | undefined = error
	let depth = 0
	while (current) {
		const indent = " ".repeat(depth * 2)
		const details = detailsOf(current)
		lines.push(`${indent}${depth > 0 ? "Caused by: " : ""}[${current.type}] ${current.message}${details}`)

		const zodError = "zodError" in current ? current.zodError : undefined
		if (isZodError(zodError)) {
			for (const issue of zodError.issues) {
				const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>"
				lines.push(`${indent}  - ${pathLabel}: ${issue.message}`)
			}
		}

		current = current.cause
		depth += 1
	}
	return lines.join("\n")
}

function isZodError(value: unknown): value is ZodError {
	return typeof value === "object" && value !== null && "issues" in value && Array.isArray(value.issues)
}

function printRawErrors(error: BaseError): void {
	if (error.rawError) {
		console.error(error.rawError)
	}
	if (error.cause) {
		printRawErrors(error.cause)
	}
}

const DETAIL_KEYS = ["field", "path", "operation", "target", "ecosystem", "command", "exitCode", "timeoutMs"] as const

function detailsOf(error: BaseError): string {
	const parts: string[] = []
	const fields: Record<string, unknown> = { ...error }
	for (const key of DETAIL_KEYS) {
		const value = fields[key]
		if (typeof value === "string" || typeof value === "number") {
			parts.push(`${key}=${value}`)
		}
	}
	if (Array.isArray(fields.cycle)) {
		parts.push(`cycle=${fields.cycle.join(" -> ")}`)
	}
	return parts.length > 0 ? ` (${parts.join(", ")})` : ""
}
