import os from "node:os"
import path from "node:path"
import {
	type AbsolutePath,
	coerceAbsolutePath,
	type MsvcRuntime,
	type Result,
	type ValidationError,
} from "@anvil/core"
import { z } from "zod"

export const DEFAULT_INDEX_URL = "https://github.com/sycomix/Anvil_Index.git"

export const LOG_LEVEL_NAMES = ["silent", "error", "warn", "info", "debug", "trace"] as const
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number]

const TRUE_VALUES = ["1", "true", "yes", "on"]
const FALSE_VALUES = ["0", "false", "no", "off"]

const booleanLike = z
	.string()
	.trim()
	.toLowerCase()
	.refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
		message: `Expected one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(", ")}.`,
	})
	.transform((value) => TRUE_VALUES.includes(value))

const envSchema = z.object({
	ANVIL_AUTO_SUBMIT: booleanLike.optional(),
	ANVIL_BUILD_TIMEOUT_MS: z
		.string()
		.trim()
		.regex(/^\d+$/, { message: "Expected a whole number of milliseconds." })
		.transform(Number)
		.pipe(z.number().int().positive())
		.optional(),
	ANVIL_FORCE_PIC: booleanLike.optional(),
	ANVIL_HOME: z.string().trim().min(1).optional(),
	ANVIL_INDEX_URL: z.string().trim().min(1).optional(),
	ANVIL_LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVEL_NAMES)).optional(),
	ANVIL_MSVC_RUNTIME: z.string().trim().toUpperCase().pipe(z.enum(["MD", "MT"])).optional(),
})

export interface AnvilConfig {
	/** Root of all persisted state */
	home: AbsolutePath
	autoSubmit: boolean
	logLevel: LogLevelName
	indexUrl: string
	/** Per-command limit; null runs commands to completion */
	buildTimeoutMs: number | null
	msvcRuntime: MsvcRuntime
	forcePic: boolean
}

/**
 * Read configuration from the environment once, at start.
 * Empty variables count as unset.
 */
export function loadConfig(
	env: NodeJS.ProcessEnv = process.env,
	homeDir: string = os.homedir(),
): Result<AnvilConfig, ValidationError> {
	const present = Object.fromEntries(
		Object.entries(env).filter(([key, value]) => key.startsWith("ANVIL_") && value !== undefined && value !== ""),
	)

	const parsed = envSchema.safeParse(present)
	if (!parsed.success) {
		const field = parsed.error.issues[0]?.path.join(".") ?? "environment"
		return {
			error: {
				field,
				message: `Invalid configuration in ${field}.`,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	const values = parsed.data
	const home = coerceAbsolutePath(values.ANVIL_HOME ?? path.join(homeDir, ".anvil"), process.cwd())
	if (!home) {
		return {
			error: {
				field: "ANVIL_HOME",
				message: "Unable to resolve the Anvil home directory.",
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: {
			autoSubmit: values.ANVIL_AUTO_SUBMIT ?? true,
			buildTimeoutMs: values.ANVIL_BUILD_TIMEOUT_MS ?? null,
			forcePic: values.ANVIL_FORCE_PIC ?? false,
			home,
			indexUrl: values.ANVIL_INDEX_URL ?? DEFAULT_INDEX_URL,
			logLevel: values.ANVIL_LOG_LEVEL ?? "info",
			msvcRuntime: values.ANVIL_MSVC_RUNTIME ?? "MD",
		},
	}
}
