import { access, constants } from "node:fs/promises"
import path from "node:path"
import type { TargetPlatform } from "../types/platform"
import type { ToolProbe } from "./types"

export interface PathProbeOptions {
	/** Raw PATH value */
	readonly searchPath: string | undefined
	readonly platform: TargetPlatform
	/** Raw PATHEXT value, Windows only */
	readonly pathExt?: string
}

const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD"

/**
 * Probe the execution path the way a shell would resolve a bare command.
 */
export function createPathProbe(options: PathProbeOptions): ToolProbe {
	const windows = options.platform === "windows"
	const separator = windows ? ";" : ":"
	const directories = (options.searchPath ?? "").split(separator).filter((entry) => entry.length > 0)
	const extensions = windows
		? ["", ...(options.pathExt ?? DEFAULT_PATHEXT).split(";").filter((entry) => entry.length > 0)]
		: [""]

	return async (tool) => {
		for (const directory of directories) {
			for (const extension of extensions) {
				const candidate = path.join(directory, `${tool}${extension.toLowerCase()}`)
				if (await isExecutable(candidate, windows)) {
					return candidate
				}
			}
		}
		return null
	}
}

async function isExecutable(candidate: string, windows: boolean): Promise<boolean> {
	try {
		await access(candidate, windows ? constants.F_OK : constants.X_OK)
		return true
	} catch {
		return false
	}
}

/**
 * Return the first candidate the probe finds, or null.
 */
export async function firstAvailable(
	probe: ToolProbe,
	candidates: readonly string[],
): Promise<string | null> {
	for (const candidate of candidates) {
		if (await probe(candidate)) {
			return candidate
		}
	}
	return null
}
