import { CommandResult } from "@/src/commands/types"
import { type AnvilContext, createContext } from "@/src/core/context"
import { loadConfig } from "@/src/env"

/**
 * Context for a CLI invocation, from the environment.
 */
export function loadCommandContext(): CommandResult<AnvilContext> {
	const config = loadConfig()
	if (!config.ok) {
		return CommandResult.failed(config.error)
	}
	return CommandResult.completed(createContext(config.value))
}
