import type { BaseError, CoreError, DetectionFailure } from "@anvil/core"

export type GitError = BaseError & {
	type: "git"
	operation: string
	target: string
}

export type LockError = BaseError & {
	type: "lock"
	path: string
	holder?: number
}

export type IndexCorruptionError = BaseError & {
	type: "index_corruption"
	path: string
}

export type BuildCommandFailedError = BaseError & {
	type: "build_command_failed"
	command: string
	exitCode: number | null
	workspace: string
	diagnostics: string[]
}

export type BuildTimeoutError = BaseError & {
	type: "build_timeout"
	command: string
	timeoutMs: number
	workspace: string
}

export type BuildCancelledError = BaseError & {
	type: "build_cancelled"
	command: string | null
	workspace: string
}

export type NoArtifactsError = BaseError & {
	type: "no_artifacts"
	expected: string[]
	workspace: string
}

export type DependencyCycleError = BaseError & {
	type: "dependency_cycle"
	cycle: string[]
}

export type BuildError = BuildCommandFailedError | BuildTimeoutError | BuildCancelledError

export type ForgeError =
	| DetectionFailure
	| CoreError
	| GitError
	| LockError
	| IndexCorruptionError
	| BuildError
	| NoArtifactsError
	| DependencyCycleError

export type AnvilError = ForgeError
