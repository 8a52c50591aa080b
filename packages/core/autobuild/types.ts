import type { BuildPlan, LibraryOutput, MsvcRuntime } from "../formula/types"
import type { AbsolutePath, PackageName } from "../types/branded"
import type { DetectionFailure, Result } from "../types/error"
import type { TargetPlatform } from "../types/platform"

export type EcosystemId =
	| "formula"
	| "cargo"
	| "node"
	| "python"
	| "ruby"
	| "maven"
	| "gradle"
	| "swift"
	| "zig"
	| "go"
	| "dotnet"
	| "autotools"
	| "cmake"
	| "meson"
	| "make"
	| "scons"
	| "ninja"
	| "bazel"
	| "archive"

/** Strength of the evidence a marker gives, strongest first. */
export type EcosystemKind =
	| "formula"
	| "manifest"
	| "module"
	| "project"
	| "build-file"
	| "build-graph"
	| "archive"

interface ArtifactLocation {
	readonly root: "prefix" | "source"
	readonly dir: string
	readonly recursive: boolean
}

/**
 * Where to look for artifacts when a plan does not name its binaries.
 * `prefix` paths are relative to the install prefix, `source` paths to the
 * source root. Executables are linked into bin, extension matches into lib.
 */
export type ArtifactRule =
	| (ArtifactLocation & { readonly select: "executables" })
	| (ArtifactLocation & { readonly select: "extensions"; readonly extensions: readonly string[] })

export interface PlanMetadata {
	readonly ecosystem: EcosystemId
	readonly kind: EcosystemKind
	/** Marker file that selected the ecosystem */
	readonly manifest: string | null
	/** Project name read from the manifest, or the directory name */
	readonly packageName: string
	/** Tool chosen by probing, when the ecosystem needs one */
	readonly tool: string | null
}

export interface DetectedPlan {
	readonly build: BuildPlan
	readonly binaries: readonly string[]
	readonly libraries?: LibraryOutput
	readonly collect: readonly ArtifactRule[]
	readonly dependencies: readonly PackageName[]
	readonly msvcRuntime?: MsvcRuntime
	readonly forcePic?: boolean
	readonly metadata: PlanMetadata
}

/**
 * Resolves a tool name to its location on the execution path.
 */
export type ToolProbe = (tool: string) => Promise<string | null>

export interface DetectOptions {
	readonly probe: ToolProbe
	readonly msvcRuntime?: MsvcRuntime
}

/**
 * Root listing of a source tree plus lazy file reads.
 */
export interface SourceTree {
	readonly root: AbsolutePath
	readonly name: string
	has(entry: string): boolean
	find(pattern: RegExp): string | null
	read(relativePath: string): Promise<string | null>
	exists(relativePath: string): Promise<boolean>
	list(relativePath: string): Promise<string[]>
}

/** Commands an ecosystem proposes. `windows` replaces `common` on Windows. */
export interface EcosystemPlan {
	readonly common: readonly string[]
	readonly windows?: readonly string[]
	readonly binaries?: readonly string[]
	readonly libraries?: LibraryOutput
	readonly collect?: readonly ArtifactRule[]
	readonly packageName?: string
}

export interface PlanContext {
	readonly tree: SourceTree
	readonly platform: TargetPlatform
	readonly marker: string
	/** Chosen tool, or null for ecosystems without one */
	readonly tool: string | null
	readonly msvcRuntime: MsvcRuntime
}

export interface Ecosystem {
	readonly id: EcosystemId
	readonly kind: EcosystemKind
	/** Candidates probed in order; the first present is used. Empty: no tool needed. */
	tools(marker: string, platform: TargetPlatform): readonly string[]
	/** Returns the marker that matched, or null. */
	matches(tree: SourceTree): string | null
	/** Project-local tool (a build wrapper) that bypasses probing. */
	localTool?(tree: SourceTree, platform: TargetPlatform): Promise<string | null>
	plan(context: PlanContext): Promise<Result<EcosystemPlan, DetectionFailure>>
}
