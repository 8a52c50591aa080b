import type { AbsolutePath, NonEmptyString, PackageName } from "../types/branded"
import type { PlatformKey } from "../types/platform"

export type FormulaSource =
	| { readonly type: "git"; readonly url: NonEmptyString }
	| { readonly type: "local"; readonly path: AbsolutePath }
	| { readonly type: "archive"; readonly url: NonEmptyString }

export type LibraryClass = "static" | "dynamic" | "import"

export interface LibraryOutput {
	/** Release-output directory, relative to the source directory. */
	readonly outputDir: string
	readonly classes: readonly LibraryClass[]
}

/**
 * Ordered command templates per platform.
 * Platforms listed in `override` replace `common` instead of extending it.
 */
export interface BuildPlan {
	readonly steps: Readonly<Partial<Record<PlatformKey, readonly string[]>>>
	readonly override: readonly PlatformKey[]
}

export type MsvcRuntime = "MD" | "MT"

export interface Formula {
	readonly name: PackageName
	readonly version?: string
	readonly description?: string
	readonly source?: FormulaSource
	readonly dependencies: readonly PackageName[]
	/** null: no explicit plan, the AutoBuilder decides at forge time. */
	readonly build: BuildPlan | null
	readonly binaries: readonly string[]
	readonly libraries?: LibraryOutput
	readonly msvcRuntime?: MsvcRuntime
	readonly forcePic?: boolean
}
