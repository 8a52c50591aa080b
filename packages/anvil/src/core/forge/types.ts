import type {
	EcosystemId,
	LibraryClass,
	MsvcRuntime,
	PackageName,
	Result,
	TargetPlatform,
} from "@anvil/core"
import type { AnvilContext } from "@/src/core/context"
import type { AnvilError } from "@/src/types/errors"

export interface InstalledLink {
	/** Entry name in the bin directory */
	name: string
	/** Absolute path of the bin entry */
	path: string
	/** File inside the generation the entry resolves to */
	target: string
}

export interface InstalledLibrary {
	fileName: string
	/** "other" for collected files that are not native libraries, such as jars */
	class: LibraryClass | "other"
	path: string
}

export type RecordSource =
	| { type: "git"; url: string }
	| { type: "archive"; url: string }
	| { type: "local"; path: string }

export interface InstalledPackageRecord {
	name: PackageName
	version: string | null
	/** Generation directory holding bin/ and lib/ */
	installPath: string
	generation: string
	links: InstalledLink[]
	libraries: InstalledLibrary[]
	source: RecordSource
	ecosystem: EcosystemId
	dependencies: PackageName[]
	installedAt: string
}

export interface ForgeOptions {
	platform?: TargetPlatform
	/** Per-command limit; null disables the configured one */
	timeoutMs?: number | null
	msvcRuntime?: MsvcRuntime
	forcePic?: boolean
	signal?: AbortSignal
}

export interface ForgeCompleted {
	locator: string
	record: InstalledPackageRecord
	/** Remote the package was built from, when it has one */
	remoteUrl: string | null
}

export interface PostForgeHook {
	name: string
	run(ctx: AnvilContext, event: ForgeCompleted): Promise<Result<void, AnvilError>>
}
