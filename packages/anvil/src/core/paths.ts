import path from "node:path"
import type { AbsolutePath } from "@anvil/core"
import { ensureDir, type IoResult } from "@/src/core/io/fs"

/**
 * Persisted state layout under the Anvil home.
 */
export interface AnvilPaths {
	root: AbsolutePath
	indexDir: string
	/** Index store, `{ version, entries }` */
	indexFile: string
	indexLock: string
	/** Checkout of the central index repository */
	central: string
	/** One subdirectory of formula files per hammer */
	hammers: string
	/** One subdirectory per installed package */
	opt: string
	/** One entry per linked executable */
	bin: string
	/** Ephemeral per-operation workspaces */
	build: string
	/** Serializes install commits, uninstalls and housekeeping */
	installLock: string
}

export function resolvePaths(root: AbsolutePath): AnvilPaths {
	const indexDir = path.join(root, "index")
	return {
		bin: path.join(root, "bin"),
		build: path.join(root, "build"),
		central: path.join(indexDir, "central"),
		hammers: path.join(root, "hammers"),
		indexDir,
		indexFile: path.join(indexDir, "index.json"),
		indexLock: path.join(indexDir, ".lock"),
		installLock: path.join(root, "install.lock"),
		opt: path.join(root, "opt"),
		root,
	}
}

export async function ensureLayout(paths: AnvilPaths): Promise<IoResult<void>> {
	for (const dir of [paths.root, paths.indexDir, paths.hammers, paths.opt, paths.bin, paths.build]) {
		const ensured = await ensureDir(dir)
		if (!ensured.ok) {
			return ensured
		}
	}
	return { ok: true, value: undefined }
}

export function packageDir(paths: AnvilPaths, name: string): string {
	return path.join(paths.opt, name)
}

export function recordPath(paths: AnvilPaths, name: string): string {
	return path.join(paths.opt, name, "anvil-record.json")
}
