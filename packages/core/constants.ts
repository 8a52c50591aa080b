/**
 * Filenames and directory names shared by the AutoBuilder and the pipeline.
 */

/** Explicit formula file inside a source tree */
export const FORMULA_FILENAME = "anvil.json"

/** Archive extensions recognised as a source or a build input, longest first */
export const ARCHIVE_EXTENSIONS = [
	".tar.gz",
	".tar.xz",
	".tar.bz2",
	".tgz",
	".tar",
	".zip",
	".7z",
] as const

/**
 * Directories never searched for build artifacts.
 */
export const IGNORED_DIRS = new Set([".git", ".hg", ".svn", "node_modules", "__pycache__"])
