import type { Dirent } from "node:fs"
import { access, constants, readdir } from "node:fs/promises"
import path from "node:path"
import { IGNORED_DIRS } from "../constants"
import type { LibraryClass } from "../formula/types"
import type { TargetPlatform } from "../types/platform"

export interface LibraryArtifact {
	readonly path: string
	readonly fileName: string
	readonly class: LibraryClass
}

const SHARED_OBJECT = /\.so(\.\d+)*$/

/**
 * Classify a file by extension. `siblings` is the listing of the file's
 * directory: a `.lib` next to a same-named `.dll` is an import library.
 */
export function classifyLibrary(
	fileName: string,
	siblings: ReadonlySet<string>,
): LibraryClass | null {
	const lowered = fileName.toLowerCase()

	if (lowered.endsWith(".dll.a")) return "import"
	if (lowered.endsWith(".lib")) {
		const stem = fileName.slice(0, -".lib".length)
		const hasDll = [...siblings].some((entry) => entry.toLowerCase() === `${stem.toLowerCase()}.dll`)
		return hasDll ? "import" : "static"
	}
	if (lowered.endsWith(".a") || lowered.endsWith(".rlib")) return "static"
	if (lowered.endsWith(".dylib") || lowered.endsWith(".dll")) return "dynamic"
	if (SHARED_OBJECT.test(lowered)) return "dynamic"

	return null
}

/**
 * Library artifacts directly inside `directory` whose class is wanted.
 * A missing directory yields no artifacts.
 */
export async function collectLibraries(
	directory: string,
	classes: readonly LibraryClass[],
): Promise<LibraryArtifact[]> {
	const entries = await listEntries(directory)
	const names = new Set(entries.filter((entry) => entry.isFile()).map((entry) => entry.name))
	const artifacts: LibraryArtifact[] = []

	for (const name of [...names].sort()) {
		const libraryClass = classifyLibrary(name, names)
		if (libraryClass && classes.includes(libraryClass)) {
			artifacts.push({ class: libraryClass, fileName: name, path: path.join(directory, name) })
		}
	}

	return artifacts
}

// Files that carry the executable bit without being programs worth linking.
const NON_BINARY_EXTENSIONS = new Set([
	".a",
	".c",
	".cc",
	".cpp",
	".d",
	".dll",
	".dylib",
	".h",
	".hpp",
	".json",
	".md",
	".o",
	".obj",
	".pdb",
	".py",
	".rlib",
	".rs",
	".sh",
	".so",
	".txt",
])

export function isBinaryName(fileName: string, platform: TargetPlatform): boolean {
	const extension = path.extname(fileName).toLowerCase()
	if (platform === "windows") {
		return extension === ".exe" || extension === ".cmd" || extension === ".bat"
	}
	return !NON_BINARY_EXTENSIONS.has(extension) && !SHARED_OBJECT.test(fileName)
}

/**
 * Executable files under `directory`, skipping VCS and dependency
 * directories when recursing.
 */
export async function findExecutables(
	directory: string,
	platform: TargetPlatform,
	recursive: boolean,
): Promise<string[]> {
	const found: string[] = []
	await walk(directory, recursive, async (filePath, entry) => {
		if (!isBinaryName(entry.name, platform)) return
		if (platform === "windows" || (await isExecutableFile(filePath))) {
			found.push(filePath)
		}
	})
	return found.sort()
}

/**
 * Files under `directory` whose extension is one of `extensions`.
 */
export async function findByExtension(
	directory: string,
	extensions: readonly string[],
	recursive: boolean,
): Promise<string[]> {
	const wanted = extensions.map((extension) => extension.toLowerCase())
	const found: string[] = []
	await walk(directory, recursive, async (filePath, entry) => {
		const lowered = entry.name.toLowerCase()
		if (wanted.some((extension) => lowered.endsWith(extension))) {
			found.push(filePath)
		}
	})
	return found.sort()
}

/**
 * First file under `directory` whose name is `binary` or, on Windows,
 * `binary` with an executable extension. Breadth-first, so shallow
 * matches win over copies buried in intermediate build directories.
 */
export async function findBinary(
	directory: string,
	binary: string,
	platform: TargetPlatform,
): Promise<string | null> {
	const names =
		platform === "windows"
			? [binary, `${binary}.exe`, `${binary}.cmd`, `${binary}.bat`].map((name) => name.toLowerCase())
			: [binary]

	let level = [directory]
	while (level.length > 0) {
		const next: string[] = []
		for (const current of level) {
			const entries = await listEntries(current)
			for (const entry of entries) {
				const candidate = platform === "windows" ? entry.name.toLowerCase() : entry.name
				if ((entry.isFile() || entry.isSymbolicLink()) && names.includes(candidate)) {
					return path.join(current, entry.name)
				}
				if (entry.isDirectory() && !IGNORED_DIRS.has(entry.name)) {
					next.push(path.join(current, entry.name))
				}
			}
		}
		level = next
	}

	return null
}

async function walk(
	directory: string,
	recursive: boolean,
	visit: (filePath: string, entry: Dirent) => Promise<void>,
): Promise<void> {
	for (const entry of await listEntries(directory)) {
		const entryPath = path.join(directory, entry.name)
		if (entry.isDirectory()) {
			if (recursive && !IGNORED_DIRS.has(entry.name)) {
				await walk(entryPath, recursive, visit)
			}
		} else if (entry.isFile() || entry.isSymbolicLink()) {
			await visit(entryPath, entry)
		}
	}
}

// Directories a build tree may contain but that cannot be listed.
const UNLISTABLE_CODES = new Set(["EACCES", "ELOOP", "ENOENT", "ENOTDIR", "EPERM"])

async function listEntries(directory: string): Promise<Dirent[]> {
	try {
		const entries = await readdir(directory, { withFileTypes: true })
		return entries.sort((a, b) => a.name.localeCompare(b.name))
	} catch (error) {
		const code = error instanceof Error && "code" in error ? error.code : undefined
		if (typeof code === "string" && UNLISTABLE_CODES.has(code)) {
			return []
		}
		throw error
	}
}

async function isExecutableFile(filePath: string): Promise<boolean> {
	try {
		await access(filePath, constants.X_OK)
		return true
	} catch {
		return false
	}
}
