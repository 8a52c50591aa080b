import path from "node:path"
import type { AbsolutePath, NonEmptyString, PackageName } from "./branded"

export function coerceNonEmpty(value: string): NonEmptyString | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

const PACKAGE_NAME_INVALID_CHARS = /[/\\:\s]/

export function coercePackageName(value: string): PackageName | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (trimmed === "." || trimmed === "..") return null
	if (PACKAGE_NAME_INVALID_CHARS.test(trimmed)) return null
	return trimmed as PackageName
}

export function coerceAbsolutePath(
	value: string,
	basePath?: string,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return resolved as AbsolutePath
}

export function coerceAbsolutePathDirect(value: string): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (!path.isAbsolute(trimmed)) return null
	return path.normalize(trimmed) as AbsolutePath
}

export function assertAbsolutePathDirect(value: string): AbsolutePath {
	const result = coerceAbsolutePathDirect(value)
	if (!result) {
		throw new Error(`Expected absolute path, got: ${value}`)
	}
	return result
}

/**
 * Derive a package name from the last segment of a URL or path.
 * "https://github.com/owner/tool.git" -> "tool"
 */
export function packageNameFromLocator(locator: string): PackageName | null {
	const cleaned = locator.trim().replace(/[\\/]+$/, "")
	const lastSegment = cleaned.split(/[\\/:]/).pop() ?? ""
	const withoutGit = lastSegment.replace(/\.git$/, "")
	const withoutArchive = withoutGit.replace(/\.(tar\.gz|tar\.xz|tar\.bz2|tgz|tar|zip)$/, "")
	return coercePackageName(withoutArchive)
}
