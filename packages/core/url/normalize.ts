import type { NormalizedUrl } from "../types/branded"

// user@host:path (scp-like ssh syntax, no scheme)
const SCP_LIKE_PATTERN = /^[^\s/@:]+@([^\s/:]+):(?!\/\/)(.+)$/
// ssh://user@host:port/path, git://host/path, git+ssh://...
const SSH_SCHEME_PATTERN = /^(?:ssh|git|git\+ssh):\/\/(?:[^@/]+@)?([^/:]+)(?::\d+)?\/(.+)$/
const HTTP_PATTERN = /^https?:\/\/(?:[^@/]+@)?([^/]+)(\/.*)?$/i

/**
 * Canonical form of a repository locator, used as the dedupe key of the index.
 *
 * git@github.com:user/repo.git, ssh://git@github.com/user/repo and
 * https://GitHub.com/user/repo/ all map to https://github.com/user/repo.
 * Only the host is lower-cased; path case is preserved.
 */
export function normalizeUrl(url: string): NormalizedUrl {
	const trimmed = url.trim()

	const scpMatch = SCP_LIKE_PATTERN.exec(trimmed)
	if (scpMatch) {
		const [, host = "", repoPath = ""] = scpMatch
		return canonicalHttps(host, `/${repoPath}`)
	}

	const sshMatch = SSH_SCHEME_PATTERN.exec(trimmed)
	if (sshMatch) {
		const [, host = "", repoPath = ""] = sshMatch
		return canonicalHttps(host, `/${repoPath}`)
	}

	const httpMatch = HTTP_PATTERN.exec(trimmed)
	if (httpMatch) {
		const [, host = "", repoPath = ""] = httpMatch
		return canonicalHttps(host, repoPath)
	}

	// Local paths and unknown schemes keep their spelling.
	const stripped = stripRepoSuffixes(trimmed)
	return (stripped.length > 0 ? stripped : trimmed) as NormalizedUrl
}

export function sameRepository(a: string, b: string): boolean {
	return normalizeUrl(a) === normalizeUrl(b)
}

export function isRemoteLocator(value: string): boolean {
	const trimmed = value.trim()
	return (
		SCP_LIKE_PATTERN.test(trimmed) ||
		SSH_SCHEME_PATTERN.test(trimmed) ||
		HTTP_PATTERN.test(trimmed)
	)
}

function canonicalHttps(host: string, repoPath: string): NormalizedUrl {
	const pathPart = stripRepoSuffixes(repoPath.replace(/\/{2,}/g, "/"))
	return `https://${host.toLowerCase()}${pathPart}` as NormalizedUrl
}

function stripRepoSuffixes(value: string): string {
	let current = value
	for (;;) {
		const next = current.replace(/\/+$/, "").replace(/\.git$/, "")
		if (next === current) {
			return current
		}
		current = next
	}
}
