import { open, readFile, unlink } from "node:fs/promises"
import path from "node:path"
import type { BaseError, Result } from "@anvil/core"
import type { ConsolaInstance } from "consola"
import { ensureDir, safeStat } from "@/src/core/io/fs"
import type { LockError } from "@/src/types/errors"
import { formatError, hasCode, isNotFound, toError } from "@/src/utils/errors"

export interface LockOptions {
	/** Give up after this long. */
	timeoutMs?: number
	/** A lock older than this is taken over even if its holder looks alive. */
	staleMs?: number
	logger?: ConsolaInstance
}

interface LockOwner {
	pid: number
	purpose: string
	startedMs: number
}

const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_STALE_MS = 10 * 60_000
const UNWRITTEN_GRACE_MS = 5_000

export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0)
		return true
	} catch (error) {
		// EPERM: the process exists but belongs to someone else.
		return hasCode(error, "EPERM")
	}
}

/**
 * Run `fn` while holding an advisory lock file created with O_EXCL.
 * A lock whose owner is dead, unreadable or older than `staleMs` is removed.
 */
export async function withLock<T, E extends BaseError>(
	lockPath: string,
	purpose: string,
	fn: () => Promise<Result<T, E>>,
	options: LockOptions = {},
): Promise<Result<T, E | LockError>> {
	const acquired = await acquireLock(lockPath, purpose, options)
	if (!acquired.ok) {
		return acquired
	}

	try {
		return await fn()
	} finally {
		await releaseLock(lockPath, options.logger)
	}
}

async function acquireLock(
	lockPath: string,
	purpose: string,
	options: LockOptions,
): Promise<Result<void, LockError>> {
	const ensured = await ensureDir(path.dirname(lockPath))
	if (!ensured.ok) {
		return lockFailure(lockPath, ensured.error.message, undefined, ensured.error.rawError)
	}

	const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
	const staleMs = options.staleMs ?? DEFAULT_STALE_MS
	const started = Date.now()
	let attempt = 0

	while (true) {
		try {
			const handle = await open(lockPath, "wx")
			const owner: LockOwner = { pid: process.pid, purpose, startedMs: Date.now() }
			try {
				await handle.writeFile(JSON.stringify(owner))
			} finally {
				await handle.close()
			}
			return { ok: true, value: undefined }
		} catch (error) {
			if (!hasCode(error, "EEXIST")) {
				return lockFailure(lockPath, formatError(error), undefined, error)
			}
		}

		const owner = await readOwner(lockPath)
		if (owner === "missing") {
			continue
		}

		const stale =
			owner === null ||
			!isProcessAlive(owner.pid) ||
			Date.now() - owner.startedMs > staleMs
		if (stale) {
			options.logger?.warn(`Removing stale lock ${lockPath}.`)
			try {
				await unlink(lockPath)
			} catch (error) {
				if (!isNotFound(error)) {
					return lockFailure(lockPath, formatError(error), undefined, error)
				}
			}
			continue
		}

		if (Date.now() - started >= timeoutMs) {
			return lockFailure(
				lockPath,
				`Lock ${lockPath} is held by process ${owner.pid} (${owner.purpose}).`,
				owner.pid,
			)
		}

		const wait = Math.min(50 * 2 ** attempt, 1000)
		attempt += 1
		options.logger?.debug(`Waiting ${wait}ms for ${lockPath}.`)
		await sleep(wait)
	}
}

async function readOwner(lockPath: string): Promise<LockOwner | null | "missing"> {
	let contents: string
	try {
		contents = await readFile(lockPath, "utf8")
	} catch (error) {
		if (isNotFound(error)) {
			return "missing"
		}
		return null
	}

	try {
		const parsed: unknown = JSON.parse(contents)
		if (
			typeof parsed === "object" &&
			parsed !== null &&
			"pid" in parsed &&
			"startedMs" in parsed &&
			typeof parsed.pid === "number" &&
			typeof parsed.startedMs === "number"
		) {
			const purpose = "purpose" in parsed && typeof parsed.purpose === "string" ? parsed.purpose : "unknown"
			return { pid: parsed.pid, purpose, startedMs: parsed.startedMs }
		}
		return null
	} catch {
		return unwrittenOwner(lockPath)
	}
}

// An owner between creating the file and writing it leaves it empty or
// partial for a moment; only a lingering one is stale.
async function unwrittenOwner(lockPath: string): Promise<LockOwner | null | "missing"> {
	const stats = await safeStat(lockPath)
	if (!stats.ok) {
		return null
	}
	if (!stats.value) {
		return "missing"
	}
	if (Date.now() - stats.value.mtimeMs > UNWRITTEN_GRACE_MS) {
		return null
	}
	return { pid: process.pid, purpose: "unknown", startedMs: stats.value.mtimeMs }
}

async function releaseLock(lockPath: string, logger?: ConsolaInstance): Promise<void> {
	try {
		await unlink(lockPath)
	} catch (error) {
		if (!isNotFound(error)) {
			logger?.warn(`Unable to release lock ${lockPath}: ${formatError(error)}`)
		}
	}
}

function lockFailure(
	lockPath: string,
	message: string,
	holder?: number,
	error?: unknown,
): { ok: false; error: LockError } {
	return {
		error: {
			holder,
			message,
			path: lockPath,
			rawError: toError(error),
			type: "lock",
		},
		ok: false,
	}
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}
