import path from "node:path"
import {
	coerceAbsolutePath,
	coercePackageName,
	type Formula,
	type FormulaParseError,
	type IoError,
	type PackageName,
	parseFormula,
	type Result,
	type ValidationError,
} from "@anvil/core"
import type { AnvilPaths } from "@/src/core/paths"
import {
	ensureDir,
	listDir,
	readTextFile,
	removePath,
	safeStat,
	writeJsonAtomic,
} from "@/src/core/io/fs"
import type { GitError } from "@/src/types/errors"
import { cloneShallow, type GitRunner, readGitRemote } from "@/src/utils/git"

const FORMULA_EXTENSION = ".json"

export interface HammerInfo {
	name: PackageName
	path: string
	/** Origin remote for a cloned hammer */
	remote: string | null
	/** Formula names, from file names */
	formulas: string[]
}

export interface HammerFormulas {
	formulas: Array<{ hammer: PackageName; formula: Formula }>
	invalid: FormulaParseError[]
}

export function hammerDir(paths: AnvilPaths, hammer: string): string {
	return path.join(paths.hammers, hammer)
}

export async function listHammers(paths: AnvilPaths): Promise<Result<HammerInfo[], IoError>> {
	const listing = await listDir(paths.hammers)
	if (!listing.ok) {
		return listing
	}

	const hammers: HammerInfo[] = []
	for (const entry of listing.value) {
		const name = coercePackageName(entry.name)
		if (!entry.isDirectory() || !name) {
			continue
		}
		const dir = hammerDir(paths, name)
		const files = await listDir(dir)
		if (!files.ok) {
			return files
		}
		hammers.push({
			formulas: files.value
				.filter((file) => file.isFile() && file.name.endsWith(FORMULA_EXTENSION))
				.map((file) => file.name.slice(0, -FORMULA_EXTENSION.length)),
			name,
			path: dir,
			remote: await readGitRemote(dir),
		})
	}

	return { ok: true, value: hammers }
}

/**
 * Parse every formula of every hammer. Unparseable files are collected,
 * not fatal, so one bad formula does not hide the rest.
 */
export async function readAllHammerFormulas(
	paths: AnvilPaths,
): Promise<Result<HammerFormulas, IoError>> {
	const hammers = await listHammers(paths)
	if (!hammers.ok) {
		return hammers
	}

	const result: HammerFormulas = { formulas: [], invalid: [] }
	for (const hammer of hammers.value) {
		for (const name of hammer.formulas) {
			const formula = await readFormulaFile(path.join(hammer.path, `${name}${FORMULA_EXTENSION}`))
			if (!formula.ok) {
				if (formula.error.type === "io") {
					return { error: formula.error, ok: false }
				}
				result.invalid.push(formula.error)
				continue
			}
			result.formulas.push({ formula: formula.value, hammer: hammer.name })
		}
	}

	return { ok: true, value: result }
}

/**
 * The formula named `name` in the first hammer (by name) that has one.
 */
export async function findHammerFormula(
	paths: AnvilPaths,
	name: PackageName,
): Promise<Result<{ hammer: PackageName; formula: Formula } | null, FormulaParseError | IoError>> {
	const hammers = await listHammers(paths)
	if (!hammers.ok) {
		return hammers
	}

	for (const hammer of hammers.value) {
		if (!hammer.formulas.includes(name)) {
			continue
		}
		const formula = await readFormulaFile(path.join(hammer.path, `${name}${FORMULA_EXTENSION}`))
		if (!formula.ok) {
			return formula
		}
		return { ok: true, value: { formula: formula.value, hammer: hammer.name } }
	}

	return { ok: true, value: null }
}

export type CreateHammerOutcome = "created" | "cloned" | "exists"

/**
 * Create an empty hammer, or clone one from `url`.
 */
export async function createHammer(
	paths: AnvilPaths,
	git: GitRunner,
	name: string,
	url?: string,
): Promise<Result<CreateHammerOutcome, IoError | GitError | ValidationError>> {
	const hammer = coercePackageName(name)
	if (!hammer) {
		return invalidHammerName(name)
	}

	const dir = hammerDir(paths, hammer)
	const existing = await safeStat(dir)
	if (!existing.ok) {
		return existing
	}
	if (existing.value) {
		return { ok: true, value: "exists" }
	}

	const parent = await ensureDir(paths.hammers)
	if (!parent.ok) {
		return parent
	}

	if (url) {
		const cloned = await cloneShallow(git, url, dir)
		if (!cloned.ok) {
			// A failed clone can leave a partial directory behind.
			const removed = await removePath(dir)
			return removed.ok ? cloned : removed
		}
		return { ok: true, value: "cloned" }
	}

	const created = await ensureDir(dir)
	if (!created.ok) {
		return created
	}
	return { ok: true, value: "created" }
}

export async function removeHammer(
	paths: AnvilPaths,
	name: string,
): Promise<Result<boolean, IoError | ValidationError>> {
	const hammer = coercePackageName(name)
	if (!hammer) {
		return invalidHammerName(name)
	}

	const dir = hammerDir(paths, hammer)
	const existing = await safeStat(dir)
	if (!existing.ok) {
		return existing
	}
	if (!existing.value) {
		return { ok: true, value: false }
	}

	const removed = await removePath(dir)
	if (!removed.ok) {
		return removed
	}
	return { ok: true, value: true }
}

export interface FormulaStub {
	name: PackageName
	url: string
	description: string
}

/**
 * Write a minimal formula for `stub` into the hammer, creating the hammer
 * if needed. An existing formula file is left untouched.
 */
export async function writeFormulaStub(
	paths: AnvilPaths,
	hammer: PackageName,
	stub: FormulaStub,
): Promise<Result<{ path: string; written: boolean }, IoError>> {
	const dir = hammerDir(paths, hammer)
	const ensured = await ensureDir(dir)
	if (!ensured.ok) {
		return ensured
	}

	const filePath = path.join(dir, `${stub.name}${FORMULA_EXTENSION}`)
	const existing = await safeStat(filePath)
	if (!existing.ok) {
		return existing
	}
	if (existing.value) {
		return { ok: true, value: { path: filePath, written: false } }
	}

	const written = await writeJsonAtomic(filePath, {
		description: stub.description,
		name: stub.name,
		type: "git",
		url: stub.url,
	})
	if (!written.ok) {
		return written
	}
	return { ok: true, value: { path: filePath, written: true } }
}

async function readFormulaFile(filePath: string): Promise<Result<Formula, FormulaParseError | IoError>> {
	const absolute = coerceAbsolutePath(filePath, process.cwd())
	if (!absolute) {
		return {
			error: { message: `Unable to resolve ${filePath}.`, operation: "resolve", path: filePath, type: "io" },
			ok: false,
		}
	}

	const contents = await readTextFile(absolute)
	if (!contents.ok) {
		return contents
	}
	return parseFormula(contents.value, absolute)
}

function invalidHammerName(name: string): { ok: false; error: ValidationError } {
	return {
		error: {
			field: "name",
			message: `Invalid hammer name "${name}".`,
			source: "manual",
			type: "validation",
		},
		ok: false,
	}
}
