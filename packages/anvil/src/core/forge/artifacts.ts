import { copyFile } from "node:fs/promises"
import path from "node:path"
import {
	collectLibraries,
	type DetectedPlan,
	findBinary,
	findByExtension,
	findExecutables,
	type IoError,
	type LibraryClass,
	type Result,
	type TargetPlatform,
} from "@anvil/core"
import type { InstalledLibrary } from "@/src/core/forge/types"
import { ensureDir, ioFailure, isWithin } from "@/src/core/io/fs"
import type { NoArtifactsError } from "@/src/types/errors"
import { formatError } from "@/src/utils/errors"

export interface LocatedArtifacts {
	binaries: string[]
	libraries: Array<{ path: string; class: LibraryClass | "other" }>
}

export interface ArtifactRoots {
	sourceDir: string
	prefix: string
	platform: TargetPlatform
	workspace: string
}

/**
 * Find what a finished build produced. Named binaries are looked up in the
 * install prefix first, then in the source tree; unnamed ones come from the
 * plan's collect rules; library plans read their release-output directory.
 */
export async function locateArtifacts(
	plan: DetectedPlan,
	roots: ArtifactRoots,
): Promise<Result<LocatedArtifacts, NoArtifactsError>> {
	const binaries: string[] = []
	const libraries: LocatedArtifacts["libraries"] = []
	const missing: string[] = []

	for (const binary of plan.binaries) {
		const found =
			(await findBinary(roots.prefix, binary, roots.platform)) ??
			(await findBinary(roots.sourceDir, binary, roots.platform))
		if (found) {
			binaries.push(found)
		} else {
			missing.push(binary)
		}
	}

	for (const rule of plan.collect) {
		const dir = path.join(rule.root === "prefix" ? roots.prefix : roots.sourceDir, rule.dir)
		if (rule.select === "executables") {
			binaries.push(...(await findExecutables(dir, roots.platform, rule.recursive)))
		} else {
			const files = await findByExtension(dir, rule.extensions, rule.recursive)
			libraries.push(...files.map((file) => ({ class: "other" as const, path: file })))
		}
	}

	if (plan.libraries) {
		const found = await collectLibraries(path.join(roots.sourceDir, plan.libraries.outputDir), plan.libraries.classes)
		libraries.push(...found.map((library) => ({ class: library.class, path: library.path })))
	}

	if (missing.length > 0) {
		return noArtifacts(
			`Build finished but did not produce ${missing.join(", ")}.`,
			missing,
			roots.workspace,
		)
	}
	if (binaries.length === 0 && libraries.length === 0) {
		return noArtifacts(
			"Build finished but produced no binaries or libraries.",
			expectedOf(plan),
			roots.workspace,
		)
	}

	return { ok: true, value: { binaries: uniqueByName(binaries), libraries: uniqueByName(libraries) } }
}

export interface StagedArtifacts {
	binaries: string[]
	libraries: InstalledLibrary[]
}

/**
 * Copy artifacts that live outside the generation into its bin/ and lib/,
 * so the install never refers back to the workspace.
 */
export async function stageArtifacts(
	artifacts: LocatedArtifacts,
	generationDir: string,
): Promise<Result<StagedArtifacts, IoError>> {
	const binaries: string[] = []
	for (const binary of artifacts.binaries) {
		const staged = await stage(binary, generationDir, "bin")
		if (!staged.ok) {
			return staged
		}
		binaries.push(staged.value)
	}

	const libraries: InstalledLibrary[] = []
	for (const library of artifacts.libraries) {
		const staged = await stage(library.path, generationDir, "lib")
		if (!staged.ok) {
			return staged
		}
		libraries.push({ class: library.class, fileName: path.basename(staged.value), path: staged.value })
	}

	return { ok: true, value: { binaries, libraries } }
}

async function stage(file: string, generationDir: string, subdir: string): Promise<Result<string, IoError>> {
	if (isWithin(generationDir, file)) {
		return { ok: true, value: file }
	}

	const targetDir = path.join(generationDir, subdir)
	const ensured = await ensureDir(targetDir)
	if (!ensured.ok) {
		return ensured
	}

	const target = path.join(targetDir, path.basename(file))
	try {
		await copyFile(file, target)
		return { ok: true, value: target }
	} catch (error) {
		return ioFailure(formatError(error), target, "copyFile", error)
	}
}

function uniqueByName<T extends string | { path: string }>(items: T[]): T[] {
	const seen = new Set<string>()
	return items.filter((item) => {
		const name = path.basename(typeof item === "string" ? item : item.path)
		if (seen.has(name)) {
			return false
		}
		seen.add(name)
		return true
	})
}

function expectedOf(plan: DetectedPlan): string[] {
	if (plan.libraries) {
		return [`${plan.libraries.classes.join("/")} libraries in ${plan.libraries.outputDir}`]
	}
	return plan.collect.map((rule) => `${rule.select} in ${rule.root}/${rule.dir}`)
}

function noArtifacts(
	message: string,
	expected: string[],
	workspace: string,
): { ok: false; error: NoArtifactsError } {
	return {
		error: { expected, message, type: "no_artifacts", workspace },
		ok: false,
	}
}
