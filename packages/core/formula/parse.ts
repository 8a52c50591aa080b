import path from "node:path"
import { z } from "zod"
import { ARCHIVE_EXTENSIONS } from "../constants"
import type { AbsolutePath, PackageName } from "../types/branded"
import { coerceAbsolutePath, coerceNonEmpty, coercePackageName } from "../types/coerce"
import type { FormulaParseError, Result } from "../types/error"
import { isPlatformKey, type PlatformKey } from "../types/platform"
import type { BuildPlan, Formula, FormulaSource, LibraryOutput } from "./types"

type ParseResult<T> = Result<T, FormulaParseError>

const trimmedString = (label: string) =>
	z
		.string()
		.transform((value) => value.trim())
		.refine((value) => value.length > 0, {
			message: `${label} must not be empty.`,
		})

const librariesSchema = z.object({
	classes: z.array(z.enum(["static", "dynamic", "import"])).min(1),
	output_dir: trimmedString("libraries.output_dir"),
})

// Unknown fields are ignored: zod objects strip them by default.
const formulaSchema = z.object({
	binaries: z.array(trimmedString("binaries[]")).optional(),
	build: z.record(z.array(z.string())).optional(),
	dependencies: z.array(trimmedString("dependencies[]")).optional(),
	description: z.string().optional(),
	force_pic: z.boolean().optional(),
	libraries: librariesSchema.optional(),
	msvc_runtime: z
		.string()
		.transform((value) => value.trim().toUpperCase())
		.pipe(z.enum(["MD", "MT"]))
		.optional(),
	name: trimmedString("name"),
	override: z.array(z.string()).optional(),
	path: trimmedString("path").optional(),
	type: z.enum(["git", "local", "archive"]).optional(),
	url: trimmedString("url").optional(),
	version: z.string().optional(),
})

type RawFormula = z.infer<typeof formulaSchema>

/**
 * Parse an explicit formula (anvil.json or a hammer formula file).
 *
 * @param sourcePath - Absolute path of the file, used for error reports and
 * to resolve a relative `path` source.
 */
export function parseFormula(contents: string, sourcePath: AbsolutePath): ParseResult<Formula> {
	let data: unknown
	try {
		data = JSON.parse(contents)
	} catch (error) {
		return failure(
			`Invalid JSON in ${sourcePath}: ${error instanceof Error ? error.message : "unreadable"}`,
			sourcePath,
			{ rawError: error instanceof Error ? error : undefined },
		)
	}

	return validateFormula(data, sourcePath)
}

export function validateFormula(data: unknown, sourcePath: AbsolutePath): ParseResult<Formula> {
	const parsed = formulaSchema.safeParse(data)
	if (!parsed.success) {
		return failure(`Invalid formula in ${sourcePath}.`, sourcePath, {
			zodError: parsed.error,
		})
	}

	const raw = parsed.data
	const name = coercePackageName(raw.name)
	if (!name) {
		return failure(`Invalid formula name "${raw.name}".`, sourcePath)
	}

	const dependencies: PackageName[] = []
	for (const dependency of raw.dependencies ?? []) {
		const coerced = coercePackageName(dependency)
		if (!coerced) {
			return failure(`Invalid dependency name "${dependency}".`, sourcePath)
		}
		if (!dependencies.includes(coerced)) {
			dependencies.push(coerced)
		}
	}

	const source = resolveSource(raw, sourcePath)
	if (!source.ok) {
		return source
	}

	const build = buildPlanFrom(raw, sourcePath)
	if (!build.ok) {
		return build
	}

	const libraries: LibraryOutput | undefined = raw.libraries
		? { classes: raw.libraries.classes, outputDir: raw.libraries.output_dir }
		: undefined

	return {
		ok: true,
		value: {
			binaries: raw.binaries ?? [],
			build: build.value,
			dependencies,
			description: raw.description,
			forcePic: raw.force_pic,
			libraries,
			msvcRuntime: raw.msvc_runtime,
			name,
			source: source.value,
			version: raw.version,
		},
	}
}

function resolveSource(
	raw: RawFormula,
	sourcePath: AbsolutePath,
): ParseResult<FormulaSource | undefined> {
	const type = raw.type ?? inferSourceType(raw)
	if (!type) {
		return { ok: true, value: undefined }
	}

	if (type === "local") {
		if (!raw.path) {
			return failure('A "local" source requires "path".', sourcePath)
		}
		const resolved = coerceAbsolutePath(raw.path, path.dirname(sourcePath))
		if (!resolved) {
			return failure(`Invalid source path "${raw.path}".`, sourcePath)
		}
		return { ok: true, value: { path: resolved, type: "local" } }
	}

	const url = raw.url ? coerceNonEmpty(raw.url) : null
	if (!url) {
		return failure(`A "${type}" source requires "url".`, sourcePath)
	}

	return { ok: true, value: { type, url } satisfies FormulaSource }
}

function inferSourceType(raw: RawFormula): FormulaSource["type"] | null {
	if (raw.url) {
		return isArchiveUrl(raw.url) ? "archive" : "git"
	}
	if (raw.path) {
		return "local"
	}
	return null
}

export function isArchiveUrl(url: string): boolean {
	const lowered = url.toLowerCase().split(/[?#]/)[0] ?? ""
	return ARCHIVE_EXTENSIONS.some((extension) => lowered.endsWith(extension))
}

function buildPlanFrom(raw: RawFormula, sourcePath: AbsolutePath): ParseResult<BuildPlan | null> {
	if (!raw.build) {
		return { ok: true, value: null }
	}

	const steps: Partial<Record<PlatformKey, readonly string[]>> = {}
	for (const [key, commands] of Object.entries(raw.build)) {
		// Unknown platform keys are ignored like any other unknown field.
		if (!isPlatformKey(key)) {
			continue
		}
		const cleaned = commands.map((command) => command.trim())
		if (cleaned.some((command) => command.length === 0)) {
			return failure(`Empty command in build.${key}.`, sourcePath)
		}
		steps[key] = cleaned
	}

	const override: PlatformKey[] = []
	for (const key of raw.override ?? []) {
		if (isPlatformKey(key) && key !== "common") {
			override.push(key)
		}
	}

	return { ok: true, value: { override, steps } }
}

function failure(
	message: string,
	sourcePath: AbsolutePath,
	extra: Pick<FormulaParseError, "rawError" | "zodError"> = {},
): { ok: false; error: FormulaParseError } {
	return {
		error: {
			message,
			path: sourcePath,
			type: "formula_parse",
			...extra,
		},
		ok: false,
	}
}

