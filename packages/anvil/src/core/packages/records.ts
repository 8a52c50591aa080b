import path from "node:path"
import {
	coercePackageName,
	type IoError,
	type PackageName,
	type Result,
	type ValidationError,
} from "@anvil/core"
import { z } from "zod"
import type { InstalledPackageRecord } from "@/src/core/forge/types"
import { listDir, readTextFileIfExists, writeJsonAtomic } from "@/src/core/io/fs"
import { type AnvilPaths, recordPath } from "@/src/core/paths"

const packageName = z.string().transform((value, ctx) => {
	const name = coercePackageName(value)
	if (!name) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid package name "${value}".` })
		return z.NEVER
	}
	return name
})

const recordSchema = z.object({
	dependencies: z.array(packageName).default([]),
	ecosystem: z.enum([
		"formula",
		"cargo",
		"node",
		"python",
		"ruby",
		"maven",
		"gradle",
		"swift",
		"zig",
		"go",
		"dotnet",
		"autotools",
		"cmake",
		"meson",
		"make",
		"scons",
		"ninja",
		"bazel",
		"archive",
	]),
	generation: z.string().min(1),
	installedAt: z.string(),
	installPath: z.string().min(1),
	libraries: z.array(
		z.object({
			class: z.enum(["static", "dynamic", "import", "other"]),
			fileName: z.string(),
			path: z.string(),
		}),
	),
	links: z.array(z.object({ name: z.string().min(1), path: z.string().min(1), target: z.string().min(1) })),
	name: packageName,
	source: z.discriminatedUnion("type", [
		z.object({ type: z.literal("git"), url: z.string() }),
		z.object({ type: z.literal("archive"), url: z.string() }),
		z.object({ path: z.string(), type: z.literal("local") }),
	]),
	version: z.string().nullable(),
})

type RecordResult<T> = Result<T, IoError | ValidationError>

export async function readRecord(
	paths: AnvilPaths,
	name: string,
): Promise<RecordResult<InstalledPackageRecord | null>> {
	const filePath = recordPath(paths, name)
	const contents = await readTextFileIfExists(filePath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: null }
	}

	let data: unknown
	try {
		data = JSON.parse(contents.value)
	} catch {
		return invalidRecord(filePath, `Invalid JSON in ${filePath}.`)
	}

	const parsed = recordSchema.safeParse(data)
	if (!parsed.success) {
		return {
			error: {
				field: parsed.error.issues[0]?.path.join(".") ?? "record",
				message: `Invalid install record ${filePath}.`,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}
	return { ok: true, value: parsed.data }
}

export async function writeRecord(paths: AnvilPaths, record: InstalledPackageRecord) {
	return writeJsonAtomic(recordPath(paths, record.name), record)
}

export interface RecordListing {
	records: InstalledPackageRecord[]
	/** Package directories whose record could not be read */
	invalid: Array<{ name: string; error: IoError | ValidationError }>
}

/**
 * Every installed package, sorted by name. Package directories without a
 * record are not installed and are skipped.
 */
export async function listRecords(paths: AnvilPaths): Promise<Result<RecordListing, IoError>> {
	const listing = await listDir(paths.opt)
	if (!listing.ok) {
		return listing
	}

	const result: RecordListing = { invalid: [], records: [] }
	for (const entry of listing.value) {
		if (!entry.isDirectory()) {
			continue
		}
		const record = await readRecord(paths, entry.name)
		if (!record.ok) {
			result.invalid.push({ error: record.error, name: entry.name })
			continue
		}
		if (record.value) {
			result.records.push(record.value)
		}
	}

	return { ok: true, value: result }
}

export async function isInstalled(paths: AnvilPaths, name: PackageName): Promise<RecordResult<boolean>> {
	const record = await readRecord(paths, name)
	if (!record.ok) {
		return record
	}
	return { ok: true, value: record.value !== null }
}

function invalidRecord(filePath: string, message: string): { ok: false; error: ValidationError } {
	return {
		error: {
			field: path.basename(filePath),
			message,
			source: "manual",
			type: "validation",
		},
		ok: false,
	}
}
