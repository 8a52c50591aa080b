import { parse as parseToml, TomlError } from "smol-toml"
import { z } from "zod"
import type { LibraryClass } from "../formula/types"
import { coerceAbsolutePath } from "../types/coerce"
import type { DetectionError, DetectionFailure, Result } from "../types/error"
import type { Ecosystem, EcosystemPlan, PlanContext, SourceTree } from "./types"

type PlanResult = Result<EcosystemPlan, DetectionFailure>

const ALL_LIBRARY_CLASSES: readonly LibraryClass[] = ["static", "dynamic", "import"]

function planned(plan: EcosystemPlan): PlanResult {
	return { ok: true, value: plan }
}

function markerIn(tree: SourceTree, names: readonly string[]): string | null {
	return names.find((name) => tree.has(name)) ?? null
}

function cmakeRuntimeFlag(runtime: PlanContext["msvcRuntime"]): string {
	return runtime === "MT" ? "MultiThreaded" : "MultiThreadedDLL"
}

function manifestError(tree: SourceTree, file: string, reason: string): DetectionError {
	return {
		message: `Unable to read ${file}: ${reason}`,
		path: coerceAbsolutePath(file, tree.root) ?? tree.root,
		type: "detection",
	}
}

async function readToml<T>(
	tree: SourceTree,
	file: string,
	schema: z.ZodType<T>,
): Promise<Result<T, DetectionError>> {
	const contents = await tree.read(file)
	if (contents === null) {
		return { error: manifestError(tree, file, "file is not readable."), ok: false }
	}

	let data: unknown
	try {
		data = parseToml(contents)
	} catch (error) {
		const reason = error instanceof TomlError ? error.message : "invalid TOML."
		return { error: manifestError(tree, file, reason), ok: false }
	}

	const parsed = schema.safeParse(data)
	if (!parsed.success) {
		return {
			error: manifestError(tree, file, parsed.error.issues[0]?.message ?? "unexpected layout."),
			ok: false,
		}
	}
	return { ok: true, value: parsed.data }
}

async function readJson<T>(
	tree: SourceTree,
	file: string,
	schema: z.ZodType<T>,
): Promise<Result<T, DetectionError>> {
	const contents = await tree.read(file)
	if (contents === null) {
		return { error: manifestError(tree, file, "file is not readable."), ok: false }
	}

	let data: unknown
	try {
		data = JSON.parse(contents)
	} catch (error) {
		const reason = error instanceof Error ? error.message : "invalid JSON."
		return { error: manifestError(tree, file, reason), ok: false }
	}

	const parsed = schema.safeParse(data)
	if (!parsed.success) {
		return {
			error: manifestError(tree, file, parsed.error.issues[0]?.message ?? "unexpected layout."),
			ok: false,
		}
	}
	return { ok: true, value: parsed.data }
}

const cargoManifestSchema = z.object({
	bin: z.array(z.object({ name: z.string().optional() }).passthrough()).optional(),
	package: z.object({ name: z.string().optional() }).passthrough().optional(),
	workspace: z.record(z.unknown()).optional(),
})

const cargo: Ecosystem = {
	id: "cargo",
	kind: "manifest",
	matches: (tree) => markerIn(tree, ["Cargo.toml"]),
	async plan({ tree }) {
		const manifest = await readToml(tree, "Cargo.toml", cargoManifestSchema)
		if (!manifest.ok) {
			return manifest
		}

		const { bin, package: pkg, workspace } = manifest.value
		const packageName = pkg?.name ?? tree.name

		if (workspace && !pkg) {
			return planned({
				collect: [{ dir: "target/release", recursive: false, root: "source", select: "executables" }],
				common: ["cargo build --release"],
				libraries: { classes: ALL_LIBRARY_CLASSES, outputDir: "target/release" },
				packageName,
			})
		}

		const binDir = await tree.list("src/bin")
		const hasBinary =
			(await tree.exists("src/main.rs")) || binDir.length > 0 || (bin?.length ?? 0) > 0
		if (!hasBinary) {
			return planned({
				binaries: [],
				common: ["cargo build --release"],
				libraries: { classes: ALL_LIBRARY_CLASSES, outputDir: "target/release" },
				packageName,
			})
		}

		return planned({
			common: ['cargo install --path . --root "{PREFIX}"'],
			packageName,
		})
	},
	tools: () => ["cargo"],
}

const packageJsonSchema = z.object({
	bin: z.union([z.string(), z.record(z.string())]).optional(),
	name: z.string().optional(),
	scripts: z.record(z.string()).optional(),
})

const node: Ecosystem = {
	id: "node",
	kind: "manifest",
	matches: (tree) => markerIn(tree, ["package.json"]),
	async plan({ tool, tree }) {
		const manifest = await readJson(tree, "package.json", packageJsonSchema)
		if (!manifest.ok) {
			return manifest
		}

		const npm = tool ?? "npm"
		const unscoped = manifest.value.name?.split("/").pop() ?? tree.name
		const { bin, scripts } = manifest.value
		const binaries = typeof bin === "string" ? [unscoped] : Object.keys(bin ?? {}).sort()

		const common = [`${npm} install`]
		if (scripts?.build) {
			common.push(`${npm} run build`)
		}
		common.push(`${npm} install --global --install-links --prefix "{PREFIX}" .`)

		return planned({ binaries, common, packageName: unscoped })
	},
	tools: () => ["npm"],
}

const pyprojectSchema = z.object({
	project: z
		.object({
			name: z.string().optional(),
			scripts: z.record(z.string()).optional(),
		})
		.passthrough()
		.optional(),
})

const python: Ecosystem = {
	id: "python",
	kind: "manifest",
	matches: (tree) => markerIn(tree, ["pyproject.toml", "setup.py", "requirements.txt"]),
	async plan({ marker, tool, tree }) {
		const interpreter = tool ?? "python3"

		if (marker === "requirements.txt") {
			return planned({
				common: [`${interpreter} -m pip install -r requirements.txt --target "{PREFIX}"`],
			})
		}

		let binaries: string[] = []
		let packageName: string | undefined
		if (marker === "pyproject.toml") {
			const manifest = await readToml(tree, "pyproject.toml", pyprojectSchema)
			if (!manifest.ok) {
				return manifest
			}
			binaries = Object.keys(manifest.value.project?.scripts ?? {}).sort()
			packageName = manifest.value.project?.name
		}

		return planned({
			binaries,
			common: [`${interpreter} -m pip install . --target "{PREFIX}" --upgrade`],
			packageName,
		})
	},
	tools: (_marker, platform) =>
		platform === "windows" ? ["python", "py", "python3"] : ["python3", "python"],
}

const ruby: Ecosystem = {
	id: "ruby",
	kind: "manifest",
	matches: (tree) => tree.find(/\.gemspec$/),
	async plan({ marker }) {
		return planned({
			common: [
				`gem build ${marker}`,
				'gem install *.gem --install-dir "{PREFIX}" --bindir "{PREFIX}/bin" --no-document',
			],
			packageName: marker.replace(/\.gemspec$/, ""),
		})
	},
	tools: () => ["gem"],
}

const maven: Ecosystem = {
	id: "maven",
	kind: "manifest",
	matches: (tree) => markerIn(tree, ["pom.xml"]),
	async plan({ tool }) {
		return planned({
			collect: [
				{ dir: "target", extensions: [".jar"], recursive: false, root: "source", select: "extensions" },
			],
			common: [`${tool ?? "mvn"} -B package -DskipTests`],
		})
	},
	tools: () => ["mvn"],
}

const gradle: Ecosystem = {
	id: "gradle",
	kind: "manifest",
	async localTool(tree, platform) {
		const wrapper = platform === "windows" ? "gradlew.bat" : "gradlew"
		if (!tree.has(wrapper)) return null
		return platform === "windows" ? wrapper : "./gradlew"
	},
	matches: (tree) => markerIn(tree, ["build.gradle", "build.gradle.kts", "gradlew"]),
	async plan({ platform, tool, tree }) {
		const collect = [
			{
				dir: "build/libs",
				extensions: [".jar"],
				recursive: false,
				root: "source",
				select: "extensions",
			} as const,
		]
		const gradleTool = tool ?? "gradle"
		if (platform !== "windows") {
			return planned({ collect, common: [`${gradleTool} build`] })
		}

		const posixTool = tree.has("gradlew") ? "./gradlew" : "gradle"
		return planned({
			collect,
			common: [`${posixTool} build`],
			windows: [`${gradleTool} build`],
		})
	},
	tools: () => ["gradle"],
}

const swift: Ecosystem = {
	id: "swift",
	kind: "manifest",
	matches: (tree) => markerIn(tree, ["Package.swift"]),
	async plan() {
		return planned({
			collect: [{ dir: ".build/release", recursive: false, root: "source", select: "executables" }],
			common: ["swift build -c release"],
		})
	},
	tools: () => ["swift"],
}

const zig: Ecosystem = {
	id: "zig",
	kind: "manifest",
	matches: (tree) => markerIn(tree, ["build.zig"]),
	async plan() {
		return planned({
			common: ['zig build -Doptimize=ReleaseSafe --prefix "{PREFIX}"'],
		})
	},
	tools: () => ["zig"],
}

async function hasGoCommands(tree: SourceTree): Promise<boolean> {
	for (const entry of await tree.list("cmd")) {
		if (entry.endsWith(".go")) return true
		const nested = await tree.list(`cmd/${entry}`)
		if (nested.some((file) => file.endsWith(".go"))) return true
	}
	return false
}

const go: Ecosystem = {
	id: "go",
	kind: "module",
	matches: (tree) => markerIn(tree, ["go.mod"]) ?? tree.find(/\.go$/),
	async plan({ platform, tree }) {
		const goMod = tree.has("go.mod") ? await tree.read("go.mod") : null
		const modulePath = goMod?.match(/^module\s+(\S+)/m)?.[1]
		const name = modulePath?.split("/").pop() ?? tree.name

		if (tree.has("main.go")) {
			return planned({
				binaries: [name],
				common: [`go build -o "{PREFIX}/bin/${name}" .`],
				packageName: name,
				windows: platform === "windows" ? [`go build -o "{PREFIX}/bin/${name}.exe" .`] : undefined,
			})
		}

		if (await hasGoCommands(tree)) {
			return planned({
				common: ['go build -o "{PREFIX}/bin/" ./cmd/...'],
				packageName: name,
			})
		}

		// No main package: a library module, archived for linking.
		return planned({
			binaries: [],
			common: [`go build -buildmode=archive -o build/${name}.a .`],
			libraries: { classes: ["static"], outputDir: "build" },
			packageName: name,
		})
	},
	tools: () => ["go"],
}

const dotnet: Ecosystem = {
	id: "dotnet",
	kind: "project",
	matches: (tree) => tree.find(/\.(cs|fs)proj$/),
	async plan({ marker }) {
		const projectName = marker.replace(/\.(cs|fs)proj$/, "")
		return planned({
			binaries: [projectName],
			common: [`dotnet publish ${marker} -c Release -o "{PREFIX}/bin"`],
			packageName: projectName,
		})
	},
	tools: () => ["dotnet"],
}

const autotools: Ecosystem = {
	id: "autotools",
	kind: "build-file",
	matches: (tree) => markerIn(tree, ["configure"]),
	async plan({ tool }) {
		const make = tool ?? "make"
		return planned({
			common: ['./configure --prefix="{PREFIX}"', `${make} -j{JOBS}`, `${make} install`],
		})
	},
	tools: () => ["make", "gmake"],
}

const cmake: Ecosystem = {
	id: "cmake",
	kind: "build-file",
	matches: (tree) => markerIn(tree, ["CMakeLists.txt"]),
	async plan({ msvcRuntime, platform }) {
		const common = [
			'cmake -S . -B build -DCMAKE_BUILD_TYPE=Release -DCMAKE_INSTALL_PREFIX="{PREFIX}"',
			"cmake --build build --parallel {JOBS}",
			"cmake --install build",
		]
		if (platform !== "windows") {
			return planned({ common })
		}

		return planned({
			common,
			windows: [
				`cmake -S . -B build -A x64 -DCMAKE_INSTALL_PREFIX="{PREFIX}" -DCMAKE_MSVC_RUNTIME_LIBRARY=${cmakeRuntimeFlag(msvcRuntime)}`,
				"cmake --build build --config Release --parallel {JOBS}",
				"cmake --install build --config Release",
			],
		})
	},
	tools: () => ["cmake"],
}

const meson: Ecosystem = {
	id: "meson",
	kind: "build-file",
	matches: (tree) => markerIn(tree, ["meson.build"]),
	async plan() {
		return planned({
			common: [
				'meson setup build --prefix="{PREFIX}" --buildtype=release',
				"meson compile -C build",
				"meson install -C build",
			],
		})
	},
	tools: () => ["meson"],
}

const MAKEFILES = ["GNUmakefile", "Makefile", "makefile"] as const

async function hasInstallTarget(tree: SourceTree): Promise<boolean> {
	for (const name of MAKEFILES) {
		if (!tree.has(name)) continue
		const contents = await tree.read(name)
		if (contents && /^install\s*:/m.test(contents)) {
			return true
		}
	}
	return false
}

function makeCommands(make: string, install: boolean): string[] {
	// nmake has no parallel flag
	const build = make === "nmake" ? make : `${make} -j{JOBS}`
	return install ? [build, `${make} install PREFIX="{PREFIX}"`] : [build]
}

const make: Ecosystem = {
	id: "make",
	kind: "build-file",
	matches: (tree) => markerIn(tree, MAKEFILES),
	async plan({ platform, tool, tree }) {
		const chosen = tool ?? "make"
		const install = await hasInstallTarget(tree)
		const collect = install
			? undefined
			: [
					{ dir: ".", recursive: false, root: "source", select: "executables" } as const,
					{ dir: "bin", recursive: true, root: "source", select: "executables" } as const,
					{ dir: "build", recursive: true, root: "source", select: "executables" } as const,
					{ dir: "dist", recursive: true, root: "source", select: "executables" } as const,
				]

		if (platform === "windows" && chosen !== "make") {
			return planned({
				collect,
				common: makeCommands("make", install),
				windows: makeCommands(chosen, install),
			})
		}

		return planned({ collect, common: makeCommands(chosen, install) })
	},
	tools: () => ["make", "gmake", "mingw32-make", "nmake"],
}

const scons: Ecosystem = {
	id: "scons",
	kind: "build-file",
	matches: (tree) => markerIn(tree, ["SConstruct"]),
	async plan() {
		return planned({
			common: ['scons -j{JOBS} PREFIX="{PREFIX}"', 'scons install PREFIX="{PREFIX}"'],
		})
	},
	tools: () => ["scons"],
}

const ninja: Ecosystem = {
	id: "ninja",
	kind: "build-graph",
	matches: (tree) => markerIn(tree, ["build.ninja"]),
	async plan({ tool }) {
		return planned({
			collect: [{ dir: ".", recursive: false, root: "source", select: "executables" }],
			common: [`${tool ?? "ninja"} -j{JOBS}`],
		})
	},
	tools: () => ["ninja", "samu"],
}

const bazel: Ecosystem = {
	id: "bazel",
	kind: "build-graph",
	matches: (tree) =>
		markerIn(tree, ["MODULE.bazel", "WORKSPACE", "WORKSPACE.bazel", "BUILD", "BUILD.bazel"]),
	async plan({ tool }) {
		return planned({
			collect: [{ dir: "bazel-bin", recursive: true, root: "source", select: "executables" }],
			common: [`${tool ?? "bazel"} build //...`],
		})
	},
	tools: () => ["bazel", "bazelisk"],
}

const ARCHIVE_PATTERN = /\.(tar\.xz|tar\.bz2|tar\.gz|tgz|tar|zip|7z)$/i

function archiveTools(marker: string): readonly string[] {
	const lowered = marker.toLowerCase()
	if (lowered.endsWith(".zip")) return ["unzip", "tar"]
	if (lowered.endsWith(".7z")) return ["7z", "7za"]
	return ["tar"]
}

const archive: Ecosystem = {
	id: "archive",
	kind: "archive",
	matches: (tree) => tree.find(ARCHIVE_PATTERN),
	async plan({ marker, tool }) {
		const extract =
			tool === "unzip"
				? `unzip -o "${marker}" -d "{PREFIX}"`
				: tool === "7z" || tool === "7za"
					? `${tool} x "${marker}" -o"{PREFIX}" -y`
					: `tar -xf "${marker}" -C "{PREFIX}"`
		return planned({
			collect: [{ dir: ".", recursive: true, root: "prefix", select: "executables" }],
			common: [extract],
			packageName: marker.replace(ARCHIVE_PATTERN, ""),
		})
	},
	tools: (marker) => archiveTools(marker),
}

/**
 * Detection order, first match wins. Manifests name their toolchain and
 * outrank generic build descriptions; new ecosystems are appended at the
 * position their evidence strength calls for.
 */
export const ECOSYSTEMS: readonly Ecosystem[] = [
	cargo,
	node,
	python,
	ruby,
	maven,
	gradle,
	swift,
	zig,
	go,
	dotnet,
	autotools,
	cmake,
	meson,
	make,
	scons,
	ninja,
	bazel,
	archive,
]
