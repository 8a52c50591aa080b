/**
 * @anvil/core
 *
 * Formula model, URL normalization and build-system detection. Nothing here
 * writes persistent state.
 */

export { classifyLibrary, collectLibraries, findBinary, findByExtension, findExecutables } from "./autobuild/artifacts"
export type { LibraryArtifact } from "./autobuild/artifacts"
export { detect, planFromFormula } from "./autobuild/detect"
export { ECOSYSTEMS } from "./autobuild/ecosystems"
export { createPathProbe, firstAvailable } from "./autobuild/tools"
export type {
	ArtifactRule,
	DetectedPlan,
	DetectOptions,
	Ecosystem,
	EcosystemId,
	EcosystemKind,
	PlanMetadata,
	ToolProbe,
} from "./autobuild/types"
export { ARCHIVE_EXTENSIONS, FORMULA_FILENAME, IGNORED_DIRS } from "./constants"
export { isArchiveUrl, parseFormula, validateFormula } from "./formula/parse"
export { renderCommand, resolveCommands } from "./formula/plan"
export type { TemplateVars } from "./formula/plan"
export type {
	BuildPlan,
	Formula,
	FormulaSource,
	LibraryClass,
	LibraryOutput,
	MsvcRuntime,
} from "./formula/types"
export type { AbsolutePath, NonEmptyString, NormalizedUrl, PackageName } from "./types/branded"
export {
	assertAbsolutePathDirect,
	coerceAbsolutePath,
	coerceAbsolutePathDirect,
	coerceNonEmpty,
	coercePackageName,
	packageNameFromLocator,
} from "./types/coerce"
export type {
	BaseError,
	CoreError,
	DetectionError,
	DetectionFailure,
	FormulaParseError,
	IoError,
	NotFoundError,
	Result,
	ToolNotFoundError,
	ValidationError,
} from "./types/error"
export {
	coerceTargetPlatform,
	currentPlatform,
	isPlatformKey,
	PLATFORM_KEYS,
	platformFromNode,
} from "./types/platform"
export type { PlatformKey, TargetPlatform } from "./types/platform"
export { isRemoteLocator, normalizeUrl, sameRepository } from "./url/normalize"
