/**
 * Platform keys used by build plans. "common" applies everywhere.
 */
export const PLATFORM_KEYS = [
	"common",
	"linux",
	"macos",
	"windows",
	"android",
	"freebsd",
] as const

export type PlatformKey = (typeof PLATFORM_KEYS)[number]

export type TargetPlatform = Exclude<PlatformKey, "common">

const PLATFORM_KEY_SET: ReadonlySet<string> = new Set(PLATFORM_KEYS)

export function isPlatformKey(value: string): value is PlatformKey {
	return PLATFORM_KEY_SET.has(value)
}

export function coerceTargetPlatform(value: string): TargetPlatform | null {
	const trimmed = value.trim().toLowerCase()
	if (!isPlatformKey(trimmed) || trimmed === "common") return null
	return trimmed
}

export function platformFromNode(nodePlatform: NodeJS.Platform): TargetPlatform {
	switch (nodePlatform) {
		case "win32":
			return "windows"
		case "darwin":
			return "macos"
		case "android":
			return "android"
		case "freebsd":
			return "freebsd"
		default:
			return "linux"
	}
}

export function currentPlatform(): TargetPlatform {
	return platformFromNode(process.platform)
}
