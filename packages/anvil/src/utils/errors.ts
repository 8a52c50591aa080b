export function formatError(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}

	return String(error)
}

export function formatErrorMessage(error: unknown, fallback: string): string {
	if (error instanceof Error) {
		return `${fallback} ${error.message}`
	}

	return fallback
}

export function isNotFound(error: unknown): boolean {
	return hasCode(error, "ENOENT") || hasCode(error, "ENOTDIR")
}

export function hasCode(error: unknown, code: string): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === code
}

export function toError(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined
}
