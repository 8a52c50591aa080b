import type { ZodError } from "zod"
import type { AbsolutePath } from "./branded"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ValidationError =
	| (BaseError & {
			type: "validation"
			source: "zod"
			field: string
			path?: AbsolutePath
			zodError: ZodError
	  })
	| (BaseError & {
			type: "validation"
			source: "manual"
			field: string
			path?: AbsolutePath
	  })

export type IoError = BaseError & {
	type: "io"
	path: string
	operation: string
}

export type NotFoundError = BaseError & {
	type: "not_found"
	target: string
	path?: AbsolutePath
}

export type FormulaParseError = BaseError & {
	type: "formula_parse"
	path: AbsolutePath
	zodError?: ZodError
}

export type DetectionError = BaseError & {
	type: "detection"
	path: AbsolutePath
}

export type ToolNotFoundError = BaseError & {
	type: "tool_not_found"
	ecosystem: string
	candidates: string[]
	path: AbsolutePath
}

export type DetectionFailure = DetectionError | FormulaParseError | ToolNotFoundError | IoError

export type CoreError =
	| ValidationError
	| IoError
	| NotFoundError
	| FormulaParseError
	| DetectionError
	| ToolNotFoundError

export type Result<T, E extends BaseError = CoreError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
