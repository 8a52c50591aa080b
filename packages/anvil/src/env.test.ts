import path from "node:path"
import { describe, expect, it } from "vitest"
import { DEFAULT_INDEX_URL, loadConfig } from "@/src/env"

describe("loadConfig", () => {
	it("applies defaults", () => {
		const result = loadConfig({}, "/home/dev")

		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.value).toEqual({
			autoSubmit: true,
			buildTimeoutMs: null,
			forcePic: false,
			home: path.join("/home/dev", ".anvil"),
			indexUrl: DEFAULT_INDEX_URL,
			logLevel: "info",
			msvcRuntime: "MD",
		})
	})

	it("reads every variable", () => {
		const result = loadConfig(
			{
				ANVIL_AUTO_SUBMIT: "off",
				ANVIL_BUILD_TIMEOUT_MS: "90000",
				ANVIL_FORCE_PIC: "1",
				ANVIL_HOME: "/srv/anvil",
				ANVIL_INDEX_URL: "https://git.example.com/index.git",
				ANVIL_LOG_LEVEL: "DEBUG",
				ANVIL_MSVC_RUNTIME: "mt",
			},
			"/home/dev",
		)

		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.value).toEqual({
			autoSubmit: false,
			buildTimeoutMs: 90000,
			forcePic: true,
			home: path.normalize("/srv/anvil"),
			indexUrl: "https://git.example.com/index.git",
			logLevel: "debug",
			msvcRuntime: "MT",
		})
	})

	it("treats empty variables as unset", () => {
		const result = loadConfig({ ANVIL_AUTO_SUBMIT: "", ANVIL_BUILD_TIMEOUT_MS: "" }, "/home/dev")

		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.value.autoSubmit).toBe(true)
		expect(result.value.buildTimeoutMs).toBeNull()
	})

	it("rejects a value that is not boolean-like", () => {
		const result = loadConfig({ ANVIL_AUTO_SUBMIT: "sometimes" }, "/home/dev")

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.error.field).toBe("ANVIL_AUTO_SUBMIT")
		expect(result.error.source).toBe("zod")
	})

	it("rejects a non-numeric timeout", () => {
		const result = loadConfig({ ANVIL_BUILD_TIMEOUT_MS: "10m" }, "/home/dev")

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.error.field).toBe("ANVIL_BUILD_TIMEOUT_MS")
	})

	it("rejects an unknown MSVC runtime", () => {
		const result = loadConfig({ ANVIL_MSVC_RUNTIME: "MDd" }, "/home/dev")

		expect(result.ok).toBe(false)
	})
})
