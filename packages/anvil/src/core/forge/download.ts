import { writeFile } from "node:fs/promises"
import type { IoError, Result } from "@anvil/core"
import { ioFailure } from "@/src/core/io/fs"
import { formatError } from "@/src/utils/errors"

/**
 * Fetch `url` into the file at `destination`.
 */
export type Downloader = (url: string, destination: string) => Promise<Result<void, IoError>>

export const fetchDownloader: Downloader = async (url, destination) => {
	let response: Response
	try {
		response = await fetch(url, { redirect: "follow" })
	} catch (error) {
		return ioFailure(`Unable to download ${url}: ${formatError(error)}`, destination, "download", error)
	}

	if (!response.ok) {
		return ioFailure(
			`Unable to download ${url}: ${response.status} ${response.statusText}`,
			destination,
			"download",
		)
	}

	try {
		const body = Buffer.from(await response.arrayBuffer())
		await writeFile(destination, body)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), destination, "writeFile", error)
	}
}
