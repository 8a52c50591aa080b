import { normalizeUrl } from "@anvil/core"

export interface Submission {
	name: string
	url: string
}

/**
 * Link that opens a prefilled "new file" page adding the package to the
 * central index's submissions directory.
 */
export function submissionLink(indexUrl: string, submission: Submission): string {
	const params = new URLSearchParams({
		filename: `submissions/${submission.name}.json`,
		message: `Add ${submission.name}`,
		value: JSON.stringify({ name: submission.name, url: submission.url }, null, 2),
	})
	return `${normalizeUrl(indexUrl)}/new/main?${params.toString()}`
}
