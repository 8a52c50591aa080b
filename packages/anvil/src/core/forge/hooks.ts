import { findByUrl, insert } from "@/src/core/index/repo-index"
import { submissionLink } from "@/src/core/forge/submission"
import type { PostForgeHook } from "@/src/core/forge/types"

export const AUTO_SUBMIT_DESCRIPTION = "User added"

/**
 * Record a freshly forged remote in the local index and print the link that
 * proposes it to the central index.
 */
export const autoSubmitHook: PostForgeHook = {
	name: "auto-submit",
	async run(ctx, event) {
		if (!ctx.config.autoSubmit || !event.remoteUrl) {
			return { ok: true, value: undefined }
		}

		const existing = await findByUrl(ctx, event.remoteUrl)
		if (!existing.ok) {
			return existing
		}
		if (existing.value) {
			ctx.logger.debug(`${event.remoteUrl} is already indexed as "${existing.value.name}".`)
			return { ok: true, value: undefined }
		}

		const inserted = await insert(ctx, {
			description: AUTO_SUBMIT_DESCRIPTION,
			name: event.record.name,
			origin: "local",
			url: event.remoteUrl,
		})
		if (!inserted.ok) {
			return inserted
		}

		ctx.logger.info(`Added "${event.record.name}" to the local index.`)
		ctx.logger.info(
			`Propose it for the central index: ${submissionLink(ctx.config.indexUrl, {
				name: event.record.name,
				url: event.remoteUrl,
			})}`,
		)
		return { ok: true, value: undefined }
	},
}
