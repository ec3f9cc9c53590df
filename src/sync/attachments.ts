import * as cli from "../cli/ui.js";
import constants from "../constants.js";
import type { ArchiveStore, AttachmentSink } from "../store/archive-store.js";
import type { AttachmentAttempt, AttachmentCounts, AttachmentPayload } from "../types/archive.js";
import { DownloadError, EventSource, RawEvent } from "../types/source.js";
import { KeyedLock, errorMessage } from "../utils.js";

export interface AttachmentRef {
	ref: string; // mxc:// content reference
	filename: string;
	size: number | null;
	mimeType: string | null;
	isImage: boolean;
}

export type AttachmentOutcome =
	| { kind: "already-cached"; ref: string }
	| { kind: "fetched"; ref: string; bytes: number; status: string }
	| { kind: "empty"; ref: string; status: string }
	| { kind: "failed"; ref: string; status: string }
	| { kind: "rejected"; ref: string; status: string }
	| { kind: "unresolvable"; ref: string };

type Body = { kind: "ok"; payload: AttachmentPayload; bytes: number; status: string } | { kind: "failed" | "rejected"; status: string };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string | null): string | null {
	return typeof value === "string" && value.length > 0 ? value : fallback;
}

/** The attachment an event points at, or null when it carries none. */
export function extractAttachment(event: RawEvent): AttachmentRef | null {
	if (event.type !== "m.room.message") return null;
	const msgtype = event.content.msgtype;
	if (typeof msgtype !== "string" || !constants.attachmentMsgTypes.includes(msgtype)) return null;

	// encrypted attachments carry the reference under `file`
	const file = event.content.file;
	const ref = stringOr(event.content.url, null) ?? (isRecord(file) ? stringOr(file.url, null) : null);
	if (ref === null) return null;

	const info = isRecord(event.content.info) ? event.content.info : {};
	const size = typeof info.size === "number" && Number.isFinite(info.size) ? info.size : null;
	return {
		ref,
		filename: stringOr(event.content.filename, null) ?? stringOr(event.content.body, null) ?? ref,
		size,
		mimeType: stringOr(info.mimetype, null),
		isImage: msgtype === "m.image"
	};
}

export function emptyAttachmentCounts(): AttachmentCounts {
	return { fetched: 0, empty: 0, failed: 0, rejected: 0, alreadyCached: 0, unresolvable: 0 };
}

export function tallyOutcome(counts: AttachmentCounts, outcome: AttachmentOutcome): void {
	switch (outcome.kind) {
		case "already-cached":
			counts.alreadyCached++;
			break;
		case "fetched":
			counts.fetched++;
			break;
		case "empty":
			counts.empty++;
			break;
		case "failed":
			counts.failed++;
			break;
		case "rejected":
			counts.rejected++;
			break;
		case "unresolvable":
			counts.unresolvable++;
			break;
	}
}

/**
 * Best-effort download of event attachments into the store. Failures become a
 * stored status on a row that stays uncached, so the next run that meets the
 * same reference tries again. Never throws for download problems.
 */
export class AttachmentFetcher {
	private readonly locks = new KeyedLock();

	constructor(
		private readonly source: EventSource,
		private readonly store: ArchiveStore,
		private readonly maxBytes: number = constants.defaultMaxAttachmentBytes,
		private readonly now: () => Date = () => new Date()
	) {}

	async maybeFetch(event: RawEvent): Promise<AttachmentOutcome | null> {
		const attachment = extractAttachment(event);
		if (!attachment) return null;

		const url = this.source.resolveContentUrl(attachment.ref);
		if (url === null) {
			cli.printWarning(`Attachment ${attachment.ref} in ${event.eventId} is not a resolvable content URI; skipped.`);
			return { kind: "unresolvable", ref: attachment.ref };
		}

		// one attempt per reference at a time, so two events sharing a file cannot race
		return this.locks.run(attachment.ref, () => this.fetchInto(attachment, url));
	}

	private async fetchInto(attachment: AttachmentRef, url: string): Promise<AttachmentOutcome> {
		const existing = await this.store.findAttachment(attachment.ref);
		if (existing?.isCached) {
			cli.printLog(`Attachment ${attachment.ref} already cached; skipping download.`);
			return { kind: "already-cached", ref: attachment.ref };
		}
		if (existing) {
			cli.printLog(`Retrying attachment ${attachment.ref} (last status: ${existing.lastFetchStatus}).`);
		}

		const body = await this.download(url, attachment);
		const attempt: AttachmentAttempt = {
			fetchUrlMatrix: attachment.ref,
			fetchUrlHttp: url,
			filename: attachment.filename,
			size: attachment.size,
			mimeType: attachment.mimeType,
			isImage: attachment.isImage,
			data: body.kind === "ok" && body.bytes > 0 ? body.payload : null,
			lastFetchStatus: body.status,
			lastFetchTs: this.now()
		};
		await this.store.saveAttachment(attempt);

		if (body.kind === "ok") {
			if (body.bytes === 0) return { kind: "empty", ref: attachment.ref, status: body.status };
			cli.printLog(`Fetched ${body.bytes} bytes for ${attachment.filename} (${body.status}).`);
			return { kind: "fetched", ref: attachment.ref, bytes: body.bytes, status: body.status };
		}
		cli.printWarning(`Attachment ${attachment.ref} not cached: ${body.status}`);
		return { kind: body.kind, ref: attachment.ref, status: body.status };
	}

	/** Streams the body into the store's sink; whatever was written is discarded unless the body completes. */
	private async download(url: string, attachment: AttachmentRef): Promise<Body> {
		let sink: AttachmentSink | null = null;
		try {
			const res = await this.source.download(url);
			if (res.contentLength !== null && res.contentLength >= this.maxBytes) {
				res.cancel();
				return { kind: "rejected", status: `rejected: content-length ${res.contentLength} >= limit ${this.maxBytes}` };
			}
			sink = this.store.openAttachmentSink(attachment.ref, attachment.filename);
			let total = 0;
			for await (const chunk of res.body) {
				total += chunk.length;
				if (total >= this.maxBytes) {
					res.cancel();
					await sink.abort();
					return { kind: "rejected", status: `rejected: body reached limit ${this.maxBytes}` };
				}
				await sink.write(chunk);
			}
			const payload = await sink.finish();
			return { kind: "ok", payload, bytes: total, status: res.status };
		} catch (error) {
			if (sink) {
				await sink.abort().catch((abortError: unknown) => {
					cli.printLog(`Discarding partial download of ${attachment.ref} failed: ${errorMessage(abortError)}`);
				});
			}
			if (error instanceof DownloadError) return { kind: "failed", status: error.status };
			return { kind: "failed", status: `error: ${errorMessage(error)}` };
		}
	}
}
