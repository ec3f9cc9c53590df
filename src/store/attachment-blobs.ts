import { once } from "events";
import { finished } from "stream/promises";
import { Db, GridFSBucket, ObjectId } from "mongodb";
import * as cli from "../cli/ui.js";
import type { AttachmentPayload } from "../types/archive.js";
import type { AttachmentSink } from "./archive-store.js";

/** An upload in progress; `id` is fixed before the first byte is written. */
export interface BlobUpload {
	readonly id: string;
	write(chunk: Uint8Array): Promise<void>;
	finish(): Promise<void>;
	abort(): Promise<void>;
}

export interface BlobStore {
	openUpload(filename: string): BlobUpload;
	delete(id: string): Promise<void>;
}

/**
 * Attachment bytes too large for an inline document, kept in a GridFS bucket
 * and referenced from the attachment row by file id.
 */
export class GridFSBlobStore implements BlobStore {
	private bucket: GridFSBucket;

	constructor(db: Db, bucketName: string) {
		this.bucket = new GridFSBucket(db, { bucketName });
	}

	openUpload(filename: string): BlobUpload {
		const upload = this.bucket.openUploadStream(filename);
		const id = upload.id.toHexString();
		let failure: Error | null = null;
		upload.on("error", (err) => {
			failure = err;
		});

		return {
			id,
			write: async (chunk) => {
				if (failure) throw failure;
				if (!upload.write(chunk)) await once(upload, "drain");
			},
			finish: async () => {
				if (failure) throw failure;
				upload.end();
				await finished(upload);
				cli.printLog(`◇ Stored ${upload.length} bytes for ${filename} in GridFS (${id})`);
			},
			abort: async () => {
				await upload.abort();
			}
		};
	}

	async delete(id: string): Promise<void> {
		await this.bucket.delete(new ObjectId(id));
	}
}

/**
 * Keeps a body in memory up to `inlineLimit` bytes, then moves it into a blob
 * upload and streams the rest there, so no body is ever held whole once it
 * outgrows an inline document.
 */
export class SpillingSink implements AttachmentSink {
	private chunks: Buffer[] = [];
	private buffered = 0;
	private upload: BlobUpload | null = null;
	private written = 0;
	private state: "open" | "finished" | "aborted" = "open";

	constructor(
		private readonly blobs: BlobStore,
		private readonly filename: string,
		private readonly inlineLimit: number
	) {}

	async write(chunk: Uint8Array): Promise<void> {
		if (this.state !== "open") throw new Error(`Attachment sink for ${this.filename} is ${this.state}`);
		if (!this.upload && this.buffered + chunk.length <= this.inlineLimit) {
			this.chunks.push(Buffer.from(chunk));
			this.buffered += chunk.length;
			return;
		}
		if (!this.upload) {
			this.upload = this.blobs.openUpload(this.filename);
			const spilled = Buffer.concat(this.chunks);
			this.chunks = [];
			this.buffered = 0;
			if (spilled.length > 0) await this.upload.write(spilled);
			this.written = spilled.length;
		}
		await this.upload.write(chunk);
		this.written += chunk.length;
	}

	async finish(): Promise<AttachmentPayload> {
		if (this.state !== "open") throw new Error(`Attachment sink for ${this.filename} is ${this.state}`);
		if (!this.upload) {
			this.state = "finished";
			const data = Buffer.concat(this.chunks);
			this.chunks = [];
			return { kind: "inline", data };
		}
		// a failed finish leaves the sink open so abort can still drop the upload
		await this.upload.finish();
		this.state = "finished";
		return { kind: "blob", fileId: this.upload.id, size: this.written };
	}

	async abort(): Promise<void> {
		if (this.state !== "open") return;
		this.state = "aborted";
		this.chunks = [];
		if (this.upload) await this.upload.abort();
	}
}
