import {
	AnyBulkWriteOperation,
	BulkWriteOptions,
	BulkWriteResult,
	Document,
	Filter,
	FindOptions,
	MongoServerError,
	ObjectId,
	Sort,
	UpdateFilter,
	UpdateOptions,
	UpdateResult
} from "mongodb";
import * as cli from "../cli/ui.js";
import constants from "../constants.js";
import { CollectionName } from "../handlers/database.js";
import type {
	AttachmentAttempt,
	AttachmentState,
	AttachmentWrite,
	DeviceRecord,
	EventRecord,
	MemberRecord,
	RoomRecord,
	WriteOnceStatus
} from "../types/archive.js";
import type { ArchiveStore, AttachmentSink } from "./archive-store.js";
import { countStatuses } from "./archive-store.js";
import { BlobStore, SpillingSink } from "./attachment-blobs.js";

/** The part of a MongoDB collection the store uses. */
export interface StoreCollection {
	updateOne(filter: Filter<Document>, update: UpdateFilter<Document>, options: UpdateOptions): Promise<Pick<UpdateResult, "upsertedCount">>;
	bulkWrite(operations: AnyBulkWriteOperation<Document>[], options: BulkWriteOptions): Promise<Pick<BulkWriteResult, "upsertedIds">>;
	findOne(filter: Filter<Document>, options: FindOptions): Promise<Document | null>;
	find(filter: Filter<Document>, options: FindOptions): { sort(sort: Sort): { limit(value: number): { toArray(): Promise<Document[]> } } };
}

/** Satisfied by handlers/database.ts `Database`. */
export interface StoreDatabase {
	readonly name: string;
	collection(name: CollectionName): StoreCollection;
}

const DUPLICATE_KEY = 11000;

/** Also true for a bulk write whose first failing operation hit a unique index. */
function isDuplicateKey(error: unknown): boolean {
	return error instanceof MongoServerError && error.code === DUPLICATE_KEY;
}

function toAttachmentState(doc: Document): AttachmentState | null {
	const d: Record<string, unknown> = { ...doc };
	const { fetchUrlMatrix, fetchUrlHttp, filename, size, mimeType, isImage, isCached, lastFetchStatus, lastFetchTs, retrievalTs } = d;
	if (typeof fetchUrlMatrix !== "string" || typeof fetchUrlHttp !== "string" || typeof filename !== "string") return null;
	if (!(lastFetchTs instanceof Date) || !(retrievalTs instanceof Date)) return null;
	return {
		fetchUrlMatrix,
		fetchUrlHttp,
		filename,
		size: typeof size === "number" ? size : null,
		mimeType: typeof mimeType === "string" ? mimeType : null,
		isImage: isImage === true,
		isCached: isCached === true,
		lastFetchStatus: typeof lastFetchStatus === "string" ? lastFetchStatus : "",
		lastFetchTs,
		retrievalTs
	};
}

/**
 * Update for one attachment attempt, applied with the filter
 * `{ fetchUrlMatrix, isCached: false }` and upsert. On insert the filter seeds
 * `isCached: false`; `$set` flips it only for a successful non-empty fetch.
 * Inline bytes land in `data`, a blob payload in `dataFileId`.
 */
export function buildAttachmentUpdate(attempt: AttachmentAttempt): { $set: Document; $setOnInsert: Document } {
	const payload = attempt.data;
	const set: Document = {
		lastFetchStatus: attempt.lastFetchStatus,
		lastFetchTs: attempt.lastFetchTs
	};
	const setOnInsert: Document = {
		fetchUrlHttp: attempt.fetchUrlHttp,
		filename: attempt.filename,
		size: attempt.size,
		mimeType: attempt.mimeType,
		isImage: attempt.isImage,
		retrievalTs: attempt.lastFetchTs
	};
	if (payload?.kind === "inline" && payload.data.length > 0) {
		Object.assign(set, { isCached: true, data: payload.data, dataFileId: null });
	} else if (payload?.kind === "blob" && payload.size > 0) {
		Object.assign(set, { isCached: true, data: null, dataFileId: new ObjectId(payload.fileId) });
	} else {
		Object.assign(setOnInsert, { data: null, dataFileId: null });
	}
	return { $set: set, $setOnInsert: setOnInsert };
}

export class MongoArchiveStore implements ArchiveStore {
	constructor(
		private readonly database: StoreDatabase,
		private readonly blobs: BlobStore,
		private readonly inlineLimit: number = constants.inlineAttachmentLimit
	) {}

	private ns(name: CollectionName): string {
		return `${this.database.name}.${name}`;
	}

	private async writeOnce(name: CollectionName, filter: Document, doc: Document): Promise<WriteOnceStatus> {
		try {
			const res = await this.database.collection(name).updateOne(filter, { $setOnInsert: doc }, { upsert: true });
			return res.upsertedCount > 0 ? "inserted" : "present";
		} catch (error) {
			if (isDuplicateKey(error)) return "present";
			throw error;
		}
	}

	private async writeOnceMany<T extends Document>(
		name: CollectionName,
		docs: T[],
		keyOf: (doc: T) => Document,
		label: (doc: T) => string
	): Promise<WriteOnceStatus[]> {
		if (docs.length === 0) return [];
		const ops: AnyBulkWriteOperation<Document>[] = docs.map((doc) => ({
			updateOne: { filter: keyOf(doc), update: { $setOnInsert: doc }, upsert: true }
		}));

		let statuses: WriteOnceStatus[];
		try {
			const res = await this.database.collection(name).bulkWrite(ops, { ordered: true });
			statuses = docs.map((_doc, i): WriteOnceStatus => (i in res.upsertedIds ? "inserted" : "present"));
		} catch (error) {
			if (!isDuplicateKey(error)) throw error;
			// another writer inserted one of these keys between upsert lookup and insert; settle each on its own
			cli.printLog(`◇ Duplicate key in ${this.ns(name)} bulk write; retrying one by one`);
			statuses = [];
			for (const doc of docs) statuses.push(await this.writeOnce(name, keyOf(doc), doc));
		}

		const { inserted, present } = countStatuses(statuses);
		cli.printLog(`◇ Upsert ${name} → ${this.ns(name)} (inserted:${inserted}, skipped:${present})`);
		statuses.forEach((status, i) => {
			if (status === "present") cli.printLog(`◇ Skip ${name}: ${label(docs[i])} already archived`);
		});
		return statuses;
	}

	async upsertRoom(room: RoomRecord): Promise<WriteOnceStatus> {
		const status = await this.writeOnce(CollectionName.Rooms, { roomId: room.roomId }, room);
		cli.printLog(`◇ Upsert room: ${room.roomId} → ${this.ns(CollectionName.Rooms)} (${status})`);
		return status;
	}

	async upsertMembers(members: MemberRecord[]): Promise<WriteOnceStatus[]> {
		return this.writeOnceMany<MemberRecord>(
			CollectionName.Members,
			members,
			(m) => ({ roomId: m.roomId, userId: m.userId }),
			(m) => `${m.userId} in ${m.roomId}`
		);
	}

	async upsertDevices(devices: DeviceRecord[]): Promise<WriteOnceStatus[]> {
		return this.writeOnceMany<DeviceRecord>(
			CollectionName.Devices,
			devices,
			(d) => ({ userId: d.userId, deviceId: d.deviceId }),
			(d) => `${d.userId}/${d.deviceId}`
		);
	}

	async upsertEvents(events: EventRecord[]): Promise<WriteOnceStatus[]> {
		return this.writeOnceMany<EventRecord>(
			CollectionName.Events,
			events,
			(e) => ({ eventId: e.eventId }),
			(e) => e.eventId
		);
	}

	async knownRecentEventIds(roomId: string, limit: number): Promise<Set<string>> {
		const docs = await this.database
			.collection(CollectionName.Events)
			.find({ roomId }, { projection: { eventId: 1, _id: 0 } })
			.sort({ originServerTs: -1 })
			.limit(limit)
			.toArray();
		const ids = new Set<string>();
		for (const doc of docs) {
			const eventId: unknown = doc.eventId;
			if (typeof eventId === "string") ids.add(eventId);
		}
		return ids;
	}

	async findAttachment(fetchUrlMatrix: string): Promise<AttachmentState | null> {
		const doc = await this.database
			.collection(CollectionName.Attachments)
			.findOne({ fetchUrlMatrix }, { projection: { data: 0, dataFileId: 0 } });
		return doc ? toAttachmentState(doc) : null;
	}

	openAttachmentSink(_fetchUrlMatrix: string, filename: string): AttachmentSink {
		return new SpillingSink(this.blobs, filename, this.inlineLimit);
	}

	async saveAttachment(attempt: AttachmentAttempt): Promise<AttachmentWrite> {
		const blobId = attempt.data?.kind === "blob" ? attempt.data.fileId : null;

		let write: AttachmentWrite;
		try {
			const res = await this.database
				.collection(CollectionName.Attachments)
				.updateOne({ fetchUrlMatrix: attempt.fetchUrlMatrix, isCached: false }, buildAttachmentUpdate(attempt), {
					upsert: true
				});
			write = res.upsertedCount > 0 ? "inserted" : "updated";
		} catch (error) {
			// the blob is referenced by no row either way
			if (blobId) await this.blobs.delete(blobId);
			// the row exists and is already cached, so the filter missed and the insert collided
			if (!isDuplicateKey(error)) throw error;
			write = "unchanged";
		}

		cli.printLog(
			`◇ Upsert attachment: ${attempt.fetchUrlMatrix} | ${attempt.lastFetchStatus} → ${this.ns(CollectionName.Attachments)} (${write})`
		);
		return write;
	}
}
