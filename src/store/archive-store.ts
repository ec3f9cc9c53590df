import type {
	AttachmentAttempt,
	AttachmentPayload,
	AttachmentState,
	AttachmentWrite,
	DeviceRecord,
	EventRecord,
	MemberRecord,
	RoomRecord,
	WriteOnceStatus
} from "../types/archive.js";

/**
 * Destination for one attachment's bytes as they arrive. `abort` discards
 * what was written; it may be called more than once and does nothing after
 * `finish`.
 */
export interface AttachmentSink {
	write(chunk: Uint8Array): Promise<void>;
	finish(): Promise<AttachmentPayload>;
	abort(): Promise<void>;
}

/**
 * Persistence boundary of the archiver. Rooms, members, devices and events are
 * write-once: an existing row is never touched and the write reports "present".
 * Batch operations commit as one unit and return statuses in input order.
 */
export interface ArchiveStore {
	upsertRoom(room: RoomRecord): Promise<WriteOnceStatus>;
	upsertMembers(members: MemberRecord[]): Promise<WriteOnceStatus[]>;
	upsertDevices(devices: DeviceRecord[]): Promise<WriteOnceStatus[]>;
	upsertEvents(events: EventRecord[]): Promise<WriteOnceStatus[]>;

	/** IDs of the `limit` most recent stored events of a room, by origin timestamp. */
	knownRecentEventIds(roomId: string, limit: number): Promise<Set<string>>;

	findAttachment(fetchUrlMatrix: string): Promise<AttachmentState | null>;

	/** Where a download for `fetchUrlMatrix` writes its body. */
	openAttachmentSink(fetchUrlMatrix: string, filename: string): AttachmentSink;

	/**
	 * Insert a new attachment row, or update one that is not cached yet:
	 * status and fetch time always, bytes only when `attempt.data` is set.
	 * A cached row is left as it is ("unchanged"), and a blob payload that
	 * did not end up referenced is deleted.
	 */
	saveAttachment(attempt: AttachmentAttempt): Promise<AttachmentWrite>;
}

export function countStatuses(statuses: WriteOnceStatus[]): { inserted: number; present: number } {
	let inserted = 0;
	for (const s of statuses) if (s === "inserted") inserted++;
	return { inserted, present: statuses.length - inserted };
}
