// Records as persisted by an ArchiveStore. Timestamps are absolute instants.

export interface RoomRecord {
	roomId: string;
	displayName: string;
	topic: string | null;
	retrievalTs: Date;
}

export interface MemberRecord {
	roomId: string;
	userId: string;
	displayName: string;
	avatarUrl: string | null;
	retrievalTs: Date;
}

export interface DeviceRecord {
	userId: string;
	deviceId: string;
	displayName: string | null;
	lastSeenTs: Date | null;
	lastSeenIp: string | null;
	raw: Record<string, unknown>;
	retrievalTs: Date;
}

export interface EventRecord {
	eventId: string;
	roomId: string;
	sender: string;
	type: string;
	content: Record<string, unknown>;
	originServerTs: Date;
	raw: Record<string, unknown>;
	retrievalTs: Date;
}

/** Stored attachment metadata, without the bytes. */
export interface AttachmentState {
	fetchUrlMatrix: string;
	fetchUrlHttp: string;
	filename: string;
	size: number | null;
	mimeType: string | null;
	isImage: boolean;
	isCached: boolean;
	lastFetchStatus: string;
	lastFetchTs: Date;
	retrievalTs: Date;
}

/**
 * Downloaded bytes: held in memory, or already written to blob storage by
 * the store's sink when they outgrew the inline limit.
 */
export type AttachmentPayload = { kind: "inline"; data: Buffer } | { kind: "blob"; fileId: string; size: number };

/**
 * One download attempt, handed to the store. `data` is set only when the
 * fetch succeeded with a non-empty body.
 */
export interface AttachmentAttempt {
	fetchUrlMatrix: string;
	fetchUrlHttp: string;
	filename: string;
	size: number | null;
	mimeType: string | null;
	isImage: boolean;
	data: AttachmentPayload | null;
	lastFetchStatus: string;
	lastFetchTs: Date;
}

export type WriteOnceStatus = "inserted" | "present";
export type AttachmentWrite = "inserted" | "updated" | "unchanged";

export interface AttachmentCounts {
	fetched: number;
	empty: number;
	failed: number;
	rejected: number;
	alreadyCached: number;
	unresolvable: number;
}

export type RoomStatus = "archived" | "skipped" | "failed";

export interface RoomReport {
	roomId: string;
	displayName: string;
	status: RoomStatus;
	newEvents: number;
	newMembers: number;
	batches: number;
	attachments: AttachmentCounts;
	error?: string;
}

export interface DeviceReport {
	inserted: number;
	present: number;
	error?: string;
}

export interface RunReport {
	devices: DeviceReport;
	rooms: RoomReport[];
}
