/**
 * The remote event source as the archiver sees it. The Matrix implementation
 * lives in source/matrix-source.ts; tests script their own.
 */

/** A room timeline event with the fields the archiver keys and sorts on. */
export interface RawEvent {
	eventId: string;
	sender: string;
	type: string;
	content: Record<string, unknown>;
	originServerTs: number; // ms epoch
	raw: Record<string, unknown>;
}

export interface MemberInfo {
	userId: string;
	displayName: string;
	avatarUrl: string | null;
}

export interface DeviceInfo {
	userId: string;
	deviceId: string;
	displayName: string | null;
	lastSeenTs: number | null; // ms epoch
	lastSeenIp: string | null;
	raw: Record<string, unknown>;
}

/** Expected lookup outcomes, so "missing" never travels as an exception. */
export type Lookup<T> = { kind: "ok"; value: T } | { kind: "absent" } | { kind: "failed"; reason: string };

export interface RoomView {
	roomId: string;
	displayName: string;
	/** Events the source already holds for the room, newest first. */
	residentEvents: RawEvent[];
	/**
	 * Backward cursor positioned just before residentEvents. Null means the
	 * history ends at residentEvents, or, when there are none, that pagination
	 * starts at the latest event.
	 */
	prevBatch: string | null;
	getJoinedMembers(): Promise<MemberInfo[]>;
	getTopic(): Promise<Lookup<string>>;
}

export interface MessagePage {
	events: RawEvent[];
	/** Cursor for the next (older) page; null when the source reports none. */
	nextCursor: string | null;
}

export interface DownloadResponse {
	/** Status line, e.g. "200 OK". */
	status: string;
	contentLength: number | null;
	body: AsyncIterable<Uint8Array>;
	/** Stop the transfer early. */
	cancel(): void;
}

/** A download that failed with a known status line, e.g. "404 Not Found". */
export class DownloadError extends Error {
	constructor(readonly status: string, options?: { cause?: unknown }) {
		super(status, options);
		this.name = "DownloadError";
	}
}

export interface EventSource {
	listRooms(): Promise<Map<string, RoomView>>;
	getDevices(): Promise<DeviceInfo[]>;
	paginateMessages(roomId: string, cursor: string | null, limit: number): Promise<MessagePage>;
	/** Resolve an mxc:// reference; null when it is not a valid content URI. */
	resolveContentUrl(ref: string): string | null;
	download(httpUrl: string): Promise<DownloadResponse>;
}
