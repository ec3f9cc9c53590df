import { Readable } from "stream";
import axios from "axios";
import loglevel from "loglevel";
import {
	ClientEvent,
	createClient,
	Direction,
	EventTimeline,
	EventType,
	MatrixClient,
	MatrixError,
	Room,
	SyncState
} from "matrix-js-sdk";
import * as cli from "../cli/ui.js";
import {
	DeviceInfo,
	DownloadError,
	DownloadResponse,
	EventSource,
	Lookup,
	MemberInfo,
	MessagePage,
	RawEvent,
	RoomView
} from "../types/source.js";
import { errorMessage } from "../utils.js";

export interface MatrixSourceOptions {
	homeserver: string;
	userId: string;
	accessToken: string;
	deviceId: string;
	requestTimeoutMs: number;
	syncTimeoutMs: number;
	initialSyncLimit: number;
	authenticatedMedia: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isUnknownToken(error: unknown): boolean {
	return error instanceof MatrixError && error.errcode === "M_UNKNOWN_TOKEN";
}

/**
 * Narrow a wire event to the fields the archiver keys on; the whole object is
 * kept as `raw`. Returns null for records that cannot be keyed.
 */
export function toRawEvent(value: unknown): RawEvent | null {
	if (!isRecord(value)) return null;
	const { event_id, sender, type, content, origin_server_ts } = value;
	if (typeof event_id !== "string" || typeof sender !== "string" || typeof type !== "string") return null;
	if (typeof origin_server_ts !== "number") return null;
	return {
		eventId: event_id,
		sender,
		type,
		content: isRecord(content) ? content : {},
		originServerTs: origin_server_ts,
		raw: value
	};
}

function toRawEvents(values: readonly unknown[], where: string): RawEvent[] {
	const events: RawEvent[] = [];
	for (const value of values) {
		const event = toRawEvent(value);
		if (event) {
			events.push(event);
		} else {
			cli.printWarning(`Dropped an event without id, sender, type or timestamp in ${where}`);
		}
	}
	return events;
}

async function* chunksOf(stream: Readable): AsyncGenerator<Uint8Array> {
	for await (const chunk of stream) {
		yield chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk));
	}
}

const SDK_LEVELS = ["trace", "debug", "info", "warn", "error", "silent"] as const;
type SdkLevel = (typeof SDK_LEVELS)[number];

function isSdkLevel(value: string): value is SdkLevel {
	return SDK_LEVELS.some((level) => level === value);
}

/** The matrix-js-sdk logs through the "matrix" loglevel logger. */
export function setSdkLogLevel(level: string): void {
	const normalized = level.toLowerCase();
	loglevel.getLogger("matrix").setLevel(isSdkLevel(normalized) ? normalized : "error");
}

/**
 * Password login with a fixed device ID, so repeated runs reuse one device
 * instead of piling up new sessions.
 */
export async function loginWithPassword(
	homeserver: string,
	userId: string,
	password: string,
	deviceId: string,
	deviceName: string
): Promise<{ accessToken: string; deviceId: string }> {
	const tempClient = createClient({ baseUrl: homeserver, userId });
	const loginResponse = await tempClient.login("m.login.password", {
		identifier: { type: "m.id.user", user: userId },
		password,
		device_id: deviceId,
		initial_device_display_name: deviceName
	});
	return { accessToken: loginResponse.access_token, deviceId: loginResponse.device_id };
}

class MatrixRoomView implements RoomView {
	readonly roomId: string;
	readonly displayName: string;
	readonly residentEvents: RawEvent[];
	readonly prevBatch: string | null;

	constructor(private readonly client: MatrixClient, private readonly room: Room) {
		this.roomId = room.roomId;
		this.displayName = room.name || room.roomId;
		const timeline = room.getLiveTimeline();
		// the SDK keeps timelines oldest first
		this.residentEvents = toRawEvents(
			timeline
				.getEvents()
				.map((ev) => ev.event)
				.reverse(),
			room.roomId
		);
		this.prevBatch = timeline.getPaginationToken(EventTimeline.BACKWARDS);
	}

	async getJoinedMembers(): Promise<MemberInfo[]> {
		return this.room.getJoinedMembers().map((m) => {
			const mxc = m.getMxcAvatarUrl();
			return {
				userId: m.userId,
				displayName: m.rawDisplayName || m.userId,
				avatarUrl: mxc ? this.client.mxcUrlToHttp(mxc) : null
			};
		});
	}

	async getTopic(): Promise<Lookup<string>> {
		try {
			const content = await this.client.getStateEvent(this.roomId, EventType.RoomTopic, "");
			const topic: unknown = content.topic;
			return typeof topic === "string" && topic.length > 0 ? { kind: "ok", value: topic } : { kind: "absent" };
		} catch (error) {
			if (error instanceof MatrixError && error.errcode === "M_NOT_FOUND") return { kind: "absent" };
			return { kind: "failed", reason: errorMessage(error) };
		}
	}
}

/** EventSource over a logged-in matrix-js-sdk client. */
export class MatrixEventSource implements EventSource {
	private readonly client: MatrixClient;

	constructor(private readonly options: MatrixSourceOptions) {
		this.client = createClient({
			baseUrl: options.homeserver,
			userId: options.userId,
			accessToken: options.accessToken,
			deviceId: options.deviceId,
			localTimeoutMs: options.requestTimeoutMs
		});
	}

	/** Run the initial sync so room views carry names, members and recent timeline. */
	async start(): Promise<void> {
		const ready = new Promise<void>((resolve, reject) => {
			const onSync = (state: SyncState) => {
				if (state === SyncState.Prepared) {
					finish();
					resolve();
				} else if (state === SyncState.Error) {
					finish();
					reject(new Error("Matrix initial sync failed"));
				}
			};
			const timer = setTimeout(() => {
				finish();
				reject(new Error(`Matrix initial sync did not complete within ${this.options.syncTimeoutMs} ms`));
			}, this.options.syncTimeoutMs);
			const finish = () => {
				clearTimeout(timer);
				this.client.off(ClientEvent.Sync, onSync);
			};
			this.client.on(ClientEvent.Sync, onSync);
		});
		await Promise.all([
			this.client.startClient({ initialSyncLimit: this.options.initialSyncLimit, lazyLoadMembers: false }),
			ready
		]);
		cli.print(`Matrix client ready: ${this.client.getRooms().length} rooms known.`);
	}

	/** Confirm the access token; rejects with M_UNKNOWN_TOKEN when it was revoked. */
	async whoami(): Promise<string> {
		const res = await this.client.whoami();
		return res.user_id;
	}

	stop(): void {
		this.client.stopClient();
	}

	async listRooms(): Promise<Map<string, RoomView>> {
		const rooms = new Map<string, RoomView>();
		for (const room of this.client.getRooms()) {
			if (room.getMyMembership() !== "join") continue;
			rooms.set(room.roomId, new MatrixRoomView(this.client, room));
		}
		return rooms;
	}

	async getDevices(): Promise<DeviceInfo[]> {
		const userId = this.client.getUserId() || this.options.userId;
		const { devices } = await this.client.getDevices();
		return devices.map((d) => ({
			userId,
			deviceId: d.device_id,
			displayName: d.display_name ?? null,
			lastSeenTs: typeof d.last_seen_ts === "number" ? d.last_seen_ts : null,
			lastSeenIp: d.last_seen_ip ?? null,
			raw: Object.fromEntries(Object.entries(d))
		}));
	}

	async paginateMessages(roomId: string, cursor: string | null, limit: number): Promise<MessagePage> {
		const res = await this.client.createMessagesRequest(roomId, cursor, limit, Direction.Backward);
		return {
			events: toRawEvents(res.chunk, roomId),
			nextCursor: res.end ?? null
		};
	}

	resolveContentUrl(ref: string): string | null {
		// the SDK only takes the lowercase scheme and answers "" for anything it cannot parse
		if (!ref.startsWith("mxc://")) return null;
		const url = this.client.mxcUrlToHttp(ref, undefined, undefined, undefined, false, true, this.options.authenticatedMedia);
		return url ? url : null;
	}

	async download(httpUrl: string): Promise<DownloadResponse> {
		const controller = new AbortController();
		const token = this.client.getAccessToken();
		try {
			const res = await axios.get<Readable>(httpUrl, {
				responseType: "stream",
				timeout: this.options.requestTimeoutMs,
				signal: controller.signal,
				headers: token ? { Authorization: `Bearer ${token}` } : {}
			});
			const length = Number(res.headers["content-length"]);
			return {
				status: `${res.status} ${res.statusText}`.trim(),
				contentLength: Number.isFinite(length) && res.headers["content-length"] !== undefined ? length : null,
				body: chunksOf(res.data),
				cancel: () => {
					controller.abort();
					res.data.destroy();
				}
			};
		} catch (error) {
			if (axios.isAxiosError(error) && error.response) {
				throw new DownloadError(`${error.response.status} ${error.response.statusText}`.trim(), { cause: error });
			}
			throw error;
		}
	}
}
