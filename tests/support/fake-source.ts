import {
  DeviceInfo,
  DownloadResponse,
  EventSource,
  Lookup,
  MemberInfo,
  MessagePage,
  RawEvent,
  RoomView
} from '../../src/types/source.js';

export const MEDIA_BASE = 'https://hs.test/_matrix/media/download/';

export function makeEvent(id: string, ts: number, content: Record<string, unknown> = { msgtype: 'm.text', body: id }): RawEvent {
  const raw = { event_id: id, sender: '@alice:hs.test', type: 'm.room.message', content, origin_server_ts: ts };
  return { eventId: id, sender: '@alice:hs.test', type: 'm.room.message', content, originServerTs: ts, raw };
}

export function fileEvent(id: string, ts: number, ref: string, msgtype: 'm.file' | 'm.image' = 'm.file'): RawEvent {
  return makeEvent(id, ts, { msgtype, body: `${id}.bin`, url: ref, info: { size: 5, mimetype: 'application/octet-stream' } });
}

/** Events e{from}..e{to}, newest first, timestamped 1000 ms apart. */
export function history(from: number, to: number): RawEvent[] {
  const events: RawEvent[] = [];
  for (let i = from; i >= to; i--) events.push(makeEvent(`$e${i}`, i * 1000));
  return events;
}

export interface ScriptedRoom {
  roomId: string;
  displayName?: string;
  /** Whole room history, newest first. */
  history: RawEvent[];
  /** How many of the newest events the sync already delivered. */
  resident?: number;
  members?: MemberInfo[];
  topic?: Lookup<string>;
  /** Keep returning a cursor after the last page. */
  trailingCursor?: boolean;
  /** Reject every /messages request after this many. */
  failAfterRequests?: number;
}

export type ScriptedFile =
  | { status: string; body: Buffer; contentLength?: number | null }
  | { error: Error };

export class ScriptedRoomView implements RoomView {
  constructor(private readonly room: ScriptedRoom) {}

  get roomId(): string {
    return this.room.roomId;
  }

  get displayName(): string {
    return this.room.displayName ?? this.room.roomId;
  }

  get residentEvents(): RawEvent[] {
    return this.room.history.slice(0, this.room.resident ?? 0);
  }

  get prevBatch(): string | null {
    const resident = this.room.resident ?? 0;
    if (resident === 0) return null;
    return resident < this.room.history.length ? String(resident) : null;
  }

  async getJoinedMembers(): Promise<MemberInfo[]> {
    return this.room.members ?? [];
  }

  async getTopic(): Promise<Lookup<string>> {
    return this.room.topic ?? { kind: 'absent' };
  }
}

/**
 * EventSource over in-memory rooms. Cursors are offsets into a room's
 * history; media references resolve under MEDIA_BASE.
 */
export class ScriptedSource implements EventSource {
  rooms: ScriptedRoom[];
  devices: DeviceInfo[] | Error = [];
  files = new Map<string, ScriptedFile>();
  pageSize = 100;
  chunkSize = 4;
  roomListError: Error | null = null;

  paginateCalls: { roomId: string; cursor: string | null; limit: number }[] = [];
  downloads: string[] = [];
  cancelled: string[] = [];

  constructor(rooms: ScriptedRoom[] = []) {
    this.rooms = rooms;
  }

  private room(roomId: string): ScriptedRoom {
    const room = this.rooms.find((r) => r.roomId === roomId);
    if (!room) throw new Error(`unknown room ${roomId}`);
    return room;
  }

  requestsFor(roomId: string): number {
    return this.paginateCalls.filter((c) => c.roomId === roomId).length;
  }

  async listRooms(): Promise<Map<string, RoomView>> {
    if (this.roomListError) throw this.roomListError;
    return new Map(this.rooms.map((r): [string, RoomView] => [r.roomId, new ScriptedRoomView(r)]));
  }

  async getDevices(): Promise<DeviceInfo[]> {
    if (this.devices instanceof Error) throw this.devices;
    return this.devices;
  }

  async paginateMessages(roomId: string, cursor: string | null, limit: number): Promise<MessagePage> {
    const room = this.room(roomId);
    this.paginateCalls.push({ roomId, cursor, limit });
    if (room.failAfterRequests !== undefined && this.requestsFor(roomId) > room.failAfterRequests) {
      throw new Error('boom');
    }
    const offset = cursor === null ? 0 : Number(cursor);
    const events = room.history.slice(offset, offset + Math.min(limit, this.pageSize));
    const end = offset + events.length;
    const more = end < room.history.length || room.trailingCursor === true;
    return { events, nextCursor: more ? String(end) : null };
  }

  resolveContentUrl(ref: string): string | null {
    if (!ref.startsWith('mxc://')) return null;
    return MEDIA_BASE + ref.slice('mxc://'.length);
  }

  async download(httpUrl: string): Promise<DownloadResponse> {
    this.downloads.push(httpUrl);
    const file = this.files.get(httpUrl);
    if (!file) throw new Error(`no file at ${httpUrl}`);
    if ('error' in file) throw file.error;

    const { body } = file;
    const chunkSize = this.chunkSize;
    async function* chunks(): AsyncGenerator<Uint8Array> {
      for (let i = 0; i < body.length; i += chunkSize) yield body.subarray(i, i + chunkSize);
    }
    return {
      status: file.status,
      contentLength: file.contentLength === undefined ? body.length : file.contentLength,
      body: chunks(),
      cancel: () => {
        this.cancelled.push(httpUrl);
      }
    };
  }
}
