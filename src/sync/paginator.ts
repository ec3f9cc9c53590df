import * as cli from "../cli/ui.js";
import constants from "../constants.js";
import type { EventSource, RawEvent, RoomView } from "../types/source.js";

/**
 * One backward walk over a room's history, newest first: the room view's
 * resident events, then /messages pages from its backward cursor. Pages are
 * re-sliced into batches of at most `batchSize`. Request errors propagate.
 * Reopen to restart.
 */
export class CursorPaginator {
	private buffer: RawEvent[];
	private cursor: string | null;
	private started: boolean;
	private exhausted = false;
	private requests = 0;

	constructor(
		private readonly source: EventSource,
		private readonly room: RoomView,
		private readonly batchSize: number = constants.batchSize
	) {
		if (!Number.isInteger(batchSize) || batchSize <= 0) throw new Error(`Invalid batch size ${batchSize}`);
		this.buffer = [...room.residentEvents];
		this.cursor = room.prevBatch;
		// resident events with no cursor behind them are the whole history
		this.started = room.residentEvents.length > 0;
	}

	/** Number of /messages requests issued so far. */
	get requestCount(): number {
		return this.requests;
	}

	/** The next batch, or null once the history is exhausted. */
	async nextBatch(): Promise<RawEvent[] | null> {
		while (this.buffer.length < this.batchSize && !this.exhausted) {
			await this.fetchPage();
		}
		if (this.buffer.length === 0) return null;
		return this.buffer.splice(0, this.batchSize);
	}

	private async fetchPage(): Promise<void> {
		// a missing cursor is only meaningful on the first request ("start at the latest event")
		if (this.started && this.cursor === null) {
			this.exhausted = true;
			return;
		}
		this.started = true;
		this.requests++;
		const page = await this.source.paginateMessages(this.room.roomId, this.cursor, this.batchSize);
		if (page.events.length === 0) {
			this.exhausted = true;
			return;
		}
		cli.printLog(`Read ${page.events.length} events from ${this.room.roomId}...`);
		this.buffer.push(...page.events);
		this.cursor = page.nextCursor;
	}
}

export function openPaginator(source: EventSource, room: RoomView, batchSize: number = constants.batchSize): CursorPaginator {
	return new CursorPaginator(source, room, batchSize);
}
