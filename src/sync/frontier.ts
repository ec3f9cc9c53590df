import type { RawEvent } from "../types/source.js";
import type { CursorPaginator } from "./paginator.js";

export interface ClassifiedBatch {
	/** Events not in the known-recent window, in delivery order. */
	fresh: RawEvent[];
	known: number;
	/** The batch touched archived history; no further batches are pulled. */
	terminal: boolean;
}

/**
 * Splits each batch against the IDs already archived for a room. A batch that
 * contains any known ID is terminal, but its unknown events are still returned
 * whole, wherever they sit in the batch.
 */
export class FrontierDetector {
	constructor(private readonly knownIds: ReadonlySet<string>) {}

	classify(batch: readonly RawEvent[]): ClassifiedBatch {
		const incoming = new Set(batch.map((e) => e.eventId));
		const unseen = new Set([...incoming].filter((id) => !this.knownIds.has(id)));

		const fresh: RawEvent[] = [];
		let known = 0;
		for (const event of batch) {
			if (unseen.has(event.eventId)) {
				fresh.push(event);
			} else {
				known++;
			}
		}
		return { fresh, known, terminal: known > 0 };
	}

	/** True for a room never archived before: every batch is fresh until history ends. */
	get isFirstArchive(): boolean {
		return this.knownIds.size === 0;
	}
}

/** Pull batches until a terminal batch or the end of history. */
export async function* walkToFrontier(paginator: CursorPaginator, detector: FrontierDetector): AsyncGenerator<ClassifiedBatch> {
	for (;;) {
		const batch = await paginator.nextBatch();
		if (batch === null) return;
		const classified = detector.classify(batch);
		yield classified;
		if (classified.terminal) return;
	}
}
