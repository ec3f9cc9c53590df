import * as cli from "../cli/ui.js";
import constants from "../constants.js";
import type { ArchiveStore } from "../store/archive-store.js";
import { countStatuses } from "../store/archive-store.js";
import type { DeviceReport, EventRecord, RoomReport, RunReport } from "../types/archive.js";
import type { EventSource, RawEvent, RoomView } from "../types/source.js";
import { errorMessage, runPool, toInstant } from "../utils.js";
import { AttachmentFetcher, AttachmentOutcome, emptyAttachmentCounts, tallyOutcome } from "./attachments.js";
import { FrontierDetector, walkToFrontier } from "./frontier.js";
import { openPaginator } from "./paginator.js";

export interface ArchiverOptions {
	/** Rooms to archive, in order; empty means every joined room. */
	roomIds?: string[];
	excludedRoomIds?: string[];
	maxAttachmentBytes?: number;
	batchSize?: number;
	knownRecentWindow?: number;
	roomConcurrency?: number;
	attachmentConcurrency?: number;
	now?: () => Date;
	onRoomComplete?: (report: RoomReport) => void;
}

type Resolved = Required<Omit<ArchiverOptions, "onRoomComplete">> & Pick<ArchiverOptions, "onRoomComplete">;

function newReport(roomId: string, displayName: string): RoomReport {
	return {
		roomId,
		displayName,
		status: "archived",
		newEvents: 0,
		newMembers: 0,
		batches: 0,
		attachments: emptyAttachmentCounts()
	};
}

/**
 * Drives one archiving run: the device list, then per room its metadata,
 * joined members and new history down to the frontier. A failing room is
 * reported and the run moves on; batches it already committed stay.
 */
export class Archiver {
	private readonly options: Resolved;
	private readonly attachments: AttachmentFetcher;

	constructor(
		private readonly source: EventSource,
		private readonly store: ArchiveStore,
		options: ArchiverOptions = {}
	) {
		this.options = {
			roomIds: options.roomIds ?? [],
			excludedRoomIds: options.excludedRoomIds ?? [],
			maxAttachmentBytes: options.maxAttachmentBytes ?? constants.defaultMaxAttachmentBytes,
			batchSize: options.batchSize ?? constants.batchSize,
			knownRecentWindow: options.knownRecentWindow ?? constants.knownRecentWindow,
			roomConcurrency: options.roomConcurrency ?? 1,
			attachmentConcurrency: options.attachmentConcurrency ?? 1,
			now: options.now ?? (() => new Date()),
			onRoomComplete: options.onRoomComplete
		};
		this.attachments = new AttachmentFetcher(source, store, this.options.maxAttachmentBytes, this.options.now);
	}

	async run(): Promise<RunReport> {
		const devices = await this.archiveDevices();

		// without a room listing there is nothing to walk
		const rooms = await this.source.listRooms();
		const targets = this.targets(rooms);

		const reports = await runPool(targets, this.options.roomConcurrency, async (roomId) => {
			const report = await this.archiveRoom(roomId, rooms.get(roomId) ?? null);
			this.options.onRoomComplete?.(report);
			return report;
		});
		return { devices, rooms: reports };
	}

	/** Configured rooms in order, each once; every joined room when none are configured. */
	private targets(rooms: Map<string, RoomView>): string[] {
		if (this.options.roomIds.length === 0) return [...rooms.keys()];
		const unique = [...new Set(this.options.roomIds)];
		if (unique.length < this.options.roomIds.length) {
			cli.printWarning(`Room list names ${this.options.roomIds.length - unique.length} room(s) more than once; archiving each once.`);
		}
		return unique;
	}

	async archiveDevices(): Promise<DeviceReport> {
		cli.print("Archiving device list for user.");
		try {
			const devices = await this.source.getDevices();
			const retrievalTs = this.options.now();
			const statuses = await this.store.upsertDevices(
				devices.map((d) => ({
					userId: d.userId,
					deviceId: d.deviceId,
					displayName: d.displayName,
					lastSeenTs: d.lastSeenTs === null ? null : toInstant(d.lastSeenTs),
					lastSeenIp: d.lastSeenIp,
					raw: d.raw,
					retrievalTs
				}))
			);
			return countStatuses(statuses);
		} catch (error) {
			cli.printError(`Device list archival failed: ${errorMessage(error)}`);
			return { inserted: 0, present: 0, error: errorMessage(error) };
		}
	}

	async archiveRoom(roomId: string, view: RoomView | null): Promise<RoomReport> {
		const report = newReport(roomId, view?.displayName ?? roomId);
		if (this.options.excludedRoomIds.includes(roomId)) {
			report.status = "skipped";
			cli.print(`Skipping Room: '${report.displayName}' (Room ID: ${roomId}) because it is on the EXCLUDED list.`);
			return report;
		}
		if (!view) {
			report.status = "failed";
			report.error = "room not found among joined rooms";
			cli.printError(`Room ${roomId} is not among the joined rooms.`);
			return report;
		}

		cli.print(`Archiving Room: '${view.displayName}' (Room ID: '${roomId}')`);
		try {
			await this.archiveMetadata(view);
			report.newMembers = await this.archiveMembers(view);
			await this.archiveEvents(view, report);
		} catch (error) {
			report.status = "failed";
			report.error = errorMessage(error);
			cli.printError(`Archiving ${roomId} stopped: ${report.error}`);
		}
		return report;
	}

	private async archiveMetadata(view: RoomView): Promise<void> {
		cli.print(" | Backing up room metadata...");
		const topic = await view.getTopic();
		if (topic.kind === "failed") {
			cli.printLog(`Topic lookup for ${view.roomId} failed (${topic.reason}); storing no topic.`);
		}
		await this.store.upsertRoom({
			roomId: view.roomId,
			displayName: view.displayName,
			topic: topic.kind === "ok" ? topic.value : null,
			retrievalTs: this.options.now()
		});
	}

	private async archiveMembers(view: RoomView): Promise<number> {
		cli.print(" | Backing up list of room members...");
		const members = await view.getJoinedMembers();
		const retrievalTs = this.options.now();
		const statuses = await this.store.upsertMembers(
			members.map((m) => ({
				roomId: view.roomId,
				userId: m.userId,
				displayName: m.displayName,
				avatarUrl: m.avatarUrl,
				retrievalTs
			}))
		);
		return countStatuses(statuses).inserted;
	}

	private async archiveEvents(view: RoomView, report: RoomReport): Promise<void> {
		cli.print(" | Backing up list of room events...");
		const known = await this.store.knownRecentEventIds(view.roomId, this.options.knownRecentWindow);
		const detector = new FrontierDetector(known);
		if (detector.isFirstArchive) cli.printLog(`No archived events for ${view.roomId}; walking its whole history.`);

		const paginator = openPaginator(this.source, view, this.options.batchSize);
		for await (const batch of walkToFrontier(paginator, detector)) {
			report.batches++;
			const statuses = await this.store.upsertEvents(batch.fresh.map((e) => this.toRecord(view.roomId, e)));
			report.newEvents += countStatuses(statuses).inserted;

			const outcomes = await runPool(batch.fresh, this.options.attachmentConcurrency, (e) => this.attachments.maybeFetch(e));
			outcomes.forEach((o: AttachmentOutcome | null) => {
				if (o) tallyOutcome(report.attachments, o);
			});
			cli.printLog(
				`Batch ${report.batches} for ${view.roomId}: ${batch.fresh.length} new, ${batch.known} known${batch.terminal ? " (frontier reached)" : ""}`
			);
		}
		cli.print(` | Archived ${report.newEvents} new events.`);
	}

	private toRecord(roomId: string, event: RawEvent): EventRecord {
		return {
			eventId: event.eventId,
			roomId,
			sender: event.sender,
			type: event.type,
			content: event.content,
			originServerTs: toInstant(event.originServerTs),
			raw: event.raw,
			retrievalTs: this.options.now()
		};
	}
}
