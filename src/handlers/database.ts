import { MongoClient, Db, Collection, Document, IndexDescription } from "mongodb";
import * as cli from "../cli/ui.js";
import config from "../config.js";

enum CollectionName {
	Rooms = "rooms",
	Members = "members",
	Devices = "devices",
	Events = "events",
	Attachments = "attachments"
}

// Natural keys of each collection are unique; the events timeline index backs the known-recent window query.
const INDEXES: Record<CollectionName, IndexDescription[]> = {
	[CollectionName.Rooms]: [{ key: { roomId: 1 }, name: "uniq_room", unique: true }],
	[CollectionName.Members]: [{ key: { roomId: 1, userId: 1 }, name: "uniq_member", unique: true }],
	[CollectionName.Devices]: [{ key: { userId: 1, deviceId: 1 }, name: "uniq_device", unique: true }],
	[CollectionName.Events]: [
		{ key: { eventId: 1 }, name: "uniq_event", unique: true },
		{ key: { roomId: 1, originServerTs: -1 }, name: "room_timeline" }
	],
	[CollectionName.Attachments]: [
		{ key: { fetchUrlMatrix: 1 }, name: "uniq_matrix_url", unique: true },
		{ key: { fetchUrlHttp: 1 }, name: "uniq_http_url", unique: true }
	]
};

class Database {
	private readonly dbName: string;
	private readonly uri: string;

	private client: MongoClient | null = null;
	private db: Db | null = null;

	public constructor(uri: string = config.databaseUri, dbName: string = config.dbName) {
		this.uri = uri;
		this.dbName = dbName;
	}

	public async connect(): Promise<Db> {
		if (this.db) {
			return this.db;
		}
		try {
			this.client = await MongoClient.connect(this.uri, { serverSelectionTimeoutMS: 5000, retryWrites: true });
			this.db = this.client.db(this.dbName);
			return this.db;
		} catch (error) {
			cli.printError(`Error connecting to archive DB. ${error}`);
			throw error;
		}
	}

	public async disconnect(): Promise<void> {
		if (this.client) {
			await this.client.close();
			this.client = null;
			this.db = null;
		}
	}

	public get name(): string {
		return this.dbName;
	}

	public async ensureIndexes(): Promise<void> {
		const db = await this.connect();
		for (const name of Object.values(CollectionName)) {
			await db.collection(name).createIndexes(INDEXES[name]);
		}
		cli.printLog(`◇ Ensured indexes on ${Object.values(CollectionName).join(", ")}`);
	}

	public collection<T extends Document>(name: CollectionName): Collection<T> {
		if (!this.db) {
			throw new Error("Database not connected");
		}
		return this.db.collection<T>(name);
	}

	public handle(): Db {
		if (!this.db) {
			throw new Error("Database not connected");
		}
		return this.db;
	}
}

export { Database, CollectionName, INDEXES };
