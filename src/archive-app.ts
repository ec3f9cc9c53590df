import mongoose from "mongoose";
import { MongoServerError } from "mongodb";
import * as cli from "./cli/ui.js";
import type { IConfig } from "./config.js";
import validateConfig from "./config_validate.js";
import constants from "./constants.js";
import { Database } from "./handlers/database.js";
import { CredentialStore } from "./source/credentials.js";
import { isUnknownToken, loginWithPassword, MatrixEventSource, setSdkLogLevel } from "./source/matrix-source.js";
import { GridFSBlobStore } from "./store/attachment-blobs.js";
import { MongoArchiveStore } from "./store/mongo-archive-store.js";
import { Archiver } from "./sync/archiver.js";
import type { RunReport } from "./types/archive.js";
import { errorMessage, formatDate } from "./utils.js";

export class ArchiveApp {
	private database: Database;
	private source: MatrixEventSource | null = null;
	private shuttingDown = false;

	constructor(private readonly config: IConfig) {
		this.database = new Database(config.databaseUri, config.dbName);
	}

	/**
	 * One archiving run: connect, log in, sync, archive, disconnect.
	 */
	async run(): Promise<RunReport> {
		cli.printIntro();

		// Validate configuration early
		try {
			validateConfig(this.config);
		} catch (e) {
			cli.printError(`Configuration error: ${errorMessage(e)}`);
			throw e;
		}
		setSdkLogLevel(this.config.matrixSdkLogLevel);

		await this.initializeDatabase();
		this.source = await this.createSource();
		await this.source.start();

		const blobs = new GridFSBlobStore(this.database.handle(), constants.attachmentBucket);
		const archiver = new Archiver(this.source, new MongoArchiveStore(this.database, blobs), {
			roomIds: this.config.roomIds,
			excludedRoomIds: this.config.excludedRoomIds,
			maxAttachmentBytes: this.config.maxAttachmentBytes,
			batchSize: this.config.batchSize,
			knownRecentWindow: this.config.knownRecentWindow,
			roomConcurrency: this.config.roomConcurrency,
			attachmentConcurrency: this.config.attachmentConcurrency,
			onRoomComplete: (report) => cli.printRoomSummary(report)
		});
		const report = await archiver.run();
		cli.printDevices(report.devices);
		cli.printOutro(report);
		cli.printLog(`Run finished ${formatDate(new Date())}.`);
		return report;
	}

	/**
	 * Initialize the database connections: the archive itself and the credential cache
	 */
	private async initializeDatabase(): Promise<void> {
		cli.printLog(`Connecting to database ${this.config.dbName} at ${this.config.databaseUri}`);
		await this.database.connect();
		await this.database.ensureIndexes();

		await mongoose.connect(this.config.databaseUri, {
			dbName: this.config.authDb,
			serverSelectionTimeoutMS: 5000,
			retryWrites: true
		});

		cli.print("Connected to archive DB.");
	}

	/**
	 * Create the Matrix source, logging in when no usable token is at hand
	 */
	private async createSource(): Promise<MatrixEventSource> {
		const cfg = this.config;
		const credStore = new CredentialStore({ mongoose, collectionNamePrefix: cfg.collectionNamePrefix });
		const open = (accessToken: string, deviceId: string) =>
			new MatrixEventSource({
				homeserver: cfg.matrixHomeserver,
				userId: cfg.matrixUserId,
				accessToken,
				deviceId,
				requestTimeoutMs: cfg.requestTimeoutMs,
				syncTimeoutMs: cfg.syncTimeoutMs,
				initialSyncLimit: cfg.matrixSyncLimit,
				authenticatedMedia: cfg.authenticatedMedia
			});

		cli.printLoading(cfg.matrixUserId, cfg.matrixHomeserver);
		if (cfg.matrixAccessToken) {
			return open(cfg.matrixAccessToken, cfg.matrixDeviceId);
		}

		const stored = await credStore.getStoredCredentials(cfg.matrixUserId);
		if (stored) {
			const source = open(stored.accessToken, stored.deviceId);
			try {
				await source.whoami();
				cli.print("Using stored Matrix credentials");
				return source;
			} catch (error) {
				if (!isUnknownToken(error)) throw error;
				cli.printWarning("Stored Matrix token was rejected; logging in again.");
				await credStore.clearCredentials(cfg.matrixUserId);
			}
		}

		if (!cfg.matrixPassword) {
			throw new Error("Matrix password must be provided for initial login");
		}
		const { accessToken, deviceId } = await loginWithPassword(
			cfg.matrixHomeserver,
			cfg.matrixUserId,
			cfg.matrixPassword,
			cfg.matrixDeviceId,
			cfg.matrixDeviceName
		);
		await credStore.storeCredentials({ userId: cfg.matrixUserId, accessToken, deviceId });
		cli.print("Matrix login successful, credentials stored");
		return open(accessToken, deviceId);
	}

	/**
	 * Readable message for a run that could not complete
	 */
	describeError(error: unknown): string {
		if (error instanceof MongoServerError && error.code === 18) {
			return "Authentication failed - please check your database credentials";
		}
		const message = errorMessage(error);
		if (message.includes("Matrix")) {
			return `Matrix client error: ${message}`;
		}
		return `Archiving run failed: ${message}`;
	}

	/**
	 * Gracefully shutdown the application
	 */
	async shutdown(): Promise<void> {
		if (this.shuttingDown) return;
		this.shuttingDown = true;

		if (this.source) {
			try {
				this.source.stop();
			} catch (e) {
				cli.printLog(`Shutdown: stopClient failed: ${e}`);
			}
		}
		try {
			await this.database.disconnect();
		} catch (e) {
			cli.printLog(`Shutdown: database disconnect failed: ${e}`);
		}
		try {
			await mongoose.disconnect();
		} catch (e) {
			cli.printLog(`Shutdown: mongoose disconnect failed: ${e}`);
		}
	}
}
