import * as process from "process";
import * as dotenv from "dotenv";
import constants from "./constants.js";
dotenv.config();

// Config Interface
export interface IConfig {
	// Matrix account
	matrixHomeserver: string; // Matrix homeserver URL
	matrixUserId: string; // Matrix user ID (@user:server.com)
	matrixPassword?: string; // Password for login (if no token)
	matrixAccessToken?: string; // Access token, skips login entirely
	matrixDeviceId: string; // Fixed device ID so repeated logins reuse one device
	matrixDeviceName: string; // Human-friendly device display name
	matrixSyncLimit: number; // initial sync timeline limit per room
	authenticatedMedia: boolean; // download through /_matrix/client/v1/media

	// Rooms
	roomIds: string[]; // empty = every joined room
	excludedRoomIds: string[];

	// Storage
	databaseUri: string;
	dbName: string;
	authDb: string; // credential cache database
	collectionNamePrefix: string;

	// Limits
	maxAttachmentBytes: number;
	requestTimeoutMs: number;
	syncTimeoutMs: number;
	batchSize: number;
	knownRecentWindow: number;
	roomConcurrency: number;
	attachmentConcurrency: number;

	logLevel: string; // App CLI log level: silent|error|warn|info|debug
	matrixSdkLogLevel: string; // SDK logger level: silent|error|warn|info|debug
}

type Env = Record<string, string | undefined>;

export function splitList(value?: string): string[] {
	return (value || "")
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

function intOr(value: string | undefined, fallback: number): number {
	if (value === undefined || value.trim() === "") return fallback;
	return Number(value);
}

export function loadConfig(env: Env = process.env): IConfig {
	const dbName = env.DB_NAME || "matrixArchive";
	return Object.freeze({
		matrixHomeserver: env.MATRIX_HOST || "https://matrix.org",
		matrixUserId: env.MATRIX_USER || "",
		matrixPassword: env.MATRIX_PASSWORD || undefined,
		matrixAccessToken: env.MATRIX_TOKEN || undefined,
		matrixDeviceId: env.MATRIX_DEVICE_ID || "Matrix Archiver",
		matrixDeviceName: env.MATRIX_DEVICE_NAME || "Matrix Archiver",
		matrixSyncLimit: intOr(env.MATRIX_CLIENT_SYNC_LIMIT, 50),
		authenticatedMedia: (env.AUTHENTICATED_MEDIA || "true").toLowerCase() === "true",

		roomIds: splitList(env.MATRIX_ROOM_IDS),
		excludedRoomIds: splitList(env.EXCLUDED_MATRIX_ROOM_IDS),

		databaseUri: env.ARCHIVE_DATABASE_URI || "mongodb://localhost:27017",
		dbName,
		authDb: env.AUTH_DB || `${dbName}Auth`,
		collectionNamePrefix: env.COLLECTION_NAME_PREFIX || `${dbName.toLowerCase()}MatrixSession`,

		maxAttachmentBytes: intOr(env.MAX_ATTACHMENT_BYTES, constants.defaultMaxAttachmentBytes),
		requestTimeoutMs: intOr(env.REQUEST_TIMEOUT_MS, 60000),
		syncTimeoutMs: intOr(env.SYNC_TIMEOUT_MS, 300000),
		batchSize: constants.batchSize,
		knownRecentWindow: constants.knownRecentWindow,
		roomConcurrency: intOr(env.ROOM_CONCURRENCY, 1),
		attachmentConcurrency: intOr(env.ATTACHMENT_CONCURRENCY, 1),

		logLevel: env.LOG_LEVEL || "info",
		matrixSdkLogLevel: env.MATRIX_SDK_LOG_LEVEL || "error"
	});
}

// Config
export const config: IConfig = loadConfig();

export default config;
