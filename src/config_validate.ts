import config, { IConfig } from "./config.js";

function isNonEmpty(s?: string): boolean {
	return !!(s && String(s).trim().length > 0);
}

function assert(cond: boolean, msg: string): void {
	if (!cond) throw new Error(msg);
}

function isPositiveInt(n: number): boolean {
	return Number.isInteger(n) && n > 0;
}

export function validateConfig(cfg: IConfig = config): void {
	// Matrix
	assert(isNonEmpty(cfg.matrixHomeserver), "MATRIX_HOST is required");
	assert(isNonEmpty(cfg.matrixUserId), "MATRIX_USER is required (e.g., @user:server)");
	assert(cfg.matrixUserId.startsWith("@") && cfg.matrixUserId.includes(":"), "MATRIX_USER must be like @user:server");
	assert(
		isNonEmpty(cfg.matrixPassword) || isNonEmpty(cfg.matrixAccessToken),
		"Provide MATRIX_PASSWORD or MATRIX_TOKEN"
	);

	// Storage
	assert(isNonEmpty(cfg.databaseUri), "ARCHIVE_DATABASE_URI is required");
	assert(isNonEmpty(cfg.dbName), "DB_NAME is required");

	// Numbers
	assert(isPositiveInt(cfg.maxAttachmentBytes), "MAX_ATTACHMENT_BYTES must be a positive integer");
	assert(isPositiveInt(cfg.requestTimeoutMs), "REQUEST_TIMEOUT_MS must be a positive integer");
	assert(isPositiveInt(cfg.syncTimeoutMs), "SYNC_TIMEOUT_MS must be a positive integer");
	assert(isPositiveInt(cfg.matrixSyncLimit), "MATRIX_CLIENT_SYNC_LIMIT must be a positive integer");
	assert(isPositiveInt(cfg.roomConcurrency), "ROOM_CONCURRENCY must be a positive integer");
	assert(isPositiveInt(cfg.attachmentConcurrency), "ATTACHMENT_CONCURRENCY must be a positive integer");

	// Rooms
	const overlap = cfg.roomIds.filter((id) => cfg.excludedRoomIds.includes(id));
	assert(overlap.length === 0, `Rooms both targeted and excluded: ${overlap.join(", ")}`);
}

export default validateConfig;
