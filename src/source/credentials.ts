import mongoose from "mongoose";
import * as cli from "../cli/ui.js";

interface CredentialStoreOptions {
	mongoose: typeof mongoose;
	collectionNamePrefix: string;
}

export interface StoredCredentials {
	userId: string;
	accessToken: string;
	deviceId: string;
}

function isStoredCredentials(value: unknown): value is StoredCredentials {
	if (typeof value !== "object" || value === null) return false;
	const v: Record<string, unknown> = { ...value };
	return typeof v.userId === "string" && typeof v.accessToken === "string" && typeof v.deviceId === "string";
}

/**
 * Access tokens from earlier password logins, cached in the auth database so
 * later runs skip the login.
 */
export class CredentialStore {
	private mongoose: typeof mongoose;
	private collectionNamePrefix: string;

	constructor(options: CredentialStoreOptions) {
		this.mongoose = options.mongoose;
		this.collectionNamePrefix = options.collectionNamePrefix;
	}

	private collection() {
		if (!this.mongoose.connection.db) {
			throw new Error("Database connection not available");
		}
		return this.mongoose.connection.db.collection(`${this.collectionNamePrefix}_credentials`);
	}

	/**
	 * Store Matrix credentials in MongoDB
	 */
	async storeCredentials(credentials: StoredCredentials): Promise<void> {
		await this.collection().replaceOne({ userId: credentials.userId }, { ...credentials }, { upsert: true });
		cli.printLog(`Matrix credentials stored for ${credentials.userId}`);
	}

	/**
	 * Retrieve stored Matrix credentials from MongoDB
	 */
	async getStoredCredentials(userId: string): Promise<StoredCredentials | null> {
		const result = await this.collection().findOne({ userId }, { projection: { _id: 0 } });
		if (isStoredCredentials(result)) {
			cli.printLog(`Matrix credentials found for ${userId}`);
			return { userId: result.userId, accessToken: result.accessToken, deviceId: result.deviceId };
		}
		cli.printLog(`No Matrix credentials found for ${userId}`);
		return null;
	}

	/**
	 * Clear stored credentials, e.g. after the homeserver rejected the token
	 */
	async clearCredentials(userId: string): Promise<void> {
		await this.collection().deleteOne({ userId });
		cli.printLog(`Matrix credentials cleared for ${userId}`);
	}
}
