function formatDate(lastSeenTimestamp: number | Date, now: Date = new Date()): string {
	const lastSeenDate = new Date(lastSeenTimestamp);

	const isToday = now.toDateString() === lastSeenDate.toDateString();
	const yesterday = new Date(now);
	yesterday.setDate(yesterday.getDate() - 1);
	const isYesterday = yesterday.toDateString() === lastSeenDate.toDateString();

	const timeString = lastSeenDate.toLocaleTimeString(undefined, {
		hour: "2-digit",
		minute: "2-digit",
		timeZone: "GMT",
		hour12: false
	});

	if (isToday) {
		return `today at ${timeString}`;
	} else if (isYesterday) {
		return `yesterday at ${timeString}`;
	} else {
		return `${lastSeenDate.toLocaleDateString()} at ${timeString}`;
	}
}

/** Source timestamps are milliseconds since the Unix epoch. */
function toInstant(msEpoch: number): Date {
	return new Date(msEpoch);
}

function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}

/**
 * Run `worker` over `items` with at most `limit` in flight. Results keep the
 * input order. Workers are expected to contain their own errors; a rejection
 * rejects the pool.
 */
async function runPool<T, R>(items: readonly T[], limit: number, worker: (item: T, index: number) => Promise<R>): Promise<R[]> {
	const results: R[] = new Array(items.length);
	let next = 0;
	const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
		while (next < items.length) {
			const index = next++;
			results[index] = await worker(items[index], index);
		}
	});
	await Promise.all(lanes);
	return results;
}

/** Serializes async sections per key; unrelated keys run freely. */
class KeyedLock {
	private tails = new Map<string, Promise<void>>();

	async run<T>(key: string, section: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => undefined;
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);
		await previous;
		try {
			return await section();
		} finally {
			release();
			if (this.tails.get(key) === tail) this.tails.delete(key);
		}
	}

	get size(): number {
		return this.tails.size;
	}
}

export { formatDate, toInstant, errorMessage, runPool, KeyedLock };
