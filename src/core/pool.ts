/**
 * Run `worker` over `items` with at most `concurrency` tasks in flight.
 *
 * Results are returned in completion order, not input order. A rejected task
 * rejects the whole pool, so workers that must not cancel their siblings have
 * to settle their own errors.
 */
export const runPool = async <T, R>(
	items: readonly T[],
	concurrency: number,
	worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
	const results: R[] = [];
	const limit = Math.max(
		1,
		Math.min(Math.floor(concurrency) || 1, items.length),
	);
	// Shared by every lane, so each entry is handed out exactly once.
	const pending = items.entries();

	const drain = async (): Promise<void> => {
		for (const [index, item] of pending) {
			results.push(await worker(item, index));
		}
	};

	await Promise.all(Array.from({length: limit}, async () => drain()));
	return results;
};
