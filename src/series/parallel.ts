/**
 * Partitioned fan-out for parApply.
 *
 * The index space is cut into contiguous ranges, one per worker. Each
 * worker fills its own output chunk and yields to the event loop every
 * `batchSize` elements so the others make progress. `Promise.all` is the
 * completion barrier; chunks are concatenated in range order, so the
 * output order never depends on scheduling.
 *
 * Closures cannot be sent to worker_threads, so workers here are
 * cooperative tasks on the main thread.
 */

import { setImmediate as yieldToLoop } from "node:timers/promises";
import { getConfig } from "../config.ts";
import { createLogger } from "../utils/logger.ts";

const log = createLogger("parallel");

export interface ParallelOptions {
	/** Worker count. Default: config `parallelism` */
	workers?: number;
	/** Elements computed between yields. Default: config `parallelBatchSize` */
	batchSize?: number;
}

export interface IndexRange {
	start: number;
	end: number;
}

/** Split [0, length) into at most `workers` contiguous, non-empty ranges */
export function partitionRanges(length: number, workers: number): IndexRange[] {
	const count = Math.max(1, Math.min(Math.floor(workers), length));
	const base = Math.floor(length / count);
	const extra = length % count;

	const ranges: IndexRange[] = [];
	let start = 0;
	for (let w = 0; w < count; w++) {
		const size = base + (w < extra ? 1 : 0);
		ranges.push({ start, end: start + size });
		start += size;
	}
	return ranges;
}

async function runWorker<R>(range: IndexRange, fn: (index: number) => R, batchSize: number): Promise<R[]> {
	const out: R[] = new Array(range.end - range.start);
	for (let i = range.start; i < range.end; i++) {
		out[i - range.start] = fn(i);
		if ((i - range.start + 1) % batchSize === 0) {
			await yieldToLoop();
		}
	}
	return out;
}

/** Map every index in [0, length) through `fn`, fanned out over workers */
export async function parallelMap<R>(
	length: number,
	fn: (index: number) => R,
	options: ParallelOptions = {},
): Promise<R[]> {
	const config = getConfig();
	const workers = options.workers ?? config.parallelism;
	const batchSize = Math.max(1, options.batchSize ?? config.parallelBatchSize);
	const ranges = partitionRanges(length, workers);

	log.debug(`parallelMap: ${length} elements over ${ranges.length} worker(s)`);

	const chunks = await Promise.all(ranges.map((range) => runWorker(range, fn, batchSize)));

	const out: R[] = [];
	for (const chunk of chunks) {
		for (const value of chunk) out.push(value);
	}
	return out;
}
