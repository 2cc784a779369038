import pLimit from 'p-limit';
import type {CollectionName} from '../constants.js';
import type {Logger} from '../logger/index.js';
import type {IndexStore, RecordOf, RejectedRecord} from './types.js';

export interface BatchUpsertOptions {
	batchSize: number;
	concurrency: number;
	logger?: Logger;
}

export interface FailedBatch {
	/** 0-based position of the batch in the split */
	index: number;
	size: number;
	message: string;
}

export interface BatchUpsertResult {
	written: number;
	rejected: RejectedRecord[];
	failedBatches: FailedBatch[];
}

/**
 * Upsert records in fixed-size batches with bounded concurrency.
 *
 * A batch whose request fails is reported with its index; other batches
 * still run. Order does not matter since record ids are content-derived.
 */
export async function upsertInBatches<C extends CollectionName>(
	store: IndexStore,
	collection: C,
	records: Array<RecordOf<C>>,
	options: BatchUpsertOptions,
): Promise<BatchUpsertResult> {
	const limit = pLimit(Math.max(1, options.concurrency));
	const size = Math.max(1, options.batchSize);

	const batches: Array<Array<RecordOf<C>>> = [];
	for (let i = 0; i < records.length; i += size) {
		batches.push(records.slice(i, i + size));
	}

	const outcomes = await Promise.all(
		batches.map((batch, index) =>
			limit(async () => {
				try {
					const result = await store.upsert(collection, batch);
					options.logger?.debug('Storage', 'Upserted batch', {
						collection,
						index,
						written: result.written,
						rejected: result.rejected.length,
					});
					return {index, size: batch.length, result, error: null};
				} catch (error) {
					const failure = error instanceof Error ? error : new Error(String(error));
					options.logger?.error(
						'Storage',
						`Batch ${index} (${batch.length} records) failed for ${collection}`,
						failure,
					);
					return {index, size: batch.length, result: null, error: failure};
				}
			}),
		),
	);

	const summary: BatchUpsertResult = {written: 0, rejected: [], failedBatches: []};
	for (const outcome of outcomes) {
		if (outcome.result) {
			summary.written += outcome.result.written;
			summary.rejected.push(...outcome.result.rejected);
		} else if (outcome.error) {
			summary.failedBatches.push({
				index: outcome.index,
				size: outcome.size,
				message: outcome.error.message,
			});
		}
	}
	return summary;
}
