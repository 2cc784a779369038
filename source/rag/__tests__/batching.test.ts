/**
 * Batched upserts.
 */

import {describe, it, expect, beforeEach} from 'vitest';
import {createNullLogger} from '../logger/index.js';
import {upsertInBatches} from '../storage/batching.js';
import {InProcessIndexStore} from '../storage/in-process.js';
import type {CollectionName} from '../constants.js';
import type {CodeRecord, RecordOf, UpsertResult} from '../storage/types.js';
import {axis, codeRecord} from './helpers.js';

const DIMS = 4;

function records(count: number): CodeRecord[] {
	return Array.from({length: count}, (_, i) =>
		codeRecord(axis(i % DIMS, DIMS), {symbol: `fn_${i}`}),
	);
}

/**
 * Store whose upsert fails for batches containing a given record id.
 */
class FlakyStore extends InProcessIndexStore {
	readonly batchSizes: number[] = [];
	failingId = '';

	constructor() {
		super({dimensions: DIMS, collections: {codebase: 'codebase', memory: 'memory'}});
	}

	override async upsert<C extends CollectionName>(
		collection: C,
		batch: Array<RecordOf<C>>,
	): Promise<UpsertResult> {
		this.batchSizes.push(batch.length);
		if (batch.some(r => r.id === this.failingId)) {
			throw new Error('connection reset');
		}
		return super.upsert(collection, batch);
	}
}

describe('upsertInBatches', () => {
	let store: FlakyStore;

	beforeEach(async () => {
		store = new FlakyStore();
		await store.connect();
		await store.ensureCollections();
	});

	it('splits records into fixed-size batches', async () => {
		const result = await upsertInBatches(store, 'codebase', records(3), {
			batchSize: 2,
			concurrency: 1,
		});
		expect(store.batchSizes).toEqual([2, 1]);
		expect(result).toEqual({written: 3, rejected: [], failedBatches: []});
	});

	it('reports a failed batch by index and still writes the others', async () => {
		const batch = records(7);
		store.failingId = batch[4]?.id ?? '';
		const result = await upsertInBatches(store, 'codebase', batch, {
			batchSize: 3,
			concurrency: 2,
			logger: createNullLogger(),
		});
		expect(result.written).toBe(4);
		expect(result.failedBatches).toEqual([
			{index: 1, size: 3, message: 'connection reset'},
		]);
		expect(await store.count('codebase')).toBe(4);
	});

	it('collects per-record rejections across batches', async () => {
		const bad = codeRecord([1, 2], {symbol: 'short'});
		const result = await upsertInBatches(store, 'codebase', [...records(2), bad], {
			batchSize: 2,
			concurrency: 1,
		});
		expect(result.written).toBe(2);
		expect(result.rejected).toEqual([
			{id: bad.id, reason: 'vector has 2 dimensions, expected 4'},
		]);
	});

	it('does nothing for an empty list', async () => {
		const result = await upsertInBatches(store, 'codebase', [], {
			batchSize: 10,
			concurrency: 4,
		});
		expect(result).toEqual({written: 0, rejected: [], failedBatches: []});
		expect(store.batchSizes).toEqual([]);
	});
});
