import type {RagConfig} from '../config/index.js';
import {getLanceDbPath} from '../constants.js';
import type {Logger} from '../logger/index.js';
import {InProcessIndexStore} from './in-process.js';
import {LanceIndexStore} from './lance.js';
import type {IndexStore} from './types.js';

export * from './types.js';
export * from './schema.js';
export {BaseIndexStore, cosineSimilarity, partitionRecords, recordProblem} from './base.js';
export {upsertInBatches, type BatchUpsertOptions, type BatchUpsertResult, type FailedBatch} from './batching.js';
export {DenseQueryRouter, type DenseQueryPath} from './dense-paths.js';
export {codeRecordId, codeRecordKey, newMemoryId, uuidV5} from './ids.js';
export {InProcessIndexStore, type InProcessStoreOptions} from './in-process.js';
export {
	LanceIndexStore,
	buildLexicalFilter,
	escapeSqlString,
	type LanceStoreOptions,
} from './lance.js';
export {codeRowCodec, memoryRowCodec, type RowCodec} from './rows.js';

/**
 * Create the configured store (not yet connected).
 */
export function createIndexStore(
	projectRoot: string,
	config: RagConfig,
	logger?: Logger,
): IndexStore {
	const {backend, path, collections} = config.store;
	const dimensions = config.embedding.dimensions;

	switch (backend) {
		case 'in-process':
			return new InProcessIndexStore({dimensions, collections, logger});
		case 'lancedb':
			return new LanceIndexStore({
				path: path ?? getLanceDbPath(projectRoot),
				dimensions,
				collections,
				logger,
			});
	}
}
