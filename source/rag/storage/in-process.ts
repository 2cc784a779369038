import {StoreNotConnectedError} from '../errors.js';
import type {Logger} from '../logger/index.js';
import {BaseIndexStore, cosineSimilarity, partitionRecords} from './base.js';
import {codeRowCodec, memoryRowCodec} from './rows.js';
import type {
	CodeRecord,
	CollectionStore,
	CollectionStores,
	IndexRecord,
	LexicalHit,
	MemoryRecord,
	ScoredHit,
	UpsertResult,
} from './types.js';

export interface InProcessStoreOptions {
	dimensions: number;
	collections: {codebase: string; memory: string};
	logger?: Logger;
}

/**
 * Map-backed collection. Scan order is first-insertion order; overwriting
 * an id keeps its original position.
 */
class InProcessCollection<R extends IndexRecord> implements CollectionStore<R> {
	private readonly records = new Map<string, R>();

	constructor(
		readonly name: string,
		private readonly dimensions: number,
		private readonly lexicalText: (payload: R['payload']) => string[],
	) {}

	async upsert(records: R[]): Promise<UpsertResult> {
		const {valid, rejected} = partitionRecords(records, this.dimensions);
		for (const record of valid) {
			this.records.set(record.id, {...record, vector: [...record.vector]});
		}
		return {written: valid.length, rejected};
	}

	async denseSearch(
		vector: number[],
		limit: number,
	): Promise<Array<ScoredHit<R['payload']>>> {
		if (vector.length !== this.dimensions) {
			throw new Error(
				`Query vector has ${vector.length} dimensions, expected ${this.dimensions}`,
			);
		}

		const scored = [...this.records.values()].map(record => ({
			id: record.id,
			score: cosineSimilarity(vector, record.vector),
			payload: record.payload,
		}));
		// Array.prototype.sort is stable: equal scores keep scan order
		scored.sort((a, b) => b.score - a.score);
		return scored.slice(0, Math.max(0, limit));
	}

	async lexicalSearch(
		tokens: string[],
		limit: number,
	): Promise<Array<LexicalHit<R['payload']>>> {
		if (tokens.length === 0 || limit <= 0) return [];

		const hits: Array<LexicalHit<R['payload']>> = [];
		for (const record of this.records.values()) {
			const fields = this.lexicalText(record.payload);
			if (tokens.some(token => fields.some(field => field.includes(token)))) {
				hits.push({id: record.id, payload: record.payload});
				if (hits.length >= limit) break;
			}
		}
		return hits;
	}

	async count(): Promise<number> {
		return this.records.size;
	}
}

/**
 * Ephemeral store held in process memory.
 */
export class InProcessIndexStore extends BaseIndexStore {
	readonly backend = 'in-process' as const;
	private readonly options: InProcessStoreOptions;
	private connected = false;
	private handles: CollectionStores | null = null;

	constructor(options: InProcessStoreOptions) {
		super();
		this.options = options;
	}

	async connect(): Promise<void> {
		this.connected = true;
	}

	async ensureCollections(): Promise<void> {
		if (!this.connected) {
			throw new StoreNotConnectedError(this.backend);
		}
		if (this.handles) return;

		const {dimensions, collections} = this.options;
		this.handles = {
			codebase: new InProcessCollection<CodeRecord>(
				collections.codebase,
				dimensions,
				codeRowCodec.lexicalText,
			),
			memory: new InProcessCollection<MemoryRecord>(
				collections.memory,
				dimensions,
				memoryRowCodec.lexicalText,
			),
		};
		this.options.logger?.debug('Storage', 'In-process collections ready', {
			collections,
			dimensions,
		});
	}

	protected stores(): CollectionStores | null {
		return this.handles;
	}

	async close(): Promise<void> {
		this.handles = null;
		this.connected = false;
	}
}
