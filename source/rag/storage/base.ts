import type {StoreBackend} from '../config/index.js';
import type {CollectionName} from '../constants.js';
import {StoreNotConnectedError} from '../errors.js';
import type {
	CollectionStores,
	IndexRecord,
	IndexStore,
	LexicalHit,
	PayloadOf,
	RecordOf,
	RejectedRecord,
	ScoredHit,
	UpsertResult,
} from './types.js';

/**
 * Reason a record cannot be written, or null when it is valid.
 */
export function recordProblem(record: IndexRecord, dimensions: number): string | null {
	if (!record.id) {
		return 'missing id';
	}
	if (record.vector.length !== dimensions) {
		return `vector has ${record.vector.length} dimensions, expected ${dimensions}`;
	}
	if (!record.vector.every(Number.isFinite)) {
		return 'vector has non-finite components';
	}
	return null;
}

/**
 * Split a batch into writable records and per-record rejections.
 */
export function partitionRecords<R extends IndexRecord>(
	records: R[],
	dimensions: number,
): {valid: R[]; rejected: RejectedRecord[]} {
	const valid: R[] = [];
	const rejected: RejectedRecord[] = [];
	for (const record of records) {
		const reason = recordProblem(record, dimensions);
		if (reason) {
			rejected.push({id: record.id, reason});
		} else {
			valid.push(record);
		}
	}
	return {valid, rejected};
}

/**
 * Cosine similarity; 0 when either vector has zero length.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < a.length; i++) {
		const x = a[i] ?? 0;
		const y = b[i] ?? 0;
		dot += x * y;
		normA += x * x;
		normB += y * y;
	}
	if (normA === 0 || normB === 0) return 0;
	return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Collection-addressed operations shared by every backend.
 */
export abstract class BaseIndexStore implements IndexStore {
	abstract readonly backend: StoreBackend;

	abstract connect(): Promise<void>;
	abstract ensureCollections(): Promise<void>;
	abstract close(): Promise<void>;

	/** Collection handles, or null before ensureCollections() */
	protected abstract stores(): CollectionStores | null;

	collection<C extends CollectionName>(name: C): CollectionStores[C] {
		const stores = this.stores();
		if (!stores) {
			throw new StoreNotConnectedError(this.backend);
		}
		return stores[name];
	}

	upsert<C extends CollectionName>(
		collection: C,
		records: Array<RecordOf<C>>,
	): Promise<UpsertResult> {
		return this.collection(collection).upsert(records);
	}

	denseSearch<C extends CollectionName>(
		collection: C,
		vector: number[],
		limit: number,
	): Promise<Array<ScoredHit<PayloadOf<C>>>> {
		return this.collection(collection).denseSearch(vector, limit);
	}

	lexicalSearch<C extends CollectionName>(
		collection: C,
		tokens: string[],
		limit: number,
	): Promise<Array<LexicalHit<PayloadOf<C>>>> {
		return this.collection(collection).lexicalSearch(tokens, limit);
	}

	count(collection: CollectionName): Promise<number> {
		return this.collection(collection).count();
	}
}
