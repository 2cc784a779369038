import type {StoreBackend} from '../config/index.js';
import type {CollectionName} from '../constants.js';
import type {UnitType} from '../extract/types.js';

// ============================================================================
// Payloads
// ============================================================================

/** Passthrough attribute values kept on code payloads */
export type ExtraValue = string | number | boolean | null;

/**
 * Payload of a codebase record. Snake_case is the persisted wire format.
 */
export interface CodePayload {
	file: string;
	/** Qualified name ("file::symbol" or "file::chunk_s_e") */
	name: string;
	/** Declared symbol; empty for line windows */
	symbol: string;
	type: UnitType;
	language: string;
	start_line: number;
	end_line: number;
	docstring: string;
	preceding_comments: string[];
	code: string;
	repo_root: string;
	/** Forward-compatible attributes with no typed field yet */
	extra?: Record<string, ExtraValue>;
}

/**
 * Payload of a memory record.
 */
export interface MemoryPayload {
	user: string;
	assistant: string;
	/** "User: <user>\nAssistant: <assistant>" */
	text: string;
	files: string[];
	tags: string[];
	/** ISO-8601 UTC */
	timestamp: string;
}

// ============================================================================
// Records
// ============================================================================

export interface CodeRecord {
	kind: 'code';
	id: string;
	vector: number[];
	payload: CodePayload;
}

export interface MemoryRecord {
	kind: 'memory';
	id: string;
	vector: number[];
	payload: MemoryPayload;
}

export type IndexRecord = CodeRecord | MemoryRecord;

/**
 * Record type held by each logical collection.
 */
export interface CollectionRecordMap {
	codebase: CodeRecord;
	memory: MemoryRecord;
}

export type RecordOf<C extends CollectionName> = CollectionRecordMap[C];
export type PayloadOf<C extends CollectionName> = CollectionRecordMap[C]['payload'];

// ============================================================================
// Results
// ============================================================================

export interface ScoredHit<P> {
	id: string;
	/** Cosine similarity, higher is closer */
	score: number;
	payload: P;
}

export interface LexicalHit<P> {
	id: string;
	payload: P;
}

export interface RejectedRecord {
	id: string;
	reason: string;
}

export interface UpsertResult {
	written: number;
	rejected: RejectedRecord[];
}

// ============================================================================
// Store Interfaces
// ============================================================================

/**
 * One collection of `(id, dense vector, payload)` records.
 */
export interface CollectionStore<R extends IndexRecord> {
	/** Physical table name */
	readonly name: string;

	/**
	 * Overwrite-by-id. Records with a wrong-sized or non-finite vector are
	 * rejected individually; the rest are written in one request.
	 */
	upsert(records: R[]): Promise<UpsertResult>;

	/**
	 * The `limit` nearest records by cosine similarity, closest first.
	 */
	denseSearch(vector: number[], limit: number): Promise<Array<ScoredHit<R['payload']>>>;

	/**
	 * Up to `limit` records whose text fields contain any token as a
	 * substring, in scan order.
	 */
	lexicalSearch(tokens: string[], limit: number): Promise<Array<LexicalHit<R['payload']>>>;

	count(): Promise<number>;
}

export type CollectionStores = {
	[C in CollectionName]: CollectionStore<CollectionRecordMap[C]>;
};

/**
 * Persistent store with the `codebase` and `memory` collections.
 */
export interface IndexStore {
	readonly backend: StoreBackend;

	/** Open the backend. Idempotent. */
	connect(): Promise<void>;

	/** Create each collection if absent. Idempotent. */
	ensureCollections(): Promise<void>;

	collection<C extends CollectionName>(name: C): CollectionStores[C];

	upsert<C extends CollectionName>(
		collection: C,
		records: Array<RecordOf<C>>,
	): Promise<UpsertResult>;

	denseSearch<C extends CollectionName>(
		collection: C,
		vector: number[],
		limit: number,
	): Promise<Array<ScoredHit<PayloadOf<C>>>>;

	lexicalSearch<C extends CollectionName>(
		collection: C,
		tokens: string[],
		limit: number,
	): Promise<Array<LexicalHit<PayloadOf<C>>>>;

	count(collection: CollectionName): Promise<number>;

	close(): Promise<void>;
}
