import * as lancedb from '@lancedb/lancedb';
import type {Connection, Table} from '@lancedb/lancedb';
import {DENSE_VECTOR_NAME} from '../constants.js';
import {StoreNotConnectedError} from '../errors.js';
import type {Logger} from '../logger/index.js';
import {BaseIndexStore, partitionRecords} from './base.js';
import {DenseQueryRouter, type DenseQueryPath} from './dense-paths.js';
import {codeRowCodec, memoryRowCodec, type RowCodec} from './rows.js';
import {denseDimensions} from './schema.js';
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

export interface LanceStoreOptions {
	/** LanceDB database directory */
	path: string;
	dimensions: number;
	collections: {codebase: string; memory: string};
	logger?: Logger;
}

interface DenseQuery {
	vector: number[];
	limit: number;
}

/**
 * Escape a string for use in SQL-like LanceDB filter expressions.
 * Escapes single quotes by doubling them.
 */
export function escapeSqlString(s: string): string {
	return s.replace(/'/g, "''");
}

/**
 * Filter matching rows where any column contains any token.
 *
 * `_` and `%` stay LIKE wildcards here, so the filter can over-match;
 * callers re-check candidates with an exact substring test.
 */
export function buildLexicalFilter(columns: string[], tokens: string[]): string {
	const clauses: string[] = [];
	for (const token of tokens) {
		const pattern = escapeSqlString(token);
		for (const column of columns) {
			clauses.push(`\`${column}\` LIKE '%${pattern}%'`);
		}
	}
	return clauses.join(' OR ');
}

/**
 * Dense query paths offered by the installed LanceDB client, newest first.
 */
export function lanceDensePaths(table: Table): Array<DenseQueryPath<DenseQuery, unknown[]>> {
	return [
		{
			name: 'vectorSearch',
			available: () =>
				'vectorSearch' in table && typeof table.vectorSearch === 'function',
			run: ({vector, limit}) =>
				table
					.vectorSearch(vector)
					.column(DENSE_VECTOR_NAME)
					.distanceType('cosine')
					.limit(limit)
					.toArray(),
		},
		{
			name: 'query.nearestTo',
			available: () => typeof table.query === 'function',
			run: ({vector, limit}) =>
				table
					.query()
					.nearestTo(vector)
					.column(DENSE_VECTOR_NAME)
					.distanceType('cosine')
					.limit(limit)
					.toArray(),
		},
	];
}

const LEXICAL_OVERFETCH = 4;

class LanceCollection<R extends IndexRecord> implements CollectionStore<R> {
	private readonly router: DenseQueryRouter<DenseQuery, unknown[]>;

	constructor(
		readonly name: string,
		private readonly table: Table,
		private readonly codec: RowCodec<R>,
		private readonly dimensions: number,
		logger?: Logger,
	) {
		this.router = new DenseQueryRouter(name, lanceDensePaths(table), logger);
		this.router.negotiate();
	}

	async upsert(records: R[]): Promise<UpsertResult> {
		const {valid, rejected} = partitionRecords(records, this.dimensions);
		if (valid.length === 0) {
			return {written: 0, rejected};
		}

		// Rows are converted against the declared schema; inference from plain
		// objects yields nullable lists and doubles the table rejects.
		const arrowTable = lancedb.makeArrowTable(
			valid.map(record => this.codec.toRow(record)),
			{schema: this.codec.schema(this.dimensions)},
		);

		// Use merge insert for upsert behavior
		await this.table
			.mergeInsert('id')
			.whenMatchedUpdateAll()
			.whenNotMatchedInsertAll()
			.execute(arrowTable);

		return {written: valid.length, rejected};
	}

	async denseSearch(
		vector: number[],
		limit: number,
	): Promise<Array<ScoredHit<R['payload']>>> {
		if (limit <= 0) return [];
		const rows = await this.router.run({vector, limit});
		return rows.map(row => {
			const {id, payload, distance} = this.codec.fromRow(row);
			// Cosine distance is 1 - similarity
			return {id, payload, score: 1 - (distance ?? 1)};
		});
	}

	async lexicalSearch(
		tokens: string[],
		limit: number,
	): Promise<Array<LexicalHit<R['payload']>>> {
		if (tokens.length === 0 || limit <= 0) return [];

		const filter = buildLexicalFilter(this.codec.lexicalColumns, tokens);
		let fetchLimit = limit * LEXICAL_OVERFETCH;

		while (true) {
			const rows = await this.table.query().where(filter).limit(fetchLimit).toArray();
			const hits: Array<LexicalHit<R['payload']>> = [];

			for (const row of rows) {
				const {id, payload} = this.codec.fromRow(row);
				const fields = this.codec.lexicalText(payload);
				if (tokens.some(token => fields.some(field => field.includes(token)))) {
					hits.push({id, payload});
					if (hits.length >= limit) return hits;
				}
			}

			// Fewer rows than asked for: the scan is exhausted
			if (rows.length < fetchLimit) return hits;
			fetchLimit *= LEXICAL_OVERFETCH;
		}
	}

	async count(): Promise<number> {
		return this.table.countRows();
	}
}

/**
 * Storage layer wrapping LanceDB for the codebase and memory collections.
 */
export class LanceIndexStore extends BaseIndexStore {
	readonly backend = 'lancedb' as const;
	private readonly options: LanceStoreOptions;
	private db: Connection | null = null;
	private handles: CollectionStores | null = null;

	constructor(options: LanceStoreOptions) {
		super();
		this.options = options;
	}

	/**
	 * Connect to the LanceDB database.
	 */
	async connect(): Promise<void> {
		if (this.db) return;
		this.db = await lancedb.connect(this.options.path);
		this.options.logger?.debug('Storage', 'Connected to LanceDB', {
			path: this.options.path,
		});
	}

	/**
	 * Open each collection's table, creating it if it doesn't exist.
	 */
	async ensureCollections(): Promise<void> {
		if (!this.db) {
			throw new StoreNotConnectedError(this.backend);
		}
		if (this.handles) return;

		const {collections, dimensions, logger} = this.options;
		const codebase = await this.openOrCreate(collections.codebase, codeRowCodec);
		const memory = await this.openOrCreate(collections.memory, memoryRowCodec);

		this.handles = {
			codebase: new LanceCollection<CodeRecord>(
				collections.codebase,
				codebase,
				codeRowCodec,
				dimensions,
				logger,
			),
			memory: new LanceCollection<MemoryRecord>(
				collections.memory,
				memory,
				memoryRowCodec,
				dimensions,
				logger,
			),
		};
	}

	private async openOrCreate<R extends IndexRecord>(
		name: string,
		codec: RowCodec<R>,
	): Promise<Table> {
		if (!this.db) {
			throw new StoreNotConnectedError(this.backend);
		}
		const {dimensions, logger} = this.options;
		const tableNames = await this.db.tableNames();

		if (!tableNames.includes(name)) {
			logger?.info('Storage', 'Creating collection', {name, dimensions});
			return this.db.createEmptyTable(name, codec.schema(dimensions));
		}

		const table = await this.db.openTable(name);
		const existing = denseDimensions(await table.schema());
		if (existing !== null && existing !== dimensions) {
			throw new Error(
				`Collection "${name}" stores ${existing}-dimension vectors but ${dimensions} are configured`,
			);
		}
		return table;
	}

	protected stores(): CollectionStores | null {
		return this.handles;
	}

	/**
	 * Close the database connection.
	 */
	async close(): Promise<void> {
		this.handles = null;
		this.db?.close();
		this.db = null;
	}
}
