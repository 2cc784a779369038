/**
 * Hybrid retrieval over the codebase collection.
 */

import type {RagConfig} from '../config/index.js';
import type {EmbeddingProvider} from '../embeddings/types.js';
import {LegTimeoutError} from '../errors.js';
import type {Logger} from '../logger/index.js';
import type {IndexStore} from '../storage/types.js';
import {reciprocalRankFusion} from './fusion.js';
import {tokenizeQuery} from './tokenize.js';
import type {
	CodeSearchResult,
	RetrievalLegs,
	SearchOptions,
	SearchResults,
} from './types.js';

export type RetrievalSettings = Pick<
	RagConfig['retrieval'],
	'denseK' | 'keywordK' | 'rrfK' | 'legTimeoutMs'
>;

export interface RetrieverDeps {
	embeddings: EmbeddingProvider;
	store: IndexStore;
	settings: RetrievalSettings;
	logger?: Logger;
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	leg: string,
): Promise<T> {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new LegTimeoutError(leg, timeoutMs)), timeoutMs);
	});
	try {
		return await Promise.race([promise, timeout]);
	} finally {
		clearTimeout(timer);
	}
}

/**
 * Runs the dense and keyword legs against the codebase collection and
 * fuses them with RRF.
 */
export class Retriever {
	private readonly embeddings: EmbeddingProvider;
	private readonly store: IndexStore;
	private readonly settings: RetrievalSettings;
	private readonly logger: Logger | null;

	constructor(deps: RetrieverDeps) {
		this.embeddings = deps.embeddings;
		this.store = deps.store;
		this.settings = deps.settings;
		this.logger = deps.logger ?? null;
	}

	/** Per-leg candidate count */
	get legLimit(): number {
		return Math.max(this.settings.denseK, this.settings.keywordK);
	}

	/**
	 * Run both legs concurrently. A leg that times out contributes an
	 * empty list; any other leg failure propagates.
	 */
	async retrieve(query: string, limit: number = this.legLimit): Promise<RetrievalLegs> {
		const tokens = tokenizeQuery(query);
		const timedOut: RetrievalLegs['timedOut'] = [];

		const guard = async <T>(leg: 'dense' | 'keyword', run: () => Promise<T[]>) => {
			try {
				return await withTimeout(run(), this.settings.legTimeoutMs, leg);
			} catch (error) {
				if (!(error instanceof LegTimeoutError)) throw error;
				this.logger?.warn('Search', error.message, {query});
				timedOut.push(leg);
				return [];
			}
		};

		const [dense, keyword] = await Promise.all([
			guard('dense', async () => {
				const vector = await this.embeddings.embedSingle(query);
				return this.store.denseSearch('codebase', vector, limit);
			}),
			guard('keyword', async () =>
				tokens.length === 0 ? [] : this.store.lexicalSearch('codebase', tokens, limit),
			),
		]);

		this.logger?.debug('Search', 'Retrieved legs', {
			dense: dense.length,
			keyword: keyword.length,
			tokens,
		});

		return {dense, keyword, tokens, timedOut};
	}

	/**
	 * Hybrid search: both legs, then Reciprocal Rank Fusion.
	 */
	async search(query: string, options: SearchOptions = {}): Promise<SearchResults> {
		const start = Date.now();
		const limit = options.limit ?? this.legLimit;
		const legs = await this.retrieve(query, Math.max(limit, this.legLimit));

		const fused = reciprocalRankFusion([legs.dense, legs.keyword], {
			k: this.settings.rrfK,
			limit,
		});

		const results = fused.map(
			(entry): CodeSearchResult => ({
				id: entry.id,
				score: entry.score,
				payload: entry.payload,
				denseRank: entry.ranks[0] ?? null,
				keywordRank: entry.ranks[1] ?? null,
			}),
		);

		return {
			results,
			query,
			tokens: legs.tokens,
			timedOut: legs.timedOut,
			elapsedMs: Date.now() - start,
		};
	}
}
