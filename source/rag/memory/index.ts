/**
 * Long-term memory of past exchanges, searched by dense similarity only.
 */

import type {EmbeddingProvider} from '../embeddings/types.js';
import type {Logger} from '../logger/index.js';
import {newMemoryId} from '../storage/ids.js';
import type {IndexStore, MemoryPayload, MemoryRecord} from '../storage/types.js';

export interface RememberOptions {
	/** Files the answer drew on; de-duplicated in first-seen order */
	files?: string[];
	tags?: string[];
}

export interface MemoryStoreDeps {
	embeddings: EmbeddingProvider;
	store: IndexStore;
	/** Default recall limit */
	recallLimit: number;
	logger?: Logger;
}

/**
 * Text stored and embedded for one exchange.
 */
export function combineExchange(userText: string, assistantText: string): string {
	return `User: ${userText}\nAssistant: ${assistantText}`;
}

/**
 * Distinct `file` values of results, in rank order.
 */
export function referencedFiles(results: Array<{payload: {file: string}}>): string[] {
	return [...new Set(results.map(result => result.payload.file))];
}

export class MemoryStore {
	private readonly embeddings: EmbeddingProvider;
	private readonly store: IndexStore;
	private readonly recallLimit: number;
	private readonly logger: Logger | null;

	constructor(deps: MemoryStoreDeps) {
		this.embeddings = deps.embeddings;
		this.store = deps.store;
		this.recallLimit = deps.recallLimit;
		this.logger = deps.logger ?? null;
	}

	/**
	 * Embed and store one exchange under a fresh id. Repeated exchanges
	 * are stored again.
	 */
	async remember(
		userText: string,
		assistantText: string,
		options: RememberOptions = {},
	): Promise<MemoryRecord> {
		const text = combineExchange(userText, assistantText);
		const vector = await this.embeddings.embedSingle(text);

		const record: MemoryRecord = {
			kind: 'memory',
			id: newMemoryId(),
			vector,
			payload: {
				user: userText,
				assistant: assistantText,
				text,
				files: [...new Set(options.files ?? [])],
				tags: [...(options.tags ?? [])],
				timestamp: new Date().toISOString(),
			},
		};

		const {rejected} = await this.store.upsert('memory', [record]);
		const problem = rejected[0];
		if (problem) {
			throw new Error(`Memory entry rejected: ${problem.reason}`);
		}

		this.logger?.debug('Memory', 'Stored exchange', {
			id: record.id,
			files: record.payload.files.length,
		});
		return record;
	}

	/**
	 * Payloads of the entries closest to the query.
	 */
	async recall(query: string, limit: number = this.recallLimit): Promise<MemoryPayload[]> {
		const vector = await this.embeddings.embedSingle(query);
		const hits = await this.store.denseSearch('memory', vector, limit);
		return hits.map(hit => hit.payload);
	}
}
