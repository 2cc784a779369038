/**
 * Search result types.
 */

import type {CodePayload} from '../storage/types.js';

/**
 * One entry of a ranked list fed to fusion. Rank is the 1-based position.
 */
export interface RankedHit<P> {
	id: string;
	payload: P;
}

/**
 * A record after Reciprocal Rank Fusion.
 */
export interface FusedResult<P> {
	id: string;
	/** Sum of 1 / (k + rank) over the lists that returned the record */
	score: number;
	/** Payload from the first list that returned the record */
	payload: P;
	/** 1-based rank in each input list, null where the list missed it */
	ranks: Array<number | null>;
}

/**
 * A fused codebase hit.
 */
export interface CodeSearchResult {
	id: string;
	score: number;
	payload: CodePayload;
	/** Rank in the dense leg (null if absent) */
	denseRank: number | null;
	/** Rank in the keyword leg (null if absent) */
	keywordRank: number | null;
}

/**
 * Both legs of one query, before fusion.
 */
export interface RetrievalLegs {
	/** Dense leg, closest first */
	dense: Array<RankedHit<CodePayload> & {score: number}>;
	/** Keyword leg, scan order */
	keyword: Array<RankedHit<CodePayload>>;
	/** Tokens sent to the keyword leg */
	tokens: string[];
	/** Legs that hit their timeout */
	timedOut: Array<'dense' | 'keyword'>;
}

/**
 * Options for a hybrid search.
 */
export interface SearchOptions {
	/** Maximum fused results (default: max(denseK, keywordK)) */
	limit?: number;
}

/**
 * Fused results with query metadata.
 */
export interface SearchResults {
	results: CodeSearchResult[];
	query: string;
	tokens: string[];
	timedOut: Array<'dense' | 'keyword'>;
	/** Time taken in milliseconds */
	elapsedMs: number;
}
