/**
 * Reciprocal Rank Fusion over any number of ranked lists.
 */

import type {FusedResult, RankedHit} from './types.js';

/**
 * Default RRF constant.
 * Higher values flatten the difference between top and lower ranks.
 */
export const DEFAULT_RRF_K = 60;

export interface FusionOptions {
	/** RRF constant (default 60) */
	k?: number;
	/** Maximum results to return (default: all) */
	limit?: number;
}

/**
 * Combine ranked lists using Reciprocal Rank Fusion.
 *
 * RRF formula: score = sum(1 / (k + rank))
 * where rank is 1-indexed and a list that misses a record adds nothing.
 *
 * Ties keep first-encounter order: the first list in order, then records
 * the next list added. The payload kept is the first one seen.
 */
export function reciprocalRankFusion<P>(
	lists: Array<Array<RankedHit<P>>>,
	options: FusionOptions = {},
): Array<FusedResult<P>> {
	const k = options.k ?? DEFAULT_RRF_K;
	const fused = new Map<string, FusedResult<P>>();

	lists.forEach((list, listIndex) => {
		list.forEach((hit, position) => {
			const rank = position + 1;
			let entry = fused.get(hit.id);
			if (!entry) {
				entry = {
					id: hit.id,
					score: 0,
					payload: hit.payload,
					ranks: lists.map(() => null),
				};
				fused.set(hit.id, entry);
			}
			// A list repeating an id only counts its best rank
			if (entry.ranks[listIndex] !== null) return;
			entry.ranks[listIndex] = rank;
			entry.score += 1 / (k + rank);
		});
	});

	// Array.prototype.sort is stable, so equal scores keep insertion order
	const sorted = [...fused.values()].sort((a, b) => b.score - a.score);
	return options.limit === undefined ? sorted : sorted.slice(0, Math.max(0, options.limit));
}
