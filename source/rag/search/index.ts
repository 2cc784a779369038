/**
 * Search module for hybrid code retrieval.
 */

export type {
	CodeSearchResult,
	FusedResult,
	RankedHit,
	RetrievalLegs,
	SearchOptions,
	SearchResults,
} from './types.js';
export {reciprocalRankFusion, DEFAULT_RRF_K, type FusionOptions} from './fusion.js';
export {tokenizeQuery} from './tokenize.js';
export {
	Retriever,
	withTimeout,
	type RetrievalSettings,
	type RetrieverDeps,
} from './retriever.js';
export {buildCodeContext, buildMemoryContext, type RenderLimits} from './render.js';
