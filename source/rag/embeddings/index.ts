/**
 * Embeddings module for generating vector embeddings.
 * Supports OpenAI-compatible APIs and an offline mock provider.
 */

import type {RagConfig} from '../config/index.js';
import type {Logger} from '../logger/index.js';
import {MockEmbeddingProvider} from './mock.js';
import {OpenAIEmbeddingProvider} from './openai.js';
import type {EmbeddingProvider} from './types.js';

export {MockEmbeddingProvider} from './mock.js';
export {OpenAIEmbeddingProvider, type OpenAIProviderOptions} from './openai.js';
export {
	EmbeddingApiError,
	chunk,
	isRetriableError,
	processBatchesWithLimit,
	withRetry,
	type RetryOptions,
} from './api-utils.js';

export type {EmbeddingProvider} from './types.js';

/**
 * Create the configured embedding provider (not yet initialized).
 */
export function createEmbeddingProvider(
	config: RagConfig,
	logger?: Logger,
): EmbeddingProvider {
	const {provider, model, dimensions, baseUrl, apiKey} = config.embedding;
	switch (provider) {
		case 'mock':
			return new MockEmbeddingProvider(dimensions);
		case 'openai':
			return new OpenAIEmbeddingProvider({
				model,
				dimensions,
				baseUrl,
				apiKey,
				batchSize: config.ingest.embedBatchSize,
				logger,
			});
	}
}
