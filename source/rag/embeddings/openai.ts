/**
 * Embedding provider for OpenAI-compatible `/embeddings` endpoints.
 *
 * Works against OpenAI itself and against local servers that expose the
 * same API (Ollama, LM Studio, vLLM), selected by the base URL.
 */

import type {Logger} from '../logger/index.js';
import {
	EmbeddingApiError,
	chunk,
	processBatchesWithLimit,
	withRetry,
	type RetryOptions,
} from './api-utils.js';
import type {EmbeddingProvider} from './types.js';

// OpenAI limits: 2,048 texts/batch, 300,000 tokens/batch
const DEFAULT_BATCH_SIZE = 64;

export interface OpenAIProviderOptions {
	model: string;
	dimensions: number;
	baseUrl: string;
	apiKey?: string;
	batchSize?: number;
	concurrency?: number;
	retry?: RetryOptions;
	logger?: Logger;
	/** Injected for tests; defaults to global fetch */
	fetch?: typeof fetch;
}

interface EmbeddingsResponse {
	data: Array<{embedding: number[]; index: number}>;
}

function isEmbeddingsResponse(value: unknown): value is EmbeddingsResponse {
	if (typeof value !== 'object' || value === null || !('data' in value)) {
		return false;
	}
	const {data} = value;
	return (
		Array.isArray(data) &&
		data.every(
			item =>
				typeof item === 'object' &&
				item !== null &&
				typeof item.index === 'number' &&
				Array.isArray(item.embedding),
		)
	);
}

/**
 * `error.message` of an OpenAI-style error body.
 */
function apiErrorMessage(body: unknown): string | null {
	if (typeof body !== 'object' || body === null || !('error' in body)) return null;
	const {error} = body;
	if (typeof error !== 'object' || error === null || !('message' in error)) return null;
	return typeof error.message === 'string' && error.message ? error.message : null;
}

function isOpenAIHost(baseUrl: string): boolean {
	try {
		return new URL(baseUrl).hostname === 'api.openai.com';
	} catch {
		return false;
	}
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;
	private readonly model: string;
	private readonly baseUrl: string;
	private readonly apiKey: string;
	private readonly batchSize: number;
	private readonly concurrency: number | undefined;
	private readonly retry: RetryOptions;
	private readonly logger: Logger | undefined;
	private readonly fetchImpl: typeof fetch;
	private initialized = false;

	constructor(options: OpenAIProviderOptions) {
		this.model = options.model;
		this.dimensions = options.dimensions;
		this.baseUrl = options.baseUrl.replace(/\/+$/, '');
		// Trim the key to remove any accidental whitespace
		this.apiKey = (options.apiKey ?? '').trim();
		this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
		this.concurrency = options.concurrency;
		this.logger = options.logger;
		this.fetchImpl = options.fetch ?? fetch;
		this.retry = {
			...options.retry,
			onRetry: (attempt, delayMs, error) => {
				this.logger?.warn('Embeddings', 'Retrying embeddings request', {
					attempt,
					delayMs,
					error: error instanceof Error ? error.message : String(error),
				});
				options.retry?.onRetry?.(attempt, delayMs, error);
			},
		};
	}

	async initialize(): Promise<void> {
		// Local OpenAI-compatible servers usually need no key
		if (!this.apiKey && isOpenAIHost(this.baseUrl)) {
			throw new Error(
				'OpenAI API key required. Set OPENAI_API_KEY or point OPENAI_BASE_URL at a local server.',
			);
		}
		this.initialized = true;
	}

	async embed(texts: string[]): Promise<number[][]> {
		if (!this.initialized) {
			await this.initialize();
		}
		if (texts.length === 0) {
			return [];
		}

		return processBatchesWithLimit(
			chunk(texts, this.batchSize),
			batch => withRetry(() => this.embedBatch(batch), this.retry),
			{concurrency: this.concurrency, logger: this.logger},
		);
	}

	async embedSingle(text: string): Promise<number[]> {
		const [vector] = await this.embed([text]);
		if (!vector) {
			throw new Error('Embeddings API returned no vector');
		}
		return vector;
	}

	private async embedBatch(texts: string[]): Promise<number[][]> {
		const headers: Record<string, string> = {'Content-Type': 'application/json'};
		if (this.apiKey) {
			headers['Authorization'] = `Bearer ${this.apiKey}`;
		}

		const body: Record<string, unknown> = {model: this.model, input: texts};
		// Only text-embedding-3 models accept a shortened output size
		if (this.model.startsWith('text-embedding-3')) {
			body['dimensions'] = this.dimensions;
		}

		const response = await this.fetchImpl(`${this.baseUrl}/embeddings`, {
			method: 'POST',
			headers,
			body: JSON.stringify(body),
		});

		if (!response.ok) {
			const errorText = await response.text();
			let errorMessage = errorText;
			try {
				errorMessage = apiErrorMessage(JSON.parse(errorText)) ?? errorText;
			} catch {
				// Non-JSON error body; keep the raw text
			}
			throw new EmbeddingApiError(response.status, errorMessage);
		}

		const json: unknown = await response.json();
		if (!isEmbeddingsResponse(json) || json.data.length !== texts.length) {
			throw new Error(
				`Embeddings API returned an unexpected body for ${texts.length} inputs`,
			);
		}

		// Sort by index to ensure correct order
		return [...json.data]
			.sort((a, b) => a.index - b.index)
			.map(item => item.embedding);
	}

	close(): void {
		this.initialized = false;
	}
}
