/**
 * Shared utilities for API-based embedding providers.
 * Provides common retry logic, rate limiting, and concurrency patterns.
 */

import pLimit from 'p-limit';
import type {Logger} from '../logger/index.js';

// ============================================================================
// Constants
// ============================================================================

/** Max concurrent API requests */
export const CONCURRENCY = 4;

/** Max retry attempts on retriable errors */
export const MAX_RETRIES = 8;

/** Initial backoff (ms) */
export const INITIAL_BACKOFF_MS = 1000;

/** Maximum backoff (ms) */
export const MAX_BACKOFF_MS = 60000;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Error raised for a non-2xx embeddings API response.
 */
export class EmbeddingApiError extends Error {
	readonly status: number;

	constructor(status: number, message: string) {
		super(`Embeddings API error (${status}): ${message}`);
		this.name = 'EmbeddingApiError';
		this.status = status;
	}
}

/**
 * Check if an error is a rate limit error (429 or quota exceeded).
 */
export function isRateLimitError(error: unknown): boolean {
	if (error instanceof EmbeddingApiError && error.status === 429) return true;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		return msg.includes('429') || msg.includes('rate limit') || msg.includes('quota');
	}
	return false;
}

/**
 * Check if an error should trigger a retry: rate limits, server errors
 * and dropped connections.
 */
export function isRetriableError(error: unknown): boolean {
	if (isRateLimitError(error)) return true;
	if (error instanceof EmbeddingApiError) return error.status >= 500;
	// fetch() rejects with a TypeError on network failure
	return error instanceof TypeError && error.message.includes('fetch failed');
}

export interface RetryOptions {
	maxRetries?: number;
	initialBackoffMs?: number;
	maxBackoffMs?: number;
	/** Called before each backoff sleep */
	onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/**
 * Execute an async function with exponential backoff retry on retriable errors.
 */
export async function withRetry<T>(
	fn: () => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const maxRetries = options.maxRetries ?? MAX_RETRIES;
	const maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
	let backoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
	let attempt = 0;

	while (true) {
		try {
			return await fn();
		} catch (error) {
			if (!isRetriableError(error) || attempt >= maxRetries) {
				throw error;
			}
			attempt++;
			options.onRetry?.(attempt, backoffMs, error);
			await sleep(backoffMs);
			backoffMs = Math.min(backoffMs * 2, maxBackoffMs);
		}
	}
}

export interface BatchRunOptions {
	concurrency?: number;
	logger?: Logger;
	onBatchProgress?: (processed: number, total: number) => void;
}

/**
 * Process batches with p-limit sliding window concurrency.
 * Results come back in batch order; the first failure rejects the whole run.
 */
export async function processBatchesWithLimit<T, R>(
	batches: T[][],
	processBatch: (batch: T[], batchIndex: number) => Promise<R[]>,
	options: BatchRunOptions = {},
): Promise<R[]> {
	const limit = pLimit(options.concurrency ?? CONCURRENCY);
	const total = batches.reduce((sum, batch) => sum + batch.length, 0);
	let processed = 0;

	const results = await Promise.all(
		batches.map((batch, batchIndex) =>
			limit(async () => {
				try {
					const result = await processBatch(batch, batchIndex);
					processed += batch.length;
					options.onBatchProgress?.(processed, total);
					return result;
				} catch (error) {
					options.logger?.error(
						'Embeddings',
						`Batch ${batchIndex} failed after retries (${batch.length} items)`,
						error instanceof Error ? error : new Error(String(error)),
					);
					throw error;
				}
			}),
		),
	);

	return results.flat();
}

/**
 * Split an array into batches of a specified size.
 */
export function chunk<T>(array: T[], size: number): T[][] {
	const batches: T[][] = [];
	for (let i = 0; i < array.length; i += size) {
		batches.push(array.slice(i, i + size));
	}
	return batches;
}
