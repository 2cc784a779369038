/**
 * Offline embedding provider.
 *
 * Every text maps to a repeatable unit vector seeded by its djb2 hash.
 * Vectors carry no meaning beyond identity: equal texts get equal vectors,
 * which is enough for exact-match recall and for exercising the pipeline
 * without network access.
 */

import type {EmbeddingProvider} from './types.js';

const DEFAULT_DIMENSIONS = 384;

/**
 * djb2 over UTF-16 code units, as an unsigned 32-bit integer.
 */
export function djb2(text: string): number {
	let hash = 5381;
	for (let i = 0; i < text.length; i++) {
		hash = ((hash * 33) ^ text.charCodeAt(i)) >>> 0;
	}
	return hash;
}

/**
 * Deterministic unit vector for a seed.
 */
export function seededUnitVector(seed: number, dimensions: number): number[] {
	const raw: number[] = [];
	for (let i = 0; i < dimensions; i++) {
		// 32-bit LCG step; a float product would drop the low bits past 2^53
		const step = Math.imul(Math.imul(seed, i + 1), 1103515245);
		const state = ((step + 12345) >>> 0) % 0x7fffffff;
		raw.push((state / 0x7fffffff) * 2 - 1);
	}

	const norm = Math.hypot(...raw);
	return raw.map(v => (norm > 0 ? v / norm : 0));
}

export class MockEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;

	constructor(dimensions: number = DEFAULT_DIMENSIONS) {
		this.dimensions = dimensions;
	}

	async initialize(): Promise<void> {}

	async embed(texts: string[]): Promise<number[][]> {
		return texts.map(text => seededUnitVector(djb2(text), this.dimensions));
	}

	async embedSingle(text: string): Promise<number[]> {
		return seededUnitVector(djb2(text), this.dimensions);
	}

	close(): void {}
}
