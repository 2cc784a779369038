/**
 * Test helpers.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import {DEFAULT_CONFIG, type RagConfig} from '../config/index.js';
import {djb2, seededUnitVector} from '../embeddings/mock.js';
import type {EmbeddingProvider} from '../embeddings/types.js';
import {codeRecordId} from '../storage/ids.js';
import type {CodePayload, CodeRecord} from '../storage/types.js';

/** Path to the checked-in test fixtures */
export const FIXTURES_ROOT = path.join(process.cwd(), 'test-fixtures');

/** Test context with temp directory and cleanup */
export interface TestContext {
	projectRoot: string;
	cleanup: () => Promise<void>;
}

/**
 * Create an empty unique temp directory.
 */
export async function makeTempDir(): Promise<TestContext> {
	const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'coderecall-test-'));
	return {
		projectRoot: tempDir,
		cleanup: async () => {
			await fs.rm(tempDir, {recursive: true, force: true});
		},
	};
}

/**
 * Copy fixture directory to a unique temp directory.
 */
export async function copyFixtureToTemp(
	fixtureName: string = 'pyrepo',
): Promise<TestContext> {
	const ctx = await makeTempDir();
	await fs.cp(path.join(FIXTURES_ROOT, fixtureName), ctx.projectRoot, {
		recursive: true,
	});
	return ctx;
}

/**
 * Add a new file to the temp project.
 */
export async function addFile(
	projectRoot: string,
	relativePath: string,
	content: string,
): Promise<void> {
	const fullPath = path.join(projectRoot, relativePath);
	await fs.mkdir(path.dirname(fullPath), {recursive: true});
	await fs.writeFile(fullPath, content);
}

/**
 * Default config with offline components and small dimensions.
 */
export function testConfig(overrides: {
	dimensions?: number;
	retrieval?: Partial<RagConfig['retrieval']>;
	extraction?: Partial<RagConfig['extraction']>;
	ingest?: Partial<RagConfig['ingest']>;
} = {}): RagConfig {
	return {
		...DEFAULT_CONFIG,
		store: {...DEFAULT_CONFIG.store, backend: 'in-process'},
		embedding: {
			...DEFAULT_CONFIG.embedding,
			provider: 'mock',
			model: 'mock',
			dimensions: overrides.dimensions ?? 8,
		},
		extraction: {...DEFAULT_CONFIG.extraction, ...overrides.extraction},
		ingest: {...DEFAULT_CONFIG.ingest, ...overrides.ingest},
		retrieval: {...DEFAULT_CONFIG.retrieval, ...overrides.retrieval},
	};
}

/**
 * Unit vector along one axis.
 */
export function axis(index: number, dimensions: number, weight: number = 1): number[] {
	return Array.from({length: dimensions}, (_, i) => (i === index ? weight : 0));
}

/**
 * Embedding provider with fixed vectors for known texts and hash vectors
 * for everything else. Can be told to stall or fail.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;
	readonly calls: string[][] = [];
	/** Delay before each embed call resolves */
	delayMs = 0;
	/** Texts whose embedding call rejects */
	failOn = new Set<string>();

	constructor(
		dimensions: number,
		private readonly vectors: Record<string, number[]> = {},
	) {
		this.dimensions = dimensions;
	}

	async initialize(): Promise<void> {}

	async embed(texts: string[]): Promise<number[][]> {
		this.calls.push(texts);
		if (this.delayMs > 0) {
			await new Promise(resolve => setTimeout(resolve, this.delayMs));
		}
		const failing = texts.find(text => this.failOn.has(text));
		if (failing !== undefined) {
			throw new Error(`embedding failed for "${failing}"`);
		}
		return texts.map(
			text => this.vectors[text] ?? seededUnitVector(djb2(text), this.dimensions),
		);
	}

	async embedSingle(text: string): Promise<number[]> {
		const [vector] = await this.embed([text]);
		if (!vector) throw new Error('no vector returned');
		return vector;
	}

	close(): void {}
}

/**
 * Code payload with sensible defaults.
 */
export function codePayload(overrides: Partial<CodePayload> = {}): CodePayload {
	const file = overrides.file ?? 'pkg/module.py';
	const symbol = overrides.symbol ?? 'handler';
	return {
		file,
		name: `${file}::${symbol}`,
		symbol,
		type: 'Function',
		language: 'python',
		start_line: 1,
		end_line: 3,
		docstring: '',
		preceding_comments: [],
		code: `def ${symbol}():\n    pass`,
		repo_root: '/repo',
		...overrides,
	};
}

/**
 * Code record with an id derived from its payload.
 */
export function codeRecord(vector: number[], overrides: Partial<CodePayload> = {}): CodeRecord {
	const payload = codePayload(overrides);
	return {kind: 'code', id: codeRecordId(payload), vector, payload};
}
