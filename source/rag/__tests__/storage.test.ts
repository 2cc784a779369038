/**
 * Index store backends.
 */

import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {StoreNotConnectedError} from '../errors.js';
import {cosineSimilarity, recordProblem} from '../storage/base.js';
import {InProcessIndexStore} from '../storage/in-process.js';
import {LanceIndexStore, buildLexicalFilter, escapeSqlString} from '../storage/lance.js';
import type {IndexStore, MemoryRecord} from '../storage/types.js';
import {axis, codeRecord, makeTempDir, type TestContext} from './helpers.js';

const DIMS = 4;
const COLLECTIONS = {codebase: 'codebase', memory: 'memory'};

function memoryRecord(id: string, vector: number[], text: string): MemoryRecord {
	return {
		kind: 'memory',
		id,
		vector,
		payload: {
			user: text,
			assistant: 'ok',
			text: `User: ${text}\nAssistant: ok`,
			files: [],
			tags: [],
			timestamp: '2026-01-01T00:00:00.000Z',
		},
	};
}

describe('recordProblem', () => {
	it('accepts a well-formed record', () => {
		expect(recordProblem(codeRecord(axis(0, DIMS)), DIMS)).toBeNull();
	});

	it('reports a wrong vector size', () => {
		expect(recordProblem(codeRecord([1, 0]), DIMS)).toBe(
			'vector has 2 dimensions, expected 4',
		);
	});

	it('reports non-finite components', () => {
		expect(recordProblem(codeRecord([1, Number.NaN, 0, 0]), DIMS)).toBe(
			'vector has non-finite components',
		);
	});
});

describe('cosineSimilarity', () => {
	it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
		expect(cosineSimilarity([2, 0], [5, 0])).toBeCloseTo(1, 10);
		expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
	});

	it('is 0 when a vector has zero length', () => {
		expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
	});
});

describe('InProcessIndexStore', () => {
	let store: InProcessIndexStore;

	beforeEach(async () => {
		store = new InProcessIndexStore({dimensions: DIMS, collections: COLLECTIONS});
		await store.connect();
		await store.ensureCollections();
	});

	it('refuses access before collections exist', async () => {
		const fresh = new InProcessIndexStore({dimensions: DIMS, collections: COLLECTIONS});
		expect(() => fresh.collection('codebase')).toThrow(StoreNotConnectedError);
		await expect(fresh.ensureCollections()).rejects.toThrow(StoreNotConnectedError);
	});

	it('overwrites by id', async () => {
		const first = codeRecord(axis(0, DIMS), {docstring: 'old'});
		const second = {...first, payload: {...first.payload, docstring: 'new'}};

		await store.upsert('codebase', [first]);
		await store.upsert('codebase', [second]);

		expect(await store.count('codebase')).toBe(1);
		const [hit] = await store.denseSearch('codebase', axis(0, DIMS), 5);
		expect(hit?.payload.docstring).toBe('new');
	});

	it('rejects invalid records individually and writes the rest', async () => {
		const good = codeRecord(axis(0, DIMS), {symbol: 'good'});
		const bad = codeRecord([1, 2], {symbol: 'bad'});

		const result = await store.upsert('codebase', [good, bad]);

		expect(result.written).toBe(1);
		expect(result.rejected).toEqual([
			{id: bad.id, reason: 'vector has 2 dimensions, expected 4'},
		]);
		expect(await store.count('codebase')).toBe(1);
	});

	it('ranks dense hits by cosine similarity', async () => {
		await store.upsert('codebase', [
			codeRecord(axis(1, DIMS), {symbol: 'far'}),
			codeRecord([1, 1, 0, 0], {symbol: 'near'}),
			codeRecord(axis(0, DIMS), {symbol: 'exact'}),
		]);

		const hits = await store.denseSearch('codebase', axis(0, DIMS), 2);
		expect(hits.map(h => h.payload.symbol)).toEqual(['exact', 'near']);
		expect(hits[0]?.score).toBeCloseTo(1, 10);
		expect(hits[1]?.score).toBeCloseTo(Math.SQRT1_2, 10);
	});

	it('rejects a query vector of the wrong size', async () => {
		await expect(store.denseSearch('codebase', [1, 0], 3)).rejects.toThrow(
			'Query vector has 2 dimensions, expected 4',
		);
	});

	it('matches lexical tokens as substrings in scan order', async () => {
		await store.upsert('codebase', [
			codeRecord(axis(0, DIMS), {symbol: 'load_config', code: 'def load_config():\n    pass'}),
			codeRecord(axis(1, DIMS), {symbol: 'render', docstring: 'Uses the config cache.'}),
			codeRecord(axis(2, DIMS), {symbol: 'unrelated', code: 'x = 1'}),
			codeRecord(axis(3, DIMS), {file: 'config/loader.py', symbol: 'read', code: 'y = 2'}),
		]);

		const hits = await store.lexicalSearch('codebase', ['config'], 10);
		expect(hits.map(h => h.payload.symbol)).toEqual(['load_config', 'render', 'read']);

		const capped = await store.lexicalSearch('codebase', ['config'], 2);
		expect(capped.map(h => h.payload.symbol)).toEqual(['load_config', 'render']);
	});

	it('keeps the first position when an id is overwritten', async () => {
		const a = codeRecord(axis(0, DIMS), {symbol: 'alpha', code: 'token'});
		const b = codeRecord(axis(1, DIMS), {symbol: 'beta', code: 'token'});
		await store.upsert('codebase', [a, b]);
		await store.upsert('codebase', [a]);

		const hits = await store.lexicalSearch('codebase', ['token'], 5);
		expect(hits.map(h => h.payload.symbol)).toEqual(['alpha', 'beta']);
	});

	it('returns nothing for an empty token list', async () => {
		await store.upsert('codebase', [codeRecord(axis(0, DIMS))]);
		expect(await store.lexicalSearch('codebase', [], 5)).toEqual([]);
	});

	it('keeps the two collections apart', async () => {
		await store.upsert('codebase', [codeRecord(axis(0, DIMS))]);
		await store.upsert('memory', [memoryRecord('m1', axis(0, DIMS), 'hello')]);

		expect(await store.count('codebase')).toBe(1);
		expect(await store.count('memory')).toBe(1);
		const [hit] = await store.denseSearch('memory', axis(0, DIMS), 1);
		expect(hit?.payload.text).toBe('User: hello\nAssistant: ok');
	});

	it('drops its collections on close', async () => {
		await store.close();
		expect(() => store.collection('memory')).toThrow(StoreNotConnectedError);
	});
});

describe('buildLexicalFilter', () => {
	it('ORs a LIKE clause for every token and column', () => {
		expect(buildLexicalFilter(['code', 'name'], ['load', 'cfg'])).toBe(
			"`code` LIKE '%load%' OR `name` LIKE '%load%' OR `code` LIKE '%cfg%' OR `name` LIKE '%cfg%'",
		);
	});

	it('escapes single quotes', () => {
		expect(escapeSqlString("it's")).toBe("it''s");
		expect(buildLexicalFilter(['text'], ["o'neil"])).toBe("`text` LIKE '%o''neil%'");
	});
});

describe('LanceIndexStore', () => {
	let ctx: TestContext;
	let store: IndexStore;

	function openStore(dimensions: number = DIMS): LanceIndexStore {
		return new LanceIndexStore({
			path: path.join(ctx.projectRoot, 'lancedb'),
			dimensions,
			collections: COLLECTIONS,
		});
	}

	beforeEach(async () => {
		ctx = await makeTempDir();
		store = openStore();
		await store.connect();
		await store.ensureCollections();
	});

	afterEach(async () => {
		await store.close();
		await ctx.cleanup();
	});

	it('writes, searches and overwrites code records', async () => {
		const exact = codeRecord(axis(0, DIMS), {
			symbol: 'parse_args',
			preceding_comments: ['CLI entry.'],
			extra: {decorated: true},
		});
		const other = codeRecord(axis(1, DIMS), {symbol: 'render'});

		const result = await store.upsert('codebase', [exact, other]);
		expect(result).toEqual({written: 2, rejected: []});

		const hits = await store.denseSearch('codebase', axis(0, DIMS), 1);
		expect(hits).toHaveLength(1);
		expect(hits[0]?.id).toBe(exact.id);
		expect(hits[0]?.score).toBeCloseTo(1, 5);
		expect(hits[0]?.payload).toEqual(exact.payload);

		await store.upsert('codebase', [exact]);
		expect(await store.count('codebase')).toBe(2);
	});

	it('writes batches against the declared column types', async () => {
		const batch = Array.from({length: 12}, (_, i) =>
			codeRecord([0.5, 0.25, 0.125, i], {
				symbol: `fn_${i}`,
				start_line: 10 * i + 1,
				end_line: 10 * i + 7,
			}),
		);

		expect(await store.upsert('codebase', batch)).toEqual({written: 12, rejected: []});
		expect(await store.upsert('codebase', batch.slice(0, 4))).toEqual({
			written: 4,
			rejected: [],
		});
		expect(await store.count('codebase')).toBe(12);

		const [hit] = await store.lexicalSearch('codebase', ['fn_3'], 1);
		expect(hit?.payload.start_line).toBe(31);
		expect(hit?.payload.end_line).toBe(37);
	});

	it('re-checks lexical candidates with an exact substring test', async () => {
		await store.upsert('codebase', [
			codeRecord(axis(0, DIMS), {symbol: 'a', code: 'read_file(path)'}),
			// `_` is a LIKE wildcard, so this row passes the filter but not the re-check
			codeRecord(axis(1, DIMS), {symbol: 'b', code: 'readXfile(path)'}),
		]);

		const hits = await store.lexicalSearch('codebase', ['read_file'], 5);
		expect(hits.map(h => h.payload.symbol)).toEqual(['a']);
	});

	it('stores memory entries', async () => {
		await store.upsert('memory', [memoryRecord('m1', axis(2, DIMS), 'where is main?')]);
		const [hit] = await store.denseSearch('memory', axis(2, DIMS), 3);
		expect(hit?.payload.user).toBe('where is main?');
		expect(hit?.payload.files).toEqual([]);
	});

	it('keeps records across reconnects', async () => {
		await store.upsert('codebase', [codeRecord(axis(0, DIMS))]);
		await store.close();

		store = openStore();
		await store.connect();
		await store.ensureCollections();
		expect(await store.count('codebase')).toBe(1);
	});

	it('refuses to open a collection with a different vector size', async () => {
		await store.close();

		store = openStore(6);
		await store.connect();
		await expect(store.ensureCollections()).rejects.toThrow(
			'Collection "codebase" stores 4-dimension vectors but 6 are configured',
		);
	});
});
