/**
 * Configuration loading: defaults, config.json, environment.
 */

import fs from 'node:fs/promises';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {
	DEFAULT_CONFIG,
	configExists,
	configFromEnv,
	loadConfig,
	saveConfig,
} from '../config/index.js';
import {getConfigPath} from '../constants.js';
import {ConfigError} from '../errors.js';
import {addFile, makeTempDir, type TestContext} from './helpers.js';

describe('loadConfig', () => {
	let ctx: TestContext;

	beforeEach(async () => {
		ctx = await makeTempDir();
	});

	afterEach(async () => {
		await ctx.cleanup();
	});

	it('returns the defaults when there is no config file', async () => {
		expect(await loadConfig(ctx.projectRoot, {})).toEqual(DEFAULT_CONFIG);
	});

	it('merges config.json section by section', async () => {
		await addFile(
			ctx.projectRoot,
			'.coderecall/config.json',
			JSON.stringify({
				retrieval: {denseK: 10},
				store: {collections: {memory: 'team_memory'}},
			}),
		);

		const config = await loadConfig(ctx.projectRoot, {});
		expect(config.retrieval.denseK).toBe(10);
		expect(config.retrieval.keywordK).toBe(6);
		expect(config.store.collections).toEqual({
			codebase: 'codebase_hybrid_v1',
			memory: 'team_memory',
		});
	});

	it('applies the environment over the file', async () => {
		await addFile(
			ctx.projectRoot,
			'.coderecall/config.json',
			JSON.stringify({retrieval: {denseK: 10}}),
		);

		const config = await loadConfig(ctx.projectRoot, {
			TOP_K_DENSE: '4',
			RRF_K: '30',
			INDEX_BACKEND: 'in-process',
			EXCLUDE_DIRS: ' .git, vendor ,,',
			INCLUDE_EXTS: '.py,.ts',
			OPENAI_API_KEY: ' test-secret ',
		});

		expect(config.retrieval.denseK).toBe(4);
		expect(config.retrieval.rrfK).toBe(30);
		expect(config.store.backend).toBe('in-process');
		expect(config.extraction.excludeDirs).toEqual(['.git', 'vendor']);
		expect(config.extraction.extensions).toEqual(['.py', '.ts']);
		expect(config.embedding.apiKey).toBe('test-secret');
	});

	it('rejects non-numeric environment numbers', async () => {
		await expect(loadConfig(ctx.projectRoot, {TOP_K_DENSE: 'lots'})).rejects.toThrow(
			'Invalid environment: TOP_K_DENSE: expected a number, got "lots"',
		);
	});

	it('rejects an unknown backend', async () => {
		await expect(loadConfig(ctx.projectRoot, {INDEX_BACKEND: 'qdrant'})).rejects.toThrow(
			ConfigError,
		);
	});

	it('rejects an overlap that is not smaller than the window', async () => {
		await expect(loadConfig(ctx.projectRoot, {CHUNK_OVERLAP: '200'})).rejects.toThrow(
			'Invalid configuration: extraction.chunkOverlap: must be smaller than chunkLines (200)',
		);
	});

	it('rejects a negative count from the file', async () => {
		await addFile(
			ctx.projectRoot,
			'.coderecall/config.json',
			JSON.stringify({retrieval: {keywordK: -1}}),
		);
		const error = await loadConfig(ctx.projectRoot, {}).catch((e: unknown) => e);
		expect(error).toBeInstanceOf(ConfigError);
		if (!(error instanceof ConfigError)) return;
		expect(error.issues).toHaveLength(1);
		expect(error.issues[0]).toMatch(/^retrieval\.keywordK: /);
	});

	it('rejects malformed JSON', async () => {
		await addFile(ctx.projectRoot, '.coderecall/config.json', '{"retrieval": ');
		await expect(loadConfig(ctx.projectRoot, {})).rejects.toThrow(/^Malformed JSON in /);
	});
});

describe('configFromEnv', () => {
	it('collects issues instead of throwing', () => {
		const {issues} = configFromEnv({
			EMBEDDING_PROVIDER: 'gemini',
			LEG_TIMEOUT_MS: 'soon',
		});
		expect(issues).toEqual([
			'EMBEDDING_PROVIDER: expected "openai" or "mock", got "gemini"',
			'LEG_TIMEOUT_MS: expected a number, got "soon"',
		]);
	});

	it('ignores blank values', () => {
		const {overrides, issues} = configFromEnv({DENSE_MODEL_NAME: '  ', RRF_K: ''});
		expect(issues).toEqual([]);
		expect(overrides.embedding?.model).toBeUndefined();
		expect(overrides.retrieval?.rrfK).toBeUndefined();
	});
});

describe('saveConfig', () => {
	it('writes the config without the API key', async () => {
		const ctx = await makeTempDir();
		try {
			expect(await configExists(ctx.projectRoot)).toBe(false);
			await saveConfig(ctx.projectRoot, {
				...DEFAULT_CONFIG,
				embedding: {...DEFAULT_CONFIG.embedding, apiKey: 'test-secret'},
			});

			expect(await configExists(ctx.projectRoot)).toBe(true);
			const written = await fs.readFile(getConfigPath(ctx.projectRoot), 'utf-8');
			expect(written).not.toContain('test-secret');
			expect(await loadConfig(ctx.projectRoot, {})).toEqual(DEFAULT_CONFIG);
		} finally {
			await ctx.cleanup();
		}
	});
});
