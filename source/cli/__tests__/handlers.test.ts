/**
 * CLI command handlers and their output.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import chalk from 'chalk';
import {describe, it, expect, beforeAll, beforeEach, afterEach} from 'vitest';
import {createRagContext, type RagContext} from '../../rag/context.js';
import type {SearchResults} from '../../rag/search/types.js';
import type {MemoryPayload} from '../../rag/storage/types.js';
import {
	codePayload,
	copyFixtureToTemp,
	makeTempDir,
	testConfig,
	type TestContext,
} from '../../rag/__tests__/helpers.js';
import {
	formatExtractStats,
	formatIngestStats,
	formatRecall,
	formatSearchResults,
	getStatus,
	runExtract,
	runInit,
	runRemember,
} from '../commands/handlers.js';

beforeAll(() => {
	chalk.level = 0;
});

describe('runInit', () => {
	let ctx: TestContext;

	beforeEach(async () => {
		ctx = await makeTempDir();
	});

	afterEach(async () => {
		await ctx.cleanup();
	});

	it('writes the config and a .gitignore entry', async () => {
		const message = await runInit(ctx.projectRoot);
		expect(message).toBe(
			`Initialized coderecall in ${path.join(ctx.projectRoot, '.coderecall')}\n` +
				'Run extract, then ingest, to build the index.',
		);
		expect(await fs.readFile(path.join(ctx.projectRoot, '.gitignore'), 'utf-8')).toBe(
			'# coderecall index\n.coderecall/\n',
		);
		await expect(
			fs.access(path.join(ctx.projectRoot, '.coderecall', 'config.json')),
		).resolves.toBeUndefined();
	});

	it('refuses to overwrite without force', async () => {
		await runInit(ctx.projectRoot);
		expect(await runInit(ctx.projectRoot)).toBe(
			'Already initialized. Use init --force to reinitialize.',
		);
		expect(await runInit(ctx.projectRoot, true)).toMatch(/^Reinitialized coderecall in /);
	});

	it('appends to an existing .gitignore once', async () => {
		const gitignore = path.join(ctx.projectRoot, '.gitignore');
		await fs.writeFile(gitignore, 'node_modules/\n');

		await runInit(ctx.projectRoot);
		await runInit(ctx.projectRoot, true);

		expect(await fs.readFile(gitignore, 'utf-8')).toBe(
			'node_modules/\n\n# coderecall index\n.coderecall/\n',
		);
	});
});

describe('runExtract', () => {
	it('writes the artifact and summarizes it', async () => {
		const ctx = await copyFixtureToTemp('pyrepo');
		try {
			const outPath = path.join(ctx.projectRoot, 'out', 'parsed_code.json');
			const artifact = await runExtract(ctx.projectRoot, outPath, testConfig());
			await expect(fs.access(outPath)).resolves.toBeUndefined();

			expect(formatExtractStats(artifact, outPath)).toBe(
				[
					'Extraction complete:',
					'  Files: 3',
					'  Declarations: 6',
					'  Line windows: 3',
					'  Syntax errors: 1',
					'  Skipped: 0',
					`  Artifact: ${outPath}`,
				].join('\n'),
			);
		} finally {
			await ctx.cleanup();
		}
	});
});

describe('formatIngestStats', () => {
	it('lists totals, rejections and failed batches', () => {
		const output = formatIngestStats({
			filesSeen: 2,
			unitsSeen: 5,
			skippedEmpty: 1,
			recordsWritten: 3,
			rejected: [{id: 'r1', reason: 'vector has 2 dimensions, expected 8'}],
			failedBatches: [{stage: 'embed', index: 0, size: 1, message: 'timeout'}],
		});
		expect(output).toBe(
			[
				'Ingest complete:',
				'  Files: 2',
				'  Units seen: 5',
				'  Skipped (empty): 1',
				'  Records written: 3',
				'  Records rejected: 1',
				'  Failed batches: 1',
				'  rejected r1: vector has 2 dimensions, expected 8',
				'  embed batch 0 (1): timeout',
			].join('\n'),
		);
	});
});

describe('formatSearchResults', () => {
	const results: SearchResults = {
		query: 'load',
		tokens: ['load'],
		timedOut: ['keyword'],
		elapsedMs: 12,
		results: [
			{
				id: 'id-1',
				score: 1 / 61,
				payload: codePayload({
					file: 'a.py',
					symbol: 'load',
					start_line: 2,
					end_line: 5,
					code: 'def load():\n    pass',
				}),
				denseRank: 1,
				keywordRank: null,
			},
		],
	};

	it('shows type, location, score, ranks and a snippet', () => {
		expect(formatSearchResults(results)).toBe(
			[
				'Found 1 results for "load" (12ms):',
				'',
				'Timed out: keyword leg',
				'',
				'[Function] load',
				'  a.py:2-5',
				'  Score: 0.0164 (dense #1, keyword -)',
				'  def load():     pass',
				'',
			].join('\n'),
		);
	});

	it('reports an empty result', () => {
		expect(formatSearchResults({...results, results: [], elapsedMs: 3})).toBe(
			'No results found for "load" (3ms)',
		);
	});
});

describe('formatRecall', () => {
	it('lists each exchange with files and tags', () => {
		const entry: MemoryPayload = {
			user: 'Where is config?',
			assistant: 'config/index.ts',
			text: 'User: Where is config?\nAssistant: config/index.ts',
			files: ['config/index.ts'],
			tags: ['config'],
			timestamp: '2026-01-02T03:04:05.000Z',
		};
		expect(formatRecall('config', [entry])).toBe(
			[
				'Recalled 1 exchanges:',
				'',
				'2026-01-02T03:04:05.000Z',
				'  User: Where is config?',
				'  Assistant: config/index.ts',
				'  Files: config/index.ts',
				'  Tags: config',
				'',
			].join('\n'),
		);
		expect(formatRecall('config', [])).toBe('No memories found for "config"');
	});
});

describe('status and memory commands', () => {
	let ctx: TestContext;
	let rag: RagContext;

	beforeEach(async () => {
		ctx = await makeTempDir();
		rag = await createRagContext({projectRoot: ctx.projectRoot, config: testConfig()});
	});

	afterEach(async () => {
		await rag.close();
		await ctx.cleanup();
	});

	it('remembers an exchange and counts it', async () => {
		const message = await runRemember(rag, {
			user: 'q',
			assistant: 'a',
			files: [],
			tags: [],
		});
		expect(message).toMatch(/^Remembered [0-9a-f-]{36} \(\d{4}-\d{2}-\d{2}T[\d:.]+Z\)$/);

		expect(await getStatus(rag)).toBe(
			[
				'Index status:',
				'  Backend: in-process',
				'  Embeddings: mock (mock, 8 dims)',
				'  codebase_hybrid_v1: 0 records',
				'  chat_memory_v1: 1 records',
			].join('\n'),
		);
	});
});
