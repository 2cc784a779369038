/**
 * Shared runtime context wiring.
 */

import path from 'node:path';
import {describe, it, expect, vi} from 'vitest';
import {createRagContext} from '../context.js';
import {MockEmbeddingProvider} from '../embeddings/mock.js';
import {UnitExtractor, extractorOptions, writeArtifact} from '../extract/extractor.js';
import {InProcessIndexStore} from '../storage/in-process.js';
import {copyFixtureToTemp, testConfig} from './helpers.js';

describe('createRagContext', () => {
	it('runs extract, ingest, search and memory end to end', async () => {
		const ctx = await copyFixtureToTemp('pyrepo');
		const config = testConfig({dimensions: 16});
		const rag = await createRagContext({projectRoot: ctx.projectRoot, config});
		const extractor = new UnitExtractor(extractorOptions(config));

		try {
			expect(rag.store.backend).toBe('in-process');
			expect(rag.embeddings).toBeInstanceOf(MockEmbeddingProvider);

			const artifactPath = path.join(ctx.projectRoot, 'parsed_code.json');
			await writeArtifact(artifactPath, await extractor.extractRepository(ctx.projectRoot));
			const stats = await rag.ingester.ingestFile(artifactPath);
			expect(stats.failedBatches).toEqual([]);
			expect(await rag.store.count('codebase')).toBe(stats.recordsWritten);

			const {results, tokens} = await rag.retriever.search('add_numbers');
			expect(tokens).toEqual(['add_numbers']);
			const topKeyword = results.find(r => r.keywordRank === 1);
			expect(topKeyword?.payload.symbol).toBe('add_numbers');
			expect(topKeyword?.payload.file).toBe('mathlib/ops.py');

			await rag.memory.remember('What adds numbers?', 'add_numbers in mathlib/ops.py', {
				files: ['mathlib/ops.py'],
			});
			const recalled = await rag.memory.recall('What adds numbers?');
			expect(recalled[0]?.files).toEqual(['mathlib/ops.py']);
		} finally {
			extractor.close();
			await rag.close();
			await ctx.cleanup();
		}
	});

	it('closes what it opened when setup fails', async () => {
		const embeddings = new MockEmbeddingProvider(8);
		const closeEmbeddings = vi.spyOn(embeddings, 'close');
		const store = new InProcessIndexStore({
			dimensions: 8,
			collections: {codebase: 'codebase', memory: 'memory'},
		});
		vi.spyOn(store, 'ensureCollections').mockRejectedValue(new Error('disk full'));
		const closeStore = vi.spyOn(store, 'close');

		await expect(
			createRagContext({projectRoot: '/unused', config: testConfig(), embeddings, store}),
		).rejects.toThrow('disk full');
		expect(closeEmbeddings).toHaveBeenCalledTimes(1);
		expect(closeStore).toHaveBeenCalledTimes(1);
	});
});
