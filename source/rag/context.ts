/**
 * Long-lived resources shared by every component: config, logger,
 * embedding provider and index store. Created once, closed once.
 */

import {loadConfig, type RagConfig} from './config/index.js';
import {createEmbeddingProvider} from './embeddings/index.js';
import type {EmbeddingProvider} from './embeddings/types.js';
import {Ingester} from './ingest/ingester.js';
import {createNullLogger, type Logger} from './logger/index.js';
import {MemoryStore} from './memory/index.js';
import {Retriever} from './search/retriever.js';
import {createIndexStore} from './storage/index.js';
import type {IndexStore} from './storage/types.js';

export interface RagContextOptions {
	projectRoot: string;
	/** Skip loadConfig and use this config */
	config?: RagConfig;
	logger?: Logger;
	/** Use this provider instead of the configured one */
	embeddings?: EmbeddingProvider;
	/** Use this store instead of the configured one */
	store?: IndexStore;
}

export interface RagContext {
	readonly projectRoot: string;
	readonly config: RagConfig;
	readonly logger: Logger;
	readonly embeddings: EmbeddingProvider;
	readonly store: IndexStore;
	readonly retriever: Retriever;
	readonly memory: MemoryStore;
	readonly ingester: Ingester;
	/** Release the provider and the store connection */
	close(): Promise<void>;
}

/**
 * Build, initialize and connect everything a command needs.
 *
 * If any step fails, whatever was opened is closed before rethrowing.
 */
export async function createRagContext(options: RagContextOptions): Promise<RagContext> {
	const {projectRoot} = options;
	const logger = options.logger ?? createNullLogger();
	const config = options.config ?? (await loadConfig(projectRoot));
	const embeddings = options.embeddings ?? createEmbeddingProvider(config, logger);
	const store = options.store ?? createIndexStore(projectRoot, config, logger);

	try {
		await embeddings.initialize();
		await store.connect();
		await store.ensureCollections();
	} catch (error) {
		embeddings.close();
		await store.close();
		throw error;
	}

	logger.info('Context', 'RAG context ready', {
		backend: store.backend,
		provider: config.embedding.provider,
		dimensions: embeddings.dimensions,
	});

	return {
		projectRoot,
		config,
		logger,
		embeddings,
		store,
		retriever: new Retriever({
			embeddings,
			store,
			settings: config.retrieval,
			logger,
		}),
		memory: new MemoryStore({
			embeddings,
			store,
			recallLimit: config.retrieval.memoryK,
			logger,
		}),
		ingester: new Ingester({
			embeddings,
			store,
			settings: config.ingest,
			logger,
		}),
		async close() {
			embeddings.close();
			await store.close();
			logger.debug('Context', 'RAG context closed');
		},
	};
}
