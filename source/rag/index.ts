/**
 * RAG Engine Core
 *
 * Code unit extraction, hybrid retrieval (dense + lexical with RRF) and
 * long-term memory of past exchanges.
 */

// Constants
export {
	CODERECALL_DIR,
	COLLECTIONS,
	DENSE_VECTOR_NAME,
	MAX_QUERY_TOKENS,
	MAX_RECORDED_SYNTAX_ERRORS,
	RECORD_ID_NAMESPACE,
	getCoderecallDir,
	getConfigPath,
	getLanceDbPath,
	getLogsDir,
	type CollectionName,
} from './constants.js';

// Errors
export {
	ArtifactFormatError,
	ConfigError,
	DenseSearchUnavailableError,
	LegTimeoutError,
	StoreNotConnectedError,
	toError,
} from './errors.js';

// Logger
export {
	createLogger,
	createNullLogger,
	getLogPath,
	type Logger,
	type LogLevel,
} from './logger/index.js';

// Config
export {
	loadConfig,
	saveConfig,
	configExists,
	parseConfig,
	DEFAULT_CONFIG,
	type RagConfig,
	type EmbeddingProviderType,
	type StoreBackend,
} from './config/index.js';

// Extraction
export * from './extract/index.js';

// Embeddings
export * from './embeddings/index.js';

// Storage
export * from './storage/index.js';

// Search
export * from './search/index.js';

// Memory
export {
	MemoryStore,
	combineExchange,
	referencedFiles,
	type MemoryStoreDeps,
	type RememberOptions,
} from './memory/index.js';

// Ingest
export * from './ingest/index.js';

// Context
export {
	createRagContext,
	type RagContext,
	type RagContextOptions,
} from './context.js';
