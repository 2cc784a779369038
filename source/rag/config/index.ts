import fs from 'node:fs/promises';
import {z} from 'zod';
import {getConfigPath, getCoderecallDir} from '../constants.js';
import {ConfigError} from '../errors.js';

// ============================================================================
// Schema
// ============================================================================

const positiveInt = z.number().int().positive();

const StoreConfigSchema = z.object({
	/** Storage backend: embedded LanceDB tables or a process-local map */
	backend: z.enum(['lancedb', 'in-process']),
	/** LanceDB directory; null means .coderecall/lancedb under the project */
	path: z.string().min(1).nullable(),
	/** Physical table names for the two logical collections */
	collections: z.object({
		codebase: z.string().min(1),
		memory: z.string().min(1),
	}),
});

const EmbeddingConfigSchema = z.object({
	provider: z.enum(['openai', 'mock']),
	model: z.string().min(1),
	dimensions: positiveInt,
	/** OpenAI-compatible API base URL (OpenAI, Azure proxy, Ollama /v1, ...) */
	baseUrl: z.string().url(),
	/** Only ever sourced from the environment; never written to disk */
	apiKey: z.string().optional(),
});

const ExtractionConfigSchema = z.object({
	extensions: z.array(z.string().startsWith('.')).min(1),
	excludeDirs: z.array(z.string().min(1)),
	chunkLines: positiveInt,
	chunkOverlap: z.number().int().nonnegative(),
	maxFileBytes: positiveInt,
	/** Where `extract` writes and `ingest` reads the artifact */
	artifactPath: z.string().min(1),
});

const IngestConfigSchema = z.object({
	batchSize: positiveInt,
	concurrency: positiveInt,
	embedBatchSize: positiveInt,
});

const RetrievalConfigSchema = z.object({
	denseK: positiveInt,
	keywordK: positiveInt,
	memoryK: positiveInt,
	rrfK: z.number().nonnegative(),
	legTimeoutMs: positiveInt,
	maxCodeCharsPerChunk: positiveInt,
	maxTotalContextChars: positiveInt,
	maxMemoryChars: positiveInt,
});

export const RagConfigSchema = z
	.object({
		version: z.literal(1),
		store: StoreConfigSchema,
		embedding: EmbeddingConfigSchema,
		extraction: ExtractionConfigSchema,
		ingest: IngestConfigSchema,
		retrieval: RetrievalConfigSchema,
	})
	.superRefine((config, ctx) => {
		if (config.extraction.chunkOverlap >= config.extraction.chunkLines) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['extraction', 'chunkOverlap'],
				message: `must be smaller than chunkLines (${config.extraction.chunkLines})`,
			});
		}
	});

export type RagConfig = z.infer<typeof RagConfigSchema>;
export type StoreBackend = RagConfig['store']['backend'];
export type EmbeddingProviderType = RagConfig['embedding']['provider'];

/**
 * Shape accepted from config.json: every section optional and partial.
 */
const ConfigFileSchema = z
	.object({
		version: z.literal(1),
		store: StoreConfigSchema.extend({
			collections: StoreConfigSchema.shape.collections.partial(),
		}).partial(),
		embedding: EmbeddingConfigSchema.omit({apiKey: true}).partial(),
		extraction: ExtractionConfigSchema.partial(),
		ingest: IngestConfigSchema.partial(),
		retrieval: RetrievalConfigSchema.partial(),
	})
	.partial();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: RagConfig = {
	version: 1,
	store: {
		backend: 'lancedb',
		path: null,
		collections: {
			codebase: 'codebase_hybrid_v1',
			memory: 'chat_memory_v1',
		},
	},
	embedding: {
		provider: 'openai',
		model: 'text-embedding-3-small',
		dimensions: 1536,
		baseUrl: 'https://api.openai.com/v1',
	},
	extraction: {
		extensions: ['.py'],
		excludeDirs: [
			'.git',
			'.venv',
			'venv',
			'node_modules',
			'dist',
			'build',
			'__pycache__',
			'.coderecall',
		],
		chunkLines: 200,
		chunkOverlap: 40,
		maxFileBytes: 2 * 1024 * 1024,
		artifactPath: 'parsed_code.json',
	},
	ingest: {
		batchSize: 256,
		concurrency: 2,
		embedBatchSize: 32,
	},
	retrieval: {
		denseK: 6,
		keywordK: 6,
		memoryK: 3,
		rrfK: 60,
		legTimeoutMs: 15_000,
		maxCodeCharsPerChunk: 1800,
		maxTotalContextChars: 9000,
		maxMemoryChars: 800,
	},
};

// ============================================================================
// Environment Overrides
// ============================================================================

type Env = Record<string, string | undefined>;

const ENV_NUMBER_KEYS = {
	DENSE_VECTOR_SIZE: ['embedding', 'dimensions'],
	CHUNK_LINES: ['extraction', 'chunkLines'],
	CHUNK_OVERLAP: ['extraction', 'chunkOverlap'],
	MAX_FILE_BYTES: ['extraction', 'maxFileBytes'],
	INGEST_BATCH_SIZE: ['ingest', 'batchSize'],
	INGEST_CONCURRENCY: ['ingest', 'concurrency'],
	TOP_K_DENSE: ['retrieval', 'denseK'],
	TOP_K_KEYWORD: ['retrieval', 'keywordK'],
	TOP_K_MEMORY: ['retrieval', 'memoryK'],
	RRF_K: ['retrieval', 'rrfK'],
	LEG_TIMEOUT_MS: ['retrieval', 'legTimeoutMs'],
	MAX_CODE_CHARS_PER_CHUNK: ['retrieval', 'maxCodeCharsPerChunk'],
	MAX_TOTAL_CONTEXT_CHARS: ['retrieval', 'maxTotalContextChars'],
} as const;

function readEnvNumber(env: Env, key: string, issues: string[]): number | undefined {
	const raw = env[key]?.trim();
	if (!raw) return undefined;
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		issues.push(`${key}: expected a number, got "${raw}"`);
		return undefined;
	}
	return value;
}

function readEnvList(env: Env, key: string): string[] | undefined {
	const raw = env[key]?.trim();
	if (!raw) return undefined;
	return raw
		.split(',')
		.map(part => part.trim())
		.filter(part => part.length > 0);
}

function readEnvString(env: Env, key: string): string | undefined {
	const raw = env[key]?.trim();
	return raw ? raw : undefined;
}

/**
 * Collect config overrides from environment variables.
 */
export function configFromEnv(env: Env): {overrides: ConfigFile; issues: string[]} {
	const issues: string[] = [];
	const store: NonNullable<ConfigFile['store']> = {};
	const embedding: NonNullable<ConfigFile['embedding']> = {};
	const extraction: NonNullable<ConfigFile['extraction']> = {};
	const ingest: NonNullable<ConfigFile['ingest']> = {};
	const retrieval: NonNullable<ConfigFile['retrieval']> = {};

	const backend = readEnvString(env, 'INDEX_BACKEND');
	if (backend === 'lancedb' || backend === 'in-process') {
		store.backend = backend;
	} else if (backend !== undefined) {
		issues.push(`INDEX_BACKEND: expected "lancedb" or "in-process", got "${backend}"`);
	}
	store.path = readEnvString(env, 'LANCEDB_PATH');
	const codebase = readEnvString(env, 'COLLECTION_CODEBASE');
	const memory = readEnvString(env, 'COLLECTION_MEMORY');
	if (codebase || memory) {
		store.collections = {codebase, memory};
	}

	const provider = readEnvString(env, 'EMBEDDING_PROVIDER');
	if (provider === 'openai' || provider === 'mock') {
		embedding.provider = provider;
	} else if (provider !== undefined) {
		issues.push(`EMBEDDING_PROVIDER: expected "openai" or "mock", got "${provider}"`);
	}
	embedding.model = readEnvString(env, 'DENSE_MODEL_NAME');
	embedding.baseUrl = readEnvString(env, 'OPENAI_BASE_URL');

	extraction.excludeDirs = readEnvList(env, 'EXCLUDE_DIRS');
	extraction.extensions = readEnvList(env, 'INCLUDE_EXTS');
	extraction.artifactPath = readEnvString(env, 'PARSED_OUT');

	const sections = {embedding, extraction, ingest, retrieval};
	for (const [key, [section, field]] of Object.entries(ENV_NUMBER_KEYS)) {
		const value = readEnvNumber(env, key, issues);
		if (value !== undefined) {
			const target: Record<string, unknown> = sections[section];
			target[field] = value;
		}
	}

	return {
		overrides: {store, embedding, extraction, ingest, retrieval},
		issues,
	};
}

// ============================================================================
// Loading
// ============================================================================

type Section = Record<string, unknown>;

function defined(value: object | undefined): Section {
	if (!value) return {};
	return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

/**
 * Merge partial config layers over the defaults, section by section.
 */
export function mergeConfig(base: RagConfig, ...layers: ConfigFile[]): unknown {
	const store: Section = {...base.store};
	const collections: Section = {...base.store.collections};
	const embedding: Section = {...base.embedding};
	const extraction: Section = {...base.extraction};
	const ingest: Section = {...base.ingest};
	const retrieval: Section = {...base.retrieval};

	for (const layer of layers) {
		Object.assign(store, defined(layer.store));
		Object.assign(collections, defined(layer.store?.collections));
		Object.assign(embedding, defined(layer.embedding));
		Object.assign(extraction, defined(layer.extraction));
		Object.assign(ingest, defined(layer.ingest));
		Object.assign(retrieval, defined(layer.retrieval));
	}

	return {
		version: base.version,
		store: {...store, collections},
		embedding,
		extraction,
		ingest,
		retrieval,
	};
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Validate a fully merged config object.
 */
export function parseConfig(value: unknown): RagConfig {
	const result = RagConfigSchema.safeParse(value);
	if (!result.success) {
		throw new ConfigError('Invalid configuration', formatIssues(result.error));
	}
	return result.data;
}

async function readConfigFile(projectRoot: string): Promise<ConfigFile> {
	const configPath = getConfigPath(projectRoot);

	let content: string;
	try {
		content = await fs.readFile(configPath, 'utf-8');
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return {};
		}
		throw new ConfigError(`Cannot read ${configPath}`, [
			error instanceof Error ? error.message : String(error),
		]);
	}

	let json: unknown;
	try {
		json = JSON.parse(content);
	} catch (error) {
		throw new ConfigError(`Malformed JSON in ${configPath}`, [
			error instanceof Error ? error.message : String(error),
		]);
	}

	const parsed = ConfigFileSchema.safeParse(json);
	if (!parsed.success) {
		throw new ConfigError(`Invalid ${configPath}`, formatIssues(parsed.error));
	}
	return parsed.data;
}

/**
 * Load config: defaults, then .coderecall/config.json, then environment.
 * A missing config file means defaults; anything invalid throws ConfigError.
 */
export async function loadConfig(
	projectRoot: string,
	env: Env = process.env,
): Promise<RagConfig> {
	const fileConfig = await readConfigFile(projectRoot);
	const {overrides, issues} = configFromEnv(env);
	if (issues.length > 0) {
		throw new ConfigError('Invalid environment', issues);
	}

	const config = parseConfig(mergeConfig(DEFAULT_CONFIG, fileConfig, overrides));
	const apiKey = readEnvString(env, 'OPENAI_API_KEY');
	return apiKey
		? {...config, embedding: {...config.embedding, apiKey}}
		: config;
}

/**
 * Save config to disk, without secrets.
 * Creates the .coderecall directory if it doesn't exist.
 */
export async function saveConfig(
	projectRoot: string,
	config: RagConfig,
): Promise<void> {
	await fs.mkdir(getCoderecallDir(projectRoot), {recursive: true});

	const {apiKey: _apiKey, ...embedding} = config.embedding;
	const persisted = {...config, embedding};
	await fs.writeFile(
		getConfigPath(projectRoot),
		JSON.stringify(persisted, null, '\t') + '\n',
	);
}

/**
 * Check if a config file exists.
 */
export async function configExists(projectRoot: string): Promise<boolean> {
	try {
		await fs.access(getConfigPath(projectRoot));
		return true;
	} catch {
		return false;
	}
}
