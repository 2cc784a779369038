/**
 * Command handlers for the CLI.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import chalk from 'chalk';
import {
	CODERECALL_DIR,
	DEFAULT_CONFIG,
	UnitExtractor,
	buildCodeContext,
	configExists,
	extractorOptions,
	getCoderecallDir,
	saveConfig,
	writeArtifact,
	type CodeSearchResult,
	type ExtractionArtifact,
	type IngestStats,
	type Logger,
	type MemoryPayload,
	type RagConfig,
	type RagContext,
	type SearchResults,
	type UnitType,
} from '../../rag/index.js';

// ============================================================================
// Init
// ============================================================================

/**
 * Write a default config and ignore the data directory in git.
 */
export async function runInit(
	projectRoot: string,
	force: boolean = false,
): Promise<string> {
	const dataDir = getCoderecallDir(projectRoot);
	const isExisting = await configExists(projectRoot);

	if (isExisting && !force) {
		return 'Already initialized. Use init --force to reinitialize.';
	}

	await saveConfig(projectRoot, DEFAULT_CONFIG);

	const gitignorePath = path.join(projectRoot, '.gitignore');
	const entry = `${CODERECALL_DIR}/`;
	let content: string | null = null;
	try {
		content = await fs.readFile(gitignorePath, 'utf-8');
	} catch (error) {
		if (!isMissingFile(error)) throw error;
	}
	if (content === null) {
		await fs.writeFile(gitignorePath, `# coderecall index\n${entry}\n`);
	} else if (!content.includes(CODERECALL_DIR)) {
		await fs.appendFile(gitignorePath, `\n# coderecall index\n${entry}\n`);
	}

	const action = isExisting ? 'Reinitialized' : 'Initialized';
	return `${action} coderecall in ${dataDir}\nRun extract, then ingest, to build the index.`;
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// Extract
// ============================================================================

/**
 * Extract units from a source tree and write the artifact.
 */
export async function runExtract(
	root: string,
	outPath: string,
	config: RagConfig,
	logger?: Logger,
): Promise<ExtractionArtifact> {
	const extractor = new UnitExtractor(extractorOptions(config), logger);
	try {
		await extractor.initialize();
		const artifact = await extractor.extractRepository(root);
		await writeArtifact(outPath, artifact);
		return artifact;
	} finally {
		extractor.close();
	}
}

/**
 * Format extraction stats for display.
 */
export function formatExtractStats(artifact: ExtractionArtifact, outPath: string): string {
	const {stats} = artifact;
	let units = 0;
	let windows = 0;
	for (const info of Object.values(artifact.parsed_code)) {
		units += info.ast_items.length;
		windows += info.file_chunks.length;
	}

	const lines = [
		chalk.bold('Extraction complete:'),
		`  Files: ${stats.num_files}`,
		`  Declarations: ${units}`,
		`  Line windows: ${windows}`,
		`  Syntax errors: ${stats.num_syntax_errors > 0 ? chalk.yellow(String(stats.num_syntax_errors)) : '0'}`,
		`  Skipped: ${stats.num_skipped > 0 ? chalk.yellow(String(stats.num_skipped)) : '0'}`,
		`  Artifact: ${chalk.green(outPath)}`,
	];
	return lines.join('\n');
}

// ============================================================================
// Ingest
// ============================================================================

/**
 * Ingest an artifact into the codebase collection.
 */
export async function runIngest(
	context: RagContext,
	artifactPath: string,
	onProgress?: (message: string) => void,
): Promise<IngestStats> {
	return context.ingester.ingestFile(artifactPath, {
		progressCallback: (current, total, stage) => {
			onProgress?.(`${stage}: ${current}/${total}`);
		},
	});
}

/**
 * Format ingest stats for display.
 */
export function formatIngestStats(stats: IngestStats): string {
	const lines = [
		chalk.bold('Ingest complete:'),
		`  Files: ${stats.filesSeen}`,
		`  Units seen: ${stats.unitsSeen}`,
		`  Skipped (empty): ${stats.skippedEmpty}`,
		`  Records written: ${chalk.green(String(stats.recordsWritten))}`,
		`  Records rejected: ${stats.rejected.length}`,
		`  Failed batches: ${stats.failedBatches.length}`,
	];

	for (const rejected of stats.rejected.slice(0, 5)) {
		lines.push(chalk.yellow(`  rejected ${rejected.id}: ${rejected.reason}`));
	}
	for (const batch of stats.failedBatches) {
		lines.push(
			chalk.red(`  ${batch.stage} batch ${batch.index} (${batch.size}): ${batch.message}`),
		);
	}

	return lines.join('\n');
}

// ============================================================================
// Search
// ============================================================================

/**
 * Run a hybrid search.
 */
export async function runSearch(
	context: RagContext,
	query: string,
	limit?: number,
): Promise<SearchResults> {
	return context.retriever.search(query, {limit});
}

/**
 * Color mapping for unit types.
 */
const TYPE_COLORS: Record<UnitType, (s: string) => string> = {
	Function: chalk.cyan,
	AsyncFunction: chalk.blue,
	Class: chalk.magenta,
	FileChunk: chalk.dim,
};

function formatRanks(result: CodeSearchResult): string {
	const dense = result.denseRank === null ? '-' : `#${result.denseRank}`;
	const keyword = result.keywordRank === null ? '-' : `#${result.keywordRank}`;
	return `dense ${dense}, keyword ${keyword}`;
}

/**
 * Format search results for display with colors.
 */
export function formatSearchResults(results: SearchResults): string {
	if (results.results.length === 0) {
		return chalk.dim(
			`No results found for "${results.query}" (${results.elapsedMs}ms)`,
		);
	}

	const lines = [
		chalk.bold(`Found ${results.results.length} results for `) +
			chalk.cyan(`"${results.query}"`) +
			chalk.dim(` (${results.elapsedMs}ms):`),
		'',
	];

	if (results.timedOut.length > 0) {
		lines.push(chalk.yellow(`Timed out: ${results.timedOut.join(', ')} leg`), '');
	}

	for (const result of results.results) {
		const {payload} = result;
		const typeColor = TYPE_COLORS[payload.type];

		lines.push(
			typeColor(`[${payload.type}]`) +
				(payload.symbol ? ` ${chalk.white(payload.symbol)}` : ''),
		);
		lines.push(
			`  ${chalk.green(payload.file)}` +
				chalk.dim(`:${payload.start_line}-${payload.end_line}`),
		);
		lines.push(`  Score: ${result.score.toFixed(4)} ${chalk.dim(`(${formatRanks(result)})`)}`);

		// Snippet (first 100 chars, dimmed)
		const snippet = payload.code.slice(0, 100).replace(/\n/g, ' ');
		lines.push(
			chalk.dim(`  ${snippet}${payload.code.length > 100 ? '...' : ''}`),
		);
		lines.push('');
	}

	return lines.join('\n');
}

/**
 * Search results rendered as prompt context blocks.
 */
export function formatSearchContext(results: SearchResults, config: RagConfig): string {
	return buildCodeContext(results.results, config.retrieval);
}

// ============================================================================
// Memory
// ============================================================================

export interface RememberInput {
	user: string;
	assistant: string;
	files: string[];
	tags: string[];
}

/**
 * Store one exchange in long-term memory.
 */
export async function runRemember(
	context: RagContext,
	input: RememberInput,
): Promise<string> {
	const record = await context.memory.remember(input.user, input.assistant, {
		files: input.files,
		tags: input.tags,
	});
	return `Remembered ${chalk.cyan(record.id)} (${record.payload.timestamp})`;
}

/**
 * Recall past exchanges similar to a query.
 */
export async function runRecall(
	context: RagContext,
	query: string,
	limit?: number,
): Promise<MemoryPayload[]> {
	return context.memory.recall(query, limit);
}

/**
 * Format recalled entries for display.
 */
export function formatRecall(query: string, entries: MemoryPayload[]): string {
	if (entries.length === 0) {
		return chalk.dim(`No memories found for "${query}"`);
	}

	const lines = [chalk.bold(`Recalled ${entries.length} exchanges:`), ''];
	for (const entry of entries) {
		lines.push(chalk.dim(entry.timestamp));
		lines.push(`  ${chalk.cyan('User:')} ${entry.user}`);
		lines.push(`  ${chalk.magenta('Assistant:')} ${entry.assistant}`);
		if (entry.files.length > 0) {
			lines.push(`  Files: ${entry.files.map(file => chalk.green(file)).join(', ')}`);
		}
		if (entry.tags.length > 0) {
			lines.push(`  Tags: ${entry.tags.join(', ')}`);
		}
		lines.push('');
	}
	return lines.join('\n');
}

// ============================================================================
// Status
// ============================================================================

/**
 * Record counts per collection.
 */
export async function getStatus(context: RagContext): Promise<string> {
	const {store, config} = context;
	const [codebase, memory] = await Promise.all([
		store.count('codebase'),
		store.count('memory'),
	]);

	const lines = [
		'Index status:',
		`  Backend: ${store.backend}`,
		`  Embeddings: ${config.embedding.provider} (${config.embedding.model}, ${config.embedding.dimensions} dims)`,
		`  ${config.store.collections.codebase}: ${codebase} records`,
		`  ${config.store.collections.memory}: ${memory} records`,
	];
	return lines.join('\n');
}
