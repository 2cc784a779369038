import fs from 'node:fs/promises';
import path from 'node:path';
import type {RagConfig} from '../config/index.js';
import {MAX_RECORDED_SYNTAX_ERRORS} from '../constants.js';
import {ArtifactFormatError} from '../errors.js';
import type {Logger} from '../logger/index.js';
import {languageLabel} from './grammars.js';
import {chunkByLines, splitLines} from './lines.js';
import {SyntaxExtractor} from './parser.js';
import {
	ExtractionArtifactSchema,
	unitToArtifact,
	type ArtifactFile,
	type ExtractionArtifact,
	type FileExtraction,
	type RetrievalUnit,
} from './types.js';
import {findReadme, listSourceFiles, readSourceFile, toPosixPath} from './walker.js';

export interface ExtractorOptions {
	chunkLines: number;
	chunkOverlap: number;
	maxFileBytes: number;
	extensions: string[];
	excludeDirs: string[];
}

export function extractorOptions(config: RagConfig): ExtractorOptions {
	const {chunkLines, chunkOverlap, maxFileBytes, extensions, excludeDirs} =
		config.extraction;
	return {chunkLines, chunkOverlap, maxFileBytes, extensions, excludeDirs};
}

/**
 * Turns source files into retrieval units.
 *
 * Every file gets line windows; files with a grammar also get one unit per
 * function, async function and class, at any nesting depth.
 */
export class UnitExtractor {
	private readonly options: ExtractorOptions;
	private readonly logger: Logger | null;
	private readonly syntax: SyntaxExtractor;

	constructor(options: ExtractorOptions, logger?: Logger) {
		if (options.chunkOverlap >= options.chunkLines) {
			throw new Error(
				`chunkOverlap (${options.chunkOverlap}) must be smaller than chunkLines (${options.chunkLines})`,
			);
		}
		this.options = options;
		this.logger = logger ?? null;
		this.syntax = new SyntaxExtractor(logger);
	}

	async initialize(): Promise<void> {
		await this.syntax.initialize();
	}

	/**
	 * Fixed-size overlapping line windows over the whole file.
	 */
	windowUnits(filePath: string, content: string): RetrievalUnit[] {
		const language = languageLabel(filePath);
		return chunkByLines(
			content,
			this.options.chunkLines,
			this.options.chunkOverlap,
		).map((window): RetrievalUnit => ({
			filePath,
			unitType: 'FileChunk',
			symbolName: '',
			qualifiedName: `${filePath}::chunk_${window.startLine}_${window.endLine}`,
			startLine: window.startLine,
			endLine: window.endLine,
			docstring: '',
			precedingComments: [],
			codeText: window.text,
			language,
		}));
	}

	/**
	 * Extract one file. The windowing pass runs even when parsing fails.
	 */
	extractFile(filePath: string, content: string): FileExtraction {
		const relativePath = toPosixPath(filePath);
		const lines = splitLines(content);
		const syntax = this.syntax.extract(relativePath, content, lines);

		return {
			syntaxUnits: syntax?.units ?? [],
			windowUnits: this.windowUnits(relativePath, content),
			imports: syntax?.imports ?? [],
			globalVariables: syntax?.globalVariables ?? [],
			syntaxError: syntax?.syntaxError ?? null,
		};
	}

	/**
	 * Walk a repository and build the extraction artifact.
	 */
	async extractRepository(root: string): Promise<ExtractionArtifact> {
		const repoRoot = path.resolve(root);
		await this.initialize();

		this.logger?.info('Extractor', 'Extracting repository', {repoRoot});

		const files = await listSourceFiles(repoRoot, this.options);
		const readme = await findReadme(repoRoot, {
			excludeDirs: this.options.excludeDirs,
			maxBytes: this.options.maxFileBytes,
		});

		const parsedCode: Record<string, ArtifactFile> = {};
		const syntaxErrors: Array<{file: string; error: string}> = [];
		const skipped: Array<{file: string; reason: string}> = [];

		for (const file of files) {
			const read = await readSourceFile(
				path.join(repoRoot, file),
				this.options.maxFileBytes,
			);

			if (!read.ok) {
				this.logger?.warn('Extractor', 'Skipping file', {
					file,
					reason: read.reason,
				});
				skipped.push({file, reason: read.reason});
				parsedCode[file] = {
					ast_items: [],
					file_chunks: [],
					imports: [],
					global_variables: [],
					syntax_error: `SKIPPED: ${read.reason}`,
				};
				continue;
			}

			const extraction = this.extractFile(file, read.content);
			if (extraction.syntaxError) {
				this.logger?.debug('Extractor', 'Syntax error', {
					file,
					error: extraction.syntaxError,
				});
				syntaxErrors.push({file, error: extraction.syntaxError});
			}

			parsedCode[file] = {
				ast_items: extraction.syntaxUnits.map(unitToArtifact),
				file_chunks: extraction.windowUnits.map(unitToArtifact),
				imports: extraction.imports,
				global_variables: extraction.globalVariables,
				syntax_error: extraction.syntaxError,
			};
		}

		this.logger?.info('Extractor', 'Extraction complete', {
			files: files.length,
			syntaxErrors: syntaxErrors.length,
			skipped: skipped.length,
		});

		return {
			repo_root: repoRoot,
			readme,
			parsed_code: parsedCode,
			stats: {
				num_files: files.length,
				num_syntax_errors: syntaxErrors.length,
				num_skipped: skipped.length,
				chunk_lines: this.options.chunkLines,
				chunk_overlap: this.options.chunkOverlap,
			},
			syntax_errors: syntaxErrors.slice(0, MAX_RECORDED_SYNTAX_ERRORS),
			skipped,
		};
	}

	close(): void {
		this.syntax.close();
	}
}

// ============================================================================
// Artifact I/O
// ============================================================================

export async function writeArtifact(
	artifactPath: string,
	artifact: ExtractionArtifact,
): Promise<void> {
	await fs.mkdir(path.dirname(path.resolve(artifactPath)), {recursive: true});
	await fs.writeFile(artifactPath, JSON.stringify(artifact, null, 2) + '\n');
}

/**
 * Read and validate an extraction artifact.
 */
export async function readArtifact(
	artifactPath: string,
): Promise<ExtractionArtifact> {
	let json: unknown;
	try {
		json = JSON.parse(await fs.readFile(artifactPath, 'utf-8'));
	} catch (error) {
		throw new ArtifactFormatError(
			artifactPath,
			error instanceof Error ? error.message : String(error),
		);
	}

	const parsed = ExtractionArtifactSchema.safeParse(json);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new ArtifactFormatError(
			artifactPath,
			issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape',
		);
	}
	return parsed.data;
}
