import {z} from 'zod';

/**
 * Kinds of retrieval unit produced by extraction.
 */
export type UnitType = 'Function' | 'AsyncFunction' | 'Class' | 'FileChunk';

/**
 * Languages with a syntax-tree adapter.
 */
export type SourceLanguage = 'python' | 'javascript' | 'typescript' | 'tsx';

/**
 * One indexable piece of source content.
 * Line numbers are 1-based and inclusive.
 */
export interface RetrievalUnit {
	/** Path relative to the repo root, forward slashes */
	filePath: string;
	unitType: UnitType;
	/** Declared name; empty for FileChunk units */
	symbolName: string;
	/** "file::symbol", or "file::chunk_<start>_<end>" for windows */
	qualifiedName: string;
	startLine: number;
	endLine: number;
	docstring: string;
	/** Comment lines directly above the declaration, top to bottom */
	precedingComments: string[];
	codeText: string;
	language: string;
	/** One-line declaration header */
	signature?: string;
	/** Source text of each base class expression (classes only) */
	bases?: string[];
}

/**
 * Result of extracting a single file.
 */
export interface FileExtraction {
	syntaxUnits: RetrievalUnit[];
	windowUnits: RetrievalUnit[];
	imports: string[];
	globalVariables: string[];
	/** "SyntaxError: ..." when the syntactic pass failed, else null */
	syntaxError: string | null;
}

// ============================================================================
// Artifact (JSON hand-off between extraction and ingestion)
// ============================================================================

export const ArtifactUnitSchema = z.object({
	type: z.enum(['Function', 'AsyncFunction', 'Class', 'FileChunk']),
	name: z.string(),
	symbol: z.string(),
	start_line: z.number().int().positive(),
	end_line: z.number().int().positive(),
	docstring: z.string(),
	code: z.string(),
	preceding_comments: z.array(z.string()),
	language: z.string(),
	signature: z.string().optional(),
	bases: z.array(z.string()).optional(),
});

export const ArtifactFileSchema = z.object({
	ast_items: z.array(ArtifactUnitSchema),
	file_chunks: z.array(ArtifactUnitSchema),
	imports: z.array(z.string()),
	global_variables: z.array(z.string()),
	syntax_error: z.string().nullable(),
});

export const ExtractionArtifactSchema = z.object({
	repo_root: z.string(),
	readme: z.string(),
	parsed_code: z.record(ArtifactFileSchema),
	stats: z.object({
		num_files: z.number().int().nonnegative(),
		num_syntax_errors: z.number().int().nonnegative(),
		num_skipped: z.number().int().nonnegative().default(0),
		chunk_lines: z.number().int().positive(),
		chunk_overlap: z.number().int().nonnegative(),
	}),
	syntax_errors: z.array(z.object({file: z.string(), error: z.string()})),
	skipped: z
		.array(z.object({file: z.string(), reason: z.string()}))
		.default([]),
});

export type ArtifactUnit = z.infer<typeof ArtifactUnitSchema>;
export type ArtifactFile = z.infer<typeof ArtifactFileSchema>;
export type ExtractionArtifact = z.infer<typeof ExtractionArtifactSchema>;

/**
 * Convert a unit to its snake_case artifact form.
 */
export function unitToArtifact(unit: RetrievalUnit): ArtifactUnit {
	const item: ArtifactUnit = {
		type: unit.unitType,
		name: unit.qualifiedName,
		symbol: unit.symbolName,
		start_line: unit.startLine,
		end_line: unit.endLine,
		docstring: unit.docstring,
		code: unit.codeText,
		preceding_comments: unit.precedingComments,
		language: unit.language,
	};
	if (unit.signature !== undefined) item.signature = unit.signature;
	if (unit.bases !== undefined) item.bases = unit.bases;
	return item;
}

/**
 * Convert an artifact item back to a unit.
 */
export function artifactToUnit(filePath: string, item: ArtifactUnit): RetrievalUnit {
	const unit: RetrievalUnit = {
		filePath,
		unitType: item.type,
		symbolName: item.symbol,
		qualifiedName: item.name,
		startLine: item.start_line,
		endLine: item.end_line,
		docstring: item.docstring,
		precedingComments: item.preceding_comments,
		codeText: item.code,
		language: item.language,
	};
	if (item.signature !== undefined) unit.signature = item.signature;
	if (item.bases !== undefined) unit.bases = item.bases;
	return unit;
}
