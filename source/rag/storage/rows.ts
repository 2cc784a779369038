import type {Schema} from 'apache-arrow';
import {z} from 'zod';
import {DENSE_VECTOR_NAME} from '../constants.js';
import {createCodebaseSchema, createMemorySchema} from './schema.js';
import type {
	CodePayload,
	CodeRecord,
	IndexRecord,
	MemoryPayload,
	MemoryRecord,
} from './types.js';

/**
 * Maps one record kind to and from LanceDB rows.
 */
export interface RowCodec<R extends IndexRecord> {
	readonly kind: R['kind'];
	/** Columns a lexical search scans */
	readonly lexicalColumns: string[];
	/** Values of the lexical columns for one payload */
	lexicalText(payload: R['payload']): string[];
	schema(dimensions: number): Schema;
	toRow(record: R): Record<string, unknown>;
	/** Decode a row; throws when the row does not have the expected shape */
	fromRow(row: unknown): {id: string; payload: R['payload']; distance: number | null};
}

// ============================================================================
// Row Schemas
// ============================================================================

function jsonColumn<T extends z.ZodTypeAny>(schema: T) {
	return z
		.string()
		.transform((text, ctx) => {
			try {
				const value: unknown = JSON.parse(text);
				return value;
			} catch {
				ctx.addIssue({code: z.ZodIssueCode.custom, message: 'invalid JSON'});
				return z.NEVER;
			}
		})
		.pipe(schema);
}

const distanceColumn = z.number().nullish();

const CodeRowSchema = z.object({
	id: z.string(),
	file: z.string(),
	name: z.string(),
	symbol: z.string(),
	type: z.enum(['Function', 'AsyncFunction', 'Class', 'FileChunk']),
	language: z.string(),
	start_line: z.number(),
	end_line: z.number(),
	docstring: z.string(),
	preceding_comments: jsonColumn(z.array(z.string())),
	code: z.string(),
	repo_root: z.string(),
	extra: jsonColumn(
		z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
	),
	_distance: distanceColumn,
});

const MemoryRowSchema = z.object({
	id: z.string(),
	user: z.string(),
	assistant: z.string(),
	text: z.string(),
	files: jsonColumn(z.array(z.string())),
	tags: jsonColumn(z.array(z.string())),
	timestamp: z.string(),
	_distance: distanceColumn,
});

function parseRow<T extends z.ZodTypeAny>(schema: T, row: unknown): z.infer<T> {
	const parsed = schema.safeParse(row);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new Error(
			`Malformed row${issue ? ` (${issue.path.join('.')}: ${issue.message})` : ''}`,
		);
	}
	return parsed.data;
}

// ============================================================================
// Codecs
// ============================================================================

export const codeRowCodec: RowCodec<CodeRecord> = {
	kind: 'code',
	lexicalColumns: ['code', 'name', 'file', 'docstring'],
	schema: createCodebaseSchema,

	lexicalText(payload) {
		return [payload.code, payload.name, payload.file, payload.docstring];
	},

	toRow({id, vector, payload}) {
		return {
			id,
			[DENSE_VECTOR_NAME]: vector,
			file: payload.file,
			name: payload.name,
			symbol: payload.symbol,
			type: payload.type,
			language: payload.language,
			start_line: payload.start_line,
			end_line: payload.end_line,
			docstring: payload.docstring,
			preceding_comments: JSON.stringify(payload.preceding_comments),
			code: payload.code,
			repo_root: payload.repo_root,
			extra: JSON.stringify(payload.extra ?? {}),
		};
	},

	fromRow(row) {
		const {id, _distance, extra, ...fields} = parseRow(CodeRowSchema, row);
		const payload: CodePayload = {...fields};
		if (Object.keys(extra).length > 0) payload.extra = extra;
		return {id, payload, distance: _distance ?? null};
	},
};

export const memoryRowCodec: RowCodec<MemoryRecord> = {
	kind: 'memory',
	lexicalColumns: ['text'],
	schema: createMemorySchema,

	lexicalText(payload) {
		return [payload.text];
	},

	toRow({id, vector, payload}) {
		return {
			id,
			[DENSE_VECTOR_NAME]: vector,
			user: payload.user,
			assistant: payload.assistant,
			text: payload.text,
			files: JSON.stringify(payload.files),
			tags: JSON.stringify(payload.tags),
			timestamp: payload.timestamp,
		};
	},

	fromRow(row) {
		const {id, _distance, ...fields} = parseRow(MemoryRowSchema, row);
		const payload: MemoryPayload = {...fields};
		return {id, payload, distance: _distance ?? null};
	},
};
