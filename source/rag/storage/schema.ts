import {
	DataType,
	Field,
	FixedSizeList,
	Float32,
	Int32,
	Schema,
	Utf8,
} from 'apache-arrow';
import {DENSE_VECTOR_NAME} from '../constants.js';

function denseField(dimensions: number): Field {
	return new Field(
		DENSE_VECTOR_NAME,
		new FixedSizeList(dimensions, new Field('item', new Float32(), false)),
		false,
	);
}

/**
 * Arrow schema for the codebase collection.
 *
 * List-valued payload fields are stored as JSON text columns.
 */
export function createCodebaseSchema(dimensions: number): Schema {
	return new Schema([
		new Field('id', new Utf8(), false), // UUID v5 of the unit identity
		denseField(dimensions),
		new Field('file', new Utf8(), false),
		new Field('name', new Utf8(), false),
		new Field('symbol', new Utf8(), false),
		new Field('type', new Utf8(), false), // Function/AsyncFunction/Class/FileChunk
		new Field('language', new Utf8(), false),
		new Field('start_line', new Int32(), false),
		new Field('end_line', new Int32(), false),
		new Field('docstring', new Utf8(), false),
		new Field('preceding_comments', new Utf8(), false), // JSON string[]
		new Field('code', new Utf8(), false),
		new Field('repo_root', new Utf8(), false),
		new Field('extra', new Utf8(), false), // JSON object
	]);
}

/**
 * Arrow schema for the memory collection.
 */
export function createMemorySchema(dimensions: number): Schema {
	return new Schema([
		new Field('id', new Utf8(), false), // random UUID v4
		denseField(dimensions),
		new Field('user', new Utf8(), false),
		new Field('assistant', new Utf8(), false),
		new Field('text', new Utf8(), false),
		new Field('files', new Utf8(), false), // JSON string[]
		new Field('tags', new Utf8(), false), // JSON string[]
		new Field('timestamp', new Utf8(), false), // ISO timestamp
	]);
}

/**
 * Vector length of the dense column in a schema, or null if absent.
 */
export function denseDimensions(schema: Schema): number | null {
	const field = schema.fields.find(f => f.name === DENSE_VECTOR_NAME);
	// Type-id check: the schema may come from LanceDB's own arrow build
	if (!field || !DataType.isFixedSizeList(field.type)) return null;
	return field.type.listSize;
}
