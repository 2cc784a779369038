// Ensure tests never read the developer's shell configuration.
for (const key of [
	'INDEX_BACKEND',
	'LANCEDB_PATH',
	'COLLECTION_CODEBASE',
	'COLLECTION_MEMORY',
	'EMBEDDING_PROVIDER',
	'DENSE_MODEL_NAME',
	'DENSE_VECTOR_SIZE',
	'OPENAI_API_KEY',
	'OPENAI_BASE_URL',
	'CHUNK_LINES',
	'CHUNK_OVERLAP',
	'MAX_FILE_BYTES',
	'EXCLUDE_DIRS',
	'INCLUDE_EXTS',
	'PARSED_OUT',
	'INGEST_BATCH_SIZE',
	'INGEST_CONCURRENCY',
	'TOP_K_DENSE',
	'TOP_K_KEYWORD',
	'TOP_K_MEMORY',
	'RRF_K',
	'LEG_TIMEOUT_MS',
	'MAX_CODE_CHARS_PER_CHUNK',
	'MAX_TOTAL_CONTEXT_CHARS',
]) {
	delete process.env[key];
}

