import path from 'node:path';

/**
 * Directory name for per-project index data (config, logs, LanceDB tables).
 * This directory should be added to .gitignore.
 */
export const CODERECALL_DIR = '.coderecall';

/**
 * Get the absolute path to the data directory for a project.
 */
export function getCoderecallDir(projectRoot: string): string {
	return path.join(projectRoot, CODERECALL_DIR);
}

/**
 * Get the path to the config file.
 */
export function getConfigPath(projectRoot: string): string {
	return path.join(getCoderecallDir(projectRoot), 'config.json');
}

/**
 * Get the path to the LanceDB database directory.
 */
export function getLanceDbPath(projectRoot: string): string {
	return path.join(getCoderecallDir(projectRoot), 'lancedb');
}

/**
 * Get the path to the logs directory.
 */
export function getLogsDir(projectRoot: string): string {
	return path.join(getCoderecallDir(projectRoot), 'logs');
}

/**
 * Logical collection names. Physical table names come from config.
 */
export const COLLECTIONS = ['codebase', 'memory'] as const;

export type CollectionName = (typeof COLLECTIONS)[number];

/**
 * Name of the single dense vector field in every collection.
 */
export const DENSE_VECTOR_NAME = 'dense';

/**
 * Maximum number of query tokens sent to the lexical leg.
 */
export const MAX_QUERY_TOKENS = 8;

/**
 * Maximum number of syntax errors kept in an extraction artifact.
 */
export const MAX_RECORDED_SYNTAX_ERRORS = 200;

/**
 * UUID namespace for record ids (RFC 4122 URL namespace).
 */
export const RECORD_ID_NAMESPACE = '6ba7b811-9dad-11d1-80b4-00c04fd430c8';
