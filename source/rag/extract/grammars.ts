/**
 * Tree-sitter grammar support matrix for the extractor.
 *
 * Kept free of `web-tree-sitter` imports so callers can check language
 * coverage without initializing WASM grammars.
 */

import path from 'node:path';
import type {SourceLanguage} from './types.js';

/**
 * Mapping from language names to tree-sitter-wasms filenames.
 * WASM files are in node_modules/tree-sitter-wasms/out/
 */
export const LANGUAGE_WASM_FILES: Record<SourceLanguage, string> = {
	python: 'tree-sitter-python.wasm',
	javascript: 'tree-sitter-javascript.wasm',
	typescript: 'tree-sitter-typescript.wasm',
	tsx: 'tree-sitter-tsx.wasm',
};

/** Every language with a grammar, in load order */
export const SOURCE_LANGUAGES: SourceLanguage[] = ['python', 'javascript', 'typescript', 'tsx'];

export const EXTENSION_TO_LANGUAGE: Record<string, SourceLanguage> = {
	'.py': 'python',
	'.pyi': 'python',
	'.js': 'javascript',
	'.jsx': 'javascript',
	'.mjs': 'javascript',
	'.cjs': 'javascript',
	'.ts': 'typescript',
	'.mts': 'typescript',
	'.cts': 'typescript',
	'.tsx': 'tsx',
};

/**
 * Language for a file path, or null when no grammar handles it.
 */
export function languageForPath(filePath: string): SourceLanguage | null {
	const ext = path.extname(filePath).toLowerCase();
	return EXTENSION_TO_LANGUAGE[ext] ?? null;
}

/**
 * Language label recorded on units: the grammar name, or the bare
 * extension for files indexed by windowing alone.
 */
export function languageLabel(filePath: string): string {
	const language = languageForPath(filePath);
	if (language) return language;
	const ext = path.extname(filePath).toLowerCase();
	return ext ? ext.slice(1) : 'text';
}
