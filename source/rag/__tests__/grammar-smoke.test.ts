/**
 * Grammar Smoke Tests
 *
 * Fast tests that verify each WASM grammar loads and can parse basic code.
 * These catch packaging problems with tree-sitter-wasms early.
 */

import {describe, it, expect, beforeAll} from 'vitest';
import {createRequire} from 'node:module';
import path from 'node:path';
import Parser from 'web-tree-sitter';
import {LANGUAGE_WASM_FILES, SOURCE_LANGUAGES} from '../extract/grammars.js';
import type {SourceLanguage} from '../extract/types.js';

const require = createRequire(import.meta.url);

const SAMPLES: Record<SourceLanguage, {code: string; rootType: string}> = {
	python: {code: 'def foo():\n    return 42', rootType: 'module'},
	javascript: {code: 'function foo() { return 42; }', rootType: 'program'},
	typescript: {code: 'const x: number = 1;', rootType: 'program'},
	tsx: {code: 'const X = () => <div>Hello</div>;', rootType: 'program'},
};

describe('Grammar Smoke Tests', () => {
	let wasmBasePath: string;

	beforeAll(async () => {
		await Parser.init();
		wasmBasePath = path.join(
			path.dirname(require.resolve('tree-sitter-wasms/package.json')),
			'out',
		);
	});

	for (const language of SOURCE_LANGUAGES) {
		it(`${language}: loads and parses without errors`, async () => {
			const grammar = await Parser.Language.load(
				path.join(wasmBasePath, LANGUAGE_WASM_FILES[language]),
			);
			const parser = new Parser();
			try {
				parser.setLanguage(grammar);
				const tree = parser.parse(SAMPLES[language].code);
				expect(tree.rootNode.type).toBe(SAMPLES[language].rootType);
				expect(tree.rootNode.hasError).toBe(false);
				tree.delete();
			} finally {
				parser.delete();
			}
		});
	}
});
