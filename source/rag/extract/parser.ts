/**
 * Syntactic pass of the unit extractor.
 *
 * Uses web-tree-sitter (WASM) grammars from tree-sitter-wasms, so no native
 * compilation is required.
 */

import {createRequire} from 'node:module';
import path from 'node:path';
import Parser from 'web-tree-sitter';
import type {Logger} from '../logger/index.js';
import {precedingComments} from './comments.js';
import {LANGUAGE_WASM_FILES, SOURCE_LANGUAGES, languageForPath} from './grammars.js';
import {javascriptAdapter} from './languages/javascript.js';
import {pythonAdapter} from './languages/python.js';
import {firstErrorNode, firstRejectedNode} from './languages/tree.js';
import type {LanguageAdapter} from './languages/types.js';
import {renderCodeText} from './source-strategy.js';
import type {RetrievalUnit, SourceLanguage} from './types.js';

// Use createRequire to resolve WASM file paths from tree-sitter-wasms
const require = createRequire(import.meta.url);

const ADAPTERS: Record<SourceLanguage, LanguageAdapter> = {
	python: pythonAdapter,
	javascript: javascriptAdapter,
	typescript: javascriptAdapter,
	tsx: javascriptAdapter,
};

/**
 * Outcome of the syntactic pass over one file.
 */
export interface SyntaxPassResult {
	units: RetrievalUnit[];
	imports: string[];
	globalVariables: string[];
	syntaxError: string | null;
}

/**
 * Extracts declaration units, imports and globals from source files.
 */
export class SyntaxExtractor {
	private parser: Parser | null = null;
	private languages: Map<SourceLanguage, Parser.Language> = new Map();
	private initialized = false;
	private readonly logger: Logger | null;

	constructor(logger?: Logger) {
		this.logger = logger ?? null;
	}

	/**
	 * Initialize web-tree-sitter and load language grammars.
	 * Must be called before using extract().
	 */
	async initialize(): Promise<void> {
		if (this.initialized) return;

		await Parser.init();
		this.parser = new Parser();

		try {
			const wasmPackagePath = require.resolve('tree-sitter-wasms/package.json');
			const wasmBasePath = path.join(path.dirname(wasmPackagePath), 'out');

			// Sequential: web-tree-sitter keeps global state while loading modules
			for (const language of SOURCE_LANGUAGES) {
				try {
					const grammar = await Parser.Language.load(
						path.join(wasmBasePath, LANGUAGE_WASM_FILES[language]),
					);
					this.languages.set(language, grammar);
				} catch (error) {
					this.logger?.warn('Extractor', `Failed to load ${language} grammar`, {
						error: error instanceof Error ? error.message : String(error),
					});
				}
			}
			this.initialized = true;
		} catch (error) {
			this.parser?.delete();
			this.parser = null;
			this.languages.clear();
			throw error;
		}
	}

	/**
	 * Whether a file has a loaded grammar.
	 */
	supports(filePath: string): boolean {
		const language = languageForPath(filePath);
		return language !== null && this.languages.has(language);
	}

	/**
	 * Run the syntactic pass. Returns null for files without a grammar.
	 *
	 * A tree with ERROR, missing or rejected nodes is a parse failure: no
	 * units, imports or globals, and a recorded message.
	 */
	extract(
		filePath: string,
		content: string,
		lines: string[],
	): SyntaxPassResult | null {
		if (!this.initialized || !this.parser) {
			throw new Error('SyntaxExtractor not initialized. Call initialize() first.');
		}

		const language = languageForPath(filePath);
		const grammar = language ? this.languages.get(language) : undefined;
		if (!language || !grammar) return null;

		// tree-sitter only counts rows on \n
		const source = content.replace(/\r\n?/g, '\n');
		const adapter = ADAPTERS[language];

		this.parser.setLanguage(grammar);
		const tree = this.parser.parse(source);

		try {
			const root = tree.rootNode;
			const errorNode = root.hasError
				? (firstErrorNode(root) ?? root)
				: firstRejectedNode(root, adapter.rejectedNodeTypes ?? []);
			if (errorNode) {
				const {row, column} = errorNode.startPosition;
				return {
					units: [],
					imports: [],
					globalVariables: [],
					syntaxError: `SyntaxError: invalid syntax (line ${row + 1}, column ${column + 1})`,
				};
			}

			const units = adapter.declarations(root, source).map(declaration => {
				const {text} = renderCodeText(declaration, lines);
				const unit: RetrievalUnit = {
					filePath,
					unitType: declaration.unitType,
					symbolName: declaration.symbol,
					qualifiedName: `${filePath}::${declaration.symbol}`,
					startLine: declaration.startLine,
					endLine: declaration.endLine,
					docstring: declaration.docstring,
					precedingComments: precedingComments(
						lines,
						declaration.anchorLine,
						adapter.comments,
					),
					codeText: text,
					language,
					signature: declaration.signature,
				};
				if (declaration.bases) unit.bases = declaration.bases;
				return unit;
			});

			return {
				units,
				imports: adapter.imports(root),
				globalVariables: adapter.globals(root),
				syntaxError: null,
			};
		} finally {
			tree.delete();
		}
	}

	/**
	 * Free the parser and grammars.
	 */
	close(): void {
		this.parser?.delete();
		this.parser = null;
		this.languages.clear();
		this.initialized = false;
	}
}
