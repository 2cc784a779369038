import type Parser from 'web-tree-sitter';
import type {CommentStyle} from '../comments.js';
import type {UnitType} from '../types.js';

/**
 * A declaration found in a syntax tree, before code text is rendered.
 */
export interface Declaration {
	unitType: Exclude<UnitType, 'FileChunk'>;
	symbol: string;
	/** Node whose source is the unit's code text (decorators, export included) */
	spanNode: Parser.SyntaxNode;
	startLine: number;
	endLine: number;
	/** Line the comment walk starts above */
	anchorLine: number;
	docstring: string;
	signature: string;
	bases?: string[];
}

/**
 * Per-language knowledge of declarations, imports and globals.
 */
export interface LanguageAdapter {
	readonly comments: CommentStyle;
	/** Node types the grammar accepts that still count as syntax errors */
	readonly rejectedNodeTypes?: readonly string[];
	declarations(root: Parser.SyntaxNode, source: string): Declaration[];
	imports(root: Parser.SyntaxNode): string[];
	globals(root: Parser.SyntaxNode): string[];
}
