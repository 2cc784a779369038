import type Parser from 'web-tree-sitter';
import {sliceLines} from './lines.js';

/**
 * Where a declaration's code text comes from.
 */
export type CodeTextPath = 'syntax-tree' | 'line-slice';

/**
 * A declaration as seen by the code-text renderer.
 */
export interface CodeSpan {
	/** Node whose source span is the unit's text (decorators included) */
	spanNode: Pick<Parser.SyntaxNode, 'hasError' | 'isMissing' | 'text'>;
	startLine: number;
	endLine: number;
}

export interface CodeTextStrategy {
	readonly path: CodeTextPath;
	/** Rendered text, or null when this path cannot render the span */
	render(span: CodeSpan, lines: string[]): string | null;
}

/**
 * Renders the node's own source span as the parser saw it.
 */
export const syntaxTreeStrategy: CodeTextStrategy = {
	path: 'syntax-tree',
	render(span) {
		const node = span.spanNode;
		if (node.hasError || node.isMissing) return null;
		const text = node.text;
		return text.trim().length > 0 ? text : null;
	},
};

/**
 * Returns exactly lines [startLine, endLine] of the file.
 */
export const lineSliceStrategy: CodeTextStrategy = {
	path: 'line-slice',
	render(span, lines) {
		return sliceLines(lines, span.startLine, span.endLine);
	},
};

const STRATEGIES: CodeTextStrategy[] = [syntaxTreeStrategy, lineSliceStrategy];

/**
 * Render a declaration's code text with the first path that can.
 */
export function renderCodeText(
	span: CodeSpan,
	lines: string[],
): {text: string; path: CodeTextPath} {
	for (const strategy of STRATEGIES) {
		const text = strategy.render(span, lines);
		if (text !== null) {
			return {text, path: strategy.path};
		}
	}
	return {
		text: sliceLines(lines, span.startLine, span.endLine),
		path: 'line-slice',
	};
}
