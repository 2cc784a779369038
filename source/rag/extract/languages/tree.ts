import type Parser from 'web-tree-sitter';

/**
 * Visit every named node in pre-order (parents before children,
 * siblings in source order).
 */
export function walkNamed(
	root: Parser.SyntaxNode,
	visit: (node: Parser.SyntaxNode) => void,
): void {
	const walk = (node: Parser.SyntaxNode) => {
		visit(node);
		for (const child of node.namedChildren) {
			walk(child);
		}
	};
	walk(root);
}

/**
 * 1-based line of a node's first character.
 */
export function startLineOf(node: Parser.SyntaxNode): number {
	return node.startPosition.row + 1;
}

/**
 * 1-based line of a node's last character.
 */
export function endLineOf(node: Parser.SyntaxNode): number {
	return node.endPosition.row + 1;
}

/**
 * Declaration header: source from the node's start up to its body,
 * whitespace collapsed. Falls back to the first line of the node.
 */
export function headerText(
	node: Parser.SyntaxNode,
	body: Parser.SyntaxNode | null,
	source: string,
): string {
	const raw = body
		? source.slice(node.startIndex, body.startIndex)
		: (node.text.split(/\r\n|\r|\n/)[0] ?? '');
	return raw.replace(/\s+/g, ' ').trim();
}

/**
 * True when one of the node's anonymous children is the given keyword.
 */
export function hasKeyword(node: Parser.SyntaxNode, keyword: string): boolean {
	return node.children.some(child => !child.isNamed && child.type === keyword);
}

/**
 * First ERROR or missing node under root, in source order.
 */
export function firstErrorNode(
	root: Parser.SyntaxNode,
): Parser.SyntaxNode | null {
	if (root.type === 'ERROR' || root.isMissing) return root;
	for (const child of root.children) {
		if (child.hasError || child.isMissing) {
			const found = firstErrorNode(child);
			if (found) return found;
		}
	}
	return null;
}

/**
 * First node, in source order, whose type is one of `types`.
 */
export function firstRejectedNode(
	root: Parser.SyntaxNode,
	types: readonly string[],
): Parser.SyntaxNode | null {
	if (types.length === 0) return null;
	return root.descendantsOfType([...types])[0] ?? null;
}
