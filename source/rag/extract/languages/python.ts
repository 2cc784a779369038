import type Parser from 'web-tree-sitter';
import {PYTHON_COMMENTS} from '../comments.js';
import {pythonDocstring} from '../docstring.js';
import {
	endLineOf,
	hasKeyword,
	headerText,
	startLineOf,
	walkNamed,
} from './tree.js';
import type {Declaration, LanguageAdapter} from './types.js';

/**
 * Docstring from the first statement of a function or class body.
 */
function bodyDocstring(body: Parser.SyntaxNode | null): string {
	if (!body) return '';
	const first = body.namedChildren.find(child => child.type !== 'comment');
	if (first?.type !== 'expression_statement') return '';
	const literal = first.firstNamedChild;
	if (literal?.type !== 'string' || first.namedChildCount !== 1) return '';
	return pythonDocstring(literal.text) ?? '';
}

/**
 * Source text of each positional base in `class X(A, B, metaclass=M)`.
 */
function classBases(node: Parser.SyntaxNode): string[] {
	const superclasses = node.childForFieldName('superclasses');
	if (!superclasses) return [];
	return superclasses.namedChildren
		.filter(
			child =>
				child.type !== 'keyword_argument' &&
				child.type !== 'comment' &&
				child.type !== 'dictionary_splat' &&
				child.type !== 'list_splat',
		)
		.map(child => child.text);
}

function toDeclaration(
	node: Parser.SyntaxNode,
	source: string,
): Declaration | null {
	const name = node.childForFieldName('name');
	if (!name) return null;

	const body = node.childForFieldName('body');
	const decorated = node.parent?.type === 'decorated_definition';
	const spanNode = decorated && node.parent ? node.parent : node;

	const base = {
		symbol: name.text,
		spanNode,
		// The declaration line, not the first decorator
		startLine: startLineOf(node),
		endLine: endLineOf(node),
		// Comments are read upward from just above the def line, so a
		// decorator there ends the walk
		anchorLine: startLineOf(node),
		docstring: bodyDocstring(body),
		signature: headerText(node, body, source),
	};

	if (node.type === 'class_definition') {
		return {...base, unitType: 'Class', bases: classBases(node)};
	}
	return {
		...base,
		unitType: hasKeyword(node, 'async') ? 'AsyncFunction' : 'Function',
	};
}

/**
 * Dotted name of an import target, ignoring any `as` alias.
 */
function importedName(node: Parser.SyntaxNode): string | null {
	if (node.type === 'dotted_name') return node.text;
	if (node.type === 'aliased_import') {
		return node.childForFieldName('name')?.text ?? null;
	}
	return null;
}

/**
 * Module of a `from X import ...` statement; null for `from . import`.
 */
function fromModule(node: Parser.SyntaxNode): string | null {
	if (node.type === 'future_import_statement') return '__future__';
	const module = node.childForFieldName('module_name');
	if (!module) return null;
	if (module.type === 'relative_import') {
		const dotted = module.namedChildren.find(c => c.type === 'dotted_name');
		return dotted ? dotted.text : null;
	}
	return module.text;
}

export const pythonAdapter: LanguageAdapter = {
	comments: PYTHON_COMMENTS,
	// Python 2 statements
	rejectedNodeTypes: ['print_statement', 'exec_statement'],

	declarations(root, source) {
		const found: Declaration[] = [];
		walkNamed(root, node => {
			if (
				node.type === 'function_definition' ||
				node.type === 'class_definition'
			) {
				const declaration = toDeclaration(node, source);
				if (declaration) found.push(declaration);
			}
		});
		return found;
	},

	imports(root) {
		const imports: string[] = [];
		walkNamed(root, node => {
			if (node.type === 'import_statement') {
				for (const child of node.childrenForFieldName('name')) {
					const name = importedName(child);
					if (name) imports.push(name);
				}
				return;
			}

			if (
				node.type === 'import_from_statement' ||
				node.type === 'future_import_statement'
			) {
				const module = fromModule(node);
				if (!module) return;
				if (node.namedChildren.some(c => c.type === 'wildcard_import')) {
					imports.push(`${module}.*`);
					return;
				}
				for (const child of node.childrenForFieldName('name')) {
					const name = importedName(child);
					if (name) imports.push(`${module}.${name}`);
				}
			}
		});
		return imports;
	},

	globals(root) {
		const names: string[] = [];
		walkNamed(root, node => {
			if (
				node.type !== 'assignment' ||
				node.parent?.type !== 'expression_statement'
			) {
				return;
			}
			// Annotated assignments (`x: int = 1`) carry a type field
			if (node.childForFieldName('type')) return;
			const left = node.childForFieldName('left');
			if (left?.type === 'identifier') {
				names.push(left.text);
			}
		});
		return names;
	},
};
