import type Parser from 'web-tree-sitter';
import {C_STYLE_COMMENTS} from '../comments.js';
import {jsDocstring} from '../docstring.js';
import {
	endLineOf,
	hasKeyword,
	headerText,
	startLineOf,
	walkNamed,
} from './tree.js';
import type {Declaration, LanguageAdapter} from './types.js';

const FUNCTION_DECLARATIONS = new Set([
	'function_declaration',
	'generator_function_declaration',
]);

const CLASS_DECLARATIONS = new Set([
	'class_declaration',
	'abstract_class_declaration',
]);

const FUNCTION_VALUES = new Set([
	'arrow_function',
	'function_expression',
	'function',
	'generator_function',
]);

const VARIABLE_DECLARATIONS = new Set([
	'lexical_declaration',
	'variable_declaration',
]);

/**
 * Widen a declaration to its `export` wrapper and, for a single-declarator
 * `const f = () => {}`, to the whole statement.
 */
function outerSpan(node: Parser.SyntaxNode): Parser.SyntaxNode {
	let span = node;
	if (node.type === 'variable_declarator') {
		const statement = node.parent;
		if (
			statement &&
			VARIABLE_DECLARATIONS.has(statement.type) &&
			statement.namedChildren.filter(c => c.type === 'variable_declarator')
				.length === 1
		) {
			span = statement;
		}
	}
	if (span.parent?.type === 'export_statement') {
		span = span.parent;
	}
	return span;
}

/**
 * JSDoc block directly before the span, if any.
 */
function leadingJsDoc(span: Parser.SyntaxNode): string {
	const previous = span.previousNamedSibling;
	if (previous?.type !== 'comment') return '';
	if (startLineOf(span) - endLineOf(previous) > 1) return '';
	return jsDocstring(previous.text) ?? '';
}

/**
 * Targets of the `extends` clause.
 */
function classBases(node: Parser.SyntaxNode): string[] {
	const heritage = node.namedChildren.find(c => c.type === 'class_heritage');
	if (!heritage) return [];

	const extendsClause = heritage.namedChildren.find(
		c => c.type === 'extends_clause',
	);
	if (extendsClause) {
		return extendsClause.namedChildren
			.filter(c => c.type !== 'type_arguments')
			.map(c => c.text);
	}
	// JavaScript grammar: class_heritage holds the expression directly
	return heritage.namedChildren
		.filter(c => c.type !== 'implements_clause')
		.map(c => c.text);
}

function build(
	node: Parser.SyntaxNode,
	name: string,
	unitType: Declaration['unitType'],
	body: Parser.SyntaxNode | null,
	source: string,
): Declaration {
	const spanNode = outerSpan(node);
	return {
		unitType,
		symbol: name,
		spanNode,
		startLine: startLineOf(spanNode),
		endLine: endLineOf(spanNode),
		anchorLine: startLineOf(spanNode),
		docstring: leadingJsDoc(spanNode),
		signature: headerText(spanNode, body, source),
	};
}

function toDeclaration(
	node: Parser.SyntaxNode,
	source: string,
): Declaration | null {
	if (FUNCTION_DECLARATIONS.has(node.type) || node.type === 'method_definition') {
		const name = node.childForFieldName('name');
		if (!name) return null;
		const unitType = hasKeyword(node, 'async') ? 'AsyncFunction' : 'Function';
		return build(node, name.text, unitType, node.childForFieldName('body'), source);
	}

	if (CLASS_DECLARATIONS.has(node.type)) {
		const name = node.childForFieldName('name');
		if (!name) return null;
		return {
			...build(node, name.text, 'Class', node.childForFieldName('body'), source),
			bases: classBases(node),
		};
	}

	if (node.type === 'variable_declarator') {
		const name = node.childForFieldName('name');
		const value = node.childForFieldName('value');
		if (name?.type !== 'identifier' || !value || !FUNCTION_VALUES.has(value.type)) {
			return null;
		}
		const unitType = hasKeyword(value, 'async') ? 'AsyncFunction' : 'Function';
		return build(node, name.text, unitType, value.childForFieldName('body'), source);
	}

	return null;
}

/**
 * Module specifier of an import statement, quotes removed.
 */
function importSource(node: Parser.SyntaxNode): string | null {
	const specifier = node.childForFieldName('source');
	if (!specifier) return null;
	const fragment = specifier.namedChildren.find(c => c.type === 'string_fragment');
	return fragment ? fragment.text : specifier.text.slice(1, -1);
}

/**
 * Identifiers declared by one top-level variable statement.
 */
function declaredNames(statement: Parser.SyntaxNode): string[] {
	return statement.namedChildren
		.filter(c => c.type === 'variable_declarator')
		.map(c => c.childForFieldName('name'))
		.filter((name): name is Parser.SyntaxNode => name?.type === 'identifier')
		.map(name => name.text);
}

export const javascriptAdapter: LanguageAdapter = {
	comments: C_STYLE_COMMENTS,

	declarations(root, source) {
		const found: Declaration[] = [];
		walkNamed(root, node => {
			const declaration = toDeclaration(node, source);
			if (declaration) found.push(declaration);
		});
		return found;
	},

	imports(root) {
		const imports: string[] = [];
		for (const node of root.namedChildren) {
			if (node.type !== 'import_statement') continue;
			const specifier = importSource(node);
			if (specifier) imports.push(specifier);
		}
		return imports;
	},

	globals(root) {
		const names: string[] = [];
		for (const node of root.namedChildren) {
			const statement =
				node.type === 'export_statement'
					? node.childForFieldName('declaration')
					: node;
			if (statement && VARIABLE_DECLARATIONS.has(statement.type)) {
				names.push(...declaredNames(statement));
			}
		}
		return names;
	},
};
