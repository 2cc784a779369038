const PYTHON_STRING_LITERAL = /^([rRuU]?)("""|'''|"|')([\s\S]*)\2$/;

const PYTHON_ESCAPES: Record<string, string> = {
	'\n': '',
	'\\': '\\',
	"'": "'",
	'"': '"',
	a: '\x07',
	b: '\b',
	f: '\f',
	n: '\n',
	r: '\r',
	t: '\t',
	v: '\v',
};

/**
 * Decode the single-character escapes of a non-raw literal body.
 * Unknown escapes keep their backslash.
 */
export function decodePythonEscapes(body: string): string {
	return body.replace(/\\([\s\S])/g, (sequence, char: string) => {
		return PYTHON_ESCAPES[char] ?? sequence;
	});
}

/**
 * Replace tabs with spaces up to the next multiple of `size` columns.
 */
export function expandTabs(line: string, size = 8): string {
	let out = '';
	for (const char of line) {
		if (char === '\t') {
			out += ' '.repeat(size - (out.length % size));
		} else {
			out += char;
		}
	}
	return out;
}

/**
 * Remove common leading indentation and surrounding blank lines.
 *
 * The first line is only left-trimmed and does not count toward the margin.
 */
export function cleanDoc(text: string): string {
	const lines = text.split(/\r\n|\r|\n/).map(line => expandTabs(line));

	let margin = Number.POSITIVE_INFINITY;
	for (const line of lines.slice(1)) {
		const content = line.trimStart();
		if (content.length > 0) {
			margin = Math.min(margin, line.length - content.length);
		}
	}

	const cleaned = lines.map((line, index) => {
		if (index === 0) return line.trimStart();
		return Number.isFinite(margin) ? line.slice(margin) : line;
	});

	while (cleaned.length > 0 && cleaned[0]?.trim() === '') cleaned.shift();
	while (cleaned.length > 0 && cleaned[cleaned.length - 1]?.trim() === '') {
		cleaned.pop();
	}

	return cleaned.join('\n');
}

/**
 * Docstring text from a Python string literal, or null when the literal
 * is not a plain (non-bytes, non-f) string.
 */
export function pythonDocstring(literal: string): string | null {
	const match = PYTHON_STRING_LITERAL.exec(literal.trim());
	if (!match) return null;
	const prefix = match[1] ?? '';
	const body = match[3] ?? '';
	return cleanDoc(prefix.toLowerCase() === 'r' ? body : decodePythonEscapes(body));
}

/**
 * Docstring text from a JSDoc block comment, or null for other comments.
 */
export function jsDocstring(comment: string): string | null {
	if (!comment.startsWith('/**') || comment === '/**/') return null;
	const body = comment
		.replace(/^\/\*\*/, '')
		.replace(/\*\/$/, '')
		.replace(/^[ \t]*\* ?/gm, '');
	return cleanDoc(body);
}
