/**
 * Line-comment conventions per language.
 */
export interface CommentStyle {
	/** Line-comment marker, e.g. "#" or "//" */
	marker: string;
	/** Trimmed-line prefixes that are skipped without ending the walk */
	passThrough: string[];
}

export const PYTHON_COMMENTS: CommentStyle = {
	marker: '#',
	passThrough: ['"""', "'''"],
};

export const C_STYLE_COMMENTS: CommentStyle = {
	marker: '//',
	passThrough: [],
};

/**
 * Collect the comment lines directly above a declaration.
 *
 * Walks upward from the line before `startLine`. Blank lines and
 * pass-through lines are skipped; any other non-comment line ends the walk.
 * Comments come back top to bottom, marker removed and trimmed.
 */
export function precedingComments(
	lines: string[],
	startLine: number,
	style: CommentStyle,
): string[] {
	const comments: string[] = [];

	for (let index = startLine - 2; index >= 0; index--) {
		const line = (lines[index] ?? '').trim();

		if (line.startsWith(style.marker)) {
			comments.unshift(line.slice(style.marker.length).trim());
			continue;
		}
		if (line === '' || style.passThrough.some(p => line.startsWith(p))) {
			continue;
		}
		break;
	}

	return comments;
}
