/**
 * Line handling shared by the syntactic and windowing passes.
 */

/**
 * A contiguous, 1-based inclusive range of lines with its text.
 */
export interface LineWindow {
	startLine: number;
	endLine: number;
	text: string;
}

/**
 * Split text into lines on \r\n, \r or \n.
 * A trailing line break does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
	if (text.length === 0) return [];
	const lines = text.split(/\r\n|\r|\n/);
	if (lines[lines.length - 1] === '') {
		lines.pop();
	}
	return lines;
}

/**
 * Exact text of lines [startLine, endLine] joined by \n.
 */
export function sliceLines(
	lines: string[],
	startLine: number,
	endLine: number,
): string {
	return lines.slice(Math.max(0, startLine - 1), endLine).join('\n');
}

/**
 * Cut text into fixed-size overlapping line windows covering every line.
 *
 * Windows start at 1, 1 + step, ... with step = max(1, size - overlap);
 * the last window is the first one that reaches the final line.
 */
export function chunkByLines(
	text: string,
	size: number,
	overlap: number,
): LineWindow[] {
	const lines = splitLines(text);
	const total = lines.length;
	if (total === 0) return [];

	const step = Math.max(1, size - overlap);
	const windows: LineWindow[] = [];

	for (let start = 0; start < total; start += step) {
		const end = Math.min(total, start + size);
		windows.push({
			startLine: start + 1,
			endLine: end,
			text: lines.slice(start, end).join('\n'),
		});
		if (end === total) break;
	}

	return windows;
}
