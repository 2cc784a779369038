/**
 * Render retrieved records as prompt context.
 */

import type {RagConfig} from '../config/index.js';
import type {CodePayload, MemoryPayload} from '../storage/types.js';

export type RenderLimits = Pick<
	RagConfig['retrieval'],
	'maxCodeCharsPerChunk' | 'maxTotalContextChars' | 'maxMemoryChars'
>;

/**
 * One block per result: a `[file:start-end]  name` header and a fenced
 * code block. Stops before the block that would exceed the total budget.
 */
export function buildCodeContext(
	results: Array<{payload: CodePayload}>,
	limits: RenderLimits,
): string {
	const blocks: string[] = [];
	let total = 0;

	for (const {payload} of results) {
		const code = payload.code.slice(0, limits.maxCodeCharsPerChunk);
		const block =
			`[${payload.file}:${payload.start_line}-${payload.end_line}]  ${payload.name}\n` +
			`\`\`\`${payload.language}\n${code}\n\`\`\``;
		if (total + block.length > limits.maxTotalContextChars) break;
		blocks.push(block);
		total += block.length;
	}

	return blocks.join('\n\n');
}

/**
 * One bullet per memory entry, cut to `maxMemoryChars`.
 */
export function buildMemoryContext(
	entries: MemoryPayload[],
	limits: RenderLimits,
): string {
	return entries.map(entry => `- ${entry.text.slice(0, limits.maxMemoryChars)}`).join('\n');
}
