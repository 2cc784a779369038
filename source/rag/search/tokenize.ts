import {MAX_QUERY_TOKENS} from '../constants.js';

/**
 * Identifier-like words: a letter or underscore, then two or more of
 * letters, digits, `_`, `.`, `/` or `-`.
 */
const TOKEN_PATTERN = /[A-Za-z_][A-Za-z0-9_./-]{2,}/g;

/**
 * Extract keyword-leg tokens from a query.
 *
 * Duplicates are dropped case-insensitively, keeping the first casing and
 * order. At most `MAX_QUERY_TOKENS` tokens are returned.
 */
export function tokenizeQuery(
	query: string,
	maxTokens: number = MAX_QUERY_TOKENS,
): string[] {
	const seen = new Set<string>();
	const tokens: string[] = [];

	for (const match of query.matchAll(TOKEN_PATTERN)) {
		const token = match[0];
		const key = token.toLowerCase();
		if (seen.has(key)) continue;
		seen.add(key);
		tokens.push(token);
		if (tokens.length >= maxTokens) break;
	}

	return tokens;
}
