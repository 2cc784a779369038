/**
 * Reciprocal Rank Fusion.
 */

import {describe, it, expect} from 'vitest';
import {reciprocalRankFusion} from '../search/fusion.js';
import type {RankedHit} from '../search/types.js';

function hits(...ids: string[]): Array<RankedHit<{label: string}>> {
	return ids.map(id => ({id, payload: {label: id}}));
}

describe('reciprocalRankFusion', () => {
	it('sums 1 / (k + rank) across lists', () => {
		const dense = hits('A', 'B');
		const keyword = hits('X', 'Y', 'A');

		const fused = reciprocalRankFusion([dense, keyword], {k: 60});
		const byId = new Map(fused.map(r => [r.id, r]));

		expect(byId.get('A')?.score).toBeCloseTo(1 / 61 + 1 / 63, 10);
		expect(byId.get('A')?.score).toBeCloseTo(0.03227, 5);
		expect(byId.get('B')?.score).toBeCloseTo(1 / 62, 10);
		expect(byId.get('B')?.score).toBeCloseTo(0.01613, 5);
		expect(fused[0]?.id).toBe('A');
	});

	it('records the rank held in each list', () => {
		const fused = reciprocalRankFusion([hits('A', 'B'), hits('B')]);
		expect(fused.map(r => [r.id, r.ranks])).toEqual([
			['B', [2, 1]],
			['A', [1, null]],
		]);
	});

	it('keeps the payload from the first list that returned the record', () => {
		const dense = [{id: 'A', payload: {label: 'dense'}}];
		const keyword = [{id: 'A', payload: {label: 'keyword'}}];
		const [result] = reciprocalRankFusion([dense, keyword]);
		expect(result?.payload).toEqual({label: 'dense'});
	});

	it('breaks ties by first-encounter order, dense list first', () => {
		// A and X both score 1/61; B and Y both score 1/62
		const fused = reciprocalRankFusion([hits('A', 'B'), hits('X', 'Y')]);
		expect(fused.map(r => r.id)).toEqual(['A', 'X', 'B', 'Y']);
	});

	it('with one empty list, preserves the other list order', () => {
		const keyword = hits('K1', 'K2', 'K3', 'K4');
		expect(reciprocalRankFusion([[], keyword]).map(r => r.id)).toEqual([
			'K1',
			'K2',
			'K3',
			'K4',
		]);
		expect(reciprocalRankFusion([keyword, []]).map(r => r.id)).toEqual([
			'K1',
			'K2',
			'K3',
			'K4',
		]);
	});

	it('ranks a record found by both lists above one found by a single list at the same rank', () => {
		const fused = reciprocalRankFusion([hits('A', 'B'), hits('C', 'B')]);
		// B: 2 / 62; A: 1 / 61; C: 1 / 61
		expect(fused.map(r => r.id)).toEqual(['B', 'A', 'C']);
	});

	it('never lowers a score when a record gains a better rank', () => {
		const before = reciprocalRankFusion([hits('A', 'B', 'C'), hits('C')]);
		const after = reciprocalRankFusion([hits('C', 'A', 'B'), hits('C')]);
		const score = (list: typeof before, id: string) =>
			list.find(r => r.id === id)?.score ?? 0;
		expect(score(after, 'C')).toBeGreaterThan(score(before, 'C'));
	});

	it('truncates to the limit', () => {
		const fused = reciprocalRankFusion([hits('A', 'B', 'C'), hits('D')], {limit: 2});
		expect(fused.map(r => r.id)).toEqual(['A', 'D']);
	});

	it('counts a repeated id once per list, at its best rank', () => {
		const fused = reciprocalRankFusion([hits('A', 'A')], {k: 60});
		expect(fused).toHaveLength(1);
		expect(fused[0]?.score).toBeCloseTo(1 / 61, 10);
	});

	it('returns nothing for empty input', () => {
		expect(reciprocalRankFusion([[], []])).toEqual([]);
	});
});
