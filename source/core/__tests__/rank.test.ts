import {describe, it, expect} from 'vitest';
import {SCORE_MAX, createScoreConfig} from '../config.js';
import {prepareCandidates} from '../prepare.js';
import {compareResults, rank} from '../rank.js';
import {Scorer} from '../scorer.js';

describe('rank', () => {
	it('puts the exact match first, then boundary matches', () => {
		const results = rank('rb', ['lib/rb.rs', 'arbiter.py', 'rb']);

		expect(results.map(r => r.candidate)).toEqual([
			'rb',
			'lib/rb.rs',
			'arbiter.py',
		]);
		expect(results.map(r => r.index)).toEqual([2, 0, 1]);
		expect(results[0]?.score).toBe(SCORE_MAX);
		expect(results[1]?.score).toBeCloseTo(1.865, 10);
		expect(results[2]?.score).toBeCloseTo(0.96, 10);
	});

	it('drops candidates that do not match', () => {
		expect(rank('te', ['tags', 'test']).map(r => r.candidate)).toEqual([
			'test',
		]);
		expect(rank('foobar', ['tags', 'test'])).toEqual([]);
		expect(rank('test', [])).toEqual([]);
	});

	it('orders by accumulated gaps', () => {
		// 'tags' has two inner gaps, 'test' one inner and one trailing
		expect(rank('ts', ['tags', 'test']).map(r => r.candidate)).toEqual([
			'test',
			'tags',
		]);
	});

	it('keeps input order for equal scores', () => {
		const candidates = ['xa', 'ya', 'za'];

		expect(rank('a', candidates).map(r => r.candidate)).toEqual([
			'xa',
			'ya',
			'za',
		]);
		expect(
			rank('a', [...candidates].reverse()).map(r => r.candidate),
		).toEqual(['za', 'ya', 'xa']);
	});

	it('keeps input order between several exact matches', () => {
		const results = rank('ab', ['AB', 'xab', 'ab', 'aB']);

		expect(results.map(r => r.index)).toEqual([0, 2, 3, 1]);
	});

	it('matches every candidate for the empty query', () => {
		const results = rank('', ['b', 'a']);

		expect(results).toEqual([
			{candidate: 'b', index: 0, score: 0},
			{candidate: 'a', index: 1, score: 0},
		]);
	});

	it('attaches positions on request', () => {
		const results = rank('rb', ['lib/rb.rs', 'rb'], {positions: true});

		expect(results.map(r => r.positions)).toEqual([
			[0, 1],
			[4, 5],
		]);
		expect(rank('rb', ['lib/rb.rs'])[0]?.positions).toBeUndefined();
	});

	it('truncates after sorting', () => {
		const results = rank('a', ['xxa', 'a', 'xa'], {limit: 2});

		expect(results.map(r => r.candidate)).toEqual(['a', 'xa']);
	});

	it('ranks prepared candidates like plain strings', () => {
		const lines = ['src/main.ts', 'source/map.ts', 'README.md'];

		expect(rank('sm', prepareCandidates(lines))).toEqual(rank('sm', lines));
	});

	it('ranks with a custom scorer', () => {
		const scorer = new Scorer(createScoreConfig({matchDot: 0}));
		const candidates = ['x.ab', 'x/ab'];

		const tuned = rank('a', candidates, {scorer});
		const standard = rank('a', candidates);

		expect(tuned.map(r => r.candidate)).toEqual(['x/ab', 'x.ab']);
		expect(tuned[1]?.score).toBeCloseTo(-0.015, 10);
		expect(standard[1]?.score).toBeCloseTo(0.585, 10);
	});
});

describe('compareResults', () => {
	it('sorts infinite scores ahead of finite ones', () => {
		const a = {candidate: 'a', index: 1, score: SCORE_MAX};
		const b = {candidate: 'b', index: 0, score: 3};

		expect(compareResults(a, b)).toBe(-1);
		expect(compareResults(b, a)).toBe(1);
		expect(compareResults(a, {...a, index: 4})).toBe(-3);
	});
});
