import {describe, it, expect} from 'vitest';
import {isAbortError} from '../abort.js';
import {prepareCandidate} from '../prepare.js';
import {rank} from '../rank.js';
import {calculateParallelism, search} from '../search.js';
import type {PreparedCandidate} from '../types.js';

function fileNames(count: number): string[] {
	return Array.from({length: count}, (_, i) => `pkg-${i % 7}/file_${i}.ts`);
}

describe('calculateParallelism', () => {
	it('never goes below one chunk', () => {
		expect(calculateParallelism(0, 4, false)).toBe(1);
		expect(calculateParallelism(1, 0, false)).toBe(1);
		expect(calculateParallelism(3, 4, false)).toBe(1);
	});

	it('ramps up with the candidate count', () => {
		expect(calculateParallelism(5, 99, false)).toBe(2);
		expect(calculateParallelism(12, 99, false)).toBe(3);
		expect(calculateParallelism(20, 99, false)).toBe(4);
		expect(calculateParallelism(100, 99, false)).toBe(13);
	});

	it('caps at the configured value', () => {
		expect(calculateParallelism(100, 4, false)).toBe(4);
		expect(calculateParallelism(10_000, 12, false)).toBe(12);
	});

	it('does not split an empty query', () => {
		expect(calculateParallelism(100, 4, true)).toBe(1);
	});
});

describe('search', () => {
	it('returns the same list as rank', async () => {
		const candidates = fileNames(250);

		for (const query of ['f1', 'pkg3', 'ts', '', 'zz']) {
			const results = await search(query, candidates, {parallelism: 4});
			expect(results).toEqual(rank(query, candidates));
		}
	});

	it('keeps input order across chunk boundaries', async () => {
		const candidates = Array.from({length: 40}, () => 'same');
		const results = await search('sme', candidates, {parallelism: 8});

		expect(results.map(r => r.index)).toEqual(
			Array.from({length: 40}, (_, i) => i),
		);
	});

	it('applies limit and positions', async () => {
		const results = await search('rb', ['lib/rb.rs', 'arbiter.py', 'rb'], {
			limit: 2,
			positions: true,
		});

		expect(results).toHaveLength(2);
		expect(results[1]?.positions).toEqual([4, 5]);
	});

	it('rejects when already aborted', async () => {
		const controller = new AbortController();
		controller.abort();

		await expect(
			search('a', ['a'], {signal: controller.signal}),
		).rejects.toMatchObject({name: 'AbortError'});
	});

	it('stops at the next chunk once aborted during a chunk', async () => {
		const controller = new AbortController();
		const scoredChunks = new Set<number>();
		let armed = false;

		// 400 candidates with parallelism 4 make four chunks of 100
		const candidates: PreparedCandidate[] = fileNames(400).map((text, i) => {
			const prepared = prepareCandidate(text);
			return {
				text: prepared.text,
				chars: prepared.chars,
				get folded() {
					scoredChunks.add(Math.floor(i / 100));
					if (i === 0 && !armed) {
						armed = true;
						// Fires on a later event-loop turn, like a keystroke
						setTimeout(() => controller.abort('query changed'), 0);
						const until = Date.now() + 30;
						while (Date.now() < until) {
							// keep chunk 0 busy past the timer
						}
					}
					return prepared.folded;
				},
			};
		});

		const error: unknown = await search('f', candidates, {
			parallelism: 4,
			signal: controller.signal,
		}).catch((err: unknown) => err);

		expect(isAbortError(error)).toBe(true);
		expect(error).toMatchObject({message: 'search: query changed'});
		expect([...scoredChunks]).toEqual([0]);
	});
});
