import React from 'react';
import {describe, it, expect} from 'vitest';
import {render} from 'ink-testing-library';
import type {RankedResult} from '../../core/index.js';
import ResultList from '../components/ResultList.js';

const stripAnsi = (text: string) => text.replace(/\u001B\[[0-9;]*m/g, '');

function frameLines(frame: string | undefined): string[] {
	return stripAnsi(frame ?? '').split('\n');
}

const results: RankedResult[] = [
	{candidate: 'rb', index: 2, score: Number.POSITIVE_INFINITY, positions: [0, 1]},
	{candidate: 'lib/rb.rs', index: 0, score: 1.5, positions: [4, 5]},
];

describe('ResultList', () => {
	it('marks the selected row', () => {
		const {lastFrame} = render(
			<ResultList
				results={results}
				selectedIndex={1}
				showScores={false}
				width={80}
			/>,
		);
		expect(frameLines(lastFrame())).toEqual(['  rb', '> lib/rb.rs']);
	});

	it('prefixes scores when enabled', () => {
		const {lastFrame} = render(
			<ResultList
				results={results}
				selectedIndex={0}
				showScores={true}
				width={80}
			/>,
		);
		expect(frameLines(lastFrame())).toEqual([
			'> (  inf) rb',
			'  ( 1.50) lib/rb.rs',
		]);
	});

	it('cuts candidates to the available width', () => {
		const {lastFrame} = render(
			<ResultList
				results={[{candidate: 'abcdefghijkl', index: 0, score: 1, positions: []}]}
				selectedIndex={0}
				showScores={false}
				width={10}
			/>,
		);
		expect(frameLines(lastFrame())).toEqual(['> abcdefgh']);
	});

	it('says so when nothing matches', () => {
		const {lastFrame} = render(
			<ResultList results={[]} selectedIndex={0} showScores={false} width={80} />,
		);
		expect(frameLines(lastFrame())).toEqual(['  No matches']);
	});
});
