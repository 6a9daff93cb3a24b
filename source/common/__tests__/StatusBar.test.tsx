import React from 'react';
import {describe, it, expect} from 'vitest';
import {render} from 'ink-testing-library';
import StatusBar, {formatStatus} from '../components/StatusBar.js';

describe('formatStatus', () => {
	it('maps each state to its text and color', () => {
		expect(formatStatus({state: 'ready', elapsedMs: 12})).toEqual({
			text: 'Ready (12ms)',
			color: 'green',
		});
		expect(formatStatus({state: 'searching'})).toEqual({
			text: 'Searching...',
			color: 'cyan',
		});
		expect(
			formatStatus({state: 'warning', message: 'Press Ctrl+C again to exit'}),
		).toEqual({text: 'Press Ctrl+C again to exit', color: 'yellow'});
		expect(formatStatus({state: 'error', message: 'boom'})).toEqual({
			text: 'boom',
			color: 'red',
		});
	});
});

describe('StatusBar', () => {
	it('shows the status and the match count', () => {
		const {lastFrame} = render(
			<StatusBar
				status={{state: 'ready', elapsedMs: 12}}
				stats={{matched: 3, total: 10}}
			/>,
		);
		const frame = lastFrame() ?? '';
		expect(frame).toContain('Ready (12ms)');
		expect(frame).toContain('3/10');
	});

	it('shows a warning message', () => {
		const {lastFrame} = render(
			<StatusBar
				status={{state: 'warning', message: 'Press Ctrl+C again to exit'}}
				stats={{matched: 0, total: 0}}
			/>,
		);
		expect(lastFrame()).toContain('Press Ctrl+C again to exit');
	});
});
