import React from 'react';
import {Box, Text} from 'ink';
import type {AppStatus, MatchStats} from '../types.js';

type Props = {
	status: AppStatus;
	stats: MatchStats;
};

/**
 * Format status message for display.
 */
export function formatStatus(status: AppStatus): {text: string; color: string} {
	switch (status.state) {
		case 'ready':
			return {text: `Ready (${status.elapsedMs}ms)`, color: 'green'};
		case 'searching':
			return {text: 'Searching...', color: 'cyan'};
		case 'warning':
			return {text: status.message, color: 'yellow'};
		case 'error':
			return {text: status.message, color: 'red'};
	}
}

export default function StatusBar({status, stats}: Props) {
	const {text, color} = formatStatus(status);

	return (
		<Box paddingX={1} justifyContent="space-between">
			<Text color={color}>{text}</Text>
			<Text dimColor>
				{stats.matched}/{stats.total}
			</Text>
		</Box>
	);
}
