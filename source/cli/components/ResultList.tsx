/**
 * Ranked results with matched characters highlighted.
 */

import React from 'react';
import {Box, Text} from 'ink';
import type {RankedResult} from '../../core/index.js';
import {formatScore, highlightSegments} from '../utils/format.js';

type Props = {
	results: RankedResult[];
	selectedIndex: number;
	showScores: boolean;
	/** Available columns */
	width: number;
};

const SELECTED_MARKER = '> ';
const UNSELECTED_MARKER = '  ';
const SCORE_WIDTH = 8; // "( 0.96) "

function ResultRow({
	result,
	selected,
	showScores,
	width,
}: {
	result: RankedResult;
	selected: boolean;
	showScores: boolean;
	width: number;
}) {
	const available = Math.max(
		0,
		width - SELECTED_MARKER.length - (showScores ? SCORE_WIDTH : 0),
	);
	const segments = highlightSegments(
		result.candidate,
		result.positions ?? [],
		available,
	);

	return (
		<Box>
			<Text color={selected ? 'cyan' : undefined} bold={selected}>
				{selected ? SELECTED_MARKER : UNSELECTED_MARKER}
			</Text>
			{showScores && <Text dimColor>{formatScore(result.score)} </Text>}
			<Text bold={selected} wrap="truncate">
				{segments.map((segment, index) =>
					segment.matched ? (
						<Text key={index} inverse>
							{segment.text}
						</Text>
					) : (
						segment.text
					),
				)}
			</Text>
		</Box>
	);
}

export default function ResultList({
	results,
	selectedIndex,
	showScores,
	width,
}: Props) {
	if (results.length === 0) {
		return (
			<Box>
				<Text dimColor>{UNSELECTED_MARKER}No matches</Text>
			</Box>
		);
	}

	return (
		<Box flexDirection="column">
			{results.map((result, index) => (
				<ResultRow
					key={result.index}
					result={result}
					selected={index === selectedIndex}
					showScores={showScores}
					width={width}
				/>
			))}
		</Box>
	);
}
