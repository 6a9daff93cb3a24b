/**
 * Result formatting shared by batch output and the interactive list.
 */

import type {ChalkInstance} from 'chalk';
import {SCORE_MAX, SCORE_MIN, toChars} from '../../core/index.js';

export type Segment = {
	text: string;
	matched: boolean;
};

/**
 * Fixed-width score column, e.g. "( 0.96)".
 */
export function formatScore(score: number): string {
	if (score === SCORE_MIN) return '(     )';
	if (score === SCORE_MAX) return '(  inf)';
	return `(${score.toFixed(2).padStart(5)})`;
}

/**
 * Split a candidate into runs of matched and unmatched characters.
 * Positions are code point indices; output stops after `maxChars`.
 */
export function highlightSegments(
	text: string,
	positions: readonly number[],
	maxChars: number = Number.POSITIVE_INFINITY,
): Segment[] {
	const matched = new Set(positions);
	const segments: Segment[] = [];

	toChars(text).forEach((char, i) => {
		if (i >= maxChars) return;
		const isMatch = matched.has(i);
		const last = segments[segments.length - 1];
		if (last && last.matched === isMatch) {
			last.text += char;
		} else {
			segments.push({text: char, matched: isMatch});
		}
	});

	return segments;
}

/**
 * Render matched characters in inverse video.
 */
export function renderHighlighted(
	text: string,
	positions: readonly number[],
	chalk: ChalkInstance,
): string {
	return highlightSegments(text, positions)
		.map(segment =>
			segment.matched ? chalk.inverse(segment.text) : segment.text,
		)
		.join('');
}
