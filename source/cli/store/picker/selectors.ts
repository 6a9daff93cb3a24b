/**
 * Memoized selectors for picker state.
 */

import {createSelector} from '@reduxjs/toolkit';
import type {RankedResult} from '../../../core/index.js';
import type {AppStatus} from '../../../common/types.js';
import type {PickerState} from './slice.js';

type RootState = {
	picker: PickerState;
};

// ============================================================================
// Basic Selectors
// ============================================================================

export const selectPicker = (state: RootState): PickerState => state.picker;

export const selectQuery = (state: RootState): string => state.picker.query;

export const selectResults = (state: RootState): RankedResult[] =>
	state.picker.results;

export const selectSelectedIndex = (state: RootState): number =>
	state.picker.selectedIndex;

// ============================================================================
// Derived Selectors
// ============================================================================

/**
 * The highlighted result, or null when nothing matches.
 */
export const selectSelectedResult = createSelector(
	[selectResults, selectSelectedIndex],
	(results, index): RankedResult | null => results[index] ?? null,
);

/**
 * Status bar state. A transient message takes precedence.
 */
export const selectAppStatus = createSelector(
	[selectPicker],
	(picker): AppStatus => {
		if (picker.status === 'error') {
			return {state: 'error', message: picker.message ?? 'Search failed'};
		}
		if (picker.message) {
			return {state: 'warning', message: picker.message};
		}
		if (picker.status === 'searching') {
			return {state: 'searching'};
		}
		return {state: 'ready', elapsedMs: picker.elapsedMs};
	},
);

export const selectMatchStats = createSelector(
	[selectPicker],
	picker => ({matched: picker.matchCount, total: picker.totalCandidates}),
);
