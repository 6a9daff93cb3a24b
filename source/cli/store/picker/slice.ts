/**
 * Redux slice for the interactive picker.
 *
 * Holds the query being edited, the visible window of ranked results and
 * the selection within it. Results arrive asynchronously; a result for a
 * query that has since been edited is dropped.
 */

import {createSlice, type PayloadAction} from '@reduxjs/toolkit';
import {toChars, type RankedResult} from '../../../core/index.js';

// ============================================================================
// Types
// ============================================================================

export type PickerStatus = 'searching' | 'ready' | 'error';

export interface PickerState {
	/** Current query text */
	query: string;
	/** Index of the highlighted row within results */
	selectedIndex: number;
	/** Top of the ranked list, with positions for highlighting */
	results: RankedResult[];
	/** Number of matching candidates (may exceed results.length) */
	matchCount: number;
	/** Number of candidates read from input */
	totalCandidates: number;
	status: PickerStatus;
	/** Duration of the last completed search */
	elapsedMs: number;
	/** Transient message for the status bar */
	message: string | null;
}

export type ResultsPayload = {
	query: string;
	results: RankedResult[];
	matchCount: number;
	elapsedMs: number;
};

// ============================================================================
// Initial State
// ============================================================================

export const initialPickerState: PickerState = {
	query: '',
	selectedIndex: 0,
	results: [],
	matchCount: 0,
	totalCandidates: 0,
	status: 'searching',
	elapsedMs: 0,
	message: null,
};

// Control characters never become part of the query
const CONTROL_CHARS = /\p{Cc}/gu;

// ============================================================================
// Slice
// ============================================================================

export const pickerSlice = createSlice({
	name: 'picker',
	initialState: initialPickerState,
	reducers: {
		candidatesLoaded: (state, action: PayloadAction<number>) => {
			state.totalCandidates = action.payload;
		},

		/**
		 * Append typed (or pasted) text to the query.
		 */
		typed: (state, action: PayloadAction<string>) => {
			const text = action.payload.replace(CONTROL_CHARS, '');
			if (!text) return;
			state.query += text;
			state.selectedIndex = 0;
		},

		/**
		 * Remove the last character of the query.
		 */
		backspaced: state => {
			if (!state.query) return;
			state.query = toChars(state.query).slice(0, -1).join('');
			state.selectedIndex = 0;
		},

		queryCleared: state => {
			state.query = '';
			state.selectedIndex = 0;
		},

		/**
		 * Move the selection, clamped to the visible results.
		 */
		selectionMoved: (state, action: PayloadAction<number>) => {
			const last = Math.max(0, state.results.length - 1);
			state.selectedIndex = Math.min(
				last,
				Math.max(0, state.selectedIndex + action.payload),
			);
		},

		searchStarted: state => {
			state.status = 'searching';
		},

		resultsReceived: (state, action: PayloadAction<ResultsPayload>) => {
			if (action.payload.query !== state.query) return;
			state.results = action.payload.results;
			state.matchCount = action.payload.matchCount;
			state.elapsedMs = action.payload.elapsedMs;
			state.status = 'ready';
			state.selectedIndex = Math.min(
				state.selectedIndex,
				Math.max(0, action.payload.results.length - 1),
			);
		},

		searchFailed: (state, action: PayloadAction<string>) => {
			state.status = 'error';
			state.message = action.payload;
		},

		messageSet: (state, action: PayloadAction<string | null>) => {
			state.message = action.payload;
		},
	},
});

export const {
	candidatesLoaded,
	typed,
	backspaced,
	queryCleared,
	selectionMoved,
	searchStarted,
	resultsReceived,
	searchFailed,
	messageSet,
} = pickerSlice.actions;

export const pickerReducer = pickerSlice.reducer;
