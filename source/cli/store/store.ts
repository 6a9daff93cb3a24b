/**
 * Redux store configuration for the interactive picker.
 */

import {configureStore} from '@reduxjs/toolkit';
import {pickerReducer} from './picker/slice.js';

// ============================================================================
// Store Configuration
// ============================================================================

export function createPickerStore() {
	return configureStore({
		reducer: {
			picker: pickerReducer,
		},
	});
}

// ============================================================================
// Type Exports
// ============================================================================

export type PickerStore = ReturnType<typeof createPickerStore>;
export type RootState = ReturnType<PickerStore['getState']>;
export type AppDispatch = PickerStore['dispatch'];
