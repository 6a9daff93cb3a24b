import {useEffect, useState, useRef, useCallback} from 'react';
import {useStdout} from 'ink';
import type {TerminalDimensions} from '../types.js';

const FALLBACK_DIMENSIONS: TerminalDimensions = {rows: 24, columns: 80};

/**
 * Hook to track the size of the terminal Ink renders to.
 *
 * Listens on Ink's own output stream (which may be stderr rather than
 * stdout) and debounces rapid resize events.
 */
export function useTerminalResize(debounceMs = 50): TerminalDimensions {
	const {stdout} = useStdout();

	const getDimensions = useCallback(
		(): TerminalDimensions => ({
			rows: stdout.rows || FALLBACK_DIMENSIONS.rows,
			columns: stdout.columns || FALLBACK_DIMENSIONS.columns,
		}),
		[stdout],
	);

	const [dimensions, setDimensions] =
		useState<TerminalDimensions>(getDimensions);
	const debounceTimerRef = useRef<ReturnType<typeof setTimeout> | null>(null);

	useEffect(() => {
		const handleResize = () => {
			if (debounceTimerRef.current) {
				clearTimeout(debounceTimerRef.current);
			}

			debounceTimerRef.current = setTimeout(() => {
				setDimensions(getDimensions());
				debounceTimerRef.current = null;
			}, debounceMs);
		};

		stdout.on('resize', handleResize);

		return () => {
			stdout.off('resize', handleResize);
			if (debounceTimerRef.current) {
				clearTimeout(debounceTimerRef.current);
			}
		};
	}, [stdout, getDimensions, debounceMs]);

	return dimensions;
}
