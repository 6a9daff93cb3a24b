import React, {useCallback, useEffect} from 'react';
import {Box, useApp, useInput} from 'ink';
import type {PreparedCandidate, Scorer} from '../core/index.js';
import type {Logger} from '../lib/logger.js';
import {StatusBar, useCtrlC, useTerminalResize} from '../common/index.js';
import QueryPrompt from './components/QueryPrompt.js';
import ResultList from './components/ResultList.js';
import {useRankedResults} from './hooks/useRankedResults.js';
import type {CliOptions} from './options.js';
import {useAppDispatch, useAppSelector} from './store/hooks.js';
import {
	selectAppStatus,
	selectMatchStats,
	selectQuery,
	selectResults,
	selectSelectedIndex,
	selectSelectedResult,
} from './store/picker/selectors.js';
import {
	backspaced,
	candidatesLoaded,
	messageSet,
	queryCleared,
	selectionMoved,
	typed,
} from './store/picker/slice.js';

type Props = {
	candidates: readonly PreparedCandidate[];
	options: Pick<CliOptions, 'lines' | 'prompt' | 'showScores' | 'parallelism'>;
	scorer: Scorer;
	logger: Logger;
	/** Called once with the chosen candidate, or null when cancelled */
	onSelect: (candidate: string | null) => void;
};

// Prompt line and status bar
const RESERVED_ROWS = 2;

export default function App({
	candidates,
	options,
	scorer,
	logger,
	onSelect,
}: Props) {
	const {exit} = useApp();
	const dispatch = useAppDispatch();
	const {rows, columns} = useTerminalResize();

	const query = useAppSelector(selectQuery);
	const results = useAppSelector(selectResults);
	const selectedIndex = useAppSelector(selectSelectedIndex);
	const selected = useAppSelector(selectSelectedResult);
	const status = useAppSelector(selectAppStatus);
	const stats = useAppSelector(selectMatchStats);

	const windowSize = Math.max(
		1,
		Math.min(options.lines, rows - RESERVED_ROWS),
	);

	useEffect(() => {
		dispatch(candidatesLoaded(candidates.length));
	}, [candidates, dispatch]);

	useRankedResults({
		query,
		candidates,
		scorer,
		parallelism: options.parallelism,
		limit: windowSize,
		logger,
	});

	const finish = useCallback(
		(candidate: string | null) => {
			onSelect(candidate);
			exit();
		},
		[onSelect, exit],
	);

	const {handleCtrlC} = useCtrlC({
		onFirstPress: () => {
			dispatch(queryCleared());
			dispatch(messageSet('Press Ctrl+C again to exit'));
		},
		onStatusClear: () => dispatch(messageSet(null)),
		onExit: () => onSelect(null),
	});

	useInput((input, key) => {
		if (key.ctrl && input === 'c') {
			handleCtrlC();
			return;
		}

		if (key.return) {
			if (selected) {
				finish(selected.candidate);
			}
			return;
		}

		if (key.escape) {
			finish(null);
			return;
		}

		if (key.upArrow || (key.ctrl && input === 'p')) {
			dispatch(selectionMoved(-1));
			return;
		}

		if (key.downArrow || (key.ctrl && input === 'n')) {
			dispatch(selectionMoved(1));
			return;
		}

		if (key.backspace || key.delete) {
			dispatch(backspaced());
			return;
		}

		if (key.ctrl || key.meta || key.tab) {
			return;
		}

		if (input) {
			dispatch(typed(input));
		}
	});

	return (
		<Box flexDirection="column">
			<QueryPrompt prompt={options.prompt} query={query} />
			<ResultList
				results={results.slice(0, windowSize)}
				selectedIndex={selectedIndex}
				showScores={options.showScores}
				width={columns}
			/>
			<StatusBar status={status} stats={stats} />
		</Box>
	);
}
