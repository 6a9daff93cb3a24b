import {useEffect} from 'react';
import {
	isAbortError,
	search,
	type PreparedCandidate,
	type Scorer,
} from '../../core/index.js';
import type {Logger} from '../../lib/logger.js';
import {useAppDispatch} from '../store/hooks.js';
import {
	resultsReceived,
	searchFailed,
	searchStarted,
} from '../store/picker/slice.js';
import {handleCliError} from '../utils/error-handler.js';

type Options = {
	query: string;
	candidates: readonly PreparedCandidate[];
	scorer: Scorer;
	parallelism: number;
	/** Number of rows to locate for highlighting */
	limit: number;
	logger: Logger;
};

/**
 * Re-rank the candidates whenever the query changes.
 *
 * Each edit aborts the search started for the previous query; its result is
 * discarded. Positions are located only for the visible rows.
 */
export function useRankedResults({
	query,
	candidates,
	scorer,
	parallelism,
	limit,
	logger,
}: Options): void {
	const dispatch = useAppDispatch();

	useEffect(() => {
		const controller = new AbortController();
		const started = performance.now();
		dispatch(searchStarted());

		void search(query, candidates, {
			scorer,
			parallelism,
			signal: controller.signal,
		})
			.then(ranked => {
				const visible = ranked.slice(0, limit).map(result => {
					const candidate = candidates[result.index];
					return {
						...result,
						positions: candidate ? (scorer.locate(query, candidate) ?? []) : [],
					};
				});
				const elapsedMs = Math.round(performance.now() - started);

				logger.debug('RankedResults', 'Search finished', {
					query,
					matches: ranked.length,
					elapsedMs,
				});
				dispatch(
					resultsReceived({
						query,
						results: visible,
						matchCount: ranked.length,
						elapsedMs,
					}),
				);
			})
			.catch((error: unknown) => {
				if (isAbortError(error)) return;
				handleCliError('RankedResults', error, logger, {
					skipConsole: true,
					context: {query},
				});
				dispatch(
					searchFailed(error instanceof Error ? error.message : String(error)),
				);
			});

		return () => {
			controller.abort('query changed');
		};
	}, [query, candidates, scorer, parallelism, limit, logger, dispatch]);
}
