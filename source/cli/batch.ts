/**
 * Batch and benchmark modes - Rank once (or N times) and print.
 */

import type {ChalkInstance} from 'chalk';
import {search, type PreparedCandidate, type Scorer} from '../core/index.js';
import type {Logger} from '../lib/logger.js';
import {EXIT_NO_MATCH, EXIT_OK, type CliOptions} from './options.js';
import {formatScore, renderHighlighted} from './utils/format.js';

export type BatchIO = {
	stdout: (line: string) => void;
	stderr: (line: string) => void;
	/** Colors for --highlight */
	chalk: ChalkInstance;
};

type RunContext = {
	candidates: readonly PreparedCandidate[];
	options: CliOptions;
	scorer: Scorer;
	io: BatchIO;
	logger: Logger;
};

/**
 * Print the best `lines` matches, one per line.
 *
 * @returns EXIT_OK when something matched, EXIT_NO_MATCH otherwise
 */
export async function runBatch({
	candidates,
	options,
	scorer,
	io,
	logger,
}: RunContext): Promise<number> {
	const results = await search(options.query, candidates, {
		scorer,
		parallelism: options.parallelism,
		limit: options.lines,
		positions: options.highlight,
	});

	logger.info('Batch', 'Ranked candidates', {
		candidates: candidates.length,
		printed: results.length,
	});

	for (const result of results) {
		const text = options.highlight
			? renderHighlighted(result.candidate, result.positions ?? [], io.chalk)
			: result.candidate;
		io.stdout(
			options.showScores ? `${formatScore(result.score)} ${text}` : text,
		);
	}

	return results.length > 0 ? EXIT_OK : EXIT_NO_MATCH;
}

/**
 * Repeat the search without printing results and report the timing.
 */
export async function runBenchmark({
	candidates,
	options,
	scorer,
	io,
	logger,
}: RunContext): Promise<number> {
	const started = performance.now();

	for (let run = 0; run < options.benchmark; run++) {
		await search(options.query, candidates, {
			scorer,
			parallelism: options.parallelism,
		});
	}

	const totalMs = performance.now() - started;
	const meanMs = totalMs / options.benchmark;
	io.stderr(
		`Ran ${options.benchmark} searches over ${candidates.length} candidates in ${totalMs.toFixed(1)}ms (${meanMs.toFixed(3)}ms each)`,
	);
	logger.info('Benchmark', 'Finished', {
		runs: options.benchmark,
		totalMs,
	});

	return EXIT_OK;
}
