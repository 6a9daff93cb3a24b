#!/usr/bin/env node
import fs from 'node:fs';
import tty from 'node:tty';
import React from 'react';
import {render} from 'ink';
import meow from 'meow';
import {Provider} from 'react-redux';
import chalk, {Chalk} from 'chalk';
import {
	Scorer,
	createScoreConfig,
	prepareCandidates,
	type PreparedCandidate,
} from '../core/index.js';
import {createLogger, type Logger} from '../lib/logger.js';
import {loadSettings} from '../lib/settings.js';
import App from './app.js';
import {runBatch, runBenchmark, type BatchIO} from './batch.js';
import {readCandidates} from './input.js';
import {
	EXIT_NO_MATCH,
	EXIT_OK,
	UsageError,
	resolveOptions,
	type CliOptions,
} from './options.js';
import {createPickerStore} from './store/store.js';
import {exitCodeFor, handleCliError} from './utils/error-handler.js';

const cli = meow(
	`
	Usage
	  $ <command> | fuzzrank [options]

	Options
	  -q, --query <query>         Print the best matches for <query> and exit
	  -e, --show-matches <query>  Same as --query
	  -l, --lines <n>             Number of result lines (default: 10)
	  -s, --show-scores           Show the score of each match
	  -j, --parallelism <n>       Maximum number of search chunks (default: 4)
	  -p, --prompt <text>         Interactive prompt (default: "> ")
	  -b, --benchmark <n>         Run the query <n> times and report the timing
	      --highlight             Highlight matched characters in --query output
	  --help                      Show help
	  --version                   Show version

	Without --query, an interactive picker reads keys from the terminal and
	prints the selected line.

	Examples
	  $ git ls-files | fuzzrank -q src/main
	  $ vim "$(find . -type f | fuzzrank)"
`,
	{
		importMeta: import.meta,
		flags: {
			query: {type: 'string', shortFlag: 'q'},
			showMatches: {type: 'string', shortFlag: 'e'},
			lines: {type: 'number', shortFlag: 'l'},
			showScores: {type: 'boolean', shortFlag: 's'},
			parallelism: {type: 'number', shortFlag: 'j', aliases: ['workers']},
			prompt: {type: 'string', shortFlag: 'p'},
			benchmark: {type: 'number', shortFlag: 'b'},
			highlight: {type: 'boolean'},
		},
	},
);

/**
 * Open the controlling terminal for keyboard input. Stdin carries the
 * candidates.
 */
function openKeyboard(): tty.ReadStream {
	return new tty.ReadStream(fs.openSync('/dev/tty', 'r'));
}

async function runInteractive(
	candidates: readonly PreparedCandidate[],
	options: CliOptions,
	scorer: Scorer,
	logger: Logger,
): Promise<number> {
	const keyboard = openKeyboard();
	const store = createPickerStore();
	const picked: {selection: string | null} = {selection: null};

	const instance = render(
		<Provider store={store}>
			<App
				candidates={candidates}
				options={options}
				scorer={scorer}
				logger={logger}
				onSelect={candidate => {
					picked.selection = candidate;
				}}
			/>
		</Provider>,
		{
			stdin: keyboard,
			stdout: process.stderr,
			exitOnCtrlC: false, // Ctrl+C clears the query first
		},
	);

	try {
		await instance.waitUntilExit();
	} finally {
		instance.cleanup();
		keyboard.destroy();
	}

	if (picked.selection === null) {
		return EXIT_NO_MATCH;
	}
	process.stdout.write(`${picked.selection}\n`);
	return EXIT_OK;
}

// Set once settings are loaded, for the top-level error handler
const runtime: {logger: Logger | null} = {logger: null};

async function main(): Promise<number> {
	const settings = await loadSettings();
	const logger = createLogger(settings.logLevel);
	runtime.logger = logger;
	const options = resolveOptions(cli.flags, settings);

	if (process.stdin.isTTY) {
		throw new UsageError(
			'No input: pipe the candidates into fuzzrank, one per line',
		);
	}

	const scorer = new Scorer(createScoreConfig(options.scoring));
	const candidates = prepareCandidates(await readCandidates(process.stdin));
	logger.debug('Cli', 'Read candidates', {
		count: candidates.length,
		mode: options.mode,
	});

	const io: BatchIO = {
		stdout: line => process.stdout.write(`${line}\n`),
		stderr: line => process.stderr.write(`${line}\n`),
		// --highlight is explicit, so color even when piped
		chalk: chalk.level > 0 ? chalk : new Chalk({level: 1}),
	};

	switch (options.mode) {
		case 'batch':
			return runBatch({candidates, options, scorer, io, logger});
		case 'benchmark':
			return runBenchmark({candidates, options, scorer, io, logger});
		case 'interactive':
			return runInteractive(candidates, options, scorer, logger);
	}
}

try {
	process.exitCode = await main();
} catch (error) {
	handleCliError('Cli', error, runtime.logger);
	process.exitCode = exitCodeFor(error);
}
