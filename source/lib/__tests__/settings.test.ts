import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {getSettingsPath} from '../constants.js';
import {
	DEFAULT_SETTINGS,
	SettingsError,
	loadSettings,
	parseSettings,
} from '../settings.js';

describe('parseSettings', () => {
	it('fills in defaults for missing keys', () => {
		expect(parseSettings({lines: 5}, 'config.json')).toEqual({
			...DEFAULT_SETTINGS,
			lines: 5,
			scoring: {},
		});
	});

	it('accepts a partial scoring table', () => {
		const settings = parseSettings(
			{scoring: {matchSlash: 1.5, gapInner: -0.02}},
			'config.json',
		);

		expect(settings.scoring).toEqual({matchSlash: 1.5, gapInner: -0.02});
	});

	it('lists every invalid key', () => {
		let caught: unknown;
		try {
			parseSettings(
				{lines: 0, scoring: {gapInner: 0.5}, colour: 'red'},
				'config.json',
			);
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(SettingsError);
		const issues = caught instanceof SettingsError ? caught.issues : [];
		expect(issues).toHaveLength(3);
		expect(issues.some(issue => issue.startsWith('lines: '))).toBe(true);
		expect(issues.some(issue => issue.startsWith('scoring.gapInner: '))).toBe(
			true,
		);
		expect(issues.some(issue => issue.startsWith('(root): '))).toBe(true);
	});

	it('rejects positive gap penalties and negative bonuses', () => {
		expect(() =>
			parseSettings({scoring: {gapTrailing: 0.1}}, 'config.json'),
		).toThrow(SettingsError);
		expect(() =>
			parseSettings({scoring: {matchWord: -1}}, 'config.json'),
		).toThrow(SettingsError);
	});
});

describe('loadSettings', () => {
	let tempHomeDir: string | null = null;
	const originalHome = process.env['FUZZRANK_HOME'];
	const originalLogLevel = process.env['FUZZRANK_LOG_LEVEL'];

	beforeEach(async () => {
		tempHomeDir = await fs.mkdtemp(
			path.join(os.tmpdir(), 'fuzzrank-settings-test-'),
		);
		process.env['FUZZRANK_HOME'] = tempHomeDir;
		delete process.env['FUZZRANK_LOG_LEVEL'];
	});

	afterEach(async () => {
		if (originalHome === undefined) delete process.env['FUZZRANK_HOME'];
		else process.env['FUZZRANK_HOME'] = originalHome;

		if (originalLogLevel === undefined)
			delete process.env['FUZZRANK_LOG_LEVEL'];
		else process.env['FUZZRANK_LOG_LEVEL'] = originalLogLevel;

		if (tempHomeDir) {
			await fs.rm(tempHomeDir, {recursive: true, force: true});
			tempHomeDir = null;
		}
	});

	it('returns defaults when no file exists', async () => {
		expect(await loadSettings()).toEqual(DEFAULT_SETTINGS);
	});

	it('reads the settings file', async () => {
		await fs.writeFile(
			getSettingsPath(),
			JSON.stringify({prompt: '$ ', showScores: true}),
		);

		const settings = await loadSettings();

		expect(settings.prompt).toBe('$ ');
		expect(settings.showScores).toBe(true);
		expect(settings.lines).toBe(10);
	});

	it('reports malformed JSON', async () => {
		await fs.writeFile(getSettingsPath(), '{"lines": ');

		await expect(loadSettings()).rejects.toBeInstanceOf(SettingsError);
	});

	it('respects FUZZRANK_LOG_LEVEL', async () => {
		await fs.writeFile(getSettingsPath(), JSON.stringify({logLevel: 'error'}));
		process.env['FUZZRANK_LOG_LEVEL'] = 'debug';

		expect((await loadSettings()).logLevel).toBe('debug');
	});

	it('ignores an unknown FUZZRANK_LOG_LEVEL', async () => {
		process.env['FUZZRANK_LOG_LEVEL'] = 'loud';

		expect((await loadSettings()).logLevel).toBe('warn');
	});
});
