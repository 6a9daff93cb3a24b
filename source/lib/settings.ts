/**
 * User settings - Optional defaults for the CLI and the scoring table.
 *
 * Path: {home}/config.json (override the directory via $FUZZRANK_HOME)
 *
 * Every key is optional. Command-line flags take precedence over the file.
 */

import fs from 'node:fs/promises';
import {z} from 'zod';
import type {ScoreConfig} from '../core/index.js';
import {FUZZRANK_LOG_LEVEL_ENV, getSettingsPath} from './constants.js';
import type {LogThreshold} from './logger.js';

// ============================================================================
// Schema
// ============================================================================

const gapPenalty = z.number().finite().max(0);
const matchBonus = z.number().finite().min(0);

const scoringSchema = z
	.object({
		gapLeading: gapPenalty,
		gapInner: gapPenalty,
		gapTrailing: gapPenalty,
		matchConsecutive: matchBonus,
		matchSlash: matchBonus,
		matchWord: matchBonus,
		matchCapital: matchBonus,
		matchDot: matchBonus,
	})
	.partial()
	.strict();

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const settingsSchema = z
	.object({
		lines: z.number().int().min(1),
		prompt: z.string(),
		showScores: z.boolean(),
		parallelism: z.number().int().min(1),
		logLevel: logLevelSchema,
		scoring: scoringSchema,
	})
	.partial()
	.strict();

export interface Settings {
	lines: number;
	prompt: string;
	showScores: boolean;
	parallelism: number;
	logLevel: LogThreshold;
	scoring: Partial<ScoreConfig>;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
	lines: 10,
	prompt: '> ',
	showScores: false,
	parallelism: 4,
	logLevel: 'warn',
	scoring: {},
});

// ============================================================================
// Errors
// ============================================================================

/**
 * The settings file exists but cannot be used.
 */
export class SettingsError extends Error {
	constructor(
		readonly settingsPath: string,
		readonly issues: string[],
	) {
		super(`Invalid settings in ${settingsPath}:\n  ${issues.join('\n  ')}`);
		this.name = 'SettingsError';
	}
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => {
		const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
		return `${where}: ${issue.message}`;
	});
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate raw settings and merge them onto the defaults.
 *
 * @throws SettingsError if the value does not match the schema
 */
export function parseSettings(
	raw: unknown,
	settingsPath: string = getSettingsPath(),
): Settings {
	const result = settingsSchema.safeParse(raw);
	if (!result.success) {
		throw new SettingsError(settingsPath, formatIssues(result.error));
	}

	return {
		...DEFAULT_SETTINGS,
		...result.data,
		scoring: {...result.data.scoring},
	};
}

/**
 * Log level from $FUZZRANK_LOG_LEVEL, if it names a valid level.
 */
export function getLogLevelEnvOverride(): LogThreshold | null {
	const parsed = logLevelSchema.safeParse(
		process.env[FUZZRANK_LOG_LEVEL_ENV]?.trim(),
	);
	return parsed.success ? parsed.data : null;
}

/**
 * Load settings from disk. A missing file yields the defaults.
 *
 * @throws SettingsError if the file is not valid JSON or fails validation
 */
export async function loadSettings(): Promise<Settings> {
	const settingsPath = getSettingsPath();
	let content: string;

	try {
		content = await fs.readFile(settingsPath, 'utf-8');
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return withEnvOverrides({...DEFAULT_SETTINGS});
		}
		throw error;
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new SettingsError(settingsPath, [`not valid JSON (${reason})`]);
	}

	return withEnvOverrides(parseSettings(raw, settingsPath));
}

function withEnvOverrides(settings: Settings): Settings {
	const logLevel = getLogLevelEnvOverride();
	return logLevel ? {...settings, logLevel} : settings;
}
