/**
 * Candidate input - One candidate per line of a stream.
 */

import readline from 'node:readline';

/**
 * Read every line of a stream, trimmed, in input order.
 *
 * Accepts LF and CRLF endings. Invalid UTF-8 is decoded to U+FFFD.
 */
export async function readCandidates(
	input: NodeJS.ReadableStream,
): Promise<string[]> {
	const lines: string[] = [];
	const reader = readline.createInterface({input, crlfDelay: Infinity});

	for await (const line of reader) {
		lines.push(line.trim());
	}

	return lines;
}
