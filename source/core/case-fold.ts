/**
 * Unicode-aware case folding and character classification.
 *
 * Strings are split by code point so that astral characters count as a
 * single character in positions and bonuses.
 */

const LOWERCASE = /^\p{Lowercase}$/u;
const UPPERCASE = /^\p{Uppercase}$/u;

/**
 * Split text into Unicode scalar values.
 */
export function toChars(text: string): string[] {
	return Array.from(text);
}

/**
 * Simple lowercase form of a single character, or the character itself.
 *
 * toLowerCase() applies the full mapping, which turns U+0130 (İ) into two
 * code points. The simple mapping is the first of them.
 */
export function foldChar(char: string): string {
	const lower = char.toLowerCase();
	const first = lower.codePointAt(0);
	return first === undefined ? lower : String.fromCodePoint(first);
}

export function foldChars(chars: readonly string[]): string[] {
	return chars.map(foldChar);
}

export function isLowercase(char: string): boolean {
	return LOWERCASE.test(char);
}

export function isUppercase(char: string): boolean {
	return UPPERCASE.test(char);
}
