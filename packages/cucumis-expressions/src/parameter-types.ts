// ============================================================================
// Parameter sub-parsers.
//
// Each sub-parser reads a prefix of the remaining step text and returns the
// converted value with the number of characters it consumed, or null.
// ============================================================================

import type { ParameterTypeName, ParameterValue } from './types.js';

export interface SubParseResult {
	value: ParameterValue;
	consumed: number;
}

export type SubParser = (text: string) => SubParseResult | null;

const INT_PATTERN = /^[+-]?\d+/;
const FLOAT_PATTERN = /^[+-]?\d+\.\d+/;
const WORD_PATTERN = /^[^ \t\n]+/;
const ATOM_PATTERN = /^[A-Za-z0-9_@]+/;

/**
 * `"..."` with `\"` and `\\` escapes. Any other character, a lone backslash
 * included, is taken as written.
 */
function parseStringParam(text: string): SubParseResult | null {
	if (!text.startsWith('"')) return null;

	let value = '';
	let i = 1;
	while (i < text.length) {
		const ch = text.charAt(i);
		if (ch === '"') {
			return { value, consumed: i + 1 };
		}
		const next = text.charAt(i + 1);
		if (ch === '\\' && (next === '"' || next === '\\')) {
			value += next;
			i += 2;
			continue;
		}
		value += ch;
		i++;
	}

	return null;
}

/** A number when it is exact as one, otherwise a bigint */
function parseIntParam(text: string): SubParseResult | null {
	const digits = INT_PATTERN.exec(text)?.[0];
	if (digits === undefined) return null;
	const value = Number.parseInt(digits, 10);
	return { value: Number.isSafeInteger(value) ? value : BigInt(digits), consumed: digits.length };
}

function parseFloatParam(text: string): SubParseResult | null {
	const digits = FLOAT_PATTERN.exec(text)?.[0];
	return digits === undefined ? null : { value: Number.parseFloat(digits), consumed: digits.length };
}

function parseWordParam(text: string): SubParseResult | null {
	const word = WORD_PATTERN.exec(text)?.[0];
	return word === undefined ? null : { value: word, consumed: word.length };
}

function parseAtomParam(text: string): SubParseResult | null {
	const name = ATOM_PATTERN.exec(text)?.[0];
	return name === undefined ? null : { value: Symbol.for(name), consumed: name.length };
}

export const PARAMETER_TYPES: Readonly<Record<ParameterTypeName, SubParser>> = {
	string: parseStringParam,
	int: parseIntParam,
	float: parseFloatParam,
	word: parseWordParam,
	atom: parseAtomParam,
};

export function isParameterTypeName(name: string): name is ParameterTypeName {
	return Object.hasOwn(PARAMETER_TYPES, name);
}
