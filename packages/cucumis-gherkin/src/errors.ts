// ============================================================================
// Gherkin parse errors.
//
// Errors carry structured location data (1-based line/column) and a short
// snippet of the unconsumed input so callers can render their own diagnostics.
// ============================================================================

export type ParseErrorCode =
	| 'missing-feature'
	| 'missing-feature-name'
	| 'invalid-tag'
	| 'malformed-table'
	| 'empty-examples'
	| 'unterminated-docstring'
	| 'conflicting-attachment'
	| 'outline-without-examples'
	| 'unexpected-input';

/** Maximum length of the `rest` snippet attached to a parse error */
export const SNIPPET_LENGTH = 50;

export interface ParseErrorOptions {
	code: ParseErrorCode;
	/** What the parser expected to find */
	expected: string;
	/** 1-based line */
	line: number;
	/** 1-based column */
	column: number;
	/** Unconsumed input from the error position */
	rest: string;
}

/**
 * Raised when a feature file does not conform to the grammar.
 * Parsing stops at the first such error.
 */
export class GherkinParseError extends Error {
	override readonly name: string = 'GherkinParseError';

	readonly code: ParseErrorCode;
	readonly expected: string;
	readonly line: number;
	readonly column: number;
	readonly rest: string;

	constructor(options: ParseErrorOptions) {
		const rest = options.rest.slice(0, SNIPPET_LENGTH);
		const parts = [
			`Gherkin parse error at line ${options.line}, column ${options.column}:`,
			`  Expected ${options.expected}`,
		];
		if (rest !== '') {
			parts.push(`Near: "${rest}..."`);
		}

		super(parts.join('\n'));
		this.code = options.code;
		this.expected = options.expected;
		this.line = options.line;
		this.column = options.column;
		this.rest = rest;
	}
}

/**
 * Raised when a Scenario Outline is finalized without a single Examples block.
 */
export class OutlineWithoutExamplesError extends GherkinParseError {
	override readonly name = 'OutlineWithoutExamplesError';

	readonly outlineName: string;

	constructor(options: Omit<ParseErrorOptions, 'code' | 'expected'> & { outlineName: string }) {
		super({
			...options,
			code: 'outline-without-examples',
			expected: `at least one Examples: block for Scenario Outline '${options.outlineName}'`,
		});
		this.outlineName = options.outlineName;
	}
}

/**
 * Raised when a tag expression does not parse. `column` is 1-based within
 * the trimmed expression.
 */
export class TagExpressionError extends Error {
	override readonly name = 'TagExpressionError';

	constructor(
		readonly expected: string,
		readonly expression: string,
		readonly column: number,
	) {
		super(`Expected ${expected} at column ${column} in tag expression: "${expression}"`);
	}
}
