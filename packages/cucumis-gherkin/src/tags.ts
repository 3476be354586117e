// ============================================================================
// Tag expressions - filters such as `(@smoke or @ui) and not @wip`.
//
// Operands use the same tag grammar as tag lines in a feature file. `not`
// binds tightest, then `and`, then `or`; operators are case-insensitive.
// Chains of one operator parse into a single n-ary node, and evaluation runs
// against tag names as the parser stores them, without `@`.
// ============================================================================

import { TagExpressionError } from './errors.js';

export type TagExpression =
	| { type: 'tag'; name: string }
	| { type: 'not'; operand: TagExpression }
	| { type: 'and'; operands: TagExpression[] }
	| { type: 'or'; operands: TagExpression[] };

/** A single tag token: `@` and a name, as written on a tag line */
export const TAG_PATTERN = /^@([A-Za-z0-9_-]+)$/;

// ---------------------------------------------------------------------------
// Scanning
// ---------------------------------------------------------------------------

type Word =
	| { kind: 'tag'; name: string; column: number }
	| { kind: 'and' | 'or' | 'not' | '(' | ')'; column: number };

const WORD = /\s*([()]|[^\s()]+)/y;

function scan(source: string): Word[] {
	const words: Word[] = [];
	WORD.lastIndex = 0;

	for (let match = WORD.exec(source); match; match = WORD.exec(source)) {
		const text = match[1] ?? '';
		const column = match.index + match[0].length - text.length + 1;
		const lower = text.toLowerCase();

		if (text === '(' || text === ')') {
			words.push({ kind: text, column });
		} else if (lower === 'and' || lower === 'or' || lower === 'not') {
			words.push({ kind: lower, column });
		} else {
			const name = TAG_PATTERN.exec(text)?.[1];
			if (!name) {
				throw new TagExpressionError('a tag (@ followed by letters, digits, _ or -)', source, column);
			}
			words.push({ kind: 'tag', name, column });
		}
	}

	return words;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a tag expression.
 *
 * ```ts
 * parseTagExpression('@smoke and not @slow');
 * // { type: 'and', operands: [{ type: 'tag', name: 'smoke' },
 * //   { type: 'not', operand: { type: 'tag', name: 'slow' } }] }
 * ```
 *
 * @throws TagExpressionError with the column of the offending word
 */
export function parseTagExpression(input: string): TagExpression {
	const source = input.trim();
	const words = scan(source);
	let index = 0;

	const fail = (expected: string): never => {
		throw new TagExpressionError(expected, source, words[index]?.column ?? source.length + 1);
	};

	const chain = (op: 'and' | 'or', operand: () => TagExpression): TagExpression => {
		const operands = [operand()];
		while (words[index]?.kind === op) {
			index++;
			operands.push(operand());
		}
		return operands.length === 1 && operands[0] ? operands[0] : { type: op, operands };
	};

	const primary = (): TagExpression => {
		const word = words[index];
		if (word?.kind === 'not') {
			index++;
			return { type: 'not', operand: primary() };
		}
		if (word?.kind === 'tag') {
			index++;
			return { type: 'tag', name: word.name };
		}
		if (word?.kind === '(') {
			index++;
			const inner = disjunction();
			if (words[index]?.kind !== ')') fail("')'");
			index++;
			return inner;
		}
		return fail("a tag, 'not' or '('");
	};

	const conjunction = (): TagExpression => chain('and', primary);
	const disjunction = (): TagExpression => chain('or', conjunction);

	const expression = disjunction();
	if (index < words.length) fail("'and', 'or' or the end of the expression");
	return expression;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Evaluate a parsed expression against tag names (without `@`).
 *
 * ```ts
 * const expr = parseTagExpression('@smoke and not @slow');
 * evaluateTagExpression(expr, ['smoke', 'fast']); // true
 * evaluateTagExpression(expr, ['smoke', 'slow']); // false
 * ```
 */
export function evaluateTagExpression(expr: TagExpression, tags: ReadonlyArray<string>): boolean {
	switch (expr.type) {
		case 'tag':
			return tags.includes(expr.name);
		case 'not':
			return !evaluateTagExpression(expr.operand, tags);
		case 'and':
			return expr.operands.every((operand) => evaluateTagExpression(operand, tags));
		case 'or':
			return expr.operands.some((operand) => evaluateTagExpression(operand, tags));
	}
}

const parsedFilters = new Map<string, TagExpression>();

/**
 * Match a filter string against tag names. Each distinct filter is parsed
 * once and reused, since hooks check theirs for every scenario and step.
 */
export function tagsMatch(filter: string, tags: ReadonlyArray<string>): boolean {
	let expr = parsedFilters.get(filter);
	if (!expr) {
		expr = parseTagExpression(filter);
		parsedFilters.set(filter, expr);
	}
	return evaluateTagExpression(expr, tags);
}
