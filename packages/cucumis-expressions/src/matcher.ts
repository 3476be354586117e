// ============================================================================
// Expression Matcher - a single left-to-right walk over the step text and the
// compiled nodes, consuming one node per step. Every node commits to what it
// consumes; there is no backtracking into an earlier decision.
// ============================================================================

import { compileExpression } from './compiler.js';
import { PARAMETER_TYPES } from './parameter-types.js';
import type { CompiledExpression, ExpressionNode, MatchArgument, ParameterTypeName } from './types.js';

/**
 * Match step text against a compiled expression.
 *
 * Returns the captured arguments in source order, or `null` when the text
 * does not match. Optional text and alternations are never captured; an
 * optional parameter that matched nothing contributes `null`.
 *
 * ```ts
 * const expr = compileExpression('I have {int} items');
 * matchExpression('I have 42 items', expr);   // [42]
 * matchExpression('I have many items', expr); // null
 * ```
 */
export function matchExpression(text: string, compiled: CompiledExpression): MatchArgument[] | null {
	const args: MatchArgument[] = [];
	let remaining = text;

	for (const node of compiled.nodes) {
		const next = consume(remaining, node, args);
		if (next === null) return null;
		remaining = next;
	}

	return remaining === '' ? args : null;
}

/** Apply one node to the remaining text; returns what is left, or null on failure */
function consume(text: string, node: ExpressionNode, args: MatchArgument[]): string | null {
	switch (node.type) {
		case 'literal':
			return text.startsWith(node.text) ? text.slice(node.text.length) : null;

		case 'parameter': {
			const parsed = PARAMETER_TYPES[node.parameterType](text);
			if (parsed) {
				args.push(parsed.value);
				return text.slice(parsed.consumed);
			}
			if (node.optional) {
				args.push(null);
				return text;
			}
			return null;
		}

		case 'optional':
			return text.startsWith(node.text) ? text.slice(node.text.length) : text;

		case 'alternation': {
			const option = node.options.find((candidate) => text.startsWith(candidate));
			return option === undefined ? null : text.slice(option.length);
		}
	}
}

// ---------------------------------------------------------------------------
// CucumberExpression
// ---------------------------------------------------------------------------

/**
 * A compiled pattern bundled with its matcher.
 *
 * ```ts
 * const expr = new CucumberExpression('I add {int} {word} to the basket/bag');
 * expr.match('I add 3 cucumbers to the bag'); // [3, 'cucumbers']
 * ```
 */
export class CucumberExpression {
	readonly compiled: CompiledExpression;

	constructor(readonly source: string) {
		this.compiled = compileExpression(source);
	}

	/** Parameter types in capture order */
	get parameterTypes(): ParameterTypeName[] {
		return this.compiled.nodes.flatMap((node) => (node.type === 'parameter' ? [node.parameterType] : []));
	}

	match(text: string): MatchArgument[] | null {
		return matchExpression(text, this.compiled);
	}

	toString(): string {
		return this.source;
	}
}
