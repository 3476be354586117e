// ============================================================================
// Expression Compiler - turns a pattern such as
// `I have {int} cucumber(s) in my basket/bag` into a flat list of nodes.
//
// At each position the tokenizer tries, in order:
//   escape        \{ \} \( \) \/ \\
//   parameter     {type} or {type?}
//   optional text (text)
//   whitespace    a literal run of spaces, tabs or newlines
//   alternation   word/word/...
//   literal       a run of anything else up to {, \, ( or whitespace
//
// Parameter type names are resolved here, so an unknown type fails at
// compile time and never at match time.
// ============================================================================

import { type CompileResult, ExpressionCompileError } from './errors.js';
import { isParameterTypeName } from './parameter-types.js';
import type { CompiledExpression, ExpressionNode } from './types.js';

const ESCAPABLE = new Set(['{', '}', '(', ')', '/', '\\']);
const PARAMETER_BODY = /^([a-z_]+)(\?)?$/;
const WHITESPACE = /^[ \t\n]+/;
const ALTERNATION = /^[^/\\ \t\n{()]+(?:\/[^/\\ \t\n{()]+)+/;
const LITERAL = /^[^{\\( \t\n]+/;

class ExpressionTokenizer {
	private pos = 0;
	private readonly nodes: ExpressionNode[] = [];

	constructor(private readonly pattern: string) {}

	tokenize(): ExpressionNode[] {
		while (this.pos < this.pattern.length) {
			const ch = this.pattern.charAt(this.pos);

			if (ch === '\\') {
				this.readEscape();
			} else if (ch === '{') {
				this.readParameter();
			} else if (ch === '(') {
				this.readOptional();
			} else {
				this.readText();
			}
		}
		return this.nodes;
	}

	private readEscape(): void {
		const escaped = this.pattern.charAt(this.pos + 1);
		if (!ESCAPABLE.has(escaped)) {
			this.fail('invalid-escape', this.pattern.slice(this.pos, this.pos + 2));
		}
		this.pushLiteral(escaped);
		this.pos += 2;
	}

	private readParameter(): void {
		const close = this.pattern.indexOf('}', this.pos);
		if (close === -1) {
			this.fail('malformed-parameter', this.pattern.slice(this.pos));
		}

		const fragment = this.pattern.slice(this.pos, close + 1);
		const body = PARAMETER_BODY.exec(fragment.slice(1, -1));
		const name = body?.[1];
		if (name === undefined) {
			this.fail('malformed-parameter', fragment);
		}
		if (!isParameterTypeName(name)) {
			this.fail('unknown-parameter-type', fragment, name);
		}

		this.nodes.push({ type: 'parameter', parameterType: name, optional: body?.[2] === '?' });
		this.pos = close + 1;
	}

	private readOptional(): void {
		const close = this.pattern.indexOf(')', this.pos);
		if (close === -1) {
			this.fail('unterminated-optional', this.pattern.slice(this.pos));
		}
		if (close === this.pos + 1) {
			this.fail('empty-optional', '()');
		}

		this.nodes.push({ type: 'optional', text: this.pattern.slice(this.pos + 1, close) });
		this.pos = close + 1;
	}

	private readText(): void {
		const rest = this.pattern.slice(this.pos);

		const whitespace = WHITESPACE.exec(rest)?.[0];
		if (whitespace !== undefined) {
			this.pushLiteral(whitespace);
			this.pos += whitespace.length;
			return;
		}

		const alternation = ALTERNATION.exec(rest)?.[0];
		if (alternation !== undefined) {
			this.nodes.push({ type: 'alternation', options: alternation.split('/') });
			this.pos += alternation.length;
			return;
		}

		// Anything reaching here starts with a character LITERAL accepts
		const literal = LITERAL.exec(rest)?.[0] ?? rest.charAt(0);
		this.pushLiteral(literal);
		this.pos += literal.length;
	}

	/** Append literal text, merging it into a preceding literal node */
	private pushLiteral(text: string): void {
		const last = this.nodes[this.nodes.length - 1];
		if (last?.type === 'literal') {
			this.nodes[this.nodes.length - 1] = { type: 'literal', text: last.text + text };
		} else {
			this.nodes.push({ type: 'literal', text });
		}
	}

	private fail(code: ExpressionCompileError['code'], fragment: string, parameterType?: string): never {
		throw new ExpressionCompileError({
			code,
			pattern: this.pattern,
			index: this.pos,
			fragment,
			parameterType,
		});
	}
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Compile a pattern into an immutable, reusable expression.
 *
 * ```ts
 * const expr = compileExpression('I have {int} cucumber(s)');
 * matchExpression('I have 5 cucumbers', expr); // [5]
 * ```
 *
 * @throws ExpressionCompileError for an unknown parameter type or malformed syntax
 */
export function compileExpression(pattern: string): CompiledExpression {
	const nodes = new ExpressionTokenizer(pattern).tokenize().map((node) => Object.freeze(node));
	return Object.freeze({ source: pattern, nodes: Object.freeze(nodes) });
}

/**
 * Like {@link compileExpression}, but returns compile errors instead of throwing them.
 */
export function tryCompileExpression(pattern: string): CompileResult {
	try {
		return { ok: true, expression: compileExpression(pattern) };
	} catch (error) {
		if (error instanceof ExpressionCompileError) {
			return { ok: false, error };
		}
		throw error;
	}
}
