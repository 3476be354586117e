// ============================================================================
// Expression compile errors.
// ============================================================================

import type { CompiledExpression } from './types.js';

export type CompileErrorCode =
	| 'unknown-parameter-type'
	| 'malformed-parameter'
	| 'empty-optional'
	| 'unterminated-optional'
	| 'invalid-escape';

export interface CompileErrorOptions {
	code: CompileErrorCode;
	pattern: string;
	/** 0-based offset of the offending construct in the pattern */
	index: number;
	/** The offending text */
	fragment: string;
	/** Set for `unknown-parameter-type` */
	parameterType?: string;
}

const DESCRIPTIONS: Record<CompileErrorCode, (fragment: string) => string> = {
	'unknown-parameter-type': (fragment) => `Unknown parameter type ${fragment}`,
	'malformed-parameter': (fragment) => `Malformed parameter ${fragment}`,
	'empty-optional': () => 'Optional text () must not be empty',
	'unterminated-optional': (fragment) => `Optional text ${fragment} is missing its closing )`,
	'invalid-escape': (fragment) => `Invalid escape ${fragment}`,
};

/**
 * Raised synchronously by `compileExpression`. A pattern that raises this is
 * never partially usable.
 */
export class ExpressionCompileError extends Error {
	override readonly name = 'ExpressionCompileError';

	readonly code: CompileErrorCode;
	readonly pattern: string;
	readonly index: number;
	readonly fragment: string;
	readonly parameterType: string | null;

	constructor(options: CompileErrorOptions) {
		super(
			`${DESCRIPTIONS[options.code](options.fragment)} at index ${options.index} in expression "${options.pattern}"`,
		);
		this.code = options.code;
		this.pattern = options.pattern;
		this.index = options.index;
		this.fragment = options.fragment;
		this.parameterType = options.parameterType ?? null;
	}
}

export type CompileResult =
	| { ok: true; expression: CompiledExpression }
	| { ok: false; error: ExpressionCompileError };
