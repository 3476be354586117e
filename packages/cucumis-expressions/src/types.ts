// ============================================================================
// Compiled expression model.
// ============================================================================

/** The closed set of parameter types an expression may reference */
export type ParameterTypeName = 'string' | 'int' | 'float' | 'word' | 'atom';

/** A value produced by a parameter sub-parser. `atom` yields an interned symbol. */
export type ParameterValue = string | number | bigint | symbol;

/** One captured argument; `null` when an optional parameter matched nothing */
export type MatchArgument = ParameterValue | null;

export type ExpressionNode =
	| { readonly type: 'literal'; readonly text: string }
	| { readonly type: 'parameter'; readonly parameterType: ParameterTypeName; readonly optional: boolean }
	| { readonly type: 'optional'; readonly text: string }
	| { readonly type: 'alternation'; readonly options: ReadonlyArray<string> };

/**
 * An immutable compiled pattern. Compile once, match many times.
 */
export interface CompiledExpression {
	readonly source: string;
	readonly nodes: ReadonlyArray<ExpressionNode>;
}
