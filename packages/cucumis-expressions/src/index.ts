// ============================================================================
// Cucumis Expressions - compile step patterns and match step text against them.
// ============================================================================

export { compileExpression, tryCompileExpression } from './compiler.js';
export { matchExpression, CucumberExpression } from './matcher.js';
export { PARAMETER_TYPES, isParameterTypeName, type SubParser, type SubParseResult } from './parameter-types.js';

export {
	ExpressionCompileError,
	type CompileErrorCode,
	type CompileErrorOptions,
	type CompileResult,
} from './errors.js';

export type {
	CompiledExpression,
	ExpressionNode,
	MatchArgument,
	ParameterTypeName,
	ParameterValue,
} from './types.js';
