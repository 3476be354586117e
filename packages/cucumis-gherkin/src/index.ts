// ============================================================================
// Cucumis Gherkin - feature file parser, document model, outline expansion
// and tag expressions.
// ============================================================================

// ---------------------------------------------------------------------------
// Document Model
// ---------------------------------------------------------------------------
export {
	isScenarioOutline,
	type Feature,
	type FeatureChild,
	type Background,
	type Scenario,
	type ScenarioOutline,
	type Examples,
	type Step,
	type StepKeyword,
} from './types.js';

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------
export { parseFeature, tryParseFeature, joinDocString, type ParseResult } from './gherkin-parser.js';

export {
	GherkinParseError,
	OutlineWithoutExamplesError,
	TagExpressionError,
	SNIPPET_LENGTH,
	type ParseErrorCode,
	type ParseErrorOptions,
} from './errors.js';

// ---------------------------------------------------------------------------
// Outline expansion
// ---------------------------------------------------------------------------
export {
	expandOutline,
	expandScenarios,
	substitutePlaceholders,
	type ExpandedScenario,
	type ExampleBinding,
} from './outline.js';

// ---------------------------------------------------------------------------
// Tags
// ---------------------------------------------------------------------------
export {
	parseTagExpression,
	evaluateTagExpression,
	tagsMatch,
	TAG_PATTERN,
	type TagExpression,
} from './tags.js';
