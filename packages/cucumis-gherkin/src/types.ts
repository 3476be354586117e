// ============================================================================
// Gherkin Document Model - plain data produced by the parser.
//
// Every node is built bottom-up and never mutated after the parser returns.
// Line numbers are 0-based and point at the keyword line of the node.
// ============================================================================

export type StepKeyword = 'Given' | 'When' | 'Then' | 'And' | 'But' | '*';

export interface Step {
	keyword: StepKeyword;
	/** Text after the keyword, trimmed */
	text: string;
	/** Doc string content with common indentation stripped */
	docstring: string | null;
	/** Data table rows, each an ordered list of trimmed cells */
	datatable: ReadonlyArray<ReadonlyArray<string>> | null;
	line: number;
}

export interface Background {
	steps: ReadonlyArray<Step>;
	line: number;
}

export interface Scenario {
	type: 'scenario';
	name: string;
	steps: ReadonlyArray<Step>;
	/** Tag names without the leading `@` */
	tags: ReadonlyArray<string>;
	line: number;
}

export interface Examples {
	/** Examples name, empty when the keyword line has no trailing text */
	name: string;
	tags: ReadonlyArray<string>;
	tableHeader: ReadonlyArray<string>;
	/** Body rows, each as wide as the header */
	tableBody: ReadonlyArray<ReadonlyArray<string>>;
	line: number;
}

export interface ScenarioOutline {
	type: 'outline';
	name: string;
	/** Steps whose text, doc string and table cells may hold `<placeholder>` tokens */
	steps: ReadonlyArray<Step>;
	tags: ReadonlyArray<string>;
	examples: ReadonlyArray<Examples>;
	line: number;
}

export type FeatureChild = Scenario | ScenarioOutline;

export interface Feature {
	name: string;
	/** Reserved; the parser skips description lines */
	description: string;
	background: Background | null;
	scenarios: ReadonlyArray<FeatureChild>;
	tags: ReadonlyArray<string>;
	line: number;
}

export function isScenarioOutline(child: FeatureChild): child is ScenarioOutline {
	return child.type === 'outline';
}
