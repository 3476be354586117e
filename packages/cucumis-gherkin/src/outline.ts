// ============================================================================
// Scenario Outline expansion - one concrete Scenario per Examples row.
//
// Placeholders (`<column>`) are substituted in step text, doc strings and
// data-table cells. Each expanded scenario carries the outline's tags plus the
// tags of the Examples block its row came from, and nothing else.
// ============================================================================

import { OutlineWithoutExamplesError } from './errors.js';
import {
	type Examples,
	type FeatureChild,
	type Scenario,
	type ScenarioOutline,
	type Step,
	isScenarioOutline,
} from './types.js';

/** Where an expanded scenario's values came from */
export interface ExampleBinding {
	/** Name of the Examples block, empty when unnamed */
	examplesName: string;
	/** 1-based row number within the Examples block */
	row: number;
	/** Column name → cell value */
	values: Readonly<Record<string, string>>;
}

export interface ExpandedScenario extends Scenario {
	/** Null for scenarios that were not produced from an outline */
	example: ExampleBinding | null;
}

const PLACEHOLDER = /<([^<>]+)>/g;

/**
 * Replace `<name>` tokens with the matching value. Unknown placeholders are
 * left as written; substituted values are not scanned again.
 */
export function substitutePlaceholders(text: string, values: Readonly<Record<string, string>>): string {
	return text.replace(PLACEHOLDER, (token, name: string) =>
		Object.hasOwn(values, name) ? (values[name] ?? token) : token,
	);
}

function substituteStep(step: Step, values: Readonly<Record<string, string>>): Step {
	return {
		...step,
		text: substitutePlaceholders(step.text, values),
		docstring: step.docstring === null ? null : substitutePlaceholders(step.docstring, values),
		datatable:
			step.datatable === null
				? null
				: step.datatable.map((row) => row.map((cell) => substitutePlaceholders(cell, values))),
	};
}

function mergeTags(...groups: ReadonlyArray<ReadonlyArray<string>>): string[] {
	const merged: string[] = [];
	for (const group of groups) {
		for (const tag of group) {
			if (!merged.includes(tag)) merged.push(tag);
		}
	}
	return merged;
}

/** Own properties for every column, `__proto__` included */
function rowValues(examples: Examples, row: ReadonlyArray<string>): Record<string, string> {
	return Object.fromEntries(examples.tableHeader.map((column, index) => [column, row[index] ?? '']));
}

function expandedName(outlineName: string, examplesName: string, row: number): string {
	return examplesName === ''
		? `${outlineName} (row ${row})`
		: `${outlineName} (${examplesName}: row ${row})`;
}

/**
 * Expand a Scenario Outline into one scenario per Examples body row, in block
 * order and then row order.
 *
 * @throws OutlineWithoutExamplesError when the outline has no Examples block
 */
export function expandOutline(outline: ScenarioOutline): ExpandedScenario[] {
	if (outline.examples.length === 0) {
		throw new OutlineWithoutExamplesError({
			outlineName: outline.name,
			line: outline.line + 1,
			column: 1,
			rest: '',
		});
	}

	return outline.examples.flatMap((examples) =>
		examples.tableBody.map((row, index): ExpandedScenario => {
			const values = rowValues(examples, row);
			return {
				type: 'scenario',
				name: expandedName(outline.name, examples.name, index + 1),
				steps: outline.steps.map((step) => substituteStep(step, values)),
				tags: mergeTags(outline.tags, examples.tags),
				line: outline.line,
				example: { examplesName: examples.name, row: index + 1, values },
			};
		}),
	);
}

/**
 * Flatten a Feature's children into concrete scenarios, expanding every
 * outline in place.
 */
export function expandScenarios(children: ReadonlyArray<FeatureChild>): ExpandedScenario[] {
	return children.flatMap((child) =>
		isScenarioOutline(child) ? expandOutline(child) : [{ ...child, example: null }],
	);
}
