import type { Step } from 'cucumis-gherkin';
import { describe, expect, it } from 'vitest';
import { HISTORY_LIMIT, StepError, type StepHistoryEntry, formatHistory, suggestPattern } from './step-error.js';

function step(keyword: Step['keyword'], text: string, line = 0): Step {
	return { keyword, text, docstring: null, datatable: null, line };
}

describe('suggestPattern', () => {
	it('should turn quoted strings and integers into parameters', () => {
		expect(suggestPattern('I have 3 "ripe" cucumbers')).toBe('I have {int} {string} cucumbers');
	});

	it('should turn decimals into {float}', () => {
		expect(suggestPattern('it costs 1.5 euros')).toBe('it costs {float} euros');
	});

	it('should escape expression syntax and then escape for a string literal', () => {
		expect(suggestPattern('a/b (x) {y}')).toBe(String.raw`a\\/b \\(x\\) \\{y\\}`);
	});

	it('should escape single quotes', () => {
		expect(suggestPattern("it's 5")).toBe(String.raw`it\'s {int}`);
	});
});

describe('StepError.missingStepDefinition', () => {
	const missing = step('Given', 'I have 3 "ripe" cucumbers', 4);

	it('should describe the step, where it is and how to define it', () => {
		const error = StepError.missingStepDefinition({
			step: missing,
			featureFile: 'features/cart.feature',
			scenarioName: 'Buying',
		});

		expect(error.message).toBe(
			[
				'No matching step definition found for step:',
				'',
				'  Given I have 3 "ripe" cucumbers',
				'',
				'in scenario "Buying" (features/cart.feature:5)',
				'',
				'Please define this step with:',
				'',
				"Step('I have {int} {string} cucumbers', (ctx) => {",
				'  // Your step implementation here',
				'});',
			].join('\n'),
		);
		expect(error.reason).toBe('missing-step-definition');
		expect(error.pattern).toBeNull();
		expect(error.name).toBe('StepError');
	});

	it('should list suggestions when there are any', () => {
		const error = StepError.missingStepDefinition({
			step: missing,
			featureFile: 'features/cart.feature',
			scenarioName: 'Buying',
			suggestions: ['I have {int} cucumbers'],
		});

		expect(error.message.endsWith('});\n\nDid you mean:\n  - I have {int} cucumbers')).toBe(true);
	});
});

describe('StepError.failedStep', () => {
	const failing = step('Then', 'I have 3 cucumbers', 6);
	const history: StepHistoryEntry[] = [
		{ status: 'passed', step: step('Given', 'an empty basket', 2) },
		{ status: 'failed', step: failing },
	];

	it('should include the pattern, the cause and the history', () => {
		const cause = new Error('expected 3 to be 4');
		const error = StepError.failedStep({
			step: failing,
			featureFile: 'features/cart.feature',
			scenarioName: 'Buying',
			pattern: 'I have {int} cucumbers',
			cause,
			history,
		});

		expect(error.message).toBe(
			[
				'Step failed:',
				'',
				'  Then I have 3 cucumbers',
				'',
				'in scenario "Buying" (features/cart.feature:7)',
				'matching pattern: "I have {int} cucumbers"',
				'',
				'expected 3 to be 4',
				'',
				'Step execution history:',
				'  [passed] Given an empty basket',
				'  [failed] Then I have 3 cucumbers',
			].join('\n'),
		);
		expect(error.cause).toBe(cause);
		expect(error.reason).toBe('failed-step');
		expect(error.pattern).toBe('I have {int} cucumbers');
	});

	it('should describe non-error causes', () => {
		const fromString = StepError.failedStep({
			step: failing,
			featureFile: 'f.feature',
			scenarioName: 's',
			pattern: 'p',
			cause: 'plain message',
		});
		const fromObject = StepError.failedStep({
			step: failing,
			featureFile: 'f.feature',
			scenarioName: 's',
			pattern: 'p',
			cause: { code: 1 },
		});

		expect(fromString.message.split('\n').at(-1)).toBe('plain message');
		expect(fromObject.message.split('\n').at(-1)).toBe('{ code: 1 }');
	});

	it('should keep only the most recent history entries', () => {
		const long: StepHistoryEntry[] = Array.from({ length: 12 }, (_, i) => ({
			status: 'passed' as const,
			step: step('And', `step ${i}`, i),
		}));

		const error = StepError.failedStep({
			step: failing,
			featureFile: 'f.feature',
			scenarioName: 's',
			pattern: 'p',
			cause: 'x',
			history: long,
		});

		expect(error.history).toHaveLength(HISTORY_LIMIT);
		expect(error.history[0]?.step.text).toBe('step 2');
	});
});

describe('formatHistory', () => {
	it('should render one line per entry', () => {
		expect(formatHistory([{ status: 'passed', step: step('*', 'a thing') }])).toBe(
			'Step execution history:\n  [passed] * a thing',
		);
	});
});
