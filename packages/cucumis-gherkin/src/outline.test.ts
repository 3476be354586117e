import { describe, expect, it } from 'vitest';
import { OutlineWithoutExamplesError } from './errors.js';
import { parseFeature } from './gherkin-parser.js';
import { expandOutline, expandScenarios, substitutePlaceholders } from './outline.js';
import type { ScenarioOutline } from './types.js';

const OUTLINE_FEATURE = [
	'Feature: Outlines',
	'  @outline-tag',
	'  Scenario Outline: Eating',
	'    Given there are <start> cucumbers',
	'    When I eat <eat> cucumbers',
	'',
	'    @smoke',
	'    Examples: Few',
	'      | start | eat |',
	'      | 12    | 5   |',
	'',
	'    @regression',
	'    Examples:',
	'      | start | eat |',
	'      | 20    | 5   |',
	'      | 7     | 2   |',
	'',
	'  Scenario: Plain',
	'    Given nothing',
].join('\n');

describe('expandScenarios', () => {
	const scenarios = expandScenarios(parseFeature(OUTLINE_FEATURE).scenarios);

	it('should produce one scenario per examples row, in order', () => {
		expect(scenarios.map((scenario) => scenario.name)).toEqual([
			'Eating (Few: row 1)',
			'Eating (row 1)',
			'Eating (row 2)',
			'Plain',
		]);
	});

	it('should substitute placeholders in step text', () => {
		expect(scenarios[2]?.steps.map((step) => step.text)).toEqual([
			'there are 7 cucumbers',
			'I eat 2 cucumbers',
		]);
	});

	it('should combine outline tags with the owning examples block tags only', () => {
		expect(scenarios[0]?.tags).toEqual(['outline-tag', 'smoke']);
		expect(scenarios[1]?.tags).toEqual(['outline-tag', 'regression']);
		expect(scenarios[3]?.tags).toEqual([]);
	});

	it('should record the example binding', () => {
		expect(scenarios[0]?.example).toEqual({
			examplesName: 'Few',
			row: 1,
			values: { start: '12', eat: '5' },
		});
		expect(scenarios[3]?.example).toBeNull();
	});

	it('should keep the outline line number', () => {
		expect(scenarios[1]?.line).toBe(2);
	});
});

describe('expandOutline', () => {
	const outline: ScenarioOutline = {
		type: 'outline',
		name: 'Attachments',
		tags: ['dup'],
		line: 4,
		steps: [
			{ keyword: 'Given', text: 'a user', docstring: 'Hello <who>', datatable: null, line: 5 },
			{ keyword: 'Then', text: 'the table', docstring: null, datatable: [['<who>', 'fixed']], line: 6 },
		],
		examples: [{ name: '', tags: ['dup', 'extra'], tableHeader: ['who'], tableBody: [['alice']], line: 8 }],
	};

	it('should substitute placeholders in doc strings and data tables', () => {
		const [scenario] = expandOutline(outline);
		expect(scenario?.steps[0]?.docstring).toBe('Hello alice');
		expect(scenario?.steps[1]?.datatable).toEqual([['alice', 'fixed']]);
	});

	it('should de-duplicate merged tags', () => {
		expect(expandOutline(outline)[0]?.tags).toEqual(['dup', 'extra']);
	});

	it('should substitute a column whose header is an Object.prototype key', () => {
		const [scenario] = expandOutline({
			...outline,
			steps: [{ keyword: 'Given', text: '<__proto__> and <constructor>', docstring: null, datatable: null, line: 5 }],
			examples: [{ name: '', tags: [], tableHeader: ['__proto__', 'constructor'], tableBody: [['p', 'c']], line: 8 }],
		});

		expect(scenario?.steps[0]?.text).toBe('p and c');
		expect(Object.keys(scenario?.example?.values ?? {})).toEqual(['__proto__', 'constructor']);
	});

	it('should throw for an outline without examples', () => {
		expect(() => expandOutline({ ...outline, examples: [] })).toThrow(OutlineWithoutExamplesError);
	});
});

describe('substitutePlaceholders', () => {
	it('should keep unknown placeholders and not rescan substituted values', () => {
		expect(substitutePlaceholders('<a> and <b> and <missing>', { a: '<b>', b: 'x' })).toBe(
			'<b> and x and <missing>',
		);
	});

	it('should not read inherited properties', () => {
		expect(substitutePlaceholders('<toString>', {})).toBe('<toString>');
	});
});
