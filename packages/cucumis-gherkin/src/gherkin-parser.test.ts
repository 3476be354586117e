import { describe, expect, it } from 'vitest';
import { GherkinParseError, OutlineWithoutExamplesError } from './errors.js';
import { joinDocString, parseFeature, tryParseFeature } from './gherkin-parser.js';

function lines(...text: string[]): string {
	return text.join('\n');
}

function parseError(text: string): GherkinParseError {
	const result = tryParseFeature(text);
	if (result.ok) {
		throw new Error('expected a parse error');
	}
	return result.error;
}

describe('parseFeature', () => {
	it('should parse a feature with background and scenario', () => {
		const feature = parseFeature(
			lines(
				'@checkout',
				'Feature: Shopping cart',
				'  Some description',
				'',
				'  Background:',
				'    Given an empty cart',
				'',
				'  @fast @fast',
				'  Scenario: Adding an item',
				'    When I add 1 cucumber',
				'    Then the cart holds 1 item',
			),
		);

		expect(feature).toEqual({
			name: 'Shopping cart',
			description: '',
			tags: ['checkout'],
			line: 1,
			background: {
				line: 4,
				steps: [{ keyword: 'Given', text: 'an empty cart', docstring: null, datatable: null, line: 5 }],
			},
			scenarios: [
				{
					type: 'scenario',
					name: 'Adding an item',
					tags: ['fast'],
					line: 8,
					steps: [
						{ keyword: 'When', text: 'I add 1 cucumber', docstring: null, datatable: null, line: 9 },
						{ keyword: 'Then', text: 'the cart holds 1 item', docstring: null, datatable: null, line: 10 },
					],
				},
			],
		});
	});

	it('should accumulate consecutive tag lines', () => {
		const feature = parseFeature(
			lines('Feature: Tags', '  @a', '  # a comment', '  @b @c # trailing', '  Scenario: s', '    Given x'),
		);
		expect(feature.scenarios[0]?.tags).toEqual(['a', 'b', 'c']);
	});

	it('should accept the star and conjunction step keywords', () => {
		const feature = parseFeature(
			lines('Feature: Keywords', '  Scenario: s', '    * a thing', '    And another', '    But not this'),
		);
		expect(feature.scenarios[0]?.steps.map((step) => step.keyword)).toEqual(['*', 'And', 'But']);
	});

	it('should attach a doc string with common indentation stripped', () => {
		const feature = parseFeature(
			lines(
				'Feature: Docs',
				'  Scenario: Doc string',
				'    Given the text',
				'      """',
				'        Hello',
				'          World',
				'      """',
				'    Then done',
			),
		);
		const steps = feature.scenarios[0]?.steps ?? [];
		expect(steps[0]?.docstring).toBe('Hello\n  World');
		expect(steps[0]?.datatable).toBeNull();
		expect(steps[1]?.text).toBe('done');
	});

	it('should attach a data table with trimmed cells', () => {
		const feature = parseFeature(
			lines(
				'Feature: Tables',
				'  Scenario: Data table',
				'    Given the users',
				'      | name  | role  |',
				'      # between rows',
				'      | alice | admin |',
			),
		);
		expect(feature.scenarios[0]?.steps[0]?.datatable).toEqual([
			['name', 'role'],
			['alice', 'admin'],
		]);
	});

	it('should skip blank and comment lines between a step and its attachment', () => {
		const feature = parseFeature(
			lines('Feature: Gaps', '  Scenario: s', '    Given x', '', '    # the table', '      | a |', '    Then y'),
		);
		const steps = feature.scenarios[0]?.steps ?? [];
		expect(steps[0]?.datatable).toEqual([['a']]);
		expect(steps[1]).toEqual({ keyword: 'Then', text: 'y', docstring: null, datatable: null, line: 6 });
	});

	it('should parse CRLF input into the same tree as LF input', () => {
		const source = [
			'@crlf',
			'Feature: Line endings',
			'  Scenario: Windows',
			'    Given the text',
			'      """',
			'      first',
			'        second',
			'      """',
			'    And the table',
			'      | a | b |',
			'      | 1 | 2 |',
		];

		const crlf = parseFeature(source.join('\r\n'));

		expect(crlf).toEqual(parseFeature(source.join('\n')));
		expect(crlf.scenarios[0]?.steps[0]?.docstring).toBe('first\n  second');
		expect(crlf.scenarios[0]?.steps[1]?.datatable).toEqual([
			['a', 'b'],
			['1', '2'],
		]);
	});

	it('should parse a scenario outline with tagged examples blocks', () => {
		const feature = parseFeature(
			lines(
				'Feature: Outlines',
				'  @outline-tag',
				'  Scenario Outline: Eating',
				'    Given there are <start> cucumbers',
				'',
				'    @smoke',
				'    Examples: Few',
				'      | start |',
				'      | 12    |',
				'',
				'    Scenarios:',
				'      | start |',
				'      | 20    |',
				'      | 7     |',
			),
		);

		const outline = feature.scenarios[0];
		expect(outline?.type).toBe('outline');
		if (outline?.type !== 'outline') return;

		expect(outline.tags).toEqual(['outline-tag']);
		expect(outline.examples).toEqual([
			{ name: 'Few', tags: ['smoke'], tableHeader: ['start'], tableBody: [['12']], line: 6 },
			{ name: '', tags: [], tableHeader: ['start'], tableBody: [['20'], ['7']], line: 10 },
		]);
	});

	it('should accept an Examples block with a header and no body rows', () => {
		const feature = parseFeature(
			lines('Feature: F', '  Scenario Outline: o', '    Given <x>', '    Examples:', '      | x |'),
		);
		const outline = feature.scenarios[0];
		expect(outline?.type === 'outline' ? outline.examples[0]?.tableBody : null).toEqual([]);
	});

	it('should accept Scenario Template as an outline keyword', () => {
		const feature = parseFeature(
			lines('Feature: F', '  Scenario Template: t', '    Given <x>', '    Examples:', '      | x |', '      | 1 |'),
		);
		expect(feature.scenarios[0]?.type).toBe('outline');
	});

	it('should not treat a keyword without a following space as a step', () => {
		const error = parseError(lines('Feature: F', '  Scenario: s', '    Givenx'));
		expect(error.code).toBe('unexpected-input');
		expect(error.line).toBe(3);
	});
});

describe('joinDocString', () => {
	it('should strip a two-space common indent', () => {
		expect(joinDocString(['  Hello', '  World'])).toBe('Hello\nWorld');
	});

	it('should ignore blank lines when computing the indent', () => {
		expect(joinDocString(['    x', '', '  ', '    y'])).toBe('x\n\n\ny');
	});

	it('should trim trailing whitespace of the joined result', () => {
		expect(joinDocString(['a  ', '', ''])).toBe('a');
	});
});

describe('parse errors', () => {
	it('should report a missing Feature line', () => {
		const error = parseError('Scenario: x');
		expect(error.code).toBe('missing-feature');
		expect(error.line).toBe(1);
		expect(error.column).toBe(1);
		expect(error.message).toBe(
			'Gherkin parse error at line 1, column 1:\n  Expected Feature:\nNear: "Scenario: x..."',
		);
	});

	it('should report end of input for an empty document', () => {
		const error = parseError('');
		expect(error.code).toBe('missing-feature');
		expect(error.rest).toBe('');
		expect(error.message).toBe('Gherkin parse error at line 1, column 1:\n  Expected Feature:');
	});

	it('should require a feature name', () => {
		expect(parseError('Feature:').code).toBe('missing-feature-name');
	});

	it('should locate an invalid tag at its column', () => {
		const error = parseError(lines('Feature: F', '  @ok @bad!', '  Scenario: s'));
		expect(error.code).toBe('invalid-tag');
		expect(error.line).toBe(2);
		expect(error.column).toBe(7);
		expect(error.rest).toBe('@bad!\n  Scenario: s');
	});

	it('should reject table rows of differing widths', () => {
		const error = parseError(
			lines('Feature: F', '  Scenario: s', '    Given t', '      | a | b |', '      | c |'),
		);
		expect(error.code).toBe('malformed-table');
		expect(error.expected).toBe('table row with 2 cells, found 1');
		expect(error.line).toBe(5);
		expect(error.column).toBe(7);
	});

	it('should reject a table row with zero cells', () => {
		const error = parseError(lines('Feature: F', '  Scenario: s', '    Given t', '      |'));
		expect(error.code).toBe('malformed-table');
		expect(error.line).toBe(4);
	});

	it('should report an unterminated doc string at its opening line', () => {
		const error = parseError(lines('Feature: F', '  Scenario: s', '    Given t', '      """', '      text'));
		expect(error.code).toBe('unterminated-docstring');
		expect(error.line).toBe(4);
		expect(error.column).toBe(7);
	});

	it('should reject a second attachment on one step', () => {
		const error = parseError(
			lines('Feature: F', '  Scenario: s', '    Given t', '      | a |', '      """', '      x', '      """'),
		);
		expect(error.code).toBe('conflicting-attachment');
		expect(error.line).toBe(5);
	});

	it('should raise a distinct error for an outline without examples', () => {
		const error = parseError(lines('Feature: F', '  Scenario Outline: o', '    Given <x>', '  Scenario: s'));
		expect(error).toBeInstanceOf(OutlineWithoutExamplesError);
		expect(error.code).toBe('outline-without-examples');
		expect(error.line).toBe(2);
		expect(error.column).toBe(3);
		if (error instanceof OutlineWithoutExamplesError) {
			expect(error.outlineName).toBe('o');
		}
	});

	it('should require a header row in every Examples block', () => {
		const error = parseError(
			lines('Feature: F', '  Scenario Outline: o', '    Given <x>', '  Examples:', '  Scenario: s'),
		);
		expect(error.code).toBe('empty-examples');
		expect(error.expected).toBe('table header row for Examples:');
		expect(error.line).toBe(5);
	});

	it('should explain Examples found outside an outline', () => {
		const error = parseError(lines('Feature: F', '  Scenario: s', '    Given x', '  Examples:', '    | a |'));
		expect(error.code).toBe('unexpected-input');
		expect(error.expected).toBe('Scenario Outline: before Examples:');
		expect(error.line).toBe(4);
		expect(error.column).toBe(3);
	});

	it('should truncate the snippet to fifty characters', () => {
		const error = parseError(lines('Feature: F', '  Scenario: s', `    ${'x'.repeat(80)}`));
		expect(error.rest).toBe('x'.repeat(50));
	});

	it('should return ok for a valid feature from tryParseFeature', () => {
		expect(tryParseFeature('Feature: ok').ok).toBe(true);
	});
});
