// ============================================================================
// Gherkin Parser - hand-written recursive descent over the lines of a
// .feature file.
//
// Layered bottom-up; each layer only calls the ones above it:
//   1. Primitives   line cursor, blank and comment skipping
//   2. Keywords     Feature:, Background:, Scenario:, Scenario Outline:, ...
//   3. Elements     tag lines, data tables, doc strings
//   4. Steps        keyword + text + optional attachment
//   5. Sections     Background, Scenario, Scenario Outline, Examples
//   6. Document     the whole Feature
//
// The parser either returns a complete Feature or throws the first
// GherkinParseError it meets. It never returns a partial tree.
// ============================================================================

import { GherkinParseError, OutlineWithoutExamplesError, type ParseErrorCode } from './errors.js';
import { TAG_PATTERN } from './tags.js';
import type {
	Background,
	Examples,
	Feature,
	FeatureChild,
	Scenario,
	ScenarioOutline,
	Step,
	StepKeyword,
} from './types.js';

// ---------------------------------------------------------------------------
// Level 1: Primitives
// ---------------------------------------------------------------------------

interface ParserState {
	lines: string[];
	pos: number;
}

function atEnd(state: ParserState): boolean {
	return state.pos >= state.lines.length;
}

function currentLine(state: ParserState): string {
	return state.lines[state.pos] ?? '';
}

function isComment(trimmed: string): boolean {
	return trimmed.startsWith('#');
}

function leadingWhitespace(line: string): number {
	let count = 0;
	while (count < line.length && (line[count] === ' ' || line[count] === '\t')) {
		count++;
	}
	return count;
}

function skipBlankAndComments(state: ParserState): void {
	while (!atEnd(state)) {
		const trimmed = currentLine(state).trim();
		if (trimmed !== '' && !isComment(trimmed)) break;
		state.pos++;
	}
}

/**
 * Throw a located parse error. `lineIndex` is 0-based and may point one past
 * the last line when the input ended too early.
 */
function fail(
	state: ParserState,
	code: ParseErrorCode,
	expected: string,
	lineIndex = state.pos,
	columnIndex?: number,
): never {
	const { line, column, rest } = locate(state, lineIndex, columnIndex);
	throw new GherkinParseError({ code, expected, line, column, rest });
}

function locate(
	state: ParserState,
	lineIndex: number,
	columnIndex?: number,
): { line: number; column: number; rest: string } {
	if (lineIndex >= state.lines.length) {
		const last = Math.max(state.lines.length - 1, 0);
		return { line: last + 1, column: (state.lines[last] ?? '').length + 1, rest: '' };
	}

	const text = state.lines[lineIndex] ?? '';
	const col = columnIndex ?? leadingWhitespace(text);
	const rest = [text.slice(col), ...state.lines.slice(lineIndex + 1)].join('\n');
	return { line: lineIndex + 1, column: col + 1, rest };
}

// ---------------------------------------------------------------------------
// Level 2: Keywords
// ---------------------------------------------------------------------------

const FEATURE_KEYWORDS = ['Feature'];
const BACKGROUND_KEYWORDS = ['Background'];
const SCENARIO_KEYWORDS = ['Scenario'];
const SCENARIO_OUTLINE_KEYWORDS = ['Scenario Outline', 'Scenario Template'];
const EXAMPLES_KEYWORDS = ['Examples', 'Scenarios'];
const STEP_KEYWORDS: readonly StepKeyword[] = ['Given', 'When', 'Then', 'And', 'But', '*'];

const STEP_KEYWORD_LABEL = 'step keyword (Given, When, Then, And, But, or *)';

interface KeywordMatch {
	keyword: string;
	/** Trailing text after `Keyword:`, trimmed */
	rest: string;
}

function matchKeyword(trimmed: string, keywords: readonly string[]): KeywordMatch | null {
	for (const keyword of keywords) {
		if (trimmed.startsWith(`${keyword}:`)) {
			return { keyword, rest: trimmed.slice(keyword.length + 1).trim() };
		}
	}
	return null;
}

function matchStepKeyword(trimmed: string): { keyword: StepKeyword; text: string } | null {
	for (const keyword of STEP_KEYWORDS) {
		if (!trimmed.startsWith(keyword)) continue;
		const next = trimmed[keyword.length];
		if (next === ' ' || next === '\t') {
			return { keyword, text: trimmed.slice(keyword.length).trim() };
		}
	}
	return null;
}

function isTagLine(trimmed: string): boolean {
	return trimmed.startsWith('@');
}

function isScenarioStart(trimmed: string): boolean {
	return (
		matchKeyword(trimmed, SCENARIO_OUTLINE_KEYWORDS) !== null ||
		matchKeyword(trimmed, SCENARIO_KEYWORDS) !== null
	);
}

// ---------------------------------------------------------------------------
// Level 3: Elements
// ---------------------------------------------------------------------------

/**
 * Consume consecutive tag lines (blank and comment lines between them are
 * allowed) and return the accumulated tag names, de-duplicated, in order.
 */
function parseTagSet(state: ParserState): string[] {
	const tags: string[] = [];

	for (;;) {
		skipBlankAndComments(state);
		if (atEnd(state)) break;

		const line = currentLine(state);
		const trimmed = line.trim();
		if (!isTagLine(trimmed)) break;

		let searchFrom = 0;
		for (const token of trimmed.split(/\s+/)) {
			if (isComment(token)) break;
			const column = line.indexOf(token, searchFrom);
			searchFrom = column + token.length;

			const name = TAG_PATTERN.exec(token)?.[1];
			if (!name) {
				fail(state, 'invalid-tag', 'tag name (@ followed by letters, digits, _ or -)', state.pos, column);
			}
			if (!tags.includes(name)) {
				tags.push(name);
			}
		}

		state.pos++;
	}

	return tags;
}

/**
 * Look past any tag lines at the current position and return the trimmed
 * text of the first other line, without consuming anything.
 */
function peekPastTags(state: ParserState): string | null {
	for (let i = state.pos; i < state.lines.length; i++) {
		const trimmed = (state.lines[i] ?? '').trim();
		if (trimmed === '' || isComment(trimmed) || isTagLine(trimmed)) continue;
		return trimmed;
	}
	return null;
}

function parseTableRow(state: ParserState): string[] {
	const trimmed = currentLine(state).trim();
	const cells = trimmed
		.split('|')
		.slice(1)
		.map((cell) => cell.trim());

	// A trailing `|` leaves one empty cell after it
	if (trimmed.endsWith('|')) {
		cells.pop();
	}

	if (cells.length === 0) {
		fail(state, 'malformed-table', 'table row with at least one cell');
	}

	state.pos++;
	return cells;
}

/**
 * Consume a run of table rows. Comment lines between rows are skipped; a
 * blank line or any other line ends the table.
 */
function parseTable(state: ParserState): string[][] {
	const rows: string[][] = [];

	while (!atEnd(state)) {
		const trimmed = currentLine(state).trim();
		if (isComment(trimmed)) {
			state.pos++;
			continue;
		}
		if (!trimmed.startsWith('|')) break;

		const rowIndex = state.pos;
		const row = parseTableRow(state);
		const width = rows[0]?.length;
		if (width !== undefined && row.length !== width) {
			fail(state, 'malformed-table', `table row with ${width} cells, found ${row.length}`, rowIndex);
		}
		rows.push(row);
	}

	return rows;
}

const DOCSTRING_DELIMITER = '"""';

function parseDocString(state: ParserState): string {
	const openLine = state.pos;
	state.pos++;

	const content: string[] = [];
	let closed = false;

	while (!atEnd(state)) {
		const line = currentLine(state);
		state.pos++;
		if (line.trim() === DOCSTRING_DELIMITER) {
			closed = true;
			break;
		}
		content.push(line);
	}

	if (!closed) {
		fail(state, 'unterminated-docstring', `closing ${DOCSTRING_DELIMITER} for doc string`, openLine);
	}

	return joinDocString(content);
}

/**
 * Join doc string lines, stripping the smallest indentation found on any
 * non-blank line so relative indentation survives, then trim the end.
 */
export function joinDocString(lines: readonly string[]): string {
	const indents = lines.filter((line) => line.trim() !== '').map(leadingWhitespace);
	const indent = indents.length > 0 ? Math.min(...indents) : 0;

	return lines
		.map((line) => line.slice(indent))
		.join('\n')
		.trimEnd();
}

// ---------------------------------------------------------------------------
// Level 4: Steps
// ---------------------------------------------------------------------------

type Attachment =
	| { kind: 'docstring'; docstring: string }
	| { kind: 'datatable'; datatable: string[][] }
	| null;

function isAttachmentStart(trimmed: string): boolean {
	return trimmed.startsWith('|') || trimmed === DOCSTRING_DELIMITER;
}

function parseAttachment(state: ParserState): Attachment {
	skipBlankAndComments(state);
	if (atEnd(state)) return null;

	const trimmed = currentLine(state).trim();
	let attachment: Attachment = null;
	if (trimmed.startsWith('|')) {
		attachment = { kind: 'datatable', datatable: parseTable(state) };
	} else if (trimmed === DOCSTRING_DELIMITER) {
		attachment = { kind: 'docstring', docstring: parseDocString(state) };
	}

	if (attachment) {
		skipBlankAndComments(state);
		if (!atEnd(state) && isAttachmentStart(currentLine(state).trim())) {
			fail(state, 'conflicting-attachment', 'a single doc string or data table per step');
		}
	}

	return attachment;
}

/**
 * Parse steps until the first line that is not a step. Blank and comment
 * lines between steps are skipped.
 */
function parseSteps(state: ParserState): Step[] {
	const steps: Step[] = [];

	for (;;) {
		skipBlankAndComments(state);
		if (atEnd(state)) break;

		const match = matchStepKeyword(currentLine(state).trim());
		if (!match) break;

		const line = state.pos;
		state.pos++;

		const attachment = parseAttachment(state);
		steps.push({
			keyword: match.keyword,
			text: match.text,
			docstring: attachment?.kind === 'docstring' ? attachment.docstring : null,
			datatable: attachment?.kind === 'datatable' ? attachment.datatable : null,
			line,
		});
	}

	return steps;
}

// ---------------------------------------------------------------------------
// Level 5: Sections
// ---------------------------------------------------------------------------

function parseBackground(state: ParserState): Background {
	const line = state.pos;
	state.pos++;
	return { steps: parseSteps(state), line };
}

function parseExamples(state: ParserState): Examples {
	const tags = parseTagSet(state);
	skipBlankAndComments(state);

	const match = matchKeyword(currentLine(state).trim(), EXAMPLES_KEYWORDS);
	if (!match) {
		fail(state, 'unexpected-input', 'Examples:');
	}

	const line = state.pos;
	state.pos++;
	skipBlankAndComments(state);

	if (atEnd(state) || !currentLine(state).trim().startsWith('|')) {
		fail(state, 'empty-examples', `table header row for ${match.keyword}:`, atEnd(state) ? line : state.pos);
	}

	const [header = [], ...body] = parseTable(state);
	return { name: match.rest, tags, tableHeader: header, tableBody: body, line };
}

function parseScenario(state: ParserState, tags: string[], name: string): Scenario {
	const line = state.pos;
	state.pos++;
	return { type: 'scenario', name, steps: parseSteps(state), tags, line };
}

function parseScenarioOutline(state: ParserState, tags: string[], name: string): ScenarioOutline {
	const line = state.pos;
	state.pos++;

	const steps = parseSteps(state);
	const examples: Examples[] = [];

	for (;;) {
		skipBlankAndComments(state);
		const next = peekPastTags(state);
		if (next === null || !matchKeyword(next, EXAMPLES_KEYWORDS)) break;
		examples.push(parseExamples(state));
	}

	if (examples.length === 0) {
		const { line: errorLine, column, rest } = locate(state, line);
		throw new OutlineWithoutExamplesError({ outlineName: name, line: errorLine, column, rest });
	}

	return { type: 'outline', name, steps, tags, examples, line };
}

function parseScenarioDefinition(state: ParserState): FeatureChild {
	const tags = parseTagSet(state);
	skipBlankAndComments(state);

	const trimmed = currentLine(state).trim();

	const outline = matchKeyword(trimmed, SCENARIO_OUTLINE_KEYWORDS);
	if (outline) {
		return parseScenarioOutline(state, tags, outline.rest);
	}

	const scenario = matchKeyword(trimmed, SCENARIO_KEYWORDS);
	if (scenario) {
		return parseScenario(state, tags, scenario.rest);
	}

	return fail(state, 'unexpected-input', 'Scenario: or Scenario Outline: after tags');
}

// ---------------------------------------------------------------------------
// Level 6: Document
// ---------------------------------------------------------------------------

function skipDescription(state: ParserState): void {
	while (!atEnd(state)) {
		const trimmed = currentLine(state).trim();
		if (
			isTagLine(trimmed) ||
			matchKeyword(trimmed, BACKGROUND_KEYWORDS) ||
			isScenarioStart(trimmed)
		) {
			break;
		}
		state.pos++;
	}
}

function unexpectedLine(state: ParserState): never {
	const trimmed = currentLine(state).trim();

	if (matchKeyword(trimmed, EXAMPLES_KEYWORDS)) {
		fail(state, 'unexpected-input', 'Scenario Outline: before Examples:');
	}
	if (matchKeyword(trimmed, BACKGROUND_KEYWORDS)) {
		fail(state, 'unexpected-input', 'Background: before the first scenario');
	}
	if (trimmed.startsWith('|') || trimmed === DOCSTRING_DELIMITER) {
		fail(state, 'unexpected-input', `${STEP_KEYWORD_LABEL} before a data table or doc string`);
	}
	return fail(state, 'unexpected-input', `${STEP_KEYWORD_LABEL}, Scenario:, Scenario Outline: or tag line`);
}

function parseDocument(state: ParserState): Feature {
	const tags = parseTagSet(state);
	skipBlankAndComments(state);

	if (atEnd(state)) {
		fail(state, 'missing-feature', 'Feature:');
	}

	const feature = matchKeyword(currentLine(state).trim(), FEATURE_KEYWORDS);
	if (!feature) {
		fail(state, 'missing-feature', 'Feature:');
	}
	if (feature.rest === '') {
		fail(state, 'missing-feature-name', 'feature name after Feature:');
	}

	const line = state.pos;
	state.pos++;
	skipDescription(state);

	let background: Background | null = null;
	skipBlankAndComments(state);
	if (!atEnd(state) && matchKeyword(currentLine(state).trim(), BACKGROUND_KEYWORDS)) {
		background = parseBackground(state);
	}

	const scenarios: FeatureChild[] = [];
	for (;;) {
		skipBlankAndComments(state);
		if (atEnd(state)) break;

		const trimmed = currentLine(state).trim();
		if (isTagLine(trimmed) || isScenarioStart(trimmed)) {
			scenarios.push(parseScenarioDefinition(state));
			continue;
		}

		unexpectedLine(state);
	}

	return {
		name: feature.rest,
		description: '',
		background,
		scenarios,
		tags,
		line,
	};
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export type ParseResult =
	| { ok: true; feature: Feature }
	| { ok: false; error: GherkinParseError };

/**
 * Parse the text of a .feature file into a Feature.
 *
 * ```ts
 * const feature = parseFeature(`
 * Feature: Shopping cart
 *   Scenario: Adding an item
 *     Given an empty cart
 *     When I add 1 cucumber
 *     Then the cart holds 1 item
 * `);
 * ```
 *
 * @throws GherkinParseError on the first grammar violation
 */
export function parseFeature(text: string): Feature {
	const state: ParserState = { lines: text.split(/\r?\n/), pos: 0 };
	return parseDocument(state);
}

/**
 * Like {@link parseFeature}, but returns parse errors instead of throwing them.
 */
export function tryParseFeature(text: string): ParseResult {
	try {
		return { ok: true, feature: parseFeature(text) };
	} catch (error) {
		if (error instanceof GherkinParseError) {
			return { ok: false, error };
		}
		throw error;
	}
}
