// ============================================================================
// Step Definition Registry - register, match, and look up step definitions.
//
// Patterns are Cucumber Expressions, compiled once at registration so a bad
// pattern fails where it is written rather than when a feature first runs.
// Step keywords are not significant for matching: `Given('x')` also matches
// `When x` and `And x`.
// ============================================================================

import { CucumberExpression, type MatchArgument } from 'cucumis-expressions';
import type { Step } from 'cucumis-gherkin';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Scenario-scoped state shared between steps and hooks */
export type ScenarioState = Record<string, unknown>;

/** The context object passed to every step definition */
export interface StepContext {
	/** State accumulated by earlier steps and hooks in this scenario */
	state: ScenarioState;
	/** Values captured by the pattern, in source order */
	args: MatchArgument[];
	/** The step's data table, if it has one */
	datatable: DataTable | null;
	/** The step's doc string, if it has one */
	docstring: string | null;
	step: Step;
	scenarioName: string;
	featureFile: string;
}

/**
 * What a step may return. A plain object is merged into the scenario state;
 * nothing leaves the state as it is.
 */
export type StepOutcome = void | ScenarioState;

export type StepFunction = (context: StepContext) => StepOutcome | Promise<StepOutcome>;

export type StepDefinitionKeyword = 'Given' | 'When' | 'Then' | 'Step';

export interface StepDefinition {
	/** Source of the pattern */
	pattern: string;
	expression: CucumberExpression;
	fn: StepFunction;
	/** Keyword used at registration; informational only */
	keyword: StepDefinitionKeyword;
	/** `file:line` of the registration, when known */
	location: string | null;
}

export interface StepMatch {
	definition: StepDefinition;
	args: MatchArgument[];
}

export interface RegisterOptions {
	keyword?: StepDefinitionKeyword;
	location?: string | null;
}

export class DuplicateStepDefinitionError extends Error {
	override readonly name = 'DuplicateStepDefinitionError';

	constructor(
		readonly pattern: string,
		readonly location: string | null,
		readonly existingLocation: string | null,
	) {
		super(
			`Duplicate step definition: "${pattern}" at ${location ?? '<unknown>'}. ` +
				`Already registered at ${existingLocation ?? '<unknown>'}`,
		);
	}
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class StepRegistry {
	private steps: StepDefinition[] = [];

	/**
	 * Register a step definition.
	 *
	 * @throws ExpressionCompileError when the pattern does not compile
	 * @throws DuplicateStepDefinitionError when the pattern is already registered
	 */
	register(pattern: string, fn: StepFunction, options: RegisterOptions = {}): StepDefinition {
		const expression = new CucumberExpression(pattern);
		const location = options.location ?? null;

		const existing = this.steps.find((s) => s.pattern === pattern);
		if (existing) {
			throw new DuplicateStepDefinitionError(pattern, location, existing.location);
		}

		const definition: StepDefinition = {
			pattern,
			expression,
			fn,
			keyword: options.keyword ?? 'Step',
			location,
		};
		this.steps.push(definition);
		return definition;
	}

	/**
	 * Find the first definition, in registration order, whose pattern matches
	 * the step text. Returns null if none does.
	 */
	match(text: string): StepMatch | null {
		for (const definition of this.steps) {
			const args = definition.expression.match(text);
			if (args) {
				return { definition, args };
			}
		}
		return null;
	}

	getAll(): StepDefinition[] {
		return [...this.steps];
	}

	get size(): number {
		return this.steps.length;
	}

	/**
	 * Clear all registered steps. Useful for test isolation.
	 */
	clear(): void {
		this.steps = [];
	}

	/**
	 * Get the step texts that no definition matches.
	 */
	findUnmatched(stepTexts: string[]): string[] {
		return stepTexts.filter((text) => !this.match(text));
	}

	/**
	 * Suggest similar step definitions for an unmatched step.
	 * Returns the closest `limit` patterns by Levenshtein distance.
	 */
	suggest(text: string, limit = 3): StepDefinition[] {
		const scored = this.steps.map((definition) => ({
			definition,
			distance: levenshtein(text.toLowerCase(), definition.pattern.toLowerCase()),
		}));
		scored.sort((a, b) => a.distance - b.distance);
		return scored.slice(0, limit).map((s) => s.definition);
	}
}

// ---------------------------------------------------------------------------
// DataTable helper class (for use in step definitions)
// ---------------------------------------------------------------------------

export class DataTable {
	constructor(private readonly table: ReadonlyArray<ReadonlyArray<string>>) {}

	/** Get raw rows as arrays of strings */
	raw(): string[][] {
		return this.table.map((row) => [...row]);
	}

	/** Get rows as arrays (excluding the header row) */
	rows(): string[][] {
		return this.raw().slice(1);
	}

	/** Get the header row */
	headers(): string[] {
		const first = this.table[0];
		return first ? [...first] : [];
	}

	/**
	 * Convert to an array of objects using the first row as keys.
	 *
	 * ```ts
	 * // | name  | age |
	 * // | Alice | 30  |
	 * // | Bob   | 25  |
	 * //
	 * // → [{ name: 'Alice', age: '30' }, { name: 'Bob', age: '25' }]
	 * ```
	 */
	asObjects(): Record<string, string>[] {
		const headers = this.headers();
		return this.rows().map((row) => {
			const obj: Record<string, string> = {};
			headers.forEach((key, i) => {
				obj[key] = row[i] ?? '';
			});
			return obj;
		});
	}

	/**
	 * Convert a two-column table to a key-value map.
	 *
	 * ```ts
	 * // | name | Alice |
	 * // | age  | 30    |
	 * //
	 * // → { name: 'Alice', age: '30' }
	 * ```
	 */
	asMap(): Record<string, string> {
		const map: Record<string, string> = {};
		for (const [key, value] of this.table) {
			if (key !== undefined) {
				map[key] = value ?? '';
			}
		}
		return map;
	}

	/** Get a single column, header included */
	column(index: number): string[] {
		return this.table.map((row) => row[index] ?? '');
	}

	/** Number of rows, header included */
	get rowCount(): number {
		return this.table.length;
	}

	/** Swap rows and columns */
	transpose(): string[][] {
		const width = this.table[0]?.length ?? 0;
		const result: string[][] = [];
		for (let c = 0; c < width; c++) {
			result.push(this.column(c));
		}
		return result;
	}
}

// ---------------------------------------------------------------------------
// Global registry + convenience functions
// ---------------------------------------------------------------------------

/** The global step registry - used by Given/When/Then/Step */
export const globalRegistry = new StepRegistry();

/**
 * Register a Given step definition.
 *
 * ```ts
 * Given('an empty basket', () => ({ count: 0 }));
 * ```
 */
export function Given(pattern: string, fn: StepFunction): void {
	globalRegistry.register(pattern, fn, { keyword: 'Given', location: callerLocation() });
}

/**
 * Register a When step definition.
 *
 * ```ts
 * When('I add {int} cucumber(s)', ({ state, args }) => ({
 *   count: Number(state.count ?? 0) + Number(args[0]),
 * }));
 * ```
 */
export function When(pattern: string, fn: StepFunction): void {
	globalRegistry.register(pattern, fn, { keyword: 'When', location: callerLocation() });
}

/**
 * Register a Then step definition.
 *
 * ```ts
 * Then('the basket holds {int} cucumber(s)', ({ state, args }) => {
 *   assert.equal(state.count, args[0]);
 * });
 * ```
 */
export function Then(pattern: string, fn: StepFunction): void {
	globalRegistry.register(pattern, fn, { keyword: 'Then', location: callerLocation() });
}

/**
 * Register a step without naming a keyword. Matches exactly like
 * Given/When/Then do.
 */
export function Step(pattern: string, fn: StepFunction): void {
	globalRegistry.register(pattern, fn, { keyword: 'Step', location: callerLocation() });
}

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

const STACK_LOCATION = /\(?([^\s()]+):(\d+):\d+\)?$/;

/**
 * `file:line` of the code that called a Given/When/Then/Step helper, read
 * from the stack: frame 0 is this function, 1 the helper, 2 its caller.
 */
function callerLocation(): string | null {
	const frame = new Error().stack?.split('\n').slice(1)[2];
	const match = frame ? STACK_LOCATION.exec(frame.trim()) : null;
	return match ? `${match[1]}:${match[2]}` : null;
}

/** Levenshtein edit distance for step suggestion */
export function levenshtein(a: string, b: string): number {
	let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

	for (let i = 1; i <= a.length; i++) {
		const current = [i];
		for (let j = 1; j <= b.length; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1;
			current[j] = Math.min(
				(previous[j] ?? 0) + 1,
				(current[j - 1] ?? 0) + 1,
				(previous[j - 1] ?? 0) + cost,
			);
		}
		previous = current;
	}

	return previous[b.length] ?? 0;
}
