// ============================================================================
// Executor - runs parsed features against step definitions.
//
// Responsibilities:
// - Feature → Scenario → Step lifecycle
// - Scenario Outline expansion and Background step prepending
// - Tag filtering (feature tags plus scenario tags)
// - Scenario state: step and hook return values merged in as they run
// - Hook invocation at every lifecycle point
// - Step status tracking (passed, failed, skipped, pending, undefined)
// - Step timeout, fail-fast and progress callbacks
// ============================================================================

import {
	type Background,
	type ExampleBinding,
	type ExpandedScenario,
	type Feature,
	type Step,
	type TagExpression,
	evaluateTagExpression,
	expandScenarios,
	parseTagExpression,
} from 'cucumis-gherkin';

import { type HookContext, type HookRegistry, type ScenarioStatus, globalHookRegistry, isPlainObject } from './hooks.js';
import { StepError, type StepHistoryEntry } from './step-error.js';
import {
	DataTable,
	type ScenarioState,
	type StepContext,
	type StepRegistry,
	globalRegistry,
} from './step-registry.js';
import { withTimeout } from './timeout.js';

// ---------------------------------------------------------------------------
// Result Types
// ---------------------------------------------------------------------------

export type StepStatus = 'passed' | 'failed' | 'skipped' | 'pending' | 'undefined';

export interface StepResult {
	keyword: string;
	text: string;
	status: StepStatus;
	/** Duration in milliseconds */
	duration: number;
	/** Set for failed and undefined steps */
	error: Error | null;
	/** 0-based line in the .feature file */
	line: number;
}

export interface ScenarioResult {
	name: string;
	status: ScenarioStatus;
	steps: StepResult[];
	duration: number;
	/** Feature tags plus scenario tags */
	tags: string[];
	line: number;
	/** Set when the scenario came from an outline row */
	example: ExampleBinding | null;
	/** Error thrown by a scenario hook */
	hookError: Error | null;
}

export interface FeatureResult {
	name: string;
	uri: string;
	status: 'passed' | 'failed' | 'skipped';
	scenarios: ScenarioResult[];
	duration: number;
	tags: string[];
}

export interface RunSummary {
	features: { total: number; passed: number; failed: number; skipped: number };
	scenarios: { total: number; passed: number; failed: number; skipped: number; pending: number };
	steps: {
		total: number;
		passed: number;
		failed: number;
		skipped: number;
		pending: number;
		undefined: number;
	};
}

export interface RunResult {
	features: FeatureResult[];
	duration: number;
	summary: RunSummary;
}

/** A parsed feature and the file it came from */
export interface FeatureSource {
	uri: string;
	feature: Feature;
}

// ---------------------------------------------------------------------------
// Executor Options
// ---------------------------------------------------------------------------

export interface ExecutorOptions {
	/** Step registry to use. Defaults to globalRegistry. */
	registry?: StepRegistry;
	/** Hook registry to use. Defaults to globalHookRegistry. */
	hooks?: HookRegistry;
	/** Tag expression. Only scenarios matching it run; the rest are skipped. */
	tagFilter?: string;
	/** Step timeout in milliseconds. Default: 30000 */
	stepTimeout?: number;
	/** Stop after the first failed scenario. Default: false */
	failFast?: boolean;
	onFeatureStart?: (feature: Feature, uri: string) => void;
	onFeatureEnd?: (result: FeatureResult) => void;
	onScenarioStart?: (scenario: ExpandedScenario, featureName: string) => void;
	onScenarioEnd?: (result: ScenarioResult, featureName: string) => void;
	onStepEnd?: (result: StepResult, scenarioName: string) => void;
}

interface ScenarioRun {
	featureFile: string;
	scenarioName: string;
	tags: string[];
	state: ScenarioState;
	history: StepHistoryEntry[];
}

const PENDING_MESSAGE = 'Step is pending';

/**
 * Thrown by {@link pending} to mark a step as not yet implemented.
 */
export class PendingStepError extends Error {
	override readonly name = 'PendingStepError';

	constructor(message = PENDING_MESSAGE) {
		super(message);
	}
}

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

export class Executor {
	private readonly registry: StepRegistry;
	private readonly hooks: HookRegistry;
	private readonly stepTimeout: number;
	private readonly failFast: boolean;
	private readonly tagFilter: TagExpression | null;

	constructor(private readonly options: ExecutorOptions = {}) {
		this.registry = options.registry ?? globalRegistry;
		this.hooks = options.hooks ?? globalHookRegistry;
		this.stepTimeout = options.stepTimeout ?? 30_000;
		this.failFast = options.failFast ?? false;
		this.tagFilter = options.tagFilter ? parseTagExpression(options.tagFilter) : null;
	}

	/**
	 * Run features in order. BeforeAll hooks run first and AfterAll hooks
	 * always run last.
	 */
	async run(sources: FeatureSource[]): Promise<RunResult> {
		const runStart = Date.now();
		const featureResults: FeatureResult[] = [];

		await this.hooks.runHooks('beforeAll', { state: {} });

		try {
			for (const source of sources) {
				const result = await this.executeFeature(source);
				featureResults.push(result);

				if (this.failFast && result.status === 'failed') {
					break;
				}
			}
		} finally {
			await this.hooks.runHooks('afterAll', { state: {} });
		}

		return {
			features: featureResults,
			duration: Date.now() - runStart,
			summary: computeSummary(featureResults),
		};
	}

	// -----------------------------------------------------------------------
	// Feature execution
	// -----------------------------------------------------------------------

	private async executeFeature({ uri, feature }: FeatureSource): Promise<FeatureResult> {
		const featureStart = Date.now();
		const scenarioResults: ScenarioResult[] = [];

		this.options.onFeatureStart?.(feature, uri);

		for (const scenario of expandScenarios(feature.scenarios)) {
			const tags = mergeTags(feature.tags, scenario.tags);

			const result =
				this.tagFilter && !evaluateTagExpression(this.tagFilter, tags)
					? skippedScenario(scenario, tags)
					: await this.executeScenario(scenario, tags, feature, uri);
			scenarioResults.push(result);

			if (this.failFast && result.status === 'failed') {
				break;
			}
		}

		const status = scenarioResults.some((s) => s.status === 'failed')
			? 'failed'
			: scenarioResults.every((s) => s.status === 'skipped')
				? 'skipped'
				: 'passed';

		const result: FeatureResult = {
			name: feature.name,
			uri,
			status,
			scenarios: scenarioResults,
			duration: Date.now() - featureStart,
			tags: [...feature.tags],
		};

		this.options.onFeatureEnd?.(result);
		return result;
	}

	// -----------------------------------------------------------------------
	// Scenario execution
	// -----------------------------------------------------------------------

	private async executeScenario(
		scenario: ExpandedScenario,
		tags: string[],
		feature: Feature,
		featureFile: string,
	): Promise<ScenarioResult> {
		const scenarioStart = Date.now();
		const stepResults: StepResult[] = [];
		let halted = false;
		let hookError: Error | null = null;

		this.options.onScenarioStart?.(scenario, feature.name);

		const run: ScenarioRun = {
			featureFile,
			scenarioName: scenario.name,
			tags,
			state: {},
			history: [],
		};

		const hookContext: HookContext = {
			state: run.state,
			featureName: feature.name,
			featureFile,
			scenarioName: scenario.name,
			tags,
		};

		try {
			await this.hooks.runHooks('beforeScenario', hookContext);
		} catch (err) {
			hookError = toError(err);
			halted = true;
		}

		for (const step of scenarioSteps(feature.background, scenario)) {
			if (halted) {
				stepResults.push(stepResult(step, 'skipped', 0, null));
				continue;
			}

			const result = await this.executeStep(step, run);
			stepResults.push(result);
			this.options.onStepEnd?.(result, scenario.name);

			if (result.status !== 'passed') {
				halted = true;
			}
		}

		let status = scenarioStatus(stepResults, hookError);
		hookContext.result = status;

		try {
			await this.hooks.runHooks('afterScenario', hookContext);
		} catch (err) {
			if (!hookError) {
				hookError = toError(err);
				status = 'failed';
			}
		}

		const result: ScenarioResult = {
			name: scenario.name,
			status,
			steps: stepResults,
			duration: Date.now() - scenarioStart,
			tags,
			line: scenario.line,
			example: scenario.example,
			hookError,
		};

		this.options.onScenarioEnd?.(result, feature.name);
		return result;
	}

	// -----------------------------------------------------------------------
	// Step execution
	// -----------------------------------------------------------------------

	private async executeStep(step: Step, run: ScenarioRun): Promise<StepResult> {
		const stepStart = Date.now();
		const elapsed = () => Date.now() - stepStart;
		const hookContext: HookContext = {
			state: run.state,
			featureFile: run.featureFile,
			scenarioName: run.scenarioName,
			tags: run.tags,
			step,
		};

		try {
			await this.hooks.runHooks('beforeStep', hookContext);
		} catch (err) {
			return stepResult(step, 'failed', elapsed(), toError(err));
		}

		const result = await this.invokeStep(step, run, elapsed);

		if (result.error) {
			hookContext.error = result.error;
		}
		try {
			await this.hooks.runHooks('afterStep', hookContext);
		} catch (err) {
			if (result.status === 'passed') {
				return stepResult(step, 'failed', elapsed(), toError(err));
			}
		}

		return result;
	}

	private async invokeStep(step: Step, run: ScenarioRun, elapsed: () => number): Promise<StepResult> {
		const location = {
			step,
			featureFile: run.featureFile,
			scenarioName: run.scenarioName,
		};

		const match = this.registry.match(step.text);
		if (!match) {
			const error = StepError.missingStepDefinition({
				...location,
				history: [...run.history, { status: 'failed', step }],
				suggestions: this.registry.suggest(step.text, 3).map((d) => d.pattern),
			});
			return stepResult(step, 'undefined', elapsed(), error);
		}

		const context: StepContext = {
			state: run.state,
			args: match.args,
			datatable: step.datatable ? new DataTable(step.datatable) : null,
			docstring: step.docstring,
			step,
			scenarioName: run.scenarioName,
			featureFile: run.featureFile,
		};

		try {
			const returned = await withTimeout(
				() => match.definition.fn(context),
				this.stepTimeout,
				`Step timed out after ${this.stepTimeout}ms: "${step.keyword} ${step.text}"`,
			);
			mergeOutcome(run.state, returned);
		} catch (err) {
			if (err instanceof PendingStepError) {
				return stepResult(step, 'pending', elapsed(), null);
			}

			const error = StepError.failedStep({
				...location,
				history: [...run.history, { status: 'failed', step }],
				pattern: match.definition.pattern,
				cause: err,
			});
			return stepResult(step, 'failed', elapsed(), error);
		}

		run.history.push({ status: 'passed', step });
		return stepResult(step, 'passed', elapsed(), null);
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function scenarioSteps(background: Background | null, scenario: ExpandedScenario): Step[] {
	return background ? [...background.steps, ...scenario.steps] : [...scenario.steps];
}

function mergeTags(featureTags: ReadonlyArray<string>, scenarioTags: ReadonlyArray<string>): string[] {
	return [...new Set([...featureTags, ...scenarioTags])];
}

/**
 * Merge a step's return value into the scenario state. Only nothing or a
 * plain object is accepted.
 */
function mergeOutcome(state: ScenarioState, returned: unknown): void {
	if (returned === undefined) return;
	if (!isPlainObject(returned)) {
		throw new TypeError(
			`Invalid step return value: ${String(returned)}. Expected nothing or a plain object to merge into the scenario state`,
		);
	}
	Object.assign(state, returned);
}

function stepResult(step: Step, status: StepStatus, duration: number, error: Error | null): StepResult {
	return { keyword: step.keyword, text: step.text, status, duration, error, line: step.line };
}

function skippedScenario(scenario: ExpandedScenario, tags: string[]): ScenarioResult {
	return {
		name: scenario.name,
		status: 'skipped',
		steps: [],
		duration: 0,
		tags,
		line: scenario.line,
		example: scenario.example,
		hookError: null,
	};
}

function scenarioStatus(steps: StepResult[], hookError: Error | null): ScenarioStatus {
	if (hookError || steps.some((s) => s.status === 'failed')) return 'failed';
	if (steps.some((s) => s.status === 'undefined' || s.status === 'pending')) return 'pending';
	if (steps.every((s) => s.status === 'skipped')) return 'skipped';
	return 'passed';
}

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

// ---------------------------------------------------------------------------
// Summary computation
// ---------------------------------------------------------------------------

/** Compute feature, scenario and step counts by status. */
export function computeSummary(features: FeatureResult[]): RunSummary {
	const summary: RunSummary = {
		features: { total: 0, passed: 0, failed: 0, skipped: 0 },
		scenarios: { total: 0, passed: 0, failed: 0, skipped: 0, pending: 0 },
		steps: { total: 0, passed: 0, failed: 0, skipped: 0, pending: 0, undefined: 0 },
	};

	for (const f of features) {
		summary.features.total++;
		summary.features[f.status]++;

		for (const s of f.scenarios) {
			summary.scenarios.total++;
			summary.scenarios[s.status]++;

			for (const st of s.steps) {
				summary.steps.total++;
				summary.steps[st.status]++;
			}
		}
	}

	return summary;
}

// ---------------------------------------------------------------------------
// Convenience functions
// ---------------------------------------------------------------------------

/**
 * Mark a step as pending (not yet implemented).
 *
 * ```ts
 * Given('something not implemented yet', () => {
 *   pending();
 * });
 * ```
 */
export function pending(message?: string): never {
	throw new PendingStepError(message);
}
