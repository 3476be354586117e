// ============================================================================
// Hooks - lifecycle callbacks with tag scoping.
//
// Supports:
// - BeforeAll / AfterAll (once per run)
// - Before / After (per scenario)
// - BeforeStep / AfterStep (per step)
// - Tag-scoped hooks: Before('@smoke', fn) only runs for @smoke scenarios
// - Named hooks, priority ordering (lower = runs first) and timeouts
//
// A scenario or step hook that returns a plain object has it merged into the
// scenario state, the same way a step's return value is.
// ============================================================================

import { type Step, tagsMatch } from 'cucumis-gherkin';
import type { ScenarioState } from './step-registry.js';
import { withTimeout } from './timeout.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type HookScope =
	| 'beforeAll'
	| 'afterAll'
	| 'beforeScenario'
	| 'afterScenario'
	| 'beforeStep'
	| 'afterStep';

export type ScenarioStatus = 'passed' | 'failed' | 'skipped' | 'pending';

export interface HookContext {
	/** Scenario state; empty for run-level hooks */
	state: ScenarioState;
	featureName?: string;
	featureFile?: string;
	scenarioName?: string;
	/** Feature tags plus scenario tags */
	tags?: string[];
	/** Current step (only for step hooks) */
	step?: Step;
	/** Error from the step (only for afterStep on failure) */
	error?: Error;
	/** Result status of the scenario (only for afterScenario) */
	result?: ScenarioStatus;
}

export type HookFunction = (context: HookContext) => void | ScenarioState | Promise<void | ScenarioState>;

export interface HookOptions {
	name?: string;
	/** Lower runs first. Default: 1000 */
	priority?: number;
	/** Milliseconds. Default: 30000 */
	timeout?: number;
}

export interface HookDefinition {
	scope: HookScope;
	fn: HookFunction;
	/** Tag expression; the hook only runs when the tags match */
	tagFilter: string | null;
	name: string | null;
	priority: number;
	timeout: number;
}

const DEFAULT_PRIORITY = 1000;
const DEFAULT_TIMEOUT = 30_000;

// ---------------------------------------------------------------------------
// Hook Registry
// ---------------------------------------------------------------------------

export class HookRegistry {
	private hooks: HookDefinition[] = [];

	/**
	 * Register a hook, optionally scoped by a tag expression.
	 *
	 * ```ts
	 * hooks.register('beforeScenario', fn);
	 * hooks.register('beforeScenario', '@db and not @readonly', fn);
	 * ```
	 */
	register(
		scope: HookScope,
		fnOrTag: HookFunction | string,
		maybeFn?: HookFunction,
		options: HookOptions = {},
	): void {
		let tagFilter: string | null = null;
		let fn: HookFunction;

		if (typeof fnOrTag === 'string') {
			tagFilter = fnOrTag;
			if (!maybeFn) {
				throw new Error(`Hook registered with tag filter "${tagFilter}" but no function provided`);
			}
			fn = maybeFn;
		} else {
			fn = fnOrTag;
		}

		this.hooks.push({
			scope,
			fn,
			tagFilter,
			name: options.name ?? null,
			priority: options.priority ?? DEFAULT_PRIORITY,
			timeout: options.timeout ?? DEFAULT_TIMEOUT,
		});
	}

	/**
	 * Hooks for a scope whose tag filter matches, sorted by priority. The
	 * filter is evaluated against the tags as given, so `not @wip` matches an
	 * untagged scenario.
	 */
	getHooks(scope: HookScope, tags: string[] = []): HookDefinition[] {
		return this.hooks
			.filter((h) => h.scope === scope)
			.filter((h) => h.tagFilter === null || tagsMatch(h.tagFilter, tags))
			.sort((a, b) => a.priority - b.priority);
	}

	/**
	 * Run every matching hook for a scope, in order, stopping at the first
	 * that throws. Returns the plain objects the hooks returned, merged.
	 */
	async runHooks(scope: HookScope, context: HookContext): Promise<ScenarioState> {
		const additions: ScenarioState = {};

		for (const hook of this.getHooks(scope, context.tags)) {
			const label = hook.name ?? `${hook.scope} hook`;
			const returned = await withTimeout(
				() => hook.fn(context),
				hook.timeout,
				`${label} timed out after ${hook.timeout}ms`,
			);
			if (isPlainObject(returned)) {
				Object.assign(additions, returned);
				Object.assign(context.state, returned);
			}
		}

		return additions;
	}

	clear(): void {
		this.hooks = [];
	}

	getAll(): HookDefinition[] {
		return [...this.hooks];
	}
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== 'object' || value === null) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

// ---------------------------------------------------------------------------
// Global hook registry + convenience functions
// ---------------------------------------------------------------------------

export const globalHookRegistry = new HookRegistry();

/**
 * Register a hook that runs before each scenario.
 *
 * ```ts
 * Before(() => ({ basket: [] }));
 *
 * // With tag filter:
 * Before('@admin', () => ({ role: 'admin' }));
 * ```
 */
export function Before(fnOrTag: HookFunction | string, maybeFn?: HookFunction): void {
	globalHookRegistry.register('beforeScenario', fnOrTag, maybeFn);
}

/**
 * Register a hook that runs after each scenario, whatever its result.
 *
 * ```ts
 * After(({ result, scenarioName }) => {
 *   if (result === 'failed') console.log(`cleaning up after ${scenarioName}`);
 * });
 * ```
 */
export function After(fnOrTag: HookFunction | string, maybeFn?: HookFunction): void {
	globalHookRegistry.register('afterScenario', fnOrTag, maybeFn);
}

/** Register a hook that runs once before all scenarios. */
export function BeforeAll(fn: HookFunction): void {
	globalHookRegistry.register('beforeAll', fn);
}

/** Register a hook that runs once after all scenarios. */
export function AfterAll(fn: HookFunction): void {
	globalHookRegistry.register('afterAll', fn);
}

export function BeforeStep(fnOrTag: HookFunction | string, maybeFn?: HookFunction): void {
	globalHookRegistry.register('beforeStep', fnOrTag, maybeFn);
}

export function AfterStep(fnOrTag: HookFunction | string, maybeFn?: HookFunction): void {
	globalHookRegistry.register('afterStep', fnOrTag, maybeFn);
}
