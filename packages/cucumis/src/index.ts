// ============================================================================
// Cucumis - run Gherkin feature files against step definitions written as
// Cucumber Expressions.
//
// ```ts
// import { Given, When, Then } from 'cucumis';
//
// Given('an empty basket', () => ({ count: 0 }));
// When('I add {int} cucumber(s)', ({ state, args }) => ({
//   count: Number(state.count) + Number(args[0]),
// }));
// ```
// ============================================================================

// ---------------------------------------------------------------------------
// Step Registry
// ---------------------------------------------------------------------------
export {
	StepRegistry,
	DataTable,
	DuplicateStepDefinitionError,
	globalRegistry,
	Given,
	When,
	Then,
	Step,
	levenshtein,
	type ScenarioState,
	type StepContext,
	type StepOutcome,
	type StepFunction,
	type StepDefinition,
	type StepDefinitionKeyword,
	type StepMatch,
	type RegisterOptions,
} from './step-registry.js';

export {
	StepError,
	HISTORY_LIMIT,
	formatHistory,
	suggestPattern,
	type StepFailureReason,
	type StepHistoryEntry,
} from './step-error.js';

// ---------------------------------------------------------------------------
// Hooks
// ---------------------------------------------------------------------------
export {
	HookRegistry,
	globalHookRegistry,
	Before,
	After,
	BeforeAll,
	AfterAll,
	BeforeStep,
	AfterStep,
	type HookScope,
	type HookContext,
	type HookFunction,
	type HookOptions,
	type HookDefinition,
	type ScenarioStatus,
} from './hooks.js';

export { TimeoutError, withTimeout } from './timeout.js';

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------
export {
	Executor,
	PendingStepError,
	computeSummary,
	pending,
	type ExecutorOptions,
	type FeatureSource,
	type StepStatus,
	type StepResult,
	type ScenarioResult,
	type FeatureResult,
	type RunResult,
	type RunSummary,
} from './executor.js';

// ---------------------------------------------------------------------------
// Discovery, config, logging, CLI
// ---------------------------------------------------------------------------
export {
	discoverFiles,
	patternExtensions,
	loadFeatureFiles,
	loadStepModules,
	ensureTypeScriptLoader,
	resolveTsxApi,
	FeatureFileError,
	StepModuleError,
	type ModuleImporter,
	type LoadStepModulesOptions,
} from './discovery.js';

export {
	CONFIG_FILE,
	ConfigError,
	configSchema,
	defineConfig,
	resolveConfig,
	loadConfig,
	type CucumisConfig,
	type UserConfig,
} from './config.js';

export { createLogger, type Logger, type LoggerOptions } from './logger.js';

export { runCli, VERSION, type CliOptions } from './cli.js';
