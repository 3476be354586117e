// ============================================================================
// Cucumis - CLI
// The command-line interface for running and inspecting feature files.
//
// cucumis run                        # Run all features
// cucumis run features/cart.feature  # Run a specific file
// cucumis parse features/cart.feature
// cucumis match 'I add {int} cucumber(s)' 'I add 3 cucumbers'
// cucumis --help                     # Show help
// ============================================================================

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { CucumberExpression, type MatchArgument } from 'cucumis-expressions';
import { expandScenarios, parseFeature } from 'cucumis-gherkin';
import { type CucumisConfig, loadConfig } from './config.js';
import { type ModuleImporter, discoverFiles, loadFeatureFiles, loadStepModules } from './discovery.js';
import { Executor, type StepResult } from './executor.js';
import { type HookRegistry, globalHookRegistry } from './hooks.js';
import { type Logger, createLogger } from './logger.js';
import { type StepRegistry, globalRegistry } from './step-registry.js';

export const VERSION = '0.1.0';

export interface CliOptions {
	/** Default: process.cwd() */
	cwd?: string;
	/** Default: a console logger, with debug output when --debug or config.debug is set */
	logger?: Logger;
	registry?: StepRegistry;
	hooks?: HookRegistry;
	importModule?: ModuleImporter;
}

/** Bad command-line usage */
export class UsageError extends Error {
	override readonly name = 'UsageError';
}

/**
 * Run the CLI with the arguments after the executable name.
 * Resolves to the process exit code; never rejects.
 */
export async function runCli(args: string[], options: CliOptions = {}): Promise<number> {
	const cwd = options.cwd ?? process.cwd();
	let logger = options.logger ?? createLogger({ debug: args.includes('--debug') });
	const [command, ...rest] = args;

	if (command === undefined || command === '--help' || command === '-h' || command === 'help') {
		printHelp(logger);
		return 0;
	}

	if (command === '--version' || command === '-v') {
		logger.info(`cucumis v${VERSION}`);
		return 0;
	}

	try {
		switch (command) {
			case 'run': {
				const flags = parseFlags(rest);
				const config = applyFlags(loadConfig(cwd, flags.config), flags);
				if (!options.logger && config.debug) {
					logger = createLogger({ debug: true });
				}
				return await runFeatures(config, flags.positional, { ...options, cwd, logger });
			}
			case 'parse':
				return parseCommand(rest, cwd, logger);
			case 'expand':
				return expandCommand(rest, cwd, logger);
			case 'match':
				return matchCommand(rest, logger);
			default:
				throw new UsageError(`Unknown command: ${command ?? ''}`);
		}
	} catch (err) {
		logger.error(err instanceof Error ? err.message : String(err));
		if (err instanceof UsageError) {
			logger.error('Run "cucumis --help" for usage information.');
		}
		return 1;
	}
}

// ---------------------------------------------------------------------------
// Run Command
// ---------------------------------------------------------------------------

interface RunContext {
	cwd: string;
	logger: Logger;
	registry?: StepRegistry;
	hooks?: HookRegistry;
	importModule?: ModuleImporter;
}

async function runFeatures(config: CucumisConfig, patterns: string[], context: RunContext): Promise<number> {
	const { cwd, logger } = context;

	// ── Step 1: Discover .feature files ────────────────────────────────
	let featureFiles: string[];

	if (patterns.length > 0) {
		featureFiles = [...new Set(patterns.flatMap((p) => discoverFiles(cwd, p, ['.feature'])))];
		if (featureFiles.length === 0) {
			logger.error(`No matching feature files found for: ${patterns.join(', ')}`);
			return 1;
		}
	} else {
		featureFiles = discoverFiles(cwd, config.features);
	}

	if (featureFiles.length === 0) {
		logger.info('\n  No .feature files found.\n');
		logger.info(`  Feature pattern: ${config.features}`);
		logger.info('  Create features/*.feature files or adjust "features" in cucumis.config.json.\n');
		return 0;
	}

	// ── Step 2: Register hooks and steps ───────────────────────────────
	const modules = [...discoverFiles(cwd, config.support), ...discoverFiles(cwd, config.steps)];
	await loadStepModules(modules, { cwd, importModule: context.importModule });
	logger.debug(`loaded ${modules.length} support and step module(s)`);

	const registry = context.registry ?? globalRegistry;
	logger.debug(`${registry.size} step definition(s) registered`);

	// ── Step 3: Parse .feature files ───────────────────────────────────
	const sources = loadFeatureFiles(featureFiles, cwd);

	const header = [`${featureFiles.length} feature file${featureFiles.length > 1 ? 's' : ''}`];
	if (config.tags) header.push(`[tags: ${config.tags}]`);
	logger.info(`\n  Cucumis - Running ${header.join(' ')}\n`);

	// ── Step 4: Execute ────────────────────────────────────────────────
	const executor = new Executor({
		registry,
		hooks: context.hooks ?? globalHookRegistry,
		tagFilter: config.tags,
		stepTimeout: config.stepTimeout,
		failFast: config.failFast,
		onFeatureStart: (feature) => {
			logger.info(`\n  Feature: ${feature.name}`);
		},
		onScenarioStart: (scenario) => {
			logger.info(`    Scenario: ${scenario.name}`);
		},
		onStepEnd: (result) => {
			logger.info(`      ${statusIcon(result)} ${result.keyword} ${result.text} (${result.duration}ms)`);
			if (result.error) {
				logger.info(indent(result.error.message, 8));
			}
		},
		onScenarioEnd: (result) => {
			if (result.hookError) {
				logger.info(indent(`Hook failed: ${result.hookError.message}`, 8));
			}
		},
	});

	const result = await executor.run(sources);

	// ── Step 5: Print summary ──────────────────────────────────────────
	const { scenarios, steps } = result.summary;

	const scenarioParts: string[] = [];
	if (scenarios.passed > 0) scenarioParts.push(`\x1b[32m${scenarios.passed} passed\x1b[0m`);
	if (scenarios.failed > 0) scenarioParts.push(`\x1b[31m${scenarios.failed} failed\x1b[0m`);
	if (scenarios.skipped > 0) scenarioParts.push(`\x1b[33m${scenarios.skipped} skipped\x1b[0m`);
	if (scenarios.pending > 0) scenarioParts.push(`\x1b[33m${scenarios.pending} pending\x1b[0m`);

	const stepParts: string[] = [];
	if (steps.passed > 0) stepParts.push(`\x1b[32m${steps.passed} passed\x1b[0m`);
	if (steps.failed > 0) stepParts.push(`\x1b[31m${steps.failed} failed\x1b[0m`);
	if (steps.undefined > 0) stepParts.push(`\x1b[33m${steps.undefined} undefined\x1b[0m`);
	if (steps.pending > 0) stepParts.push(`\x1b[33m${steps.pending} pending\x1b[0m`);
	if (steps.skipped > 0) stepParts.push(`\x1b[90m${steps.skipped} skipped\x1b[0m`);

	logger.info('\n  ─────────────────────────────────────');
	logger.info(`  Scenarios: ${scenarioParts.join(', ')} (${scenarios.total} total)`);
	logger.info(`  Steps:     ${stepParts.join(', ')} (${steps.total} total)`);
	logger.info(`  Time:      ${formatDuration(result.duration)}`);
	logger.info('');

	if (scenarios.failed > 0) {
		logger.info('  \x1b[31mSome scenarios failed.\x1b[0m\n');
	} else if (steps.undefined > 0) {
		logger.info('  \x1b[33mSome steps are undefined.\x1b[0m\n');
	} else {
		logger.info('  \x1b[32mAll scenarios passed!\x1b[0m\n');
	}

	return scenarios.failed > 0 || steps.undefined > 0 ? 1 : 0;
}

function statusIcon(result: StepResult): string {
	switch (result.status) {
		case 'passed':
			return '\x1b[32m+\x1b[0m';
		case 'failed':
			return '\x1b[31mx\x1b[0m';
		case 'undefined':
			return '\x1b[33m?\x1b[0m';
		case 'pending':
			return '\x1b[33m-\x1b[0m';
		case 'skipped':
			return '\x1b[90m-\x1b[0m';
	}
}

function indent(text: string, spaces: number): string {
	const pad = ' '.repeat(spaces);
	return text
		.split('\n')
		.map((line) => (line ? pad + line : line))
		.join('\n');
}

function formatDuration(ms: number): string {
	return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

// ---------------------------------------------------------------------------
// Inspection Commands
// ---------------------------------------------------------------------------

function readFeature(args: string[], cwd: string, command: string) {
	const [file] = args;
	if (!file) {
		throw new UsageError(`Usage: cucumis ${command} <file>`);
	}
	return parseFeature(readFileSync(resolve(cwd, file), 'utf-8'));
}

/** Print the parsed document tree as JSON */
function parseCommand(args: string[], cwd: string, logger: Logger): number {
	logger.info(JSON.stringify(readFeature(args, cwd, 'parse'), null, 2));
	return 0;
}

/** Print each concrete scenario with its tags, one per line */
function expandCommand(args: string[], cwd: string, logger: Logger): number {
	const feature = readFeature(args, cwd, 'expand');
	for (const scenario of expandScenarios(feature.scenarios)) {
		const tags = [...feature.tags, ...scenario.tags].map((t) => `@${t}`);
		logger.info(tags.length > 0 ? `${scenario.name}  ${[...new Set(tags)].join(' ')}` : scenario.name);
	}
	return 0;
}

/** Print the arguments a pattern captures from a step text */
function matchCommand(args: string[], logger: Logger): number {
	const [pattern, text] = args;
	if (pattern === undefined || text === undefined) {
		throw new UsageError('Usage: cucumis match <pattern> <text>');
	}

	const captured = new CucumberExpression(pattern).match(text);
	if (!captured) {
		logger.info('No match');
		return 1;
	}

	logger.info(`Matched with ${captured.length} argument${captured.length === 1 ? '' : 's'}`);
	captured.forEach((value, i) => {
		logger.info(`  ${i + 1}: ${formatArgument(value)}`);
	});
	return 0;
}

export function formatArgument(value: MatchArgument): string {
	if (value === null) return 'null';
	if (typeof value === 'string') return JSON.stringify(value);
	if (typeof value === 'symbol') return `:${Symbol.keyFor(value) ?? value.description ?? ''}`;
	return String(value);
}

// ---------------------------------------------------------------------------
// Flag parsing
// ---------------------------------------------------------------------------

export interface CLIFlags {
	/** Tag filter expression, e.g. "@smoke and not @wip" */
	tags?: string;
	bail?: boolean;
	debug?: boolean;
	/** Config file path, relative to the working directory */
	config?: string;
	/** Feature files, directories or patterns */
	positional: string[];
}

export function parseFlags(args: string[]): CLIFlags {
	const flags: CLIFlags = { positional: [] };

	const valueOf = (i: number, flag: string): string => {
		const value = args[i];
		if (value === undefined || value.startsWith('--')) {
			throw new UsageError(`Missing value for ${flag}`);
		}
		return value;
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? '';
		switch (arg) {
			case '--debug':
				flags.debug = true;
				break;
			case '--bail':
				flags.bail = true;
				break;
			case '--tag':
			case '--tags':
				flags.tags = valueOf(++i, arg);
				break;
			case '--config':
				flags.config = valueOf(++i, arg);
				break;
			default:
				if (arg.startsWith('-')) {
					throw new UsageError(`Unknown option: ${arg}`);
				}
				flags.positional.push(arg);
		}
	}

	return flags;
}

function applyFlags(config: CucumisConfig, flags: CLIFlags): CucumisConfig {
	return {
		...config,
		tags: flags.tags ?? config.tags,
		failFast: flags.bail ?? config.failFast,
		debug: flags.debug ?? config.debug,
	};
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function printHelp(logger: Logger): void {
	logger.info(`
  cucumis v${VERSION} -- Gherkin features with Cucumber Expressions

  Usage:
    cucumis run [features...] [options]
    cucumis parse <file>
    cucumis expand <file>
    cucumis match <pattern> <text>

  Commands:
    run           Run feature files against step definitions
    parse         Print the parsed document tree as JSON
    expand        List the concrete scenarios of a feature, outlines expanded
    match         Show what a Cucumber Expression captures from a step text

  Options:
    --tags <expr>       Tag filter: "@smoke", "@smoke and not @wip"
    --bail              Stop after the first failed scenario
    --config <file>     Config file (default: cucumis.config.json)
    --debug             Enable verbose debug logging
    -h, --help          Show this help message
    -v, --version       Show version

  Examples:
    cucumis run                                  # All features
    cucumis run features/cart.feature            # Single feature
    cucumis run --tags "@smoke and not @wip"     # Tag filter
    cucumis match 'I add {int} cucumber(s)' 'I add 3 cucumbers'
`);
}
