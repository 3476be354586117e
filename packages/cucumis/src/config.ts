// ============================================================================
// Configuration
// Zero config by default. Override only what you need in cucumis.config.json.
// ============================================================================

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { TagExpressionError, parseTagExpression } from 'cucumis-gherkin';
import { z } from 'zod';

export const CONFIG_FILE = 'cucumis.config.json';

const tagExpression = z.string().superRefine((value, ctx) => {
	try {
		parseTagExpression(value);
	} catch (err) {
		if (!(err instanceof TagExpressionError)) throw err;
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
	}
});

export const configSchema = z
	.object({
		/** Glob for feature files */
		features: z.string().min(1).default('features/**/*.feature'),
		/** Glob for step definition modules */
		steps: z.string().min(1).default('features/step_definitions/**/*.{ts,js,mts,mjs}'),
		/** Glob for support modules (hooks, helpers); loaded before step modules */
		support: z.string().min(1).default('features/support/**/*.{ts,js,mts,mjs}'),
		/** Tag expression; only matching scenarios run */
		tags: tagExpression.optional(),
		/** Step timeout in milliseconds */
		stepTimeout: z.number().int().positive().default(30_000),
		/** Stop after the first failed scenario */
		failFast: z.boolean().default(false),
		/** Verbose debug logging */
		debug: z.boolean().default(false),
	})
	.strict();

/** Full configuration with all options */
export type CucumisConfig = z.output<typeof configSchema>;

/** Users provide a partial config; everything has defaults */
export type UserConfig = z.input<typeof configSchema>;

export class ConfigError extends Error {
	override readonly name = 'ConfigError';

	constructor(
		message: string,
		/** Path of the offending config file, if one was read */
		readonly path: string | null,
		/** One `key: message` entry per schema violation */
		readonly issues: string[] = [],
	) {
		super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
	}
}

/**
 * Typed identity for building a config in code.
 *
 * ```ts
 * const config = resolveConfig(defineConfig({ tags: '@smoke', failFast: true }));
 * ```
 */
export function defineConfig(config: UserConfig): UserConfig {
	return config;
}

/**
 * Validate a user config and fill in defaults.
 *
 * @throws ConfigError listing every invalid or unknown key
 */
export function resolveConfig(userConfig: unknown = {}, path: string | null = null): CucumisConfig {
	const result = configSchema.safeParse(userConfig);
	if (!result.success) {
		throw new ConfigError(
			`Invalid configuration${path ? ` in ${path}` : ''}`,
			path,
			result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
		);
	}
	return result.data;
}

/**
 * Load and resolve the config. Without `file`, a missing `cucumis.config.json`
 * in `cwd` means defaults; an explicitly named file must exist.
 */
export function loadConfig(cwd: string, file?: string): CucumisConfig {
	const path = resolve(cwd, file ?? CONFIG_FILE);

	if (!existsSync(path)) {
		if (file) {
			throw new ConfigError(`Config file not found: ${path}`, path);
		}
		return resolveConfig({});
	}

	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, 'utf-8'));
	} catch (err) {
		throw new ConfigError(
			`Could not read ${path}: ${err instanceof Error ? err.message : String(err)}`,
			path,
		);
	}

	return resolveConfig(raw, path);
}
