// ============================================================================
// Discovery - find feature files and step modules on disk and load them.
// ============================================================================

import { existsSync, readFileSync, readdirSync, statSync } from 'node:fs';
import { createRequire } from 'node:module';
import { join, relative, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { GherkinParseError, parseFeature } from 'cucumis-gherkin';
import type { FeatureSource } from './executor.js';

const SKIPPED_DIRECTORIES = new Set(['node_modules', 'dist', '.git', 'coverage']);

const TYPESCRIPT_EXTENSIONS = ['.ts', '.mts', '.cts'];

/** A feature file that could not be read or parsed */
export class FeatureFileError extends Error {
	override readonly name = 'FeatureFileError';

	constructor(
		readonly path: string,
		cause: unknown,
	) {
		super(`${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
	}

	/** The underlying parse error, when the file was read but did not parse */
	get parseError(): GherkinParseError | null {
		return this.cause instanceof GherkinParseError ? this.cause : null;
	}
}

/** A step or support module that threw while being imported */
export class StepModuleError extends Error {
	override readonly name = 'StepModuleError';

	constructor(
		readonly path: string,
		cause: unknown,
	) {
		super(`Failed to load ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
	}
}

// ---------------------------------------------------------------------------
// File discovery
// ---------------------------------------------------------------------------

/**
 * Extensions named by the last segment of a glob-like pattern.
 *
 * ```ts
 * patternExtensions('features/**\/*.feature');    // ['.feature']
 * patternExtensions('steps/**\/*.{ts,js}');       // ['.ts', '.js']
 * ```
 */
export function patternExtensions(pattern: string): string[] {
	const last = pattern.split('/').pop() ?? '';
	const braces = /\*\.\{([^}]+)\}$/.exec(last);
	if (braces?.[1]) {
		return braces[1].split(',').map((ext) => `.${ext.trim()}`);
	}
	const single = /\*(\.[^*/]+)$/.exec(last);
	return single?.[1] ? [single[1]] : [];
}

/**
 * Discover files matching a glob-like pattern within a directory. The walk
 * starts at the pattern's static prefix (`features` for
 * `features/**\/*.feature`) and keeps files with one of `extensions`.
 * Returns sorted absolute paths; a missing base directory yields none.
 */
export function discoverFiles(
	rootDir: string,
	pattern: string,
	extensions: string[] = patternExtensions(pattern),
): string[] {
	const files: string[] = [];

	const staticParts: string[] = [];
	for (const part of pattern.split('/')) {
		if (part.includes('*') || part.includes('{')) break;
		staticParts.push(part);
	}
	const baseDir = resolve(rootDir, staticParts.join('/'));

	if (!existsSync(baseDir)) return files;
	if (statSync(baseDir).isFile()) {
		return extensions.some((ext) => baseDir.endsWith(ext)) ? [baseDir] : [];
	}

	const walkDir = (dir: string): void => {
		for (const entry of readdirSync(dir)) {
			if (SKIPPED_DIRECTORIES.has(entry)) continue;
			const fullPath = join(dir, entry);
			const stat = statSync(fullPath);
			if (stat.isDirectory()) {
				walkDir(fullPath);
			} else if (stat.isFile() && extensions.some((ext) => entry.endsWith(ext))) {
				files.push(fullPath);
			}
		}
	};

	walkDir(baseDir);
	return files.sort();
}

// ---------------------------------------------------------------------------
// Feature loading
// ---------------------------------------------------------------------------

/**
 * Read and parse each feature file. The `uri` of each result is the path
 * relative to `cwd`, with forward slashes.
 *
 * @throws FeatureFileError for the first file that cannot be read or parsed
 */
export function loadFeatureFiles(paths: string[], cwd: string): FeatureSource[] {
	return paths.map((path) => {
		const uri = relative(cwd, path).split('\\').join('/');
		try {
			return { uri, feature: parseFeature(readFileSync(path, 'utf-8')) };
		} catch (err) {
			throw new FeatureFileError(uri, err);
		}
	});
}

// ---------------------------------------------------------------------------
// Step module loading
// ---------------------------------------------------------------------------

export type ModuleImporter = (path: string) => Promise<unknown>;

export interface LoadStepModulesOptions {
	/** Project root that tsx is resolved from. Default: process.cwd() */
	cwd?: string;
	importModule?: ModuleImporter;
}

/**
 * Import step definition and support modules in order, so that their
 * `Given/When/Then` and hook calls register. Returns the loaded paths.
 *
 * @throws StepModuleError naming the first module that failed to import
 */
export async function loadStepModules(paths: string[], options: LoadStepModulesOptions = {}): Promise<string[]> {
	const importModule = options.importModule ?? diskImporter(options.cwd ?? process.cwd());
	const loaded: string[] = [];
	for (const path of paths) {
		try {
			await importModule(path);
		} catch (err) {
			throw new StepModuleError(path, err);
		}
		loaded.push(path);
	}
	return loaded;
}

function diskImporter(cwd: string): ModuleImporter {
	return async (path) => {
		if (TYPESCRIPT_EXTENSIONS.some((ext) => path.endsWith(ext))) {
			await ensureTypeScriptLoader(cwd);
		}
		return import(pathToFileURL(path).href);
	};
}

// ---------------------------------------------------------------------------
// TypeScript loader
// ---------------------------------------------------------------------------

let tsLoaderRegistered = false;

/**
 * Make `.ts` step files importable. Does nothing when the process already
 * runs under a TypeScript loader; otherwise registers tsx, resolved from the
 * user's project rather than from this package.
 */
export async function ensureTypeScriptLoader(cwd: string): Promise<void> {
	if (tsLoaderRegistered) return;

	const execArgs = process.execArgv.join(' ');
	if (execArgs.includes('tsx') || execArgs.includes('loader') || execArgs.includes('--import')) {
		tsLoaderRegistered = true;
		return;
	}

	const apiPath = resolveTsxApi(cwd);
	const api: unknown = await import(pathToFileURL(apiPath).href);
	if (typeof api === 'object' && api !== null && 'register' in api && typeof api.register === 'function') {
		api.register();
		tsLoaderRegistered = true;
		return;
	}

	throw new Error(`tsx at ${apiPath} does not export register()`);
}

/**
 * Path of tsx's register API as resolved from `cwd`.
 *
 * @throws Error telling the user to install tsx when it cannot be found
 */
export function resolveTsxApi(cwd: string): string {
	const userRequire = createRequire(pathToFileURL(resolve(cwd, 'package.json')));
	try {
		return userRequire.resolve('tsx/esm/api');
	} catch (err) {
		throw new Error(
			'Cannot import TypeScript step files. Install tsx in your project:\n\n' +
				'    npm install -D tsx\n',
			{ cause: err },
		);
	}
}
