#!/usr/bin/env node
import { runCli } from './cli.js';

runCli(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		console.error('Fatal error:', err instanceof Error ? err.message : String(err));
		process.exitCode = 1;
	},
);
