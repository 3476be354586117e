// ============================================================================
// Logger - console output with a prefix and a debug level that is off unless
// asked for.
// ============================================================================

export interface Logger {
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	/** Only printed when the logger was created with `debug: true` */
	debug(message: string): void;
}

export interface LoggerOptions {
	debug?: boolean;
	/** Default: '[cucumis]' */
	prefix?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const prefix = options.prefix ?? '[cucumis]';
	const debugEnabled = options.debug ?? false;

	return {
		info: (message) => console.log(message),
		warn: (message) => console.warn(`${prefix} ${message}`),
		error: (message) => console.error(`${prefix} ${message}`),
		debug: (message) => {
			if (debugEnabled) console.log(`${prefix} debug: ${message}`);
		},
	};
}
