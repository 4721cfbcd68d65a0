export type Logger = (message?: unknown, ...optionalParams: unknown[]) => void;

export interface Loggers {
	warn: Logger;
	debug: Logger;
}

const defaults: Loggers = {
	// eslint-disable-next-line no-console
	warn: (message, ...optionalParams) => console.warn(message, ...optionalParams),
	// eslint-disable-next-line no-console
	debug: (message, ...optionalParams) => console.debug(message, ...optionalParams),
};

export function getDefaultLoggers(): Loggers {
	return defaults;
}

// Swap the process-wide sinks used when an entry point receives no `logger` option.
export function setDefaultLoggers(loggers: Partial<Loggers>) {
	if (loggers.warn) defaults.warn = loggers.warn;
	if (loggers.debug) defaults.debug = loggers.debug;
}
