const LEVELS = { debug: 10, info: 20, warn: 30, error: 40 } as const;

export type LogLevel = keyof typeof LEVELS;

function isLogLevel(value: string | undefined): value is LogLevel {
	return value !== undefined && value in LEVELS;
}

const envLevel = process.env.LOG_LEVEL;
let threshold: number = LEVELS[isLogLevel(envLevel) ? envLevel : "info"];

/** Messages below `level` are dropped. */
export function setLogLevel(level: LogLevel): void {
	threshold = LEVELS[level];
}

// stdout is reserved for protocol traffic, so everything goes to stderr
function write(level: LogLevel, args: unknown[]): void {
	if (LEVELS[level] < threshold) return;
	console.error(`[${level.toUpperCase()}]`, ...args);
}

export const logger = {
	info: (...args: unknown[]) => write("info", args),
	warn: (...args: unknown[]) => write("warn", args),
	error: (...args: unknown[]) => write("error", args),
	debug: (...args: unknown[]) => write("debug", args),
};
