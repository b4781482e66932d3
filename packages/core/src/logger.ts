/**
 * Minimal leveled logger used across seatbook packages.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured values attached to a log line.
 */
export type LogContext = Record<string, unknown>;

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

/**
 * The subset of the global console a console logger writes to.
 */
export type ConsoleSink = Pick<Console, LogLevel>;

export interface ConsoleLoggerOptions {
	/** Lowest level that is written; defaults to "warn" */
	level?: LogLevel;
	/** Where lines are written; defaults to the global console */
	console?: ConsoleSink;
	/** Clock used for the timestamp prefix */
	now?: () => Date;
}

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

/**
 * Creates a logger that writes `<timestamp> <LEVEL> <message> [context]` lines.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'info' });
 * logger.info('Found slot', { resourceId: '42' });
 * // 2024-01-15T09:00:00.000Z INFO Found slot {"resourceId":"42"}
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
	const { level = 'warn', console: sink = console, now = () => new Date() } = options;
	const threshold = LEVEL_RANK[level];

	function write(lineLevel: LogLevel, message: string, context?: LogContext): void {
		if (LEVEL_RANK[lineLevel] < threshold) {
			return;
		}

		let line = `${now().toISOString()} ${lineLevel.toUpperCase()} ${message}`;
		if (context && Object.keys(context).length > 0) {
			line += ` ${JSON.stringify(context)}`;
		}
		sink[lineLevel](line);
	}

	return {
		debug: (message, context) => write('debug', message, context),
		info: (message, context) => write('info', message, context),
		warn: (message, context) => write('warn', message, context),
		error: (message, context) => write('error', message, context),
	};
}

/**
 * A logger that discards everything.
 */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
