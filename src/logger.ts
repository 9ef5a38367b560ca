import winston from 'winston';
import { z } from 'zod';
import { InvalidLogLevelError } from './errors';

/**
 * Logger used by the engine.
 *
 * Any object with these methods works, a winston logger included:
 * ```typescript
 * import winston from 'winston';
 *
 * const logger = winston.createLogger({
 *   level: 'debug',
 *   transports: [new winston.transports.Console()]
 * });
 *
 * shortestPaths(graph, 'A', { logger });
 * ```
 */
export interface Logger {
	debug(message: string, meta?: Record<string, unknown>): void;
	info(message: string, meta?: Record<string, unknown>): void;
	warn(message: string, meta?: Record<string, unknown>): void;
	error(message: string, meta?: Record<string, unknown>): void;
	child(meta: Record<string, unknown>): Logger;
}

export const LOG_LEVEL_ENV = 'SHORTEST_PATHS_LOG_LEVEL';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Reads the log level from the environment; `undefined` means logging is off.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
	const value = env[LOG_LEVEL_ENV];
	if (value === undefined || value === '') {
		return undefined;
	}
	const result = LogLevelSchema.safeParse(value.toLowerCase());
	if (!result.success) {
		throw new InvalidLogLevelError(LOG_LEVEL_ENV, value, LogLevelSchema.options);
	}
	return result.data;
}

export function createLogger(level: LogLevel | undefined = resolveLogLevel()): Logger {
	return winston.createLogger({
		level: level ?? 'info',
		silent: level === undefined,
		defaultMeta: { service: 'shortest-paths' },
		format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
		transports: [new winston.transports.Console()]
	});
}

let defaultLogger: Logger | undefined;

export function getDefaultLogger(): Logger {
	defaultLogger ??= createLogger();
	return defaultLogger;
}
