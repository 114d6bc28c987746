import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	/** Log level, or 'silent' to discard everything */
	level: LogLevel | 'silent';
	/** Service name for structured logs */
	serviceName: string;
	/** Whether to use pretty printing (dev only) */
	pretty?: boolean;
	/** Additional base context */
	base?: Record<string, unknown>;
	/** Write JSON lines here instead of stdout. Ignored when pretty is set. */
	destination?: DestinationStream;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	// Use pino-pretty for development
	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		});
	}

	if (config.destination) {
		return pino(options, config.destination);
	}

	return pino(options);
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
	return parent.child(bindings);
}

/**
 * Logger that discards everything. Handy as a default in tests.
 */
export function createSilentLogger(): Logger {
	return pino({ level: 'silent' });
}

/**
 * Bindings for a command or query dispatch
 */
export interface DispatchContext {
	executionId: string;
	correlationId: string;
	operation: string;
	principalId: string;
	orgId: string;
	[key: string]: unknown;
}

/**
 * Bindings for change feed processing
 */
export interface FeedContext {
	position: number;
	eventType: string;
	aggregateId: string;
	sequence: number;
	[key: string]: unknown;
}
