import pino, { type Logger, type LoggerOptions } from 'pino';

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
	SILENT: 'silent',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Replacement written in place of any redacted value.
 */
export const REDACTED = '[REDACTED]';

/**
 * Paths that never reach a log line unredacted. Covers the API key header
 * on traced requests and any credential object passed as a binding.
 */
export const REDACT_PATHS: readonly string[] = [
	'headers.authorization',
	'headers.Authorization',
	'*.headers.authorization',
	'*.headers.Authorization',
	'secret',
	'*.secret',
	'apiKey',
	'*.apiKey',
];

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	/** Log level */
	level: LogLevel;
	/** Service name for structured logs */
	serviceName: string;
	/** Whether to use pretty printing (dev only) */
	pretty?: boolean;
	/** Additional base context */
	base?: Record<string, unknown>;
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
		redact: {
			paths: [...REDACT_PATHS],
			censor: REDACTED,
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

	return pino(options);
}

/**
 * Create a logger that writes every line to the given sink instead of stdout.
 * Used by tests that assert on emitted log records.
 */
export function createLoggerToStream(config: LoggerConfig, stream: pino.DestinationStream): Logger {
	return pino(
		{
			level: config.level,
			base: { service: config.serviceName, ...config.base },
			formatters: {
				level: (label) => ({ level: label }),
			},
			redact: {
				paths: [...REDACT_PATHS],
				censor: REDACTED,
			},
		},
		stream,
	);
}

/**
 * Logger that discards everything.
 */
export function createSilentLogger(): Logger {
	return pino({ level: 'silent' });
}
