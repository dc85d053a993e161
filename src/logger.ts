/**
 * @file Leveled, context-tagged logger shared by repositories, sessions and providers.
 */

/**
 * Log levels, lowest to highest priority.
 */
export enum LogLevel {
	ALL = 0,
	DEBUG = 10,
	INFO = 20,
	WARN = 30,
	ERROR = 40,
	/** Disables all output */
	OFF = 50
}

/**
 * A single log record handed to the formatter and handler.
 */
export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	message: string;
	/** Component that emitted the entry, e.g. `Session` */
	context?: string;
	data?: unknown;
}

export interface LoggerConfig {
	/** Minimum level written (default: INFO) */
	level?: LogLevel;
	/** Write to the console (default: true) */
	console?: boolean;
	formatter?: (entry: LogEntry) => string;
	/** Replaces console output entirely when given */
	handler?: (entry: LogEntry) => void;
}

/**
 * Logger bound to one component name, as returned by {@link getLogger}.
 */
export interface ContextLogger {
	debug(message: string, data?: unknown): void;
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, data?: unknown): void;
}

const defaultFormatter = (entry: LogEntry): string => {
	const timestamp = entry.timestamp.toISOString();
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data !== undefined ? ` ${JSON.stringify(entry.data)}` : '';
	return `${timestamp} ${level} ${context}${entry.message}${data}`;
};

/**
 * Resolves a level from its case-insensitive name (`'debug'`, `'WARN'`, ...).
 * Returns undefined for unknown names.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
	switch (name.trim().toUpperCase()) {
		case 'ALL': return LogLevel.ALL;
		case 'DEBUG': return LogLevel.DEBUG;
		case 'INFO': return LogLevel.INFO;
		case 'WARN': return LogLevel.WARN;
		case 'ERROR': return LogLevel.ERROR;
		case 'OFF': return LogLevel.OFF;
		default: return undefined;
	}
}

export class Logger {
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			level: config.level ?? LogLevel.INFO,
			console: config.console ?? true,
			formatter: config.formatter ?? defaultFormatter,
			handler: config.handler ?? this.writeToConsole.bind(this)
		};
	}

	/**
	 * Merges the given options into the current configuration.
	 */
	configure(config: Partial<LoggerConfig>): void {
		this.config = {
			level: config.level ?? this.config.level,
			console: config.console ?? this.config.console,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	isEnabled(level: LogLevel): boolean {
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	private writeToConsole(entry: LogEntry): void {
		if (!this.config.console) return;

		const line = this.config.formatter(entry);

		switch (entry.level) {
			case LogLevel.ERROR:
				console.error(line);
				break;
			case LogLevel.WARN:
				console.warn(line);
				break;
			case LogLevel.DEBUG:
				console.debug(line);
				break;
			default:
				console.log(line);
				break;
		}
	}

	private log(level: LogLevel, message: string, context?: string, data?: unknown): void {
		if (!this.isEnabled(level)) return;

		this.config.handler({
			timestamp: new Date(),
			level,
			message,
			context,
			data
		});
	}

	debug(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, message, context, data);
	}

	info(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.INFO, message, context, data);
	}

	warn(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.WARN, message, context, data);
	}

	error(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.ERROR, message, context, data);
	}
}

/**
 * Process-wide logger every component writes through.
 */
export const globalLogger = new Logger();

/**
 * Returns a logger that tags every entry with `context`.
 */
export function getLogger(context?: string): ContextLogger {
	return {
		debug: (message, data) => globalLogger.debug(message, context, data),
		info: (message, data) => globalLogger.info(message, context, data),
		warn: (message, data) => globalLogger.warn(message, context, data),
		error: (message, data) => globalLogger.error(message, context, data)
	};
}
