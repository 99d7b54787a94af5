import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
};

export const LOG_LEVEL_NAMES: readonly string[] = Object.keys(LOG_LEVELS);

/**
 * Leveled console logger for conversion diagnostics. Children share the
 * parent's level at creation time and prepend their prefix to every message.
 * The "error" level only silences warnings: failures travel as thrown
 * ConversionErrors and the command line reports them.
 */
export class Logger {
	private level: LogLevel = "info";
	private prefix = "";

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
	}

	private formatMessage(message: string): string {
		return this.prefix ? `[${this.prefix}] ${message}` : message;
	}

	debug(message: string): void {
		if (this.shouldLog("debug")) console.log(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
	}

	info(message: string): void {
		if (this.shouldLog("info")) console.log(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
	}

	/** Warnings go to stderr. */
	warn(message: string): void {
		if (this.shouldLog("warn")) console.warn(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
	}

	child(prefix: string): Logger {
		const child = new Logger();
		child.level = this.level;
		child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
		return child;
	}
}

export const logger = new Logger();
