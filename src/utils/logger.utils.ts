import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConsoleStyle, LogColor, LoggerConfig, LoggerDependencies, LogLevel, LogOutcome } from '@I/index';
import { FatalLogError, LogConfigurationError } from '@E/index';
import { isLogColor, isLogLevel, mergeConfig, resolveConfig } from '@U/config.utils';
import { ChalkConsoleSink, waitForKeyPress } from '@U/console.utils';
import { isDebuggerAttached } from '@U/debug.utils';
import { renderLogFormat } from '@U/format.utils';
import { renderFatalScreen } from '@U/template.utils';

const FATAL_SCREEN_FOREGROUND: LogColor = 'whiteBright';

/**
 * Capabilities used when none are injected: chalk-styled console,
 * key press on stdin, Node inspector detection and the system clock
 */
export function createDefaultDependencies(): LoggerDependencies {
    return {
        console: new ChalkConsoleSink(),
        acknowledge: waitForKeyPress,
        isDebugModeActive: isDebuggerAttached,
        now: () => new Date(),
    };
}

/**
 * Fills every missing or undefined capability with its default
 */
function withDefaultDependencies(dependencies: Partial<LoggerDependencies>): LoggerDependencies {
    const defaults = createDefaultDependencies();
    return {
        console: dependencies.console ?? defaults.console,
        acknowledge: dependencies.acknowledge ?? defaults.acknowledge,
        isDebugModeActive: dependencies.isDebugModeActive ?? defaults.isDebugModeActive,
        now: dependencies.now ?? defaults.now,
    };
}

/**
 * Synchronous console and file logger
 */
export class Logger {
    private config: LoggerConfig;
    private readonly dependencies: LoggerDependencies;

    constructor(config: Partial<LoggerConfig> = {}, dependencies: Partial<LoggerDependencies> = {}) {
        this.config = resolveConfig(config);
        this.dependencies = withDefaultDependencies(dependencies);
    }

    /**
     * Formats message and writes it to every enabled sink.
     *
     * DEBUG messages are dropped unless a debugger is attached. A FATAL
     * message either shows the fatal screen or goes to the console like any
     * other level, is appended to the log file, and then throws a
     * FatalLogError when fatalLogThrowsOnError is set.
     *
     * @throws LogConfigurationError when colors are enabled and the level has no color
     * @throws FatalLogError for FATAL messages when fatalLogThrowsOnError is set
     */
    log(message: string, level: LogLevel): LogOutcome {
        if (level === LogLevel.DEBUG && !this.dependencies.isDebugModeActive()) {
            return { status: 'skipped', level };
        }

        const line = renderLogFormat(this.config.logFormat, this.dependencies.now(), level, message);

        if (level === LogLevel.FATAL && this.config.showFatalErrorScreen) {
            this.showFatalScreen(line);
        } else if (this.config.logToConsole) {
            this.writeToConsole(level, line);
        }

        // the file gets the raw message, not the formatted line
        this.writeToFile(message);

        if (level === LogLevel.FATAL) {
            const error = new FatalLogError(message, line);
            if (this.config.fatalLogThrowsOnError) {
                throw error;
            }
            return { status: 'fatal', level, line, error };
        }

        return { status: 'logged', level, line };
    }

    info(message: string): LogOutcome {
        return this.log(message, LogLevel.INFO);
    }

    warn(message: string): LogOutcome {
        return this.log(message, LogLevel.WARN);
    }

    error(message: string): LogOutcome {
        return this.log(message, LogLevel.ERROR);
    }

    /**
     * Log fatal message. Throws a FatalLogError afterwards unless
     * fatalLogThrowsOnError is disabled.
     */
    fatal(message: string): LogOutcome {
        return this.log(message, LogLevel.FATAL);
    }

    success(message: string): LogOutcome {
        return this.log(message, LogLevel.SUCCESS);
    }

    /**
     * Log debug message, only while a debugger is attached
     */
    debug(message: string): LogOutcome {
        return this.log(message, LogLevel.DEBUG);
    }

    network(message: string): LogOutcome {
        return this.log(message, LogLevel.NETWORK);
    }

    /**
     * Apply a configuration update. A levelColors table replaces the current one.
     */
    configure(update: Partial<LoggerConfig>): void {
        this.config = mergeConfig(this.config, update);
    }

    /**
     * Set the console color of a single level
     */
    setLevelColor(level: LogLevel, color: LogColor): void {
        if (!isLogLevel(level)) {
            throw new LogConfigurationError(`Unknown log level: ${String(level)}`);
        }
        if (!isLogColor(color)) {
            throw new LogConfigurationError(`Unknown console color for ${level}: ${String(color)}`);
        }
        const levelColors = { ...this.config.levelColors };
        levelColors[level] = color;
        this.config.levelColors = levelColors;
    }

    /**
     * Get logger configuration
     */
    getConfig(): LoggerConfig {
        return { ...this.config, levelColors: { ...this.config.levelColors } };
    }

    /**
     * Get the absolute path of the log file
     */
    getLogFilePath(): string {
        return path.resolve(this.config.logFile);
    }

    private showFatalScreen(line: string): void {
        const style: ConsoleStyle = {
            foreground: FATAL_SCREEN_FOREGROUND,
            background: this.config.fatalErrorScreenColor,
        };

        this.dependencies.console.clear(style);
        for (const bannerLine of renderFatalScreen(line)) {
            this.dependencies.console.writeLine(bannerLine, style);
        }
        this.dependencies.acknowledge();
    }

    private writeToConsole(level: LogLevel, line: string): void {
        if (!this.config.useConsoleColors) {
            this.dependencies.console.writeLine(line);
            return;
        }

        const color = this.config.levelColors[level];
        if (color === undefined) {
            throw new LogConfigurationError(`No console color configured for level ${level}`);
        }
        this.dependencies.console.writeLine(line, { foreground: color });
    }

    private writeToFile(message: string): void {
        if (!this.config.logToFile) return;

        fs.appendFileSync(this.config.logFile, message + os.EOL, 'utf8');
    }
}

// Default logger instance
let defaultLogger: Logger | null = null;

/**
 * Get or create the default logger instance
 */
export function getLogger(config?: Partial<LoggerConfig>): Logger {
    if (!defaultLogger) {
        defaultLogger = new Logger(config);
    }
    return defaultLogger;
}

/**
 * Replace the default logger instance
 */
export function initializeLogger(config: Partial<LoggerConfig>, dependencies?: Partial<LoggerDependencies>): Logger {
    defaultLogger = new Logger(config, dependencies);
    return defaultLogger;
}

/**
 * Create a new logger instance (not the default one)
 */
export function createLogger(config?: Partial<LoggerConfig>, dependencies?: Partial<LoggerDependencies>): Logger {
    return new Logger(config, dependencies);
}

/**
 * Drop the default logger; the next getLogger() call starts from the defaults
 */
export function resetLogger(): void {
    defaultLogger = null;
}

export function configure(update: Partial<LoggerConfig>): void {
    getLogger().configure(update);
}

export function log(message: string, level: LogLevel): LogOutcome {
    return getLogger().log(message, level);
}

export function info(message: string): LogOutcome {
    return getLogger().info(message);
}

export function warn(message: string): LogOutcome {
    return getLogger().warn(message);
}

export function error(message: string): LogOutcome {
    return getLogger().error(message);
}

export function fatal(message: string): LogOutcome {
    return getLogger().fatal(message);
}

export function success(message: string): LogOutcome {
    return getLogger().success(message);
}

export function debug(message: string): LogOutcome {
    return getLogger().debug(message);
}

export function network(message: string): LogOutcome {
    return getLogger().network(message);
}
