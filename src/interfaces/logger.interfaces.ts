import type { BackgroundColorName, ForegroundColorName } from 'chalk';
import type { FatalLogError } from '@E/FatalLogError';

/**
 * Severity of a log message. The value is what `{level}` renders as.
 */
export enum LogLevel {
    INFO = 'INFO',
    WARN = 'WARN',
    ERROR = 'ERROR',
    FATAL = 'FATAL',
    SUCCESS = 'SUCCESS',
    DEBUG = 'DEBUG', // only logged while a debugger is attached
    NETWORK = 'NETWORK',
}

export type LogColor = ForegroundColorName;

export type FatalScreenColor = BackgroundColorName;

export type LevelColors = Partial<Record<LogLevel, LogColor>>;

export interface LoggerConfig {
    logToFile: boolean;
    logFile: string;
    /** Supports {timestamp}, {timestamp:<pattern>}, {level} and {message} */
    logFormat: string;
    logToConsole: boolean;
    useConsoleColors: boolean;
    showFatalErrorScreen: boolean;
    fatalErrorScreenColor: FatalScreenColor;
    /** Throw a FatalLogError after a FATAL message has been written */
    fatalLogThrowsOnError: boolean;
    levelColors: LevelColors;
}

export interface ConsoleStyle {
    foreground?: LogColor;
    background?: FatalScreenColor;
}

/**
 * Console the logger writes to. A styled line must leave the console
 * with its colors reset once written.
 */
export interface ConsoleSink {
    writeLine(text: string, style?: ConsoleStyle): void;
    /** Clears the console, filling it with the style's colors when one is given */
    clear(style?: ConsoleStyle): void;
}

export interface LoggerDependencies {
    console: ConsoleSink;
    /** Blocks until the fatal screen has been acknowledged */
    acknowledge: () => void;
    isDebugModeActive: () => boolean;
    now: () => Date;
}

export type LogOutcome =
    | { status: 'skipped'; level: LogLevel }
    | { status: 'logged'; level: LogLevel; line: string }
    | { status: 'fatal'; level: LogLevel.FATAL; line: string; error: FatalLogError };
