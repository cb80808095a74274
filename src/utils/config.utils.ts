import { z } from 'zod';
import { backgroundColorNames, foregroundColorNames } from 'chalk';
import { FatalScreenColor, LogColor, LoggerConfig, LogLevel } from '@I/index';
import { LogConfigurationError } from '@E/index';

export const DEFAULT_LEVEL_COLORS: Readonly<Record<LogLevel, LogColor>> = {
    [LogLevel.INFO]: 'whiteBright',
    [LogLevel.WARN]: 'yellowBright',
    [LogLevel.ERROR]: 'redBright',
    [LogLevel.FATAL]: 'red',
    [LogLevel.SUCCESS]: 'greenBright',
    [LogLevel.DEBUG]: 'gray',
    [LogLevel.NETWORK]: 'blueBright',
};

export const DEFAULT_CONFIG: Readonly<LoggerConfig> = {
    logToFile: true,
    logFile: '.log',
    logFormat: '{timestamp} [{level}] {message}',
    logToConsole: true,
    useConsoleColors: true,
    showFatalErrorScreen: true,
    fatalErrorScreenColor: 'bgRed',
    fatalLogThrowsOnError: true,
    levelColors: DEFAULT_LEVEL_COLORS,
};

export function isLogLevel(value: unknown): value is LogLevel {
    return Object.values(LogLevel).some((level) => level === value);
}

export function isLogColor(value: unknown): value is LogColor {
    return foregroundColorNames.some((name) => name === value);
}

export function isFatalScreenColor(value: unknown): value is FatalScreenColor {
    return backgroundColorNames.some((name) => name === value);
}

const logColorSchema = z.custom<LogColor>(isLogColor, 'Expected a console foreground color name');

const levelColorsSchema = z
    .object({
        [LogLevel.INFO]: logColorSchema.optional(),
        [LogLevel.WARN]: logColorSchema.optional(),
        [LogLevel.ERROR]: logColorSchema.optional(),
        [LogLevel.FATAL]: logColorSchema.optional(),
        [LogLevel.SUCCESS]: logColorSchema.optional(),
        [LogLevel.DEBUG]: logColorSchema.optional(),
        [LogLevel.NETWORK]: logColorSchema.optional(),
    })
    .strict();

export const loggerConfigSchema = z
    .object({
        logToFile: z.boolean(),
        logFile: z.string().min(1),
        logFormat: z.string(),
        logToConsole: z.boolean(),
        useConsoleColors: z.boolean(),
        showFatalErrorScreen: z.boolean(),
        fatalErrorScreenColor: z.custom<FatalScreenColor>(isFatalScreenColor, 'Expected a console background color name'),
        fatalLogThrowsOnError: z.boolean(),
        levelColors: levelColorsSchema,
    })
    .strict();

const configUpdateSchema = loggerConfigSchema.partial().strict();

/**
 * Checks an untrusted configuration update against the schema
 * @throws LogConfigurationError listing every rejected field
 */
export function validateConfigUpdate(update: unknown): Partial<LoggerConfig> {
    const parsed = configUpdateSchema.safeParse(update);
    if (!parsed.success) {
        throw LogConfigurationError.fromIssues(parsed.error.issues);
    }
    return parsed.data;
}

/**
 * Validates a configuration update and applies it on top of base.
 * A given levelColors table replaces the existing one as a whole.
 * @throws LogConfigurationError when the update or the merged result is invalid
 */
export function mergeConfig(base: LoggerConfig, update: Partial<LoggerConfig>): LoggerConfig {
    // explicit undefined values fail here as missing fields
    const merged = loggerConfigSchema.safeParse({ ...base, ...validateConfigUpdate(update) });
    if (!merged.success) {
        throw LogConfigurationError.fromIssues(merged.error.issues);
    }

    return merged.data;
}

/**
 * Builds a full configuration from the defaults and the given overrides
 */
export function resolveConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
    return mergeConfig(DEFAULT_CONFIG, config);
}
