import { LogLevel } from '@I/index';

export const DEFAULT_TIMESTAMP_PATTERN = 'yyyy-MM-dd HH:mm:ss.fff';

const PLACEHOLDER_PATTERN = /\{(\w+)(?::([^}]*))?\}/g;
const TIMESTAMP_TOKEN_PATTERN = /yyyy|MM|dd|HH|mm|ss|fff/g;

function pad(value: number, width = 2): string {
    return String(value).padStart(width, '0');
}

/**
 * Formats a date in local time.
 * Supported tokens: yyyy, MM, dd, HH, mm, ss, fff (milliseconds)
 */
export function formatTimestamp(date: Date, pattern: string = DEFAULT_TIMESTAMP_PATTERN): string {
    const tokens: Record<string, string> = {
        yyyy: pad(date.getFullYear(), 4),
        MM: pad(date.getMonth() + 1),
        dd: pad(date.getDate()),
        HH: pad(date.getHours()),
        mm: pad(date.getMinutes()),
        ss: pad(date.getSeconds()),
        fff: pad(date.getMilliseconds(), 3),
    };

    return pattern.replace(TIMESTAMP_TOKEN_PATTERN, (token) => tokens[token] ?? token);
}

/**
 * Renders a log format template.
 *
 * Placeholders: `{timestamp}`, `{timestamp:<pattern>}`, `{level}` and `{message}`.
 * Anything else in braces is kept as written. The message is inserted verbatim;
 * braces inside it are not treated as placeholders.
 */
export function renderLogFormat(format: string, date: Date, level: LogLevel, message: string): string {
    return format.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string, pattern: string | undefined) => {
        switch (name) {
            case 'timestamp':
                return formatTimestamp(date, pattern ?? DEFAULT_TIMESTAMP_PATTERN);
            case 'level':
                return pattern === undefined ? level : placeholder;
            case 'message':
                return pattern === undefined ? message : placeholder;
            default:
                return placeholder;
        }
    });
}
