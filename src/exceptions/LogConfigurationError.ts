import type { ZodIssue } from 'zod';

export class LogConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LogConfigurationError';
    }

    /**
     * Builds an error listing every rejected configuration field
     * @param issues Issues reported by the configuration schema
     */
    static fromIssues(issues: ZodIssue[]): LogConfigurationError {
        const details = issues.map((issue) => {
            const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${field}: ${issue.message}`;
        });
        return new LogConfigurationError(`Invalid logger configuration - ${details.join('; ')}`);
    }
}
