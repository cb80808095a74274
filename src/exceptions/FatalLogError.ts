export class FatalLogError extends Error {
    constructor(
        readonly logMessage: string,
        readonly line: string
    ) {
        super(`Fatal error: ${logMessage}`);
        this.name = 'FatalLogError';
    }
}
