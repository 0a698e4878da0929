/**
 * Custom error types for the Founder Finder CLI
 */

/**
 * Base error class for Founder Finder errors
 */
export class FounderFinderError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FounderFinderError';
        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * Error thrown when an API key is missing or invalid
 */
export class ApiKeyError extends FounderFinderError {
    public readonly keyNames: string[];

    constructor(keyNames: string[], message?: string) {
        const defaultMessage = `Missing API key${keyNames.length === 1 ? '' : 's'}: ${keyNames.join(', ')}\n` +
            'Run: founders init';
        super(message || defaultMessage);
        this.name = 'ApiKeyError';
        this.keyNames = keyNames;
    }
}

/**
 * Error thrown when configuration is invalid or incomplete
 */
export class ConfigError extends FounderFinderError {
    public readonly configKey?: string;

    constructor(message: string, configKey?: string) {
        super(message);
        this.name = 'ConfigError';
        this.configKey = configKey;
    }
}

/**
 * Error thrown when the company list or an expected-results file cannot be read
 */
export class InputFileError extends FounderFinderError {
    public readonly filePath: string;

    constructor(filePath: string, message?: string) {
        super(message || `${filePath} not found`);
        this.name = 'InputFileError';
        this.filePath = filePath;
    }
}

/**
 * Error raised inside the research agent when the model or a tool misbehaves
 */
export class AgentError extends FounderFinderError {
    public readonly turn?: number;

    constructor(message: string, turn?: number) {
        super(message);
        this.name = 'AgentError';
        this.turn = turn;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
