export class ConfigError extends Error {
    public readonly field: string;
    public readonly code: string;

    constructor(field: string, message: string, code = 'INVALID_OPTION') {
        super(message);
        this.name = 'ConfigError';
        this.field = field;
        this.code = code;
    }
}

/**
 * Turns any thrown value into a single display line.
 */
export function formatError(error: unknown, context?: string): string {
    let message: string;

    if (error instanceof Error) {
        message = error.message;
    } else if (typeof error === 'string') {
        message = error;
    } else {
        message = 'An unexpected error occurred';
    }

    if (message.length > 500) {
        message = message.substring(0, 500) + '...';
    }

    return context ? `${context}: ${message}` : message;
}
