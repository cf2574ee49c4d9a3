/**
 * Error taxonomy. The HTTP layer maps each class to a status code.
 */
export class AppError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Missing or invalid startup configuration. Fatal, never raised per request.
 */
export class ConfigurationError extends AppError {}

export class InvalidRequestError extends AppError {
    constructor(
        message: string,
        public readonly details: string[] = []
    ) {
        super(message);
    }
}

export class UserNotFoundError extends AppError {
    constructor(public readonly userId: string) {
        super(`User not found: ${userId}`);
    }
}

/**
 * Wraps whatever the generation client threw (network, quota, timeout, blocked reply)
 */
export class GenerationFailedError extends AppError {
    constructor(cause: unknown) {
        super(
            `Failed to generate recommendations: ${cause instanceof Error ? cause.message : "Unknown error"}`,
            { cause }
        );
    }
}

/**
 * The model reply could not be split into any task
 */
export class ParseAmbiguityError extends AppError {
    constructor(public readonly rawText: string) {
        super("Model reply contained no usable tasks");
    }
}
