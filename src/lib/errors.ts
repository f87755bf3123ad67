export type FieldErrors = Record<string, string>;

/**
 * Base for every error a handler, hook or policy may throw on purpose.
 * The app's error handler turns these into the response envelope as-is.
 */
export class AppError extends Error {
    constructor(
        message: string,
        readonly statusCode: number,
        readonly details?: Record<string, unknown>,
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationError extends AppError {
    constructor(readonly fields: FieldErrors) {
        super("Validation failed", 400);
    }
}

export class BadRequestError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 400, details);
    }
}

/** Duplicate signup, RSVP or membership. Reported as 400 like other client errors. */
export class ConflictError extends AppError {
    constructor(message: string) {
        super(message, 400);
    }
}

export class AuthenticationError extends AppError {
    constructor(message = "Authentication required") {
        super(message, 401);
    }
}

export class AuthorizationError extends AppError {
    constructor(message = "You do not have permission to access this resource") {
        super(message, 403);
    }
}

export class NotFoundError extends AppError {
    constructor(message = "The requested resource was not found") {
        super(message, 404);
    }
}

export class InternalError extends AppError {
    constructor(message = "An unexpected error occurred") {
        super(message, 500);
    }
}

export function isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
}
