// src/utils/errors.ts

/** Error that knows which HTTP status it maps to. */
export class HttpError extends Error {
    constructor(public readonly status: number, message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class NotFoundError extends HttpError {
    constructor(message: string) {
        super(404, message);
    }
}

/**
 * The loaded rows broke an ordering/shape contract the report relies on.
 * A defect in the loader, not something a caller can fix.
 */
export class InvariantViolationError extends HttpError {
    constructor(message: string) {
        super(500, message);
    }
}
