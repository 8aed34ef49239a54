// src/utils/errors.ts

import type { ZodError } from 'zod';

export class WorkroomError extends Error {
    readonly status: number;
    readonly details?: unknown;

    constructor(message: string, status: number, details?: unknown) {
        super(message);
        this.name = 'WorkroomError';
        this.status = status;
        this.details = details;
    }
}

export class ValidationError extends WorkroomError {
    constructor(message: string, details?: unknown) {
        super(message, 400, details);
        this.name = 'ValidationError';
    }

    static fromZod(error: ZodError, what: string): ValidationError {
        const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        return new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, error.issues);
    }
}

export class NotFoundError extends WorkroomError {
    constructor(message: string) {
        super(message, 404);
        this.name = 'NotFoundError';
    }
}

export class ConflictError extends WorkroomError {
    constructor(message: string) {
        super(message, 409);
        this.name = 'ConflictError';
    }
}

/** Raised when a write to the data directory fails. Never swallowed. */
export class StorageError extends WorkroomError {
    constructor(message: string, cause?: unknown) {
        super(message, 500, cause instanceof Error ? cause.message : cause);
        this.name = 'StorageError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return typeof error === 'string' ? error : 'Unknown error';
}
