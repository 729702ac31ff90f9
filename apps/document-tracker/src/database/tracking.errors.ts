import {
    BadRequestException,
    ConflictException,
    NotFoundException,
    ServiceUnavailableException,
} from '@nestjs/common';

/**
 * Missing or malformed input (object key, queued time, owner id, list range).
 * Surfaced to the caller as-is and never retried.
 */
export class DocumentValidationError extends BadRequestException {
    constructor(message: string) {
        super(message);
    }
}

/**
 * No record exists at the derived key. Callers must not treat this as a
 * signal to create the record: a miss usually means the owner used to derive
 * the key differs from the one used at intake.
 */
export class DocumentNotFoundError extends NotFoundException {
    constructor(
        readonly objectKey: string,
        readonly partitionKey: string,
    ) {
        super(`Document not found: ${objectKey} (PK=${partitionKey})`);
    }
}

export class DocumentAlreadyExistsError extends ConflictException {
    constructor(
        readonly objectKey: string,
        readonly partitionKey: string,
    ) {
        super(`Document already tracked: ${objectKey} (PK=${partitionKey})`);
    }
}

export class InvalidTransitionError extends ConflictException {
    constructor(
        readonly from: string,
        readonly to: string,
    ) {
        super(`Invalid status transition: ${from} → ${to}`);
    }
}

/**
 * The tracking store throttled the request or failed server-side.
 * The operation had no effect and may be retried with backoff by the caller.
 */
export class StoreUnavailableError extends ServiceUnavailableException {
    readonly retryable = true;

    constructor(operation: string, cause: unknown) {
        super(`Tracking store unavailable during ${operation}: ${describeError(cause)}`, { cause });
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isRetryableError(error: unknown): boolean {
    return error instanceof StoreUnavailableError;
}
