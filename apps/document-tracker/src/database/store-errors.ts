import { StoreUnavailableError } from './tracking.errors';

interface AwsErrorShape {
    name: string;
    $fault?: string;
    $retryable?: unknown;
}

const TRANSIENT_ERROR_NAMES = new Set([
    'ProvisionedThroughputExceededException',
    'ThrottlingException',
    'RequestLimitExceeded',
    'InternalServerError',
    'ServiceUnavailable',
    'TimeoutError',
    'ECONNRESET',
    'ETIMEDOUT',
]);

function isAwsError(error: unknown): error is AwsErrorShape {
    return typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string';
}

export function isConditionalCheckFailure(error: unknown): boolean {
    return isAwsError(error) && error.name === 'ConditionalCheckFailedException';
}

export function isTransientStoreError(error: unknown): boolean {
    if (!isAwsError(error)) {
        return false;
    }
    return TRANSIENT_ERROR_NAMES.has(error.name) || error.$retryable !== undefined || error.$fault === 'server';
}

/**
 * Converts throttling and server-side faults into StoreUnavailableError.
 * Anything else (conditional failures, validation errors) is returned unchanged.
 */
export function toStoreError(operation: string, error: unknown): unknown {
    return isTransientStoreError(error) ? new StoreUnavailableError(operation, error) : error;
}
