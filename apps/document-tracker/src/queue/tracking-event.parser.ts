import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';

import { CompletionMetadata } from '../database/models';
import { DocumentValidationError } from '../database/tracking.errors';
import { CompletionMetadataDto, TrackingEventEnvelopeDto } from './dto/tracking-event.dto';

/**
 * Decodes a stream record payload into a validated event envelope. The
 * `data` block is left untyped until the event type is known.
 */
export function parseTrackingEvent(payload: Uint8Array | string): TrackingEventEnvelopeDto {
    const text = typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8');

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new DocumentValidationError(
            `Event payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        );
    }

    return validateEventPart(TrackingEventEnvelopeDto, parsed, 'envelope');
}

export function validateEventPart<T extends object>(cls: ClassConstructor<T>, plain: unknown, part: string): T {
    if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
        throw new DocumentValidationError(`Event ${part} must be a JSON object`);
    }

    const instance = plainToInstance(cls, plain);
    const errors = validateSync(instance);
    if (errors.length > 0) {
        throw new DocumentValidationError(`Invalid event ${part}: ${describeValidationErrors(errors)}`);
    }
    return instance;
}

export function toCompletionMetadata(dto: CompletionMetadataDto | undefined): CompletionMetadata {
    if (!dto) {
        return {};
    }
    return {
        workflowExecutionArn: dto.WorkflowExecutionArn,
        workflowStatus: dto.WorkflowStatus,
        startTime: dto.StartTime,
        completionTime: dto.CompletionTime,
        pageCount: dto.PageCount,
        errorMessage: dto.ErrorMessage,
        outputUri: dto.OutputUri,
    };
}

function describeValidationErrors(errors: ValidationError[], parent = ''): string {
    return errors
        .flatMap((error) => {
            const own = Object.values(error.constraints ?? {}).map((message) => (parent ? `${parent}.${message}` : message));
            const nested = error.children?.length ? [describeValidationErrors(error.children, error.property)] : [];
            return [...own, ...nested];
        })
        .join('; ');
}
