import { DocumentValidationError } from '../database/tracking.errors';
import { DocumentUploadedDataDto, StatusChangedDataDto } from './dto/tracking-event.dto';
import { parseTrackingEvent, toCompletionMetadata, validateEventPart } from './tracking-event.parser';

describe('tracking event parsing', () => {
    it('should decode a binary envelope', () => {
        const envelope = parseTrackingEvent(
            Buffer.from(JSON.stringify({ eventType: 'document.uploaded', data: { ObjectKey: 'a.pdf' } })),
        );

        expect(envelope.eventType).toBe('document.uploaded');
        expect(envelope.data).toEqual({ ObjectKey: 'a.pdf' });
    });

    it('should reject payloads that are not JSON objects', () => {
        expect(() => parseTrackingEvent('{')).toThrow(DocumentValidationError);
        expect(() => parseTrackingEvent('[]')).toThrow('Event envelope must be a JSON object');
    });

    it('should reject an envelope without data', () => {
        expect(() => parseTrackingEvent('{"eventType":"document.uploaded"}')).toThrow(
            'Invalid event envelope: data must be an object',
        );
    });

    it('should validate nested identity claims', () => {
        expect(() =>
            validateEventPart(
                DocumentUploadedDataDto,
                { ObjectKey: 'a.pdf', QueuedTime: '2025-10-17T10:00:00Z', Identity: { sub: 42 } },
                'data',
            ),
        ).toThrow('Identity.sub must be a string');
    });

    it('should map status change metadata to completion metadata', () => {
        const data = validateEventPart(
            StatusChangedDataDto,
            {
                ObjectKey: 'a.pdf',
                Status: 'FAILED',
                Metadata: { ErrorMessage: 'Page limit exceeded', PageCount: 0 },
            },
            'data',
        );

        expect(toCompletionMetadata(data.Metadata)).toEqual({ errorMessage: 'Page limit exceeded', pageCount: 0 });
        expect(toCompletionMetadata(undefined)).toEqual({});
    });
});
