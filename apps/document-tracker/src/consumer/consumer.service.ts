import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';

import { ownerFromId } from '../database/models';
import {
    DocumentAlreadyExistsError,
    StoreUnavailableError,
    describeError,
    isRetryableError,
} from '../database/tracking.errors';
import { IdentityClaims, identityClaimsFrom } from '../identity/identity-claims';
import { IdentityResolverService } from '../identity/identity-resolver.service';
import {
    DocumentUploadedDataDto,
    StatusChangedDataDto,
    TrackingEventEnvelopeDto,
    TrackingEventType,
} from '../queue/dto/tracking-event.dto';
import { KinesisService } from '../queue/kinesis.service';
import { parseTrackingEvent, toCompletionMetadata, validateEventPart } from '../queue/tracking-event.parser';
import { DocumentLifecycleService } from '../tracking/document-lifecycle.service';

export type RecordOutcome = 'processed' | 'skipped' | 'dropped';

const SHARD_ID = 'shardId-000000000000';
const POLL_INTERVAL_MS = 2000;
const ERROR_BACKOFF_MS = 5000;

/**
 * Applies tracking events from the stream: upload notifications become
 * intakes, workflow status changes become advances.
 *
 * Failures that retrying cannot fix (malformed events, unknown documents,
 * rejected transitions) are logged and dropped. Store unavailability is
 * rethrown so the record is delivered again.
 */
@Injectable()
export class ConsumerService implements OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(ConsumerService.name);
    private isPolling = false;

    constructor(
        private readonly kinesisService: KinesisService,
        private readonly documentLifecycleService: DocumentLifecycleService,
        private readonly identityResolver: IdentityResolverService,
    ) { }

    onModuleInit() {
        // Deployed consumers run as the Lambda handler; polling is for local runs
        if (process.env.CONSUMER_POLLING_ENABLED === 'true') {
            this.startPolling();
        }
    }

    onModuleDestroy() {
        this.isPolling = false;
    }

    async handleRecord(payload: Uint8Array | string): Promise<RecordOutcome> {
        try {
            return await this.handleEvent(parseTrackingEvent(payload));
        } catch (error) {
            if (isRetryableError(error)) {
                this.logger.warn(`Retryable failure, record will be redelivered: ${describeError(error)}`);
                throw error;
            }
            this.logger.error(
                `Dropping tracking event: ${describeError(error)}`,
                error instanceof Error ? error.stack : undefined,
            );
            return 'dropped';
        }
    }

    async handleEvent(envelope: TrackingEventEnvelopeDto): Promise<RecordOutcome> {
        switch (envelope.eventType) {
            case TrackingEventType.DOCUMENT_UPLOADED:
                await this.onDocumentUploaded(validateEventPart(DocumentUploadedDataDto, envelope.data, 'data'));
                return 'processed';
            case TrackingEventType.STATUS_CHANGED:
                await this.onStatusChanged(validateEventPart(StatusChangedDataDto, envelope.data, 'data'));
                return 'processed';
            default:
                this.logger.debug(`Ignoring event type: ${envelope.eventType}`);
                return 'skipped';
        }
    }

    /**
     * Reads one batch from the shard and returns the iterator to continue
     * with. When a record fails retryably the current iterator is returned,
     * so the whole batch is read again; records already applied are then
     * rejected as duplicates or accepted as repeated statuses.
     */
    async pollOnce(shardIterator: string): Promise<string | undefined> {
        const response = await this.kinesisService.getRecords(shardIterator, 10);

        if (response.records.length > 0) {
            this.logger.log(`Received ${response.records.length} records`);
        }

        for (const record of response.records) {
            if (!record.Data) {
                continue;
            }
            try {
                await this.handleRecord(record.Data);
            } catch (error) {
                this.logger.warn(`Re-reading batch from sequence ${record.SequenceNumber}: ${describeError(error)}`);
                return shardIterator;
            }
        }

        return response.nextShardIterator;
    }

    /**
     * A partial intake is rethrown as retryable so the upload is delivered
     * again; the redelivery finds the record and rewrites the missing list
     * entry.
     */
    private async onDocumentUploaded(data: DocumentUploadedDataDto): Promise<void> {
        const identity = this.uploadIdentity(data);
        const result = await this.documentLifecycleService
            .intake({
                objectKey: data.ObjectKey,
                queuedTime: data.QueuedTime,
                identity,
                expiresAfter: data.ExpiresAfter,
            })
            .catch((error: unknown) => {
                if (error instanceof DocumentAlreadyExistsError) {
                    return null;
                }
                throw error;
            });

        if (result === null) {
            const item = await this.documentLifecycleService.repairListEntry(
                data.ObjectKey,
                this.identityResolver.resolveOwner(identity),
            );
            this.logger.warn(`Upload already tracked, list entry rewritten: ${data.ObjectKey} (${item.PK})`);
            return;
        }

        if (result.outcome === 'partial') {
            throw new StoreUnavailableError('append', result.listError);
        }
    }

    private async onStatusChanged(data: StatusChangedDataDto): Promise<void> {
        await this.documentLifecycleService.advance(
            data.ObjectKey,
            ownerFromId(data.UserId),
            data.Status,
            toCompletionMetadata(data.Metadata),
        );
    }

    /**
     * A UserId carried by the event was resolved upstream and wins over the
     * raw claims; otherwise the claims go through the identity resolver.
     */
    private uploadIdentity(data: DocumentUploadedDataDto): IdentityClaims {
        const claims = identityClaimsFrom(data.Identity);
        return data.UserId ? { ...claims, stableId: data.UserId } : claims;
    }

    private startPolling() {
        if (this.isPolling) return;
        this.isPolling = true;
        this.logger.log('Starting Kinesis consumer polling...');
        this.pollLoop().catch((error: unknown) => {
            this.isPolling = false;
            this.logger.error(
                `Consumer polling stopped: ${describeError(error)}`,
                error instanceof Error ? error.stack : undefined,
            );
        });
    }

    private async pollLoop() {
        let shardIterator: string | undefined;

        while (this.isPolling) {
            try {
                if (!shardIterator) {
                    this.logger.log('Acquiring new Kinesis shard iterator...');
                    shardIterator = await this.kinesisService.getShardIterator(
                        this.kinesisService.streamName,
                        SHARD_ID,
                        'LATEST',
                    );
                }

                if (shardIterator) {
                    shardIterator = await this.pollOnce(shardIterator);
                }

                await sleep(POLL_INTERVAL_MS);
            } catch (error) {
                this.logger.error(
                    `Error in polling loop: ${describeError(error)}`,
                    error instanceof Error ? error.stack : undefined,
                );

                // An expired iterator is re-acquired on the next pass
                if (error instanceof Error && error.name === 'ExpiredIteratorException') {
                    this.logger.warn('Shard iterator expired, will re-acquire...');
                    shardIterator = undefined;
                }

                await sleep(ERROR_BACKOFF_MS);
            }
        }
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
