import { Injectable, Inject, Logger } from '@nestjs/common';
import {
    KinesisClient,
    PutRecordCommand,
    GetShardIteratorCommand,
    GetRecordsCommand,
    _Record,
} from '@aws-sdk/client-kinesis';

import { CompletionMetadata, DocumentOwner, DocumentStatus, ownerIdOf } from '../database/models';
import { describeError } from '../database/tracking.errors';
import { userIdFromObjectKey } from '../storage/user-object-key';
import {
    CompletionMetadataDto,
    DocumentUploadedDataDto,
    EventIdentityDto,
    StatusChangedDataDto,
    TrackingEventType,
} from './dto/tracking-event.dto';

export const EVENT_SOURCE = 'document-tracker';

export interface KinesisEvent<T = unknown> {
    eventType: string;
    data: T;
    timestamp: string;
    metadata?: Record<string, unknown>;
}

export interface PublishOptions<T> {
    streamName?: string;
    partitionKey: string;
    data: T;
    eventType: string;
}

export interface UploadEventOptions {
    identity?: EventIdentityDto;
    expiresAfter?: number;
}

export interface ShardReadResult {
    records: _Record[];
    nextShardIterator?: string;
    millisBehindLatest?: number;
}

@Injectable()
export class KinesisService {
    private readonly logger = new Logger(KinesisService.name);
    readonly streamName: string;

    constructor(
        @Inject('KINESIS_CLIENT')
        private readonly kinesisClient: KinesisClient,
    ) {
        this.streamName = process.env.KINESIS_STREAM_NAME || 'document-tracking-events';
    }

    /**
     * Dispatches a single event to the Kinesis stream, wrapped in the standard
     * envelope.
     */
    async publishEvent<T>(options: PublishOptions<T>): Promise<{ sequenceNumber: string; shardId: string }> {
        const { streamName = this.streamName, partitionKey, data, eventType } = options;

        try {
            const response = await this.kinesisClient.send(
                new PutRecordCommand({
                    StreamName: streamName,
                    PartitionKey: partitionKey,
                    Data: encodeEvent(eventType, data),
                }),
            );

            this.logger.log(`Event published to Kinesis: ${eventType} (Shard: ${response.ShardId})`);

            return {
                sequenceNumber: response.SequenceNumber || '',
                shardId: response.ShardId || '',
            };
        } catch (error) {
            this.logger.error(
                `Failed to publish event to Kinesis: ${describeError(error)}`,
                error instanceof Error ? error.stack : undefined,
            );
            throw new Error(`Kinesis publish failed: ${describeError(error)}`);
        }
    }

    /**
     * Announces a new upload. The owner is taken from a `users/<id>/` key
     * path; keys outside it are sent without UserId and will be tracked
     * under the identity claims, or as legacy documents.
     */
    async publishDocumentUploadEvent(
        objectKey: string,
        queuedTime: string,
        options: UploadEventOptions = {},
    ): Promise<DocumentUploadedDataDto> {
        const userId = userIdFromObjectKey(objectKey);
        if (userId === null) {
            this.logger.warn(`Upload key is not user-scoped; publishing without UserId: ${objectKey}`);
        }

        const data: DocumentUploadedDataDto = {
            ObjectKey: objectKey,
            QueuedTime: queuedTime,
            ...(userId !== null && { UserId: userId }),
            ...(options.identity && { Identity: options.identity }),
            ...(options.expiresAfter !== undefined && { ExpiresAfter: options.expiresAfter }),
        };

        await this.publishEvent({
            partitionKey: objectKey,
            eventType: TrackingEventType.DOCUMENT_UPLOADED,
            data,
        });
        return data;
    }

    /**
     * Reports a workflow status change for a tracked document. The partition
     * key is the object key so changes to one document stay ordered.
     */
    async publishStatusChangedEvent(
        objectKey: string,
        owner: DocumentOwner,
        status: DocumentStatus,
        metadata: CompletionMetadata = {},
    ): Promise<void> {
        const ownerId = ownerIdOf(owner);
        const metadataDto = toMetadataDto(metadata);
        const data: StatusChangedDataDto = {
            ObjectKey: objectKey,
            Status: status,
            ...(ownerId !== null && { UserId: ownerId }),
            ...(Object.keys(metadataDto).length > 0 && { Metadata: metadataDto }),
        };

        await this.publishEvent({
            partitionKey: objectKey,
            eventType: TrackingEventType.STATUS_CHANGED,
            data,
        });
    }

    async getShardIterator(
        streamName: string,
        shardId: string,
        iteratorType: 'TRIM_HORIZON' | 'LATEST' = 'LATEST',
    ): Promise<string | undefined> {
        try {
            const response = await this.kinesisClient.send(
                new GetShardIteratorCommand({
                    StreamName: streamName,
                    ShardId: shardId,
                    ShardIteratorType: iteratorType,
                }),
            );
            return response.ShardIterator;
        } catch (error) {
            this.logger.error(
                `Failed to get shard iterator: ${describeError(error)}`,
                error instanceof Error ? error.stack : undefined,
            );
            throw error;
        }
    }

    async getRecords(shardIterator: string, limit: number = 10): Promise<ShardReadResult> {
        try {
            const response = await this.kinesisClient.send(
                new GetRecordsCommand({
                    ShardIterator: shardIterator,
                    Limit: limit,
                }),
            );
            return {
                records: response.Records ?? [],
                nextShardIterator: response.NextShardIterator,
                millisBehindLatest: response.MillisBehindLatest,
            };
        } catch (error) {
            this.logger.error(
                `Failed to get records: ${describeError(error)}`,
                error instanceof Error ? error.stack : undefined,
            );
            throw error;
        }
    }
}

function encodeEvent<T>(eventType: string, data: T): Buffer {
    const event: KinesisEvent<T> = {
        eventType,
        data,
        timestamp: new Date().toISOString(),
        metadata: {
            source: EVENT_SOURCE,
        },
    };
    return Buffer.from(JSON.stringify(event));
}

function toMetadataDto(metadata: CompletionMetadata): CompletionMetadataDto {
    const dto: CompletionMetadataDto = {};
    if (metadata.workflowExecutionArn !== undefined) dto.WorkflowExecutionArn = metadata.workflowExecutionArn;
    if (metadata.workflowStatus !== undefined) dto.WorkflowStatus = metadata.workflowStatus;
    if (metadata.startTime !== undefined) dto.StartTime = metadata.startTime;
    if (metadata.completionTime !== undefined) dto.CompletionTime = metadata.completionTime;
    if (metadata.pageCount !== undefined) dto.PageCount = metadata.pageCount;
    if (metadata.errorMessage !== undefined) dto.ErrorMessage = metadata.errorMessage;
    if (metadata.outputUri !== undefined) dto.OutputUri = metadata.outputUri;
    return dto;
}
