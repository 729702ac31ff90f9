import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { DynamoDBDocumentClient, PutCommand, GetCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';

import trackingConfig from '../config/tracking.config';
import {
    CompletionMetadata,
    DocumentOwner,
    DocumentRecord,
    DocumentStatus,
    TrackingKeyGenerator,
    fromDocumentItem,
    metadataAttributes,
    toDocumentItem,
} from './models';
import { DocumentAlreadyExistsError, DocumentNotFoundError } from './tracking.errors';
import { isConditionalCheckFailure, toStoreError } from './store-errors';

export interface RecordChange {
    status: DocumentStatus;
    metadata?: CompletionMetadata;
}

/**
 * Point reads and writes of primary document records. Every key comes from
 * TrackingKeyGenerator.documentKeys, so a record created for a scoped owner
 * can only be found again with that same owner.
 */
@Injectable()
export class DocumentRecordService {
    private readonly logger = new Logger(DocumentRecordService.name);
    private readonly tableName: string;

    constructor(
        @Inject('DYNAMODB_CLIENT')
        private readonly dynamoClient: DynamoDBDocumentClient,
        @Inject(trackingConfig.KEY)
        config: ConfigType<typeof trackingConfig>,
    ) {
        this.tableName = config.tableName;
    }

    /**
     * Inserts a new record. Re-intake of a key that is already tracked is
     * rejected; status changes go through update().
     */
    async create(record: DocumentRecord): Promise<DocumentRecord> {
        const item = toDocumentItem(record);

        try {
            await this.dynamoClient.send(
                new PutCommand({
                    TableName: this.tableName,
                    Item: item,
                    ConditionExpression: 'attribute_not_exists(PK)',
                }),
            );
        } catch (error) {
            if (isConditionalCheckFailure(error)) {
                throw new DocumentAlreadyExistsError(record.objectKey, item.PK);
            }
            throw toStoreError('create', error);
        }

        this.logger.log(`Created document record: PK=${item.PK}, status=${item.ObjectStatus}`);
        return record;
    }

    /**
     * Sets the status and any completion metadata on an existing record and
     * returns the record as stored afterwards.
     */
    async update(objectKey: string, owner: DocumentOwner, change: RecordChange): Promise<DocumentRecord> {
        const keys = TrackingKeyGenerator.documentKeys(objectKey, owner);

        const updateExpressions: string[] = ['ObjectStatus = :ObjectStatus'];
        const expressionAttributeValues: Record<string, unknown> = {
            ':ObjectStatus': change.status,
        };

        Object.entries(metadataAttributes(change.metadata ?? {})).forEach(([key, value]) => {
            updateExpressions.push(`${key} = :${key}`);
            expressionAttributeValues[`:${key}`] = value;
        });

        try {
            const result = await this.dynamoClient.send(
                new UpdateCommand({
                    TableName: this.tableName,
                    Key: keys,
                    UpdateExpression: `SET ${updateExpressions.join(', ')}`,
                    ConditionExpression: 'attribute_exists(PK)',
                    ExpressionAttributeValues: expressionAttributeValues,
                    ReturnValues: 'ALL_NEW',
                }),
            );

            if (!result.Attributes) {
                throw new DocumentNotFoundError(objectKey, keys.PK);
            }

            this.logger.log(`Updated document record: PK=${keys.PK}, status=${change.status}`);
            return fromDocumentItem(result.Attributes);
        } catch (error) {
            if (isConditionalCheckFailure(error)) {
                throw new DocumentNotFoundError(objectKey, keys.PK);
            }
            throw toStoreError('update', error);
        }
    }

    async get(objectKey: string, owner: DocumentOwner): Promise<DocumentRecord | null> {
        const keys = TrackingKeyGenerator.documentKeys(objectKey, owner);

        let item: Record<string, unknown> | undefined;
        try {
            const result = await this.dynamoClient.send(
                new GetCommand({
                    TableName: this.tableName,
                    Key: keys,
                    ConsistentRead: true,
                }),
            );
            item = result.Item;
        } catch (error) {
            throw toStoreError('get', error);
        }

        return item ? fromDocumentItem(item) : null;
    }
}
