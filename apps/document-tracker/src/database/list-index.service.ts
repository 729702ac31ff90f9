import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { DynamoDBDocumentClient, PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';

import trackingConfig from '../config/tracking.config';
import {
    ListEntry,
    ListEntryItem,
    TableKey,
    TrackingKeyGenerator,
    assertDate,
    assertQueuedTime,
    fromListEntryItem,
    toListEntryItem,
} from './models';
import { mergeSorted } from './merge-sorted';
import { DocumentValidationError } from './tracking.errors';
import { toStoreError } from './store-errors';

/**
 * Which list entries a query may return. A scoped listing only ever sees
 * entries carrying the same UserId; the unscoped listing is operational and
 * includes legacy entries without one.
 */
export type ListScope =
    | { kind: 'owner'; ownerId: string }
    | { kind: 'unscoped' };

export interface TimeRange {
    from: string;
    to: string;
}

export interface ShardRange {
    from: number;
    to: number;
}

export type ListedEntry = ListEntry & TableKey;

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_PAGE_SIZE = 100;

@Injectable()
export class ListIndexService {
    private readonly logger = new Logger(ListIndexService.name);
    private readonly tableName: string;
    private readonly shardCount: number;
    private readonly maxListDays: number;

    constructor(
        @Inject('DYNAMODB_CLIENT')
        private readonly dynamoClient: DynamoDBDocumentClient,
        @Inject(trackingConfig.KEY)
        config: ConfigType<typeof trackingConfig>,
    ) {
        this.tableName = config.tableName;
        this.shardCount = config.listShardCount;
        this.maxListDays = config.maxListDays;
    }

    get shards(): number {
        return this.shardCount;
    }

    /**
     * Writes the list entry for a document. Entries are immutable, so writing
     * the same entry twice leaves the table unchanged.
     */
    async append(entry: ListEntry): Promise<ListEntryItem> {
        const item = toListEntryItem(entry, this.shardCount);
        if (entry.owner.kind === 'legacy') {
            this.logger.warn(`Appending list entry without UserId (legacy): ${item.SK}`);
        }

        try {
            await this.dynamoClient.send(
                new PutCommand({
                    TableName: this.tableName,
                    Item: item,
                }),
            );
        } catch (error) {
            throw toStoreError('append', error);
        }

        this.logger.log(`Appended list entry: PK=${item.PK}, SK=${item.SK}`);
        return item;
    }

    /**
     * Lazily pages through one shard of one date, ascending by sort key.
     * The owner predicate is evaluated by the store, so other users' entries
     * never leave the table.
     */
    async *queryShard(
        scope: ListScope,
        date: string,
        shard: number,
        range: TimeRange,
        pageSize = DEFAULT_PAGE_SIZE,
    ): AsyncGenerator<ListedEntry> {
        assertDate(date);
        const expressionAttributeValues: Record<string, unknown> = {
            ':pk': TrackingKeyGenerator.listPartitionKey(date, shard),
            ':from': `ts#${range.from}`,
            // '~' sorts after '#', so entries queued exactly at range.to are included
            ':to': `ts#${range.to}~`,
        };
        if (scope.kind === 'owner') {
            expressionAttributeValues[':userId'] = scope.ownerId;
        }

        let exclusiveStartKey: Record<string, unknown> | undefined;
        do {
            let items: Array<Record<string, unknown>>;
            try {
                const result = await this.dynamoClient.send(
                    new QueryCommand({
                        TableName: this.tableName,
                        KeyConditionExpression: 'PK = :pk AND SK BETWEEN :from AND :to',
                        FilterExpression: scope.kind === 'owner' ? 'UserId = :userId' : undefined,
                        ExpressionAttributeValues: expressionAttributeValues,
                        ExclusiveStartKey: exclusiveStartKey,
                        Limit: pageSize,
                        ScanIndexForward: true,
                    }),
                );
                items = result.Items ?? [];
                exclusiveStartKey = result.LastEvaluatedKey;
            } catch (error) {
                throw toStoreError('query', error);
            }

            for (const item of items) {
                yield fromListEntryItem(item);
            }
        } while (exclusiveStartKey);
    }

    /**
     * Lists entries in a time range. Dates are visited in order and the shard
     * sequences of each date are merged, so the result is ascending by
     * queued time (then object key) across the whole range.
     *
     * `after` is the sort key of the last entry a previous call returned;
     * only entries sorting after it are listed.
     */
    async *query(
        scope: ListScope,
        range: TimeRange,
        shards?: ShardRange,
        after?: string,
    ): AsyncGenerator<ListedEntry> {
        this.assertRange(range);
        const shardRange = this.resolveShards(shards);

        let from = range.from;
        if (after !== undefined) {
            const resumeAt = TrackingKeyGenerator.queuedTimeOf(after);
            if (resumeAt > range.to) {
                return;
            }
            if (resumeAt > from) {
                from = resumeAt;
            }
        }
        const effective = { from, to: range.to };
        const dates = this.datesIn(effective);

        this.logger.log(
            `Listing ${scope.kind === 'owner' ? `owner ${scope.ownerId}` : 'all owners'}: ` +
            `${effective.from} → ${effective.to}, ${dates.length} date(s), shards ${shardRange.from}-${shardRange.to}`,
        );

        for (const date of dates) {
            const perShard: Array<AsyncIterable<ListedEntry>> = [];
            for (let shard = shardRange.from; shard <= shardRange.to; shard++) {
                perShard.push(this.queryShard(scope, date, shard, effective));
            }
            for await (const entry of mergeSorted(perShard, (listed) => listed.SK)) {
                if (after === undefined || entry.SK > after) {
                    yield entry;
                }
            }
        }
    }

    // Queued times are whole-second UTC strings, so they compare lexically
    private assertRange(range: TimeRange): void {
        assertQueuedTime(range.from);
        assertQueuedTime(range.to);
        if (range.from > range.to) {
            throw new DocumentValidationError(`Range start ${range.from} is after range end ${range.to}`);
        }
    }

    private datesIn(range: TimeRange): string[] {

        const first = Date.parse(`${range.from.slice(0, 10)}T00:00:00Z`);
        const last = Date.parse(`${range.to.slice(0, 10)}T00:00:00Z`);
        const days = Math.round((last - first) / DAY_MS) + 1;
        if (days > this.maxListDays) {
            throw new DocumentValidationError(`Range spans ${days} days; at most ${this.maxListDays} are allowed`);
        }

        return Array.from({ length: days }, (_, index) => new Date(first + index * DAY_MS).toISOString().slice(0, 10));
    }

    private resolveShards(shards?: ShardRange): ShardRange {
        if (!shards) {
            return { from: 0, to: this.shardCount - 1 };
        }
        const valid =
            Number.isInteger(shards.from) &&
            Number.isInteger(shards.to) &&
            shards.from >= 0 &&
            shards.from <= shards.to &&
            shards.to < this.shardCount;
        if (!valid) {
            throw new DocumentValidationError(
                `Shard range ${shards.from}-${shards.to} is outside 0-${this.shardCount - 1}`,
            );
        }
        return shards;
    }
}
