import { createHash } from 'crypto';
import { DocumentValidationError } from './tracking.errors';

/**
 * Who a document belongs to, as far as key derivation is concerned.
 *
 * A scoped owner puts the record under `user#<ownerId>#doc#<objectKey>`;
 * legacy documents (no resolved identity) live under `doc#<objectKey>`.
 * Every read and write path carries this value explicitly so the same
 * document is always addressed with the same key.
 */
export type DocumentOwner =
    | { kind: 'scoped'; ownerId: string }
    | { kind: 'legacy' };

export const LEGACY_OWNER: DocumentOwner = { kind: 'legacy' };

export function scopedOwner(ownerId: string): DocumentOwner {
    return { kind: 'scoped', ownerId };
}

/** Maps an optional owner id (as carried in events and records) to an owner. */
export function ownerFromId(ownerId: string | null | undefined): DocumentOwner {
    return ownerId ? scopedOwner(ownerId) : LEGACY_OWNER;
}

export function ownerIdOf(owner: DocumentOwner): string | null {
    return owner.kind === 'scoped' ? owner.ownerId : null;
}

export enum DocumentStatus {
    QUEUED = 'QUEUED',
    RUNNING = 'RUNNING',
    COMPLETED = 'COMPLETED',
    FAILED = 'FAILED',
    ABORTED = 'ABORTED',
}

/**
 * Attributes attached to a record by workflow status callbacks.
 */
export interface CompletionMetadata {
    workflowExecutionArn?: string;
    workflowStatus?: string;
    startTime?: string;
    completionTime?: string;
    pageCount?: number;
    errorMessage?: string;
    outputUri?: string;
}

export interface DocumentRecord {
    objectKey: string;
    owner: DocumentOwner;
    status: DocumentStatus;
    queuedTime: string;
    expiresAfter?: number;
    metadata: CompletionMetadata;
}

export interface ListEntry {
    objectKey: string;
    owner: DocumentOwner;
    queuedTime: string;
    expiresAfter?: number;
}

/**
 * Primary record item as stored in the tracking table.
 */
export interface DocumentItem {
    PK: string; // Format: user#<ownerId>#doc#<objectKey> or doc#<objectKey>
    SK: string; // Always 'none'
    ObjectKey: string;
    UserId?: string;
    ObjectStatus: DocumentStatus;
    QueuedTime: string;
    ExpiresAfter?: number;
    WorkflowExecutionArn?: string;
    WorkflowStatus?: string;
    StartTime?: string;
    CompletionTime?: string;
    PageCount?: number;
    ErrorMessage?: string;
    OutputUri?: string;
}

/**
 * List index item, one per document, bucketed by date and shard.
 */
export interface ListEntryItem {
    PK: string; // Format: list#<YYYY-MM-DD>#s#<NN>
    SK: string; // Format: ts#<QueuedTime>#id#<objectKey>
    ObjectKey: string;
    UserId?: string;
    QueuedTime: string;
    ExpiresAfter?: number;
}

export interface TableKey {
    PK: string;
    SK: string;
}

export interface DerivedKeys {
    record: TableKey;
    listEntry: TableKey;
}

const RECORD_SORT_KEY = 'none';
const QUEUED_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * The single implementation of key construction for the tracking table.
 * Every service that reads or writes a record or list entry goes through here.
 */
export class TrackingKeyGenerator {
    /**
     * Escapes the key separator inside a key component. '%' is escaped first
     * so the encoding stays reversible: '%' → '%25', '#' → '%23'.
     */
    static escapeComponent(value: string): string {
        return value.replace(/%/g, '%25').replace(/#/g, '%23');
    }

    static documentKeys(objectKey: string, owner: DocumentOwner): TableKey {
        assertObjectKey(objectKey);
        const objectPart = TrackingKeyGenerator.escapeComponent(objectKey);

        if (owner.kind === 'legacy') {
            return { PK: `doc#${objectPart}`, SK: RECORD_SORT_KEY };
        }

        if (owner.ownerId.length === 0) {
            throw new DocumentValidationError('Owner id must be a non-empty string');
        }
        const ownerPart = TrackingKeyGenerator.escapeComponent(owner.ownerId);
        return { PK: `user#${ownerPart}#doc#${objectPart}`, SK: RECORD_SORT_KEY };
    }

    static listPartitionKey(date: string, shard: number): string {
        return `list#${date}#s#${TrackingKeyGenerator.formatShard(shard)}`;
    }

    static listSortKey(queuedTime: string, objectKey: string): string {
        return `ts#${queuedTime}#id#${TrackingKeyGenerator.escapeComponent(objectKey)}`;
    }

    /** Reads the queued time back out of a list sort key. */
    static queuedTimeOf(listSortKey: string): string {
        const match = /^ts#([^#]+)#id#./.exec(listSortKey);
        if (!match) {
            throw new DocumentValidationError(`Not a list sort key: ${listSortKey}`);
        }
        assertQueuedTime(match[1]);
        return match[1];
    }

    static listEntryKeys(objectKey: string, queuedTime: string, shardCount: number): TableKey {
        assertObjectKey(objectKey);
        assertQueuedTime(queuedTime);
        const shard = TrackingKeyGenerator.shardFor(objectKey, shardCount);

        return {
            PK: TrackingKeyGenerator.listPartitionKey(queuedTime.slice(0, 10), shard),
            SK: TrackingKeyGenerator.listSortKey(queuedTime, objectKey),
        };
    }

    static derive(
        objectKey: string,
        owner: DocumentOwner,
        queuedTime: string,
        shardCount: number,
    ): DerivedKeys {
        return {
            record: TrackingKeyGenerator.documentKeys(objectKey, owner),
            listEntry: TrackingKeyGenerator.listEntryKeys(objectKey, queuedTime, shardCount),
        };
    }

    /**
     * Spreads the uploads of one date across `shardCount` list partitions.
     * Only used for load fan-out; unrelated keys sharing a shard is expected.
     */
    static shardFor(objectKey: string, shardCount: number): number {
        if (!Number.isInteger(shardCount) || shardCount < 1) {
            throw new DocumentValidationError(`Shard count must be a positive integer, got ${shardCount}`);
        }
        const digest = createHash('sha256').update(objectKey, 'utf8').digest();
        return digest.readUInt32BE(0) % shardCount;
    }

    static formatShard(shard: number): string {
        return shard.toString().padStart(2, '0');
    }

    static generateTTL(fromIso: string, days: number): number {
        return Math.floor(Date.parse(fromIso) / 1000) + days * 24 * 60 * 60;
    }
}

export function assertObjectKey(objectKey: string): void {
    if (typeof objectKey !== 'string' || objectKey.length === 0) {
        throw new DocumentValidationError('ObjectKey must be a non-empty string');
    }
}

/**
 * Queued times go into sort keys verbatim, so only one form is accepted:
 * UTC 'Z', whole seconds. '.' sorts before 'Z', so a fractional time would
 * order ahead of the same whole second.
 */
export function assertQueuedTime(queuedTime: string): void {
    if (typeof queuedTime !== 'string' || !QUEUED_TIME_PATTERN.test(queuedTime)) {
        throw new DocumentValidationError(
            `QueuedTime must be an ISO-8601 UTC timestamp in whole seconds (YYYY-MM-DDTHH:MM:SSZ), got: ${String(queuedTime)}`,
        );
    }
    if (Number.isNaN(Date.parse(queuedTime))) {
        throw new DocumentValidationError(`QueuedTime is not a valid date: ${queuedTime}`);
    }
}

/** Formats an instant as a queued time, dropping the milliseconds. */
export function toQueuedTime(instant: Date): string {
    return `${instant.toISOString().slice(0, 19)}Z`;
}

export function assertDate(date: string): void {
    if (!DATE_PATTERN.test(date) || Number.isNaN(Date.parse(`${date}T00:00:00Z`))) {
        throw new DocumentValidationError(`Invalid date: ${date}`);
    }
}

export function toDocumentItem(record: DocumentRecord): DocumentItem {
    const keys = TrackingKeyGenerator.documentKeys(record.objectKey, record.owner);
    const item: DocumentItem = {
        ...keys,
        ObjectKey: record.objectKey,
        ObjectStatus: record.status,
        QueuedTime: record.queuedTime,
    };

    const ownerId = ownerIdOf(record.owner);
    if (ownerId !== null) {
        item.UserId = ownerId;
    }
    if (record.expiresAfter !== undefined) {
        item.ExpiresAfter = record.expiresAfter;
    }

    return { ...item, ...metadataAttributes(record.metadata) };
}

export function metadataAttributes(metadata: CompletionMetadata): Partial<DocumentItem> {
    const attributes: Partial<DocumentItem> = {};
    if (metadata.workflowExecutionArn !== undefined) attributes.WorkflowExecutionArn = metadata.workflowExecutionArn;
    if (metadata.workflowStatus !== undefined) attributes.WorkflowStatus = metadata.workflowStatus;
    if (metadata.startTime !== undefined) attributes.StartTime = metadata.startTime;
    if (metadata.completionTime !== undefined) attributes.CompletionTime = metadata.completionTime;
    if (metadata.pageCount !== undefined) attributes.PageCount = metadata.pageCount;
    if (metadata.errorMessage !== undefined) attributes.ErrorMessage = metadata.errorMessage;
    if (metadata.outputUri !== undefined) attributes.OutputUri = metadata.outputUri;
    return attributes;
}

export function toListEntryItem(entry: ListEntry, shardCount: number): ListEntryItem {
    const keys = TrackingKeyGenerator.listEntryKeys(entry.objectKey, entry.queuedTime, shardCount);
    const item: ListEntryItem = {
        ...keys,
        ObjectKey: entry.objectKey,
        QueuedTime: entry.queuedTime,
    };

    const ownerId = ownerIdOf(entry.owner);
    if (ownerId !== null) {
        item.UserId = ownerId;
    }
    if (entry.expiresAfter !== undefined) {
        item.ExpiresAfter = entry.expiresAfter;
    }
    return item;
}

/**
 * Reads a primary record back from a raw table item. Attributes with an
 * unexpected type are dropped rather than trusted.
 */
export function fromDocumentItem(item: Record<string, unknown>): DocumentRecord {
    const objectKey = stringAttribute(item, 'ObjectKey');
    const queuedTime = stringAttribute(item, 'QueuedTime');
    const status = item.ObjectStatus;
    if (objectKey === undefined || queuedTime === undefined || !isDocumentStatus(status)) {
        throw new Error(`Malformed document item: PK=${String(item.PK)}`);
    }

    const metadata: CompletionMetadata = {
        workflowExecutionArn: stringAttribute(item, 'WorkflowExecutionArn'),
        workflowStatus: stringAttribute(item, 'WorkflowStatus'),
        startTime: stringAttribute(item, 'StartTime'),
        completionTime: stringAttribute(item, 'CompletionTime'),
        pageCount: numberAttribute(item, 'PageCount'),
        errorMessage: stringAttribute(item, 'ErrorMessage'),
        outputUri: stringAttribute(item, 'OutputUri'),
    };

    return {
        objectKey,
        owner: ownerFromId(stringAttribute(item, 'UserId')),
        status,
        queuedTime,
        expiresAfter: numberAttribute(item, 'ExpiresAfter'),
        metadata,
    };
}

export function fromListEntryItem(item: Record<string, unknown>): ListEntry & TableKey {
    const pk = stringAttribute(item, 'PK');
    const sk = stringAttribute(item, 'SK');
    const objectKey = stringAttribute(item, 'ObjectKey');
    const queuedTime = stringAttribute(item, 'QueuedTime');
    if (pk === undefined || sk === undefined || objectKey === undefined || queuedTime === undefined) {
        throw new Error(`Malformed list entry item: PK=${String(item.PK)}, SK=${String(item.SK)}`);
    }

    return {
        PK: pk,
        SK: sk,
        objectKey,
        queuedTime,
        owner: ownerFromId(stringAttribute(item, 'UserId')),
        expiresAfter: numberAttribute(item, 'ExpiresAfter'),
    };
}

const DOCUMENT_STATUSES: readonly string[] = Object.values(DocumentStatus);

export function isDocumentStatus(value: unknown): value is DocumentStatus {
    return typeof value === 'string' && DOCUMENT_STATUSES.includes(value);
}

function stringAttribute(item: Record<string, unknown>, name: string): string | undefined {
    const value = item[name];
    return typeof value === 'string' ? value : undefined;
}

function numberAttribute(item: Record<string, unknown>, name: string): number | undefined {
    const value = item[name];
    return typeof value === 'number' ? value : undefined;
}

