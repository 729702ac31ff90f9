import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';

import trackingConfig from '../config/tracking.config';
import { DocumentRecordService } from '../database/document-record.service';
import { ListIndexService, ListScope, ListedEntry, ShardRange, TimeRange } from '../database/list-index.service';
import {
    CompletionMetadata,
    DocumentOwner,
    DocumentRecord,
    DocumentStatus,
    ListEntryItem,
    TrackingKeyGenerator,
    ownerIdOf,
} from '../database/models';
import { DocumentNotFoundError, DocumentValidationError, describeError } from '../database/tracking.errors';
import { IdentityClaims } from '../identity/identity-claims';
import { IdentityResolverService } from '../identity/identity-resolver.service';
import { DocumentStatusMachine } from './document-status-machine';

export interface IntakeRequest {
    objectKey: string;
    queuedTime: string;
    identity: IdentityClaims;
    expiresAfter?: number;
}

/**
 * `partial` means the record was written but its list entry was not: the
 * document is fetchable by key yet missing from time-range listings until
 * repairListEntry() runs.
 */
export interface IntakeResult {
    outcome: 'created' | 'partial';
    objectKey: string;
    ownerId: string | null;
    listError?: string;
}

export interface ListedDocument {
    entry: ListedEntry;
    record: DocumentRecord | null;
}

/**
 * Entry point for upload intake, workflow status callbacks and read queries.
 */
@Injectable()
export class DocumentLifecycleService {
    private readonly logger = new Logger(DocumentLifecycleService.name);
    private readonly shardCount: number;
    private readonly retentionDays: number;

    constructor(
        private readonly identityResolver: IdentityResolverService,
        private readonly documentRecordService: DocumentRecordService,
        private readonly listIndexService: ListIndexService,
        @Inject(trackingConfig.KEY)
        config: ConfigType<typeof trackingConfig>,
    ) {
        this.shardCount = config.listShardCount;
        this.retentionDays = config.retentionDays;
    }

    /**
     * Starts tracking an uploaded document: primary record first, then its
     * list entry. The two writes are not atomic; a failed list write is
     * reported as a partial intake rather than rolled back.
     */
    async intake(request: IntakeRequest): Promise<IntakeResult> {
        const { objectKey, queuedTime } = request;
        const owner = this.identityResolver.resolveOwner(request.identity);

        // Derive both keys up front so malformed input fails before any write
        const keys = TrackingKeyGenerator.derive(objectKey, owner, queuedTime, this.shardCount);
        const expiresAfter = this.expiryFor(queuedTime, request.expiresAfter);
        const ownerId = ownerIdOf(owner);

        this.logger.log(`Intake: ${objectKey} queued at ${queuedTime} (PK=${keys.record.PK})`);

        await this.documentRecordService.create({
            objectKey,
            owner,
            status: DocumentStatus.QUEUED,
            queuedTime,
            expiresAfter,
            metadata: {},
        });

        try {
            await this.listIndexService.append({ objectKey, owner, queuedTime, expiresAfter });
        } catch (error) {
            this.logger.error(
                `Partial intake for ${objectKey}: record written, list entry ${keys.listEntry.PK} failed`,
                error instanceof Error ? error.stack : undefined,
            );
            return { outcome: 'partial', objectKey, ownerId, listError: describeError(error) };
        }

        return { outcome: 'created', objectKey, ownerId };
    }

    /**
     * Moves a record to a later status and attaches workflow metadata.
     * The owner must be the one the document was taken in with.
     *
     * Repeating the current status writes nothing and returns the record as
     * stored, so a redelivered callback cannot overwrite the metadata of a
     * finished document.
     */
    async advance(
        objectKey: string,
        owner: DocumentOwner,
        status: DocumentStatus,
        metadata: CompletionMetadata = {},
    ): Promise<DocumentRecord> {
        const current = await this.fetch(objectKey, owner);
        if (current.status === status) {
            this.logger.warn(`${objectKey} is already ${status}; ignoring repeated status`);
            return current;
        }
        DocumentStatusMachine.validateTransition(current.status, status);

        const updated = await this.documentRecordService.update(objectKey, owner, { status, metadata });
        this.logger.log(`Advanced ${objectKey}: ${current.status} → ${updated.status}`);
        return updated;
    }

    async fetch(objectKey: string, owner: DocumentOwner): Promise<DocumentRecord> {
        const record = await this.documentRecordService.get(objectKey, owner);
        if (!record) {
            throw new DocumentNotFoundError(objectKey, TrackingKeyGenerator.documentKeys(objectKey, owner).PK);
        }
        return record;
    }

    /**
     * Lists one owner's documents in a time range, resolving every list entry
     * through its primary record. Entries whose record is gone are still
     * yielded, with `record: null`. `after` resumes behind the sort key of
     * an entry an earlier page ended on.
     */
    listDocuments(
        ownerId: string,
        range: TimeRange,
        shards?: ShardRange,
        after?: string,
    ): AsyncGenerator<ListedDocument> {
        return this.resolveEntries({ kind: 'owner', ownerId }, range, shards, after);
    }

    /**
     * Operational listing across all owners, legacy documents included.
     */
    listAllDocuments(range: TimeRange, shards?: ShardRange, after?: string): AsyncGenerator<ListedDocument> {
        return this.resolveEntries({ kind: 'unscoped' }, range, shards, after);
    }

    /**
     * Rewrites the list entry of an existing record, closing the gap left by
     * a partial intake.
     */
    async repairListEntry(objectKey: string, owner: DocumentOwner): Promise<ListEntryItem> {
        const record = await this.fetch(objectKey, owner);
        const item = await this.listIndexService.append({
            objectKey: record.objectKey,
            owner: record.owner,
            queuedTime: record.queuedTime,
            expiresAfter: record.expiresAfter,
        });
        this.logger.log(`Repaired list entry for ${objectKey}: ${item.PK} / ${item.SK}`);
        return item;
    }

    private async *resolveEntries(
        scope: ListScope,
        range: TimeRange,
        shards?: ShardRange,
        after?: string,
    ): AsyncGenerator<ListedDocument> {
        for await (const entry of this.listIndexService.query(scope, range, shards, after)) {
            const record = await this.documentRecordService.get(entry.objectKey, entry.owner);
            if (!record) {
                this.logger.warn(`List entry without primary record: ${entry.PK} / ${entry.SK}`);
            }
            yield { entry, record };
        }
    }

    private expiryFor(queuedTime: string, requested?: number): number | undefined {
        if (requested !== undefined) {
            if (!Number.isInteger(requested) || requested <= 0) {
                throw new DocumentValidationError(`ExpiresAfter must be a positive epoch-seconds integer, got ${requested}`);
            }
            return requested;
        }
        return this.retentionDays > 0 ? TrackingKeyGenerator.generateTTL(queuedTime, this.retentionDays) : undefined;
    }
}
