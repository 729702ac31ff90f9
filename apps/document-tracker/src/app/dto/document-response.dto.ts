import { CompletionMetadata, DocumentRecord, DocumentStatus, ownerIdOf } from '../../database/models';
import { ListedDocument } from '../../tracking/document-lifecycle.service';

export interface DocumentResponseDto {
    objectKey: string;
    ownerId: string | null;
    status: DocumentStatus;
    queuedTime: string;
    expiresAfter?: number;
    metadata: CompletionMetadata;
}

export interface ListedDocumentResponseDto {
    objectKey: string;
    queuedTime: string;
    // null when the list entry outlived its record
    document: DocumentResponseDto | null;
}

export interface DocumentPageResponseDto {
    items: ListedDocumentResponseDto[];
    truncated: boolean;
    // Pass back as `cursor` to continue after the last item
    nextCursor: string | null;
}

export function toDocumentResponse(record: DocumentRecord): DocumentResponseDto {
    return {
        objectKey: record.objectKey,
        ownerId: ownerIdOf(record.owner),
        status: record.status,
        queuedTime: record.queuedTime,
        expiresAfter: record.expiresAfter,
        metadata: record.metadata,
    };
}

export function toListedDocumentResponse(listed: ListedDocument): ListedDocumentResponseDto {
    return {
        objectKey: listed.entry.objectKey,
        queuedTime: listed.entry.queuedTime,
        document: listed.record ? toDocumentResponse(listed.record) : null,
    };
}
