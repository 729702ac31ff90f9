import { TrackingKeyGenerator } from '../database/models';
import { ListedDocument } from '../tracking/document-lifecycle.service';
import { DocumentPageResponseDto, ListedDocumentResponseDto, toListedDocumentResponse } from './dto/document-response.dto';

/**
 * List cursors are the sort key of the last entry on a page, base64url
 * encoded so they travel in a query string unchanged.
 */
export function encodeListCursor(listSortKey: string): string {
    return Buffer.from(listSortKey, 'utf8').toString('base64url');
}

export function decodeListCursor(cursor: string): string {
    const listSortKey = Buffer.from(cursor, 'base64url').toString('utf8');
    TrackingKeyGenerator.queuedTimeOf(listSortKey);
    return listSortKey;
}

/**
 * Reads at most `limit` documents. When more remain, the page is flagged
 * truncated and carries the cursor to continue from.
 */
export async function collectPage(
    documents: AsyncIterable<ListedDocument>,
    limit: number,
): Promise<DocumentPageResponseDto> {
    const items: ListedDocumentResponseDto[] = [];
    let lastSortKey: string | null = null;

    for await (const listed of documents) {
        if (items.length === limit) {
            return {
                items,
                truncated: true,
                nextCursor: lastSortKey === null ? null : encodeListCursor(lastSortKey),
            };
        }
        items.push(toListedDocumentResponse(listed));
        lastSortKey = listed.entry.SK;
    }

    return { items, truncated: false, nextCursor: null };
}
