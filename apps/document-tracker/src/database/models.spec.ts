import {
    DocumentStatus,
    LEGACY_OWNER,
    TrackingKeyGenerator,
    fromDocumentItem,
    fromListEntryItem,
    ownerFromId,
    scopedOwner,
    toDocumentItem,
    toListEntryItem,
    toQueuedTime,
} from './models';
import { DocumentValidationError } from './tracking.errors';

describe('TrackingKeyGenerator', () => {
    describe('documentKeys', () => {
        it('should build the user-scoped key for a scoped owner', () => {
            expect(TrackingKeyGenerator.documentKeys('users/u1/report.pdf', scopedOwner('u1-uuid'))).toEqual({
                PK: 'user#u1-uuid#doc#users/u1/report.pdf',
                SK: 'none',
            });
        });

        it('should build the legacy key when there is no owner', () => {
            expect(TrackingKeyGenerator.documentKeys('report.pdf', LEGACY_OWNER)).toEqual({
                PK: 'doc#report.pdf',
                SK: 'none',
            });
        });

        it('should return the same key on every call', () => {
            const first = TrackingKeyGenerator.documentKeys('a/b.pdf', scopedOwner('owner-1'));
            const second = TrackingKeyGenerator.documentKeys('a/b.pdf', scopedOwner('owner-1'));

            expect(second).toEqual(first);
        });

        it('should give different owners different keys for the same object key', () => {
            const a = TrackingKeyGenerator.documentKeys('shared.pdf', scopedOwner('owner-a'));
            const b = TrackingKeyGenerator.documentKeys('shared.pdf', scopedOwner('owner-b'));

            expect(a.PK).not.toBe(b.PK);
        });

        it('should escape separators inside the object key and owner id', () => {
            expect(TrackingKeyGenerator.documentKeys('notes#1%.txt', scopedOwner('team#a')).PK).toBe(
                'user#team%23a#doc#notes%231%25.txt',
            );
        });

        it('should keep escaped and literal keys apart', () => {
            const literal = TrackingKeyGenerator.documentKeys('a%23b', LEGACY_OWNER);
            const hashed = TrackingKeyGenerator.documentKeys('a#b', LEGACY_OWNER);

            expect(literal.PK).toBe('doc#a%2523b');
            expect(hashed.PK).toBe('doc#a%23b');
        });

        it('should reject an empty object key', () => {
            expect(() => TrackingKeyGenerator.documentKeys('', LEGACY_OWNER)).toThrow(DocumentValidationError);
        });

        it('should reject an empty owner id', () => {
            expect(() => TrackingKeyGenerator.documentKeys('a.pdf', scopedOwner(''))).toThrow(
                'Owner id must be a non-empty string',
            );
        });
    });

    describe('listEntryKeys', () => {
        it('should bucket by UTC date and shard and sort by time then object key', () => {
            expect(TrackingKeyGenerator.listEntryKeys('users/u1/report.pdf', '2025-10-17T10:00:00Z', 6)).toEqual({
                PK: 'list#2025-10-17#s#03',
                SK: 'ts#2025-10-17T10:00:00Z#id#users/u1/report.pdf',
            });
        });

        it('should reject a queued time that is not UTC ISO-8601', () => {
            expect(() => TrackingKeyGenerator.listEntryKeys('a.pdf', '2025-10-17 10:00', 6)).toThrow(
                DocumentValidationError,
            );
            expect(() => TrackingKeyGenerator.listEntryKeys('a.pdf', '2025-10-17T10:00:00+02:00', 6)).toThrow(
                DocumentValidationError,
            );
        });

        it('should reject fractional seconds', () => {
            expect(() => TrackingKeyGenerator.listEntryKeys('report.pdf', '2025-10-17T23:59:59.123Z', 6)).toThrow(
                'QueuedTime must be an ISO-8601 UTC timestamp in whole seconds (YYYY-MM-DDTHH:MM:SSZ), ' +
                    'got: 2025-10-17T23:59:59.123Z',
            );
        });
    });

    describe('queuedTimeOf', () => {
        it('should read the queued time back from a list sort key', () => {
            expect(TrackingKeyGenerator.queuedTimeOf('ts#2025-10-17T10:00:00Z#id#notes%231.txt')).toBe(
                '2025-10-17T10:00:00Z',
            );
        });

        it('should reject anything else', () => {
            expect(() => TrackingKeyGenerator.queuedTimeOf('none')).toThrow('Not a list sort key: none');
            expect(() => TrackingKeyGenerator.queuedTimeOf('ts#yesterday#id#a.pdf')).toThrow(DocumentValidationError);
        });
    });

    describe('toQueuedTime', () => {
        it('should drop the milliseconds', () => {
            expect(toQueuedTime(new Date('2025-10-17T23:59:59.999Z'))).toBe('2025-10-17T23:59:59Z');
            expect(toQueuedTime(new Date('2025-10-17T10:00:00Z'))).toBe('2025-10-17T10:00:00Z');
        });
    });

    describe('shardFor', () => {
        it('should be deterministic and bounded', () => {
            for (let i = 0; i < 50; i++) {
                const key = `users/u${i}/file-${i}.pdf`;
                const shard = TrackingKeyGenerator.shardFor(key, 6);

                expect(shard).toBe(TrackingKeyGenerator.shardFor(key, 6));
                expect(shard).toBeGreaterThanOrEqual(0);
                expect(shard).toBeLessThan(6);
            }
        });

        it('should spread keys across every shard', () => {
            const used = new Set<number>();
            for (let i = 0; i < 200; i++) {
                used.add(TrackingKeyGenerator.shardFor(`uploads/doc-${i}.pdf`, 6));
            }

            expect(used.size).toBe(6);
        });

        it('should reject a non-positive shard count', () => {
            expect(() => TrackingKeyGenerator.shardFor('a.pdf', 0)).toThrow(DocumentValidationError);
        });
    });

    it('should compute the TTL from the queued time', () => {
        expect(TrackingKeyGenerator.generateTTL('2025-10-17T10:00:00Z', 30)).toBe(1763287200);
    });
});

describe('item mapping', () => {
    it('should write UserId only for scoped records', () => {
        const scoped = toDocumentItem({
            objectKey: 'users/u1/report.pdf',
            owner: scopedOwner('u1-uuid'),
            status: DocumentStatus.QUEUED,
            queuedTime: '2025-10-17T10:00:00Z',
            expiresAfter: 1763287200,
            metadata: {},
        });
        const legacy = toDocumentItem({
            objectKey: 'report.pdf',
            owner: LEGACY_OWNER,
            status: DocumentStatus.QUEUED,
            queuedTime: '2025-10-17T10:00:00Z',
            metadata: {},
        });

        expect(scoped).toEqual({
            PK: 'user#u1-uuid#doc#users/u1/report.pdf',
            SK: 'none',
            ObjectKey: 'users/u1/report.pdf',
            UserId: 'u1-uuid',
            ObjectStatus: 'QUEUED',
            QueuedTime: '2025-10-17T10:00:00Z',
            ExpiresAfter: 1763287200,
        });
        expect(legacy).not.toHaveProperty('UserId');
        expect(legacy).not.toHaveProperty('ExpiresAfter');
    });

    it('should copy owner and expiry onto list entry items', () => {
        expect(
            toListEntryItem(
                {
                    objectKey: 'users/u1/report.pdf',
                    owner: scopedOwner('u1-uuid'),
                    queuedTime: '2025-10-17T10:00:00Z',
                    expiresAfter: 1763287200,
                },
                6,
            ),
        ).toEqual({
            PK: 'list#2025-10-17#s#03',
            SK: 'ts#2025-10-17T10:00:00Z#id#users/u1/report.pdf',
            ObjectKey: 'users/u1/report.pdf',
            UserId: 'u1-uuid',
            QueuedTime: '2025-10-17T10:00:00Z',
            ExpiresAfter: 1763287200,
        });
    });

    it('should read records and their completion metadata back', () => {
        const record = fromDocumentItem({
            PK: 'user#u1-uuid#doc#users/u1/report.pdf',
            SK: 'none',
            ObjectKey: 'users/u1/report.pdf',
            UserId: 'u1-uuid',
            ObjectStatus: 'COMPLETED',
            QueuedTime: '2025-10-17T10:00:00Z',
            PageCount: 3,
            CompletionTime: '2025-10-17T10:05:00Z',
        });

        expect(record).toEqual({
            objectKey: 'users/u1/report.pdf',
            owner: { kind: 'scoped', ownerId: 'u1-uuid' },
            status: DocumentStatus.COMPLETED,
            queuedTime: '2025-10-17T10:00:00Z',
            metadata: { pageCount: 3, completionTime: '2025-10-17T10:05:00Z' },
        });
    });

    it('should reject an item with an unknown status', () => {
        expect(() =>
            fromDocumentItem({ PK: 'doc#a', SK: 'none', ObjectKey: 'a', ObjectStatus: 'DONE', QueuedTime: 'x' }),
        ).toThrow('Malformed document item: PK=doc#a');
    });

    it('should read legacy list entries as owned by nobody', () => {
        const entry = fromListEntryItem({
            PK: 'list#2025-10-17#s#00',
            SK: 'ts#2025-10-17T10:00:00Z#id#report.pdf',
            ObjectKey: 'report.pdf',
            QueuedTime: '2025-10-17T10:00:00Z',
        });

        expect(entry.owner).toEqual(LEGACY_OWNER);
    });

    it('should map absent and empty owner ids to the legacy owner', () => {
        expect(ownerFromId(undefined)).toEqual(LEGACY_OWNER);
        expect(ownerFromId('')).toEqual(LEGACY_OWNER);
        expect(ownerFromId('u1')).toEqual({ kind: 'scoped', ownerId: 'u1' });
    });
});
