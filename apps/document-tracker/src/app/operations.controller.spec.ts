import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';

import trackingConfig from '../config/tracking.config';
import { DocumentRecordService } from '../database/document-record.service';
import { ListIndexService } from '../database/list-index.service';
import { DocumentStatus, LEGACY_OWNER, scopedOwner } from '../database/models';
import { InMemoryDynamoTable } from '../database/testing/in-memory-dynamodb';
import { testTrackingConfig } from '../database/testing/test-config';
import { IdentityResolverService } from '../identity/identity-resolver.service';
import { KinesisService } from '../queue/kinesis.service';
import { DocumentLifecycleService } from '../tracking/document-lifecycle.service';
import { OperationsController } from './operations.controller';

describe('OperationsController', () => {
    let controller: OperationsController;
    let lifecycle: DocumentLifecycleService;
    let kinesisService: jest.Mocked<Pick<KinesisService, 'publishStatusChangedEvent'>>;

    beforeEach(async () => {
        kinesisService = { publishStatusChangedEvent: jest.fn().mockResolvedValue(undefined) };
        jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

        const module: TestingModule = await Test.createTestingModule({
            controllers: [OperationsController],
            providers: [
                DocumentLifecycleService,
                IdentityResolverService,
                DocumentRecordService,
                ListIndexService,
                { provide: KinesisService, useValue: kinesisService },
                { provide: 'DYNAMODB_CLIENT', useValue: new InMemoryDynamoTable() },
                {
                    provide: trackingConfig.KEY,
                    useValue: { ...testTrackingConfig, operatorApiKey: 'test-operator-key-0001' },
                },
            ],
        }).compile();

        controller = module.get<OperationsController>(OperationsController);
        lifecycle = module.get<DocumentLifecycleService>(DocumentLifecycleService);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('listAll', () => {
        it('should list documents of every owner and legacy ones', async () => {
            await lifecycle.intake({
                objectKey: 'users/u1/a.pdf',
                queuedTime: '2025-10-17T09:00:00Z',
                identity: { stableId: 'u1-uuid' },
            });
            await lifecycle.intake({ objectKey: 'inbox/b.pdf', queuedTime: '2025-10-17T09:30:00Z', identity: {} });

            const page = await controller.listAll({ from: '2025-10-17', to: '2025-10-17' });

            expect(page.items.map((item) => [item.objectKey, item.document?.ownerId])).toEqual([
                ['users/u1/a.pdf', 'u1-uuid'],
                ['inbox/b.pdf', null],
            ]);
            expect(page).toEqual(expect.objectContaining({ truncated: false, nextCursor: null }));
        });
    });

    describe('reportStatus', () => {
        it('should publish the change for the owner', async () => {
            await controller.reportStatus({
                objectKey: 'users/u1/report.pdf',
                ownerId: 'u1-uuid',
                status: DocumentStatus.COMPLETED,
                metadata: { outputUri: 's3://output/run-1.json', pageCount: 3 },
            });

            expect(kinesisService.publishStatusChangedEvent).toHaveBeenCalledWith(
                'users/u1/report.pdf',
                scopedOwner('u1-uuid'),
                DocumentStatus.COMPLETED,
                { outputUri: 's3://output/run-1.json', pageCount: 3 },
            );
        });

        it('should address legacy documents without an owner', async () => {
            await controller.reportStatus({ objectKey: 'inbox/b.pdf', status: DocumentStatus.RUNNING });

            expect(kinesisService.publishStatusChangedEvent).toHaveBeenCalledWith(
                'inbox/b.pdf',
                LEGACY_OWNER,
                DocumentStatus.RUNNING,
                undefined,
            );
        });
    });
});
