import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { KinesisStreamBatchItemFailure, KinesisStreamBatchResponse, KinesisStreamEvent } from 'aws-lambda';

import { ConsumerModule } from './consumer.module';
import { ConsumerService } from './consumer.service';

type RecordHandler = Pick<ConsumerService, 'handleRecord'>;

const logger = new Logger('KinesisHandler');

let cachedService: ConsumerService | undefined;

async function getConsumerService(): Promise<ConsumerService> {
    if (!cachedService) {
        const app = await NestFactory.createApplicationContext(ConsumerModule);
        cachedService = app.get<ConsumerService>(ConsumerService);
    }
    return cachedService;
}

/**
 * Builds the Kinesis-triggered Lambda handler. Records are applied in order;
 * the first one that fails retryably is reported as a batch item failure so
 * Lambda resumes the shard from it.
 */
export function createHandler(resolveService: () => Promise<RecordHandler>) {
    return async (event: KinesisStreamEvent): Promise<KinesisStreamBatchResponse> => {
        const service = await resolveService();
        const batchItemFailures: KinesisStreamBatchItemFailure[] = [];

        for (const record of event.Records) {
            try {
                await service.handleRecord(Buffer.from(record.kinesis.data, 'base64'));
            } catch (error) {
                logger.warn(
                    `Record ${record.kinesis.sequenceNumber} failed and will be retried: ` +
                    (error instanceof Error ? error.message : String(error)),
                );
                batchItemFailures.push({ itemIdentifier: record.kinesis.sequenceNumber });
                break;
            }
        }

        return { batchItemFailures };
    };
}

export const handler = createHandler(getConsumerService);
