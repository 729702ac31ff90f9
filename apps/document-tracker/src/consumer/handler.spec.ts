import { Logger } from '@nestjs/common';
import { KinesisStreamEvent, KinesisStreamRecord } from 'aws-lambda';

import { StoreUnavailableError } from '../database/tracking.errors';
import { throttlingError } from '../database/testing/in-memory-dynamodb';
import { createHandler } from './handler';

function streamRecord(sequenceNumber: string, body: string): KinesisStreamRecord {
    return {
        kinesis: {
            kinesisSchemaVersion: '1.0',
            partitionKey: 'users/u1/report.pdf',
            sequenceNumber,
            data: Buffer.from(body).toString('base64'),
            approximateArrivalTimestamp: 1760695200,
        },
        eventSource: 'aws:kinesis',
        eventVersion: '1.0',
        eventID: `shardId-000000000000:${sequenceNumber}`,
        eventName: 'aws:kinesis:record',
        invokeIdentityArn: 'arn:aws:iam::000000000000:role/tracking-consumer',
        awsRegion: 'us-east-1',
        eventSourceARN: 'arn:aws:kinesis:us-east-1:000000000000:stream/tracking-test-stream',
    };
}

describe('Kinesis handler', () => {
    beforeEach(() => {
        jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should decode every record and report no failures', async () => {
        const handleRecord = jest.fn().mockResolvedValue('processed');
        const handler = createHandler(async () => ({ handleRecord }));
        const event: KinesisStreamEvent = { Records: [streamRecord('1', '{"a":1}'), streamRecord('2', '{"b":2}')] };

        await expect(handler(event)).resolves.toEqual({ batchItemFailures: [] });
        expect(handleRecord).toHaveBeenCalledTimes(2);
        expect(handleRecord.mock.calls[0][0].toString('utf8')).toBe('{"a":1}');
    });

    it('should stop at the first retryable failure and report it', async () => {
        const handleRecord = jest
            .fn()
            .mockResolvedValueOnce('processed')
            .mockRejectedValueOnce(new StoreUnavailableError('create', throttlingError()));
        const handler = createHandler(async () => ({ handleRecord }));
        const event: KinesisStreamEvent = {
            Records: [streamRecord('1', '{}'), streamRecord('2', '{}'), streamRecord('3', '{}')],
        };

        await expect(handler(event)).resolves.toEqual({ batchItemFailures: [{ itemIdentifier: '2' }] });
        expect(handleRecord).toHaveBeenCalledTimes(2);
    });
});
