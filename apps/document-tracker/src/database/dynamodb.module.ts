import { Module, Global } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

import { awsClientOptions } from '../config/aws-client.config';
import trackingConfig from '../config/tracking.config';
import { DocumentRecordService } from './document-record.service';
import { ListIndexService } from './list-index.service';

@Global()
@Module({
    imports: [ConfigModule.forFeature(trackingConfig)],
    providers: [
        {
            provide: 'DYNAMODB_CLIENT',
            useFactory: () => {
                const client = new DynamoDBClient(awsClientOptions());

                // Optional attributes (UserId, ExpiresAfter, metadata) are simply left off the item
                return DynamoDBDocumentClient.from(client, {
                    marshallOptions: {
                        removeUndefinedValues: true,
                    },
                });
            },
        },
        DocumentRecordService,
        ListIndexService,
    ],
    exports: ['DYNAMODB_CLIENT', DocumentRecordService, ListIndexService],
})
export class DynamoDBModule { }
