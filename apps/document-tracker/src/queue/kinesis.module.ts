import { Module, Global } from '@nestjs/common';
import { KinesisClient } from '@aws-sdk/client-kinesis';

import { awsClientOptions } from '../config/aws-client.config';
import { KinesisService } from './kinesis.service';

@Global()
@Module({
    providers: [
        {
            provide: 'KINESIS_CLIENT',
            useFactory: () => new KinesisClient(awsClientOptions()),
        },
        KinesisService,
    ],
    exports: ['KINESIS_CLIENT', KinesisService],
})
export class KinesisModule { }
