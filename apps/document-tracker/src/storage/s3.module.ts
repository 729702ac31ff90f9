import { Module, Global } from '@nestjs/common';
import { S3Client } from '@aws-sdk/client-s3';

import { awsClientOptions } from '../config/aws-client.config';
import { S3Service } from './s3.service';

@Global()
@Module({
    providers: [
        {
            provide: 'S3_CLIENT',
            useFactory: () => {
                const options = awsClientOptions();
                // Path-style addressing is required for LocalStack
                return new S3Client({ ...options, forcePathStyle: options.endpoint !== undefined });
            },
        },
        S3Service,
    ],
    exports: ['S3_CLIENT', S3Service],
})
export class S3Module { }
