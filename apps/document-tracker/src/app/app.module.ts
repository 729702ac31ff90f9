import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import trackingConfig from '../config/tracking.config';
import { ConsumerModule } from '../consumer/consumer.module';
import { DynamoDBModule } from '../database/dynamodb.module';
import { KinesisModule } from '../queue/kinesis.module';
import { S3Module } from '../storage/s3.module';
import { TrackingModule } from '../tracking/tracking.module';
import { DocumentsController } from './documents.controller';
import { OperationsController } from './operations.controller';
import { UploadController } from './upload.controller';

@Module({
    imports: [
        ConfigModule.forRoot({ isGlobal: true, load: [trackingConfig] }),
        DynamoDBModule,
        S3Module,
        KinesisModule,
        TrackingModule,
        ConsumerModule,
    ],
    controllers: [DocumentsController, OperationsController, UploadController],
})
export class AppModule { }
