import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import trackingConfig from '../config/tracking.config';
import { DynamoDBModule } from '../database/dynamodb.module';
import { IdentityModule } from '../identity/identity.module';
import { DocumentLifecycleService } from './document-lifecycle.service';

@Module({
    imports: [ConfigModule.forFeature(trackingConfig), DynamoDBModule, IdentityModule],
    providers: [DocumentLifecycleService],
    exports: [DocumentLifecycleService, IdentityModule],
})
export class TrackingModule { }
