import { Module } from '@nestjs/common';

import { KinesisModule } from '../queue/kinesis.module';
import { TrackingModule } from '../tracking/tracking.module';
import { ConsumerService } from './consumer.service';

@Module({
    imports: [KinesisModule, TrackingModule],
    providers: [ConsumerService],
    exports: [ConsumerService],
})
export class ConsumerModule { }
