import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import trackingConfig from '../config/tracking.config';
import { IdentityResolverService } from './identity-resolver.service';

@Module({
    imports: [ConfigModule.forFeature(trackingConfig)],
    providers: [IdentityResolverService],
    exports: [IdentityResolverService],
})
export class IdentityModule { }
