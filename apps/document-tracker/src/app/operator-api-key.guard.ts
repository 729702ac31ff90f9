import {
    CanActivate,
    ExecutionContext,
    ForbiddenException,
    Inject,
    Injectable,
    UnauthorizedException,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Request } from 'express';

import trackingConfig from '../config/tracking.config';

/**
 * Guards the operational endpoints with the operator API key, sent as
 * `Authorization: Bearer <key>`. Never log the key value.
 */
@Injectable()
export class OperatorApiKeyGuard implements CanActivate {
    constructor(
        @Inject(trackingConfig.KEY)
        private readonly config: ConfigType<typeof trackingConfig>,
    ) { }

    canActivate(context: ExecutionContext): boolean {
        const expectedKey = this.config.operatorApiKey;
        if (expectedKey === undefined) {
            throw new ForbiddenException('Operator endpoints are disabled');
        }

        const authHeader = context.switchToHttp().getRequest<Request>().headers.authorization;
        if (!authHeader || !authHeader.startsWith('Bearer ')) {
            throw new UnauthorizedException('Missing or invalid operator API key');
        }

        if (authHeader.substring(7) !== expectedKey) {
            throw new UnauthorizedException('Invalid operator API key');
        }

        return true;
    }
}
