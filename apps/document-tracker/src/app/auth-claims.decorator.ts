import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { IncomingHttpHeaders } from 'http';
import { Request } from 'express';

import { IdentityClaims, identityClaimsFrom } from '../identity/identity-claims';

/**
 * The upstream authorizer forwards the verified token claims as headers.
 */
export function authClaimsFromHeaders(headers: IncomingHttpHeaders): IdentityClaims {
    return identityClaimsFrom({
        sub: headers['x-auth-sub'],
        username: headers['x-auth-username'],
    });
}

export const AuthClaims = createParamDecorator((_data: unknown, ctx: ExecutionContext): IdentityClaims => {
    const request = ctx.switchToHttp().getRequest<Request>();
    return authClaimsFromHeaders(request.headers);
});
