import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { validate as isUuid } from 'uuid';

import trackingConfig from '../config/tracking.config';
import { DocumentOwner, LEGACY_OWNER, scopedOwner } from '../database/models';
import { IdentityClaims } from './identity-claims';

@Injectable()
export class IdentityResolverService {
    private readonly logger = new Logger(IdentityResolverService.name);
    private readonly validateShape: boolean;

    constructor(
        @Inject(trackingConfig.KEY)
        config: ConfigType<typeof trackingConfig>,
    ) {
        this.validateShape = config.validateUserIdShape;
    }

    /**
     * Picks the identifier used for partitioning. The stable subject id always
     * wins; the display name is only a fallback because two accounts can share
     * one, which would merge their document namespaces. Never throws: no
     * identity at all is returned as null.
     */
    resolve(claims: IdentityClaims): string | null {
        if (claims.stableId) {
            if (this.validateShape && !isUuid(claims.stableId)) {
                this.logger.warn(`Stable user id does not look like a UUID: ${claims.stableId}`);
            }
            return claims.stableId;
        }

        if (claims.displayName) {
            this.logger.warn(
                `No stable subject id in identity context; partitioning by display name '${claims.displayName}'`,
            );
            return claims.displayName;
        }

        return null;
    }

    resolveOwner(claims: IdentityClaims): DocumentOwner {
        const ownerId = this.resolve(claims);
        if (ownerId === null) {
            this.logger.warn('No identity in context; falling back to legacy (unscoped) document keys');
            return LEGACY_OWNER;
        }
        return scopedOwner(ownerId);
    }
}
