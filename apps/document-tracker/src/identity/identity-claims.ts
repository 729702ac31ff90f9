/**
 * The two identity fields the tracking service cares about, lifted out of
 * whatever claim map the authentication layer hands over.
 */
export interface IdentityClaims {
    /** Immutable per-user subject identifier (`sub`). */
    stableId?: string;
    /** Mutable, user-chosen login name (`username`); not unique over time. */
    displayName?: string;
}

/**
 * Adapts a raw claim map (token claims, event identity block, auth headers)
 * into IdentityClaims. Non-string and blank values are treated as absent.
 */
export function identityClaimsFrom(raw: unknown): IdentityClaims {
    if (typeof raw !== 'object' || raw === null) {
        return {};
    }

    const claims: IdentityClaims = {};
    const stableId = claimValue(raw, 'sub');
    const displayName = claimValue(raw, 'username') ?? claimValue(raw, 'cognito:username');
    if (stableId !== undefined) {
        claims.stableId = stableId;
    }
    if (displayName !== undefined) {
        claims.displayName = displayName;
    }
    return claims;
}

function claimValue(raw: object, name: string): string | undefined {
    const value: unknown = Reflect.get(raw, name);
    if (typeof value !== 'string') {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}
