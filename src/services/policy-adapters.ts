import { Principal } from '../interfaces/resource.js';
import { isRecord } from './scalars.js';

export const ANONYMOUS_PRINCIPAL: Principal = Object.freeze({
    id: null,
    roles: Object.freeze([]),
    claims: Object.freeze({})
});

const RESERVED_CLAIMS = new Set(['sub', 'roles', 'role', 'iat', 'exp', 'nbf', 'iss', 'aud', 'jti']);

function readRoles(payload: Record<string, unknown>): string[] {
    const roles = new Set<string>();
    if (Array.isArray(payload.roles)) {
        for (const role of payload.roles) {
            if (typeof role === 'string' && role.length > 0) {
                roles.add(role);
            }
        }
    } else if (typeof payload.roles === 'string') {
        payload.roles.split(/[\s,]+/).filter(Boolean).forEach((role) => roles.add(role));
    }
    if (typeof payload.role === 'string' && payload.role.length > 0) {
        roles.add(payload.role);
    }
    return Array.from(roles);
}

/**
 * Normalizes a verified token payload into a principal. `sub` becomes the id,
 * `roles` (list or separated string) and `role` the granted roles, and every
 * other non-registered claim is kept as-is.
 */
export function buildPrincipal(payload: unknown): Principal {
    if (!isRecord(payload)) {
        return ANONYMOUS_PRINCIPAL;
    }

    const sub = payload.sub;
    const id = typeof sub === 'string' && sub.length > 0
        ? sub
        : typeof sub === 'number' ? String(sub) : null;

    const claims: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
        if (!RESERVED_CLAIMS.has(key)) {
            claims[key] = value;
        }
    }

    return Object.freeze({
        id,
        roles: Object.freeze(readRoles(payload)),
        claims: Object.freeze(claims)
    });
}
