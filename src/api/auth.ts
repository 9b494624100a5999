import { IncomingHttpHeaders } from 'node:http';

import { FastifyRequest } from 'fastify';

import { Principal } from '../interfaces/resource.js';
import { ANONYMOUS_PRINCIPAL, buildPrincipal } from '../services/policy-adapters.js';

type AuthSuccess = {
    ok: true;
    principal: Principal;
};

type AuthFailure = {
    ok: false;
    statusCode: number;
    payload: {
        error: string;
        code: string;
        remediation: string;
    };
};

export type AuthResult = AuthSuccess | AuthFailure;

export function getBearerToken(headers: IncomingHttpHeaders): string | null {
    const authorization = headers.authorization;
    if (typeof authorization !== 'string') {
        return null;
    }

    const [scheme, token] = authorization.split(' ');
    if (scheme?.toLowerCase() === 'bearer' && token) {
        return token.trim();
    }

    return null;
}

/**
 * Requests without a bearer token act as the anonymous principal. A token that
 * fails verification is rejected instead of being downgraded.
 */
export async function authenticateRequest(request: FastifyRequest): Promise<AuthResult> {
    if (!getBearerToken(request.headers)) {
        return { ok: true, principal: ANONYMOUS_PRINCIPAL };
    }

    try {
        const payload = await request.jwtVerify();
        return { ok: true, principal: buildPrincipal(payload) };
    } catch (error) {
        request.log.debug({ err: error }, 'Bearer token rejected');
        return {
            ok: false,
            statusCode: 401,
            payload: {
                error: 'Invalid bearer token',
                code: 'AUTH_INVALID_TOKEN',
                remediation: 'Provide Authorization: Bearer <token> signed with the server secret, or omit it to act anonymously.'
            }
        };
    }
}
