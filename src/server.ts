import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import fastifyJwt from '@fastify/jwt';
import rateLimit from '@fastify/rate-limit';
import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import mercurius from 'mercurius';

import { authenticateRequest } from './api/auth.js';
import { errorHandler } from './api/error-handler.js';
import { AppConfig } from './config.js';
import { buildResolvers } from './graphql/resolvers.js';
import { buildSchema } from './graphql/schema.js';
import { PersistenceCollaborator } from './interfaces/persistence.js';
import { OperationResolver } from './services/operation-resolver.js';
import { ANONYMOUS_PRINCIPAL } from './services/policy-adapters.js';
import { ResourceRegistry } from './services/resource-registry.js';

const GRAPHQL_PATH = '/graphql';

export type ServerOptions = {
    config: AppConfig;
    registry: ResourceRegistry;
    persistence: PersistenceCollaborator;
    /** Rejects when the storage behind `persistence` is unreachable. */
    healthCheck?: () => Promise<void>;
    logger?: FastifyServerOptions['logger'];
};

function readRequestIdHeader(raw: string | string[] | undefined): string | null {
    if (typeof raw === 'string' && raw.trim().length > 0) {
        return raw.trim();
    }

    if (Array.isArray(raw) && typeof raw[0] === 'string' && raw[0].trim().length > 0) {
        return raw[0].trim();
    }

    return null;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
    const { config, registry, persistence } = options;

    const server = Fastify({
        logger: options.logger ?? { level: config.logLevel },
        genReqId: (request) => readRequestIdHeader(request.headers['x-request-id']) || randomUUID()
    });

    server.setErrorHandler(errorHandler);

    server.addHook('onSend', async (request, reply, payload) => {
        reply.header('x-request-id', request.id);
        return payload;
    });

    await server.register(cors);
    await server.register(fastifyJwt, { secret: config.jwtSecret });
    await server.register(rateLimit, {
        max: config.rateLimitMax,
        timeWindow: '1 minute',
        errorResponseBuilder: (request, context) => ({
            statusCode: 429,
            error: 'Too Many Requests',
            message: 'Too Many Requests',
            code: 'RATE_LIMIT_EXCEEDED',
            remediation: `You have exceeded the rate limit of ${context.max} requests per minute. Please wait before retrying.`,
            context: {
                requestId: request.id
            }
        })
    });

    const resolver = new OperationResolver(registry, persistence, {
        pagination: {
            defaultPageSize: config.defaultPageSize,
            maximumPageSize: config.maxPageSize
        },
        notFoundAsDenial: config.notFoundAsDenial
    });

    server.decorateRequest('principal', null);
    server.addHook('preHandler', async (request, reply) => {
        if (request.url.split('?')[0] !== GRAPHQL_PATH) {
            return;
        }

        const auth = await authenticateRequest(request);
        if (!auth.ok) {
            return reply.status(auth.statusCode).send({
                ...auth.payload,
                context: {
                    requestId: request.id
                }
            });
        }
        request.principal = auth.principal;
    });

    await server.register(mercurius, {
        schema: buildSchema(registry),
        resolvers: buildResolvers(registry, resolver),
        graphiql: config.graphiql,
        path: GRAPHQL_PATH,
        context: (request, reply) => {
            const controller = new AbortController();
            reply.raw.once('close', () => {
                if (!reply.raw.writableFinished) {
                    controller.abort();
                }
            });

            return { principal: request.principal ?? ANONYMOUS_PRINCIPAL, signal: controller.signal };
        }
    });

    server.get('/health', async (_request, reply) => {
        const timestamp = new Date().toISOString();
        const resources = registry.list().length;

        try {
            await options.healthCheck?.();
            return {
                status: 'ok',
                services: {
                    persistence: persistence.persistenceName
                },
                resources,
                timestamp
            };
        } catch (error) {
            server.log.warn({ err: error }, 'Health check failed');
            return reply.status(503).send({
                status: 'degraded',
                services: {
                    persistence: 'down'
                },
                resources,
                timestamp
            });
        }
    });

    return server;
}
