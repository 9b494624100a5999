import { GraphQLError, GraphQLResolveInfo } from 'graphql';
import type { MercuriusContext } from 'mercurius';

import { MUTATION_KINDS, MutationKind } from '../interfaces/resource.js';
import { ResolutionError, isResolutionError } from '../services/errors.js';
import { OperationResolver } from '../services/operation-resolver.js';
import { ResourceRegistry } from '../services/resource-registry.js';
import { isRecord } from '../services/scalars.js';
import { resourceNames } from './schema.js';
import { descend, selectionFromInfo } from './selection.js';

type FieldResolver = (
    root: unknown,
    args: Record<string, unknown>,
    context: MercuriusContext,
    info: GraphQLResolveInfo
) => Promise<unknown>;

/** Keyed by root type (`Query`, `Mutation`), then by field name. */
export type ResolverMap = Record<string, Record<string, FieldResolver>>;

export function toGraphQLError(error: ResolutionError): GraphQLError {
    return new GraphQLError(error.message, {
        originalError: error,
        extensions: {
            code: error.code,
            category: error.category,
            remediation: error.remediation,
            ...(error.context ? { context: error.context } : {})
        }
    });
}

function withErrors(resolver: FieldResolver): FieldResolver {
    return async (root, args, context, info) => {
        try {
            return await resolver(root, args, context, info);
        } catch (error) {
            if (isResolutionError(error)) {
                throw toGraphQLError(error);
            }
            context.reply.request.log.error({ err: error, field: info.fieldName }, 'Unexpected resolver failure');
            throw error;
        }
    };
}

function mutationResolver(resolver: OperationResolver, resource: string, kind: MutationKind): FieldResolver {
    const payloadField = resourceNames(resource).item;

    return async (_root, args, context, info) => {
        const payload: Record<string, unknown> = isRecord(args.input) ? args.input : {};
        const { clientMutationId, ...input } = payload;
        const result = await resolver.resolveMutation({
            resource,
            operation: kind,
            input,
            principal: context.principal,
            signal: context.signal,
            logger: context.reply.request.log,
            selection: descend(selectionFromInfo(info), payloadField)
        });

        const echo = typeof clientMutationId === 'string' ? clientMutationId : null;
        return kind === 'delete'
            ? { deletedId: result.id, clientMutationId: echo }
            : { [payloadField]: result, clientMutationId: echo };
    };
}

/** Query and mutation resolvers for every exposed operation in the registry. */
export function buildResolvers(registry: ResourceRegistry, resolver: OperationResolver): ResolverMap {
    const query: Record<string, FieldResolver> = {};
    const mutation: Record<string, FieldResolver> = {};

    for (const descriptor of registry.list()) {
        const resource = descriptor.name;
        const names = resourceNames(resource);

        if (registry.exposes(resource, 'query')) {
            query[names.collection] = withErrors(async (_root, args, context, info) => resolver.resolveCollection({
                resource,
                args,
                principal: context.principal,
                signal: context.signal,
                logger: context.reply.request.log,
                selection: descend(selectionFromInfo(info), 'edges', 'node')
            }));

            query[names.item] = withErrors(async (_root, args, context, info) => resolver.resolveItem({
                resource,
                id: args.id,
                principal: context.principal,
                signal: context.signal,
                logger: context.reply.request.log,
                selection: selectionFromInfo(info)
            }));
        }

        for (const kind of MUTATION_KINDS) {
            if (registry.exposes(resource, kind)) {
                mutation[names.mutation(kind)] = withErrors(mutationResolver(resolver, resource, kind));
            }
        }
    }

    const resolvers: ResolverMap = { Query: query };
    if (Object.keys(mutation).length > 0) {
        resolvers.Mutation = mutation;
    }
    return resolvers;
}
