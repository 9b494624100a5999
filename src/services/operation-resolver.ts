import type { FastifyBaseLogger } from 'fastify';

import { PersistenceCollaborator } from '../interfaces/persistence.js';
import {
    FieldDescriptor,
    MutationKind,
    Principal,
    ResourceDescriptor,
    ResourceItem,
    isMutationKind
} from '../interfaces/resource.js';
import { AccessControlEvaluator, ResolvedAccessRule } from './access-control.js';
import {
    AuthorizationError,
    OperationCancelledError,
    PersistenceError,
    ResolutionError,
    ValidationError
} from './errors.js';
import { translateArguments } from './filter-arguments.js';
import { Connection, PaginationEngine, PaginationOptions } from './pagination.js';
import { ResourceRegistry } from './resource-registry.js';
import { coerceScalar } from './scalars.js';
import {
    DenormalizedInput,
    GroupSet,
    denormalizeInput,
    outputFields,
    resolveSerializationContext
} from './serialization-context.js';

/** Requested sub-fields, keyed by field name. Leaves map to an empty selection. */
export type Selection = { readonly [field: string]: Selection };

export type ResolverLogger = Pick<FastifyBaseLogger, 'debug' | 'warn' | 'error'>;

export type ShapedItem = {
    id: string;
    [field: string]: unknown;
};

export type ResolutionStage =
    | 'PARSE'
    | 'AUTHORIZE_COLLECTION'
    | 'TRANSLATE_ARGS'
    | 'PAGINATE'
    | 'FETCH'
    | 'AUTHORIZE_ITEM'
    | 'MUTATE'
    | 'RESOLVE_SERIALIZATION_CONTEXT'
    | 'SHAPE_RESPONSE';

type BaseRequest = {
    resource: string;
    principal: Principal;
    selection?: Selection;
    signal?: AbortSignal;
    logger?: ResolverLogger;
};

export type CollectionRequest = BaseRequest & {
    args: Readonly<Record<string, unknown>>;
};

export type ItemRequest = BaseRequest & {
    id: unknown;
};

export type MutationRequest = BaseRequest & {
    operation: string;
    input: Readonly<Record<string, unknown>>;
};

export type OperationResolverOptions = {
    pagination: PaginationOptions;
    /** Report a missing item-level target exactly like an access denial. */
    notFoundAsDenial: boolean;
};

const silentLogger: ResolverLogger = {
    debug: () => undefined,
    warn: () => undefined,
    error: () => undefined
};

class Resolution {
    stage: ResolutionStage = 'PARSE';
    readonly logger: ResolverLogger;

    constructor(
        readonly operation: string,
        readonly resource: string,
        readonly signal: AbortSignal | undefined,
        logger: ResolverLogger | undefined
    ) {
        this.logger = logger ?? silentLogger;
    }

    enter(stage: ResolutionStage) {
        this.checkAborted();
        this.stage = stage;
        this.logger.debug({ operation: this.operation, resource: this.resource, stage }, 'resolution stage');
    }

    checkAborted() {
        if (this.signal?.aborted) {
            throw new OperationCancelledError();
        }
    }

    async persist<T>(call: () => Promise<T>): Promise<T> {
        this.checkAborted();
        let result: T;
        try {
            result = await call();
        } catch (error) {
            if (error instanceof ResolutionError) {
                throw error;
            }
            if (this.signal?.aborted) {
                throw new OperationCancelledError();
            }
            this.logger.error(
                { err: error, operation: this.operation, resource: this.resource, stage: this.stage },
                'persistence call failed'
            );
            throw new PersistenceError(error);
        }
        this.checkAborted();
        return result;
    }
}

function parseId(value: unknown, argument: string): string {
    const id = value === undefined || value === null ? undefined : coerceScalar(value, 'ID');
    if (typeof id !== 'string') {
        throw new ValidationError(
            'MISSING_INPUT_FIELD',
            `Argument '${argument}' must be an id`,
            `Provide '${argument}'.`,
            argument
        );
    }
    return id;
}

/**
 * Runs one operation through the resolution stages. A failure in any stage ends
 * the operation; nothing shared with other operations is touched.
 */
export class OperationResolver {
    private readonly pagination: PaginationEngine;

    constructor(
        private readonly registry: ResourceRegistry,
        private readonly persistence: PersistenceCollaborator,
        private readonly options: OperationResolverOptions
    ) {
        this.pagination = new PaginationEngine(options.pagination);
    }

    private async run<T>(resolution: Resolution, body: () => Promise<T>): Promise<T> {
        try {
            return await body();
        } catch (error) {
            if (error instanceof ResolutionError) {
                resolution.logger.debug(
                    {
                        operation: resolution.operation,
                        resource: resolution.resource,
                        stage: resolution.stage,
                        code: error.code,
                        ...(error instanceof AuthorizationError ? { decision: error.decision, detail: error.detail } : {})
                    },
                    'operation failed'
                );
            }
            throw error;
        }
    }

    /** Rules that do not read the object run before any persistence access. */
    private authorizeCollection(rule: ResolvedAccessRule, principal: Principal, includeObjectRules: boolean) {
        if (rule.rule && (includeObjectRules || !rule.rule.referencesObject)) {
            AccessControlEvaluator.assert(rule, principal);
        }
    }

    private authorizeItem(rule: ResolvedAccessRule, principal: Principal, item: ResourceItem) {
        if (rule.rule?.referencesObject) {
            AccessControlEvaluator.assert(rule, principal, item);
        }
    }

    private missingItem(rule: ResolvedAccessRule, resource: string, id: string): ResolutionError {
        if (this.options.notFoundAsDenial) {
            return AccessControlEvaluator.denialFor(rule);
        }
        return new ValidationError(
            'ITEM_NOT_FOUND',
            `${resource} '${id}' was not found`,
            'Verify the id.',
            'id'
        );
    }

    private async resolveRelation(
        field: FieldDescriptor,
        value: unknown,
        selection: Selection,
        principal: Principal,
        resolution: Resolution
    ): Promise<unknown> {
        const relation = field.relation;
        if (!relation) {
            return value;
        }

        const target = this.registry.get(relation.target);
        const override = this.registry.requireOperation(target.name, 'query');
        const rule = AccessControlEvaluator.resolveRule(target, override, 'security');
        const context = resolveSerializationContext(target, 'query', override);

        const load = async (id: string): Promise<ShapedItem | null> => {
            const related = await resolution.persist(
                () => this.persistence.fetchOne(target.name, id, { signal: resolution.signal })
            );
            if (!related) {
                return null;
            }
            AccessControlEvaluator.assert(rule, principal, related);
            return this.shape(related, target, context.output, selection, principal, resolution);
        };

        if (relation.many) {
            const ids = Array.isArray(value) ? value.map(String) : [];
            const loaded = await Promise.all(ids.map(load));
            return loaded.filter((entry): entry is ShapedItem => entry !== null);
        }

        return load(String(value));
    }

    /**
     * Copies the fields allowed by the output groups. Selected relations whose
     * target is queryable are resolved concurrently; other relations stay ids.
     */
    private async shape(
        item: ResourceItem,
        descriptor: ResourceDescriptor,
        groups: GroupSet,
        selection: Selection | undefined,
        principal: Principal,
        resolution: Resolution
    ): Promise<ShapedItem> {
        const shaped: ShapedItem = { id: item.id };
        const nested: Promise<void>[] = [];

        for (const field of outputFields(descriptor, groups)) {
            if (field.name === 'id') {
                continue;
            }

            const value = item[field.name] ?? null;
            const subSelection = selection && Object.prototype.hasOwnProperty.call(selection, field.name)
                ? selection[field.name]
                : undefined;

            if (field.relation && subSelection && value !== null && this.registry.exposes(field.relation.target, 'query')) {
                nested.push(
                    this.resolveRelation(field, value, subSelection, principal, resolution).then((resolved) => {
                        shaped[field.name] = resolved;
                    })
                );
                continue;
            }

            shaped[field.name] = value;
        }

        await Promise.all(nested);
        return shaped;
    }

    async resolveCollection(request: CollectionRequest): Promise<Connection<ShapedItem>> {
        const resolution = new Resolution('query', request.resource, request.signal, request.logger);

        return this.run(resolution, async () => {
            const descriptor = this.registry.get(request.resource);
            const override = this.registry.requireOperation(descriptor.name, 'query');
            const security = AccessControlEvaluator.resolveRule(descriptor, override, 'security');

            resolution.enter('AUTHORIZE_COLLECTION');
            this.authorizeCollection(security, request.principal, false);

            resolution.enter('TRANSLATE_ARGS');
            const { first, after, last, before, ...filterArgs } = request.args;
            const { filter, ordering } = translateArguments(this.registry.argumentSchema(descriptor.name), filterArgs);

            resolution.enter('PAGINATE');
            const window = this.pagination.parseWindow({ first, after, last, before }, descriptor.paginationItemsPerPage);

            resolution.enter('FETCH');
            const options = { signal: resolution.signal };
            const connection = await this.pagination.paginate(window, {
                fingerprint: PaginationEngine.fingerprint(descriptor.name, filter, ordering),
                count: () => resolution.persist(() => this.persistence.count(descriptor.name, filter, options)),
                fetch: (spec) => resolution.persist(
                    () => this.persistence.fetchWindow(descriptor.name, filter, ordering, spec, options)
                )
            });

            resolution.enter('AUTHORIZE_ITEM');
            for (const edge of connection.edges) {
                this.authorizeItem(security, request.principal, edge.node);
            }

            resolution.enter('RESOLVE_SERIALIZATION_CONTEXT');
            const { output } = resolveSerializationContext(descriptor, 'query', override);

            resolution.enter('SHAPE_RESPONSE');
            const edges = await Promise.all(connection.edges.map(async (edge) => ({
                cursor: edge.cursor,
                node: await this.shape(edge.node, descriptor, output, request.selection, request.principal, resolution)
            })));
            resolution.checkAborted();

            return { ...connection, edges };
        });
    }

    async resolveItem(request: ItemRequest): Promise<ShapedItem | null> {
        const resolution = new Resolution('query', request.resource, request.signal, request.logger);

        return this.run(resolution, async () => {
            const descriptor = this.registry.get(request.resource);
            const override = this.registry.requireOperation(descriptor.name, 'query');
            const security = AccessControlEvaluator.resolveRule(descriptor, override, 'security');

            resolution.enter('AUTHORIZE_COLLECTION');
            this.authorizeCollection(security, request.principal, false);

            resolution.enter('TRANSLATE_ARGS');
            const id = parseId(request.id, 'id');

            resolution.enter('FETCH');
            const item = await resolution.persist(
                () => this.persistence.fetchOne(descriptor.name, id, { signal: resolution.signal })
            );

            resolution.enter('AUTHORIZE_ITEM');
            if (!item) {
                if (this.options.notFoundAsDenial) {
                    throw this.missingItem(security, descriptor.name, id);
                }
                return null;
            }
            this.authorizeItem(security, request.principal, item);

            resolution.enter('RESOLVE_SERIALIZATION_CONTEXT');
            const { output } = resolveSerializationContext(descriptor, 'query', override);

            resolution.enter('SHAPE_RESPONSE');
            const shaped = await this.shape(item, descriptor, output, request.selection, request.principal, resolution);
            resolution.checkAborted();
            return shaped;
        });
    }

    /**
     * Runs create, update or delete. Item-level and post-denormalize checks run
     * before the mutation is sent to persistence. `delete` returns only the id.
     */
    async resolveMutation(request: MutationRequest): Promise<ShapedItem> {
        const resolution = new Resolution(request.operation, request.resource, request.signal, request.logger);

        return this.run(resolution, async () => {
            const descriptor = this.registry.get(request.resource);
            if (!isMutationKind(request.operation)) {
                throw new ValidationError(
                    'OPERATION_NOT_EXPOSED',
                    `'${request.operation}' is not a mutation`,
                    'Use create, update or delete.',
                    undefined,
                    { resource: descriptor.name, operation: request.operation }
                );
            }
            const kind: MutationKind = request.operation;
            const override = this.registry.requireOperation(descriptor.name, kind);
            const security = AccessControlEvaluator.resolveRule(descriptor, override, 'security');
            const postDenormalize = AccessControlEvaluator.resolveRule(descriptor, override, 'securityPostDenormalize');

            resolution.enter('AUTHORIZE_COLLECTION');
            this.authorizeCollection(security, request.principal, kind === 'create');

            resolution.enter('TRANSLATE_ARGS');
            const context = resolveSerializationContext(descriptor, kind, override);
            const { id: rawId, ...fields } = request.input;
            const id = kind === 'create' ? undefined : parseId(rawId, 'input.id');
            const { accepted, ignored }: DenormalizedInput = kind === 'delete' || context.kind !== 'mutation'
                ? { accepted: {}, ignored: [] }
                : denormalizeInput(descriptor, context.input, fields, kind === 'create');
            if (kind === 'create' && request.principal.id !== null) {
                for (const field of descriptor.fields) {
                    if (field.fromPrincipal) {
                        accepted[field.name] = request.principal.id;
                    }
                }
            }
            if (ignored.length > 0) {
                resolution.logger.debug(
                    { operation: kind, resource: descriptor.name, ignored },
                    'ignored input fields outside the denormalization groups'
                );
            }

            let existing: ResourceItem | null = null;
            if (id !== undefined) {
                resolution.enter('FETCH');
                existing = await resolution.persist(
                    () => this.persistence.fetchOne(descriptor.name, id, { signal: resolution.signal })
                );
            }

            resolution.enter('AUTHORIZE_ITEM');
            if (id !== undefined) {
                if (!existing) {
                    throw this.missingItem(security, descriptor.name, id);
                }
                this.authorizeItem(security, request.principal, existing);
            }
            if (kind !== 'delete' && postDenormalize.rule) {
                const candidate: ResourceItem = { ...existing, ...accepted, id: existing?.id ?? '' };
                AccessControlEvaluator.assert(postDenormalize, request.principal, candidate);
            }

            resolution.enter('MUTATE');
            const result = await resolution.persist(
                () => this.persistence.mutate(descriptor.name, kind, { id, data: accepted }, { signal: resolution.signal })
            );

            resolution.enter('RESOLVE_SERIALIZATION_CONTEXT');
            const output = context.output;

            resolution.enter('SHAPE_RESPONSE');
            if (kind === 'delete') {
                return { id: result.id };
            }
            const shaped = await this.shape(result, descriptor, output, request.selection, request.principal, resolution);
            resolution.checkAborted();
            return shaped;
        });
    }
}
