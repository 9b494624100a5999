import {
    FieldDescriptor,
    OPERATION_NAMES,
    OperationName,
    OperationOverride,
    ResourceDescriptor
} from '../interfaces/resource.js';
import { ResourceConfigError, ValidationError } from './errors.js';
import { ArgumentSchema, PathResolver, PropertyTarget, buildArgumentSchema } from './filter-arguments.js';

export const ID_FIELD: FieldDescriptor = Object.freeze({
    name: 'id',
    type: 'ID',
    nullable: false,
    writable: false
});

export type ResourceRegistryOptions = {
    /** Operations exposed by resources that declare no `operations` of their own. */
    defaultOperations?: readonly OperationName[];
};

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const entry of Object.values(value)) {
            deepFreeze(entry);
        }
    }
    return value;
}

function checkDescriptor(descriptor: ResourceDescriptor, names: ReadonlySet<string>): string[] {
    const issues: string[] = [];
    const seen = new Set<string>();

    for (const field of descriptor.fields) {
        if (field.name === ID_FIELD.name) {
            issues.push(`${descriptor.name}.id is implicit and must not be declared`);
        }
        if (seen.has(field.name)) {
            issues.push(`${descriptor.name}.${field.name} is declared twice`);
        }
        seen.add(field.name);

        if (field.relation) {
            if (!names.has(field.relation.target)) {
                issues.push(`${descriptor.name}.${field.name} targets unknown resource '${field.relation.target}'`);
            }
            if (field.type !== 'ID') {
                issues.push(`${descriptor.name}.${field.name} is a relation and must have type ID`);
            }
        }
    }

    if (descriptor.paginationItemsPerPage !== undefined
        && (!Number.isInteger(descriptor.paginationItemsPerPage) || descriptor.paginationItemsPerPage < 1)) {
        issues.push(`${descriptor.name}.paginationItemsPerPage must be a positive integer`);
    }

    return issues;
}

/**
 * Immutable set of resource descriptors. Everything derived from them (operation
 * sets, argument schemas) is computed once, on creation.
 */
export class ResourceRegistry implements PathResolver {
    private readonly resources: ReadonlyMap<string, ResourceDescriptor>;
    private readonly operationSets: ReadonlyMap<string, ReadonlyMap<OperationName, OperationOverride>>;
    private readonly argumentSchemas: ReadonlyMap<string, ArgumentSchema>;

    private constructor(descriptors: readonly ResourceDescriptor[], defaultOperations: readonly OperationName[]) {
        this.resources = new Map(descriptors.map((descriptor) => [descriptor.name, descriptor]));

        const operationSets = new Map<string, ReadonlyMap<OperationName, OperationOverride>>();
        for (const descriptor of descriptors) {
            const declared = descriptor.operations;
            const entries: Array<[OperationName, OperationOverride]> = [];
            for (const operation of OPERATION_NAMES) {
                if (declared) {
                    const override = declared[operation];
                    if (override) {
                        entries.push([operation, override]);
                    }
                } else if (defaultOperations.includes(operation)) {
                    entries.push([operation, {}]);
                }
            }
            operationSets.set(descriptor.name, new Map(entries));
        }
        this.operationSets = operationSets;

        const argumentSchemas = new Map<string, ArgumentSchema>();
        for (const descriptor of descriptors) {
            const query = operationSets.get(descriptor.name)?.get('query');
            if (query) {
                argumentSchemas.set(
                    descriptor.name,
                    buildArgumentSchema(descriptor, query.filters ?? descriptor.filters, this)
                );
            }
        }
        this.argumentSchemas = argumentSchemas;
    }

    static create(descriptors: readonly ResourceDescriptor[], options: ResourceRegistryOptions = {}): ResourceRegistry {
        const names = new Set<string>();
        const issues: string[] = [];

        for (const descriptor of descriptors) {
            if (names.has(descriptor.name)) {
                issues.push(`Resource '${descriptor.name}' is declared twice`);
            }
            names.add(descriptor.name);
        }
        for (const descriptor of descriptors) {
            issues.push(...checkDescriptor(descriptor, names));
        }
        if (issues.length > 0) {
            throw new ResourceConfigError(issues);
        }

        const frozen = descriptors.map((descriptor) => deepFreeze(descriptor));
        const registry = new ResourceRegistry(frozen, options.defaultOperations ?? OPERATION_NAMES);

        for (const descriptor of frozen) {
            for (const clause of descriptor.order ?? []) {
                if (!registry.findPath(descriptor.name, clause.property)) {
                    issues.push(`${descriptor.name} orders by unknown property '${clause.property}'`);
                }
            }
        }
        if (issues.length > 0) {
            throw new ResourceConfigError(issues);
        }

        return registry;
    }

    list(): ResourceDescriptor[] {
        return Array.from(this.resources.values());
    }

    has(name: string): boolean {
        return this.resources.has(name);
    }

    get(name: string): ResourceDescriptor {
        const descriptor = this.resources.get(name);
        if (!descriptor) {
            throw new ValidationError(
                'UNKNOWN_RESOURCE',
                `Unknown resource '${name}'`,
                'Use one of the resources exposed by this endpoint.',
                undefined,
                { resource: name }
            );
        }
        return descriptor;
    }

    operations(name: string): ReadonlyMap<OperationName, OperationOverride> {
        return this.operationSets.get(name) ?? new Map();
    }

    exposes(name: string, operation: OperationName): boolean {
        return this.operations(name).has(operation);
    }

    requireOperation(name: string, operation: OperationName): OperationOverride {
        const override = this.operations(this.get(name).name).get(operation);
        if (!override) {
            throw new ValidationError(
                'OPERATION_NOT_EXPOSED',
                `Operation '${operation}' is not exposed for resource '${name}'`,
                `Use one of: ${Array.from(this.operations(name).keys()).join(', ') || 'none'}.`,
                undefined,
                { resource: name, operation }
            );
        }
        return override;
    }

    argumentSchema(name: string): ArgumentSchema {
        this.requireOperation(name, 'query');
        const schema = this.argumentSchemas.get(name);
        if (!schema) {
            throw new Error(`Argument schema missing for resource '${name}'`);
        }
        return schema;
    }

    field(resource: string, name: string): FieldDescriptor | undefined {
        if (name === ID_FIELD.name) {
            return ID_FIELD;
        }
        return this.resources.get(resource)?.fields.find((field) => field.name === name);
    }

    /** Resolves a dotted property path through the relation graph. */
    findPath(resource: string, property: string): PropertyTarget | undefined {
        const names = property.split('.');
        const segments: PropertyTarget['segments'][number][] = [];
        let current = resource;

        for (const [index, name] of names.entries()) {
            const field = this.field(current, name);
            if (!field) {
                return undefined;
            }
            segments.push({ resource: current, field });

            if (index < names.length - 1) {
                if (!field.relation) {
                    return undefined;
                }
                current = field.relation.target;
            }
        }

        const leaf = segments[segments.length - 1];
        if (!leaf) {
            return undefined;
        }

        return { property, segments, leaf: leaf.field };
    }
}
