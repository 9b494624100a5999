import { FieldDescriptor, OperationName, OperationOverride, ResourceDescriptor } from '../interfaces/resource.js';
import { ValidationError } from './errors.js';
import { ID_FIELD } from './resource-registry.js';
import { coerceScalar, describeValue } from './scalars.js';

/** `undefined` means no groups are configured and every field is eligible. */
export type GroupSet = readonly string[] | undefined;

export type SerializationContext =
    | { kind: 'query'; output: GroupSet }
    | { kind: 'mutation'; input: GroupSet; output: GroupSet };

export type DenormalizedInput = {
    accepted: Record<string, unknown>;
    ignored: string[];
};

export function resolveSerializationContext(
    descriptor: ResourceDescriptor,
    operation: OperationName,
    override: OperationOverride
): SerializationContext {
    const output = override.normalizationGroups ?? descriptor.normalizationGroups;
    if (operation === 'query') {
        return { kind: 'query', output };
    }

    return {
        kind: 'mutation',
        input: override.denormalizationGroups ?? descriptor.denormalizationGroups,
        output
    };
}

function isEligible(field: FieldDescriptor, groups: GroupSet): boolean {
    if (groups === undefined) {
        return true;
    }
    return field.groups?.some((group) => groups.includes(group)) ?? false;
}

/** Fields present in the response. The identifier is always included. */
export function outputFields(descriptor: ResourceDescriptor, groups: GroupSet): FieldDescriptor[] {
    return [ID_FIELD, ...descriptor.fields.filter((field) => isEligible(field, groups))];
}

export function inputFields(descriptor: ResourceDescriptor, groups: GroupSet): FieldDescriptor[] {
    return descriptor.fields.filter(
        (field) => field.writable !== false && !field.fromPrincipal && isEligible(field, groups)
    );
}

export function sameGroups(left: GroupSet, right: GroupSet): boolean {
    if (left === undefined || right === undefined) {
        return left === right;
    }
    return left.length === right.length && left.every((group) => right.includes(group));
}

function acceptValue(field: FieldDescriptor, value: unknown): unknown {
    const argument = `input.${field.name}`;
    if (value === null) {
        if (!field.nullable) {
            throw new ValidationError(
                'INVALID_ARGUMENT_TYPE',
                `Field '${field.name}' cannot be null`,
                `Provide a ${field.type} for '${field.name}'.`,
                argument
            );
        }
        return null;
    }

    if (field.relation?.many) {
        if (!Array.isArray(value)) {
            throw new ValidationError(
                'INVALID_ARGUMENT_TYPE',
                `Field '${field.name}' expects a list of ${field.relation.target} ids, received ${describeValue(value)}`,
                `Provide a list of ids for '${field.name}'.`,
                argument
            );
        }
        return value.map((entry, index) => {
            const id = coerceScalar(entry, 'ID');
            if (id === undefined) {
                throw new ValidationError(
                    'INVALID_ARGUMENT_TYPE',
                    `Field '${field.name}[${index}]' expects an id, received ${describeValue(entry)}`,
                    `Provide ${field.relation?.target ?? 'related'} ids for '${field.name}'.`,
                    `${argument}[${index}]`
                );
            }
            return id;
        });
    }

    const coerced = coerceScalar(value, field.type);
    if (coerced === undefined) {
        throw new ValidationError(
            'INVALID_ARGUMENT_TYPE',
            `Field '${field.name}' expects a ${field.type}, received ${describeValue(value)}`,
            `Provide a ${field.type} for '${field.name}'.`,
            argument
        );
    }
    return coerced;
}

/**
 * Keeps the submitted fields allowed by the input groups. Other submitted keys
 * are reported as ignored, not rejected.
 */
export function denormalizeInput(
    descriptor: ResourceDescriptor,
    groups: GroupSet,
    input: Readonly<Record<string, unknown>>,
    requireComplete: boolean
): DenormalizedInput {
    const fields = inputFields(descriptor, groups);
    const allowed = new Map(fields.map((field) => [field.name, field]));
    const accepted: Record<string, unknown> = {};
    const ignored: string[] = [];

    for (const [key, value] of Object.entries(input)) {
        if (value === undefined) {
            continue;
        }
        const field = allowed.get(key);
        if (!field) {
            ignored.push(key);
            continue;
        }
        accepted[key] = acceptValue(field, value);
    }

    if (requireComplete) {
        const missing = fields.find((field) => !field.nullable && accepted[field.name] === undefined);
        if (missing) {
            throw new ValidationError(
                'MISSING_INPUT_FIELD',
                `Field '${missing.name}' is required`,
                `Provide '${missing.name}' in the input.`,
                `input.${missing.name}`
            );
        }
    }

    return { accepted, ignored };
}
