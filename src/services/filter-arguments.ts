import { FilterCondition, FilterSpec } from '../interfaces/persistence.js';
import {
    FieldDescriptor,
    FilterDeclaration,
    FilterKind,
    OrderClause,
    OrderDirection,
    ResourceDescriptor,
    ScalarType,
    ScalarValue
} from '../interfaces/resource.js';
import { ValidationError } from './errors.js';
import { coerceScalar, describeValue, isRecord } from './scalars.js';

export const LIST_SUFFIX = '_list';
export const ORDER_ARGUMENT = 'order';
export const EXISTS_ARGUMENT = 'exists';
export const PAGINATION_ARGUMENTS = ['first', 'after', 'last', 'before'] as const;

const RESERVED_ARGUMENTS = new Set<string>([...PAGINATION_ARGUMENTS, ORDER_ARGUMENT, EXISTS_ARGUMENT]);
const MULTI_VALUE_KINDS = new Set<FilterKind>(['exact', 'partial', 'start', 'end', 'numeric']);
const TEXT_KINDS = new Set<FilterKind>(['partial', 'start', 'end']);

const COMPATIBLE_TYPES: Record<FilterKind, readonly ScalarType[] | null> = {
    exact: null,
    partial: ['String', 'ID'],
    start: ['String', 'ID'],
    end: ['String', 'ID'],
    numeric: ['Int', 'Float'],
    boolean: ['Boolean'],
    range: ['Int', 'Float'],
    date: ['DateTime'],
    exists: null,
    order: null
};

const RANGE_OPERATORS = {
    lt: 'lt',
    lte: 'lte',
    gt: 'gt',
    gte: 'gte'
} as const;

const DATE_OPERATORS = {
    before: 'lte',
    strictly_before: 'lt',
    after: 'gte',
    strictly_after: 'gt'
} as const;

export type PathSegment = {
    readonly resource: string;
    readonly field: FieldDescriptor;
};

export type PropertyTarget = {
    readonly property: string;
    readonly segments: readonly PathSegment[];
    readonly leaf: FieldDescriptor;
};

export interface PathResolver {
    findPath(resource: string, property: string): PropertyTarget | undefined;
}

export type ArgumentShape = 'scalar' | 'list' | 'range' | 'date';

export type FilterArgument = {
    readonly name: string;
    readonly shape: ArgumentShape;
    readonly kind: FilterKind;
    readonly filter: string;
    readonly property: string;
    readonly valueType: ScalarType;
};

/** One key of the structured `order` or `exists` argument. */
export type StructuredEntry = {
    readonly key: string;
    readonly property: string;
    readonly valueType: ScalarType;
};

export type ArgumentSchema = {
    readonly resource: string;
    readonly arguments: readonly FilterArgument[];
    readonly order: readonly StructuredEntry[];
    readonly exists: readonly StructuredEntry[];
    readonly defaultOrder: readonly OrderClause[];
};

export type TranslatedArguments = {
    filter: FilterSpec;
    ordering: OrderClause[];
};

export function toArgumentName(property: string): string {
    return property.split('.').join('_');
}

function isRangeOperator(key: string): key is keyof typeof RANGE_OPERATORS {
    return Object.prototype.hasOwnProperty.call(RANGE_OPERATORS, key);
}

function isDateOperator(key: string): key is keyof typeof DATE_OPERATORS {
    return Object.prototype.hasOwnProperty.call(DATE_OPERATORS, key);
}

function invalidType(argument: string, expected: string, value: unknown): ValidationError {
    return new ValidationError(
        'INVALID_ARGUMENT_TYPE',
        `Argument '${argument}' expects ${expected}, received ${describeValue(value)}`,
        `Provide ${expected} for '${argument}'.`,
        argument
    );
}

function scalarFor(argument: FilterArgument, value: unknown, name: string): ScalarValue {
    const coerced = coerceScalar(value, argument.valueType);
    if (coerced === undefined) {
        throw invalidType(name, `a ${argument.valueType}`, value);
    }
    return coerced;
}

function checkFilterTarget(
    descriptor: ResourceDescriptor,
    filterName: string,
    declaration: FilterDeclaration,
    target: PropertyTarget | undefined,
    property: string
): PropertyTarget {
    if (!target) {
        throw new ValidationError(
            'UNRESOLVABLE_FILTER_PATH',
            `Filter '${filterName}' on ${descriptor.name} targets '${property}', which does not resolve`,
            'Declare filters on fields reachable through the relation graph.',
            filterName,
            { property }
        );
    }

    const allowed = COMPATIBLE_TYPES[declaration.kind];
    const throughMany = target.segments.slice(0, -1).some((segment) => segment.field.relation?.many);
    if ((allowed && !allowed.includes(target.leaf.type)) || (declaration.kind === 'order' && throughMany)) {
        throw new ValidationError(
            'INCOMPATIBLE_FILTER_TYPE',
            `Filter '${filterName}' of kind ${declaration.kind} cannot apply to '${property}' (${target.leaf.type})`,
            'Pick a filter kind that matches the field type.',
            filterName,
            { property }
        );
    }

    return target;
}

/**
 * Derives the arguments a caller may pass for the given filter set. Nested
 * paths use `_` as separator; multi-value kinds are exposed a second time with
 * the `_list` suffix.
 */
export function buildArgumentSchema(
    descriptor: ResourceDescriptor,
    filters: Readonly<Record<string, FilterDeclaration>>,
    paths: PathResolver
): ArgumentSchema {
    const argumentsList: FilterArgument[] = [];
    const order: StructuredEntry[] = [];
    const exists: StructuredEntry[] = [];
    const taken = new Set<string>();

    const claim = (name: string, filterName: string) => {
        if (taken.has(name) || RESERVED_ARGUMENTS.has(name)) {
            throw new ValidationError(
                'DUPLICATE_FILTER_ARGUMENT',
                `Filter '${filterName}' on ${descriptor.name} produces argument '${name}', which is already taken`,
                'Declare at most one argument-producing filter per property.',
                filterName
            );
        }
        taken.add(name);
    };

    for (const [filterName, declaration] of Object.entries(filters)) {
        for (const property of declaration.properties) {
            const target = checkFilterTarget(
                descriptor,
                filterName,
                declaration,
                paths.findPath(descriptor.name, property),
                property
            );
            const key = toArgumentName(property);
            const base = { kind: declaration.kind, filter: filterName, property, valueType: target.leaf.type };

            switch (declaration.kind) {
                case 'order':
                    order.push({ key, property, valueType: target.leaf.type });
                    break;
                case 'exists':
                    exists.push({ key, property, valueType: target.leaf.type });
                    break;
                case 'range':
                case 'date':
                    claim(key, filterName);
                    argumentsList.push({ ...base, name: key, shape: declaration.kind });
                    break;
                default:
                    claim(key, filterName);
                    argumentsList.push({ ...base, name: key, shape: 'scalar' });
                    if (MULTI_VALUE_KINDS.has(declaration.kind)) {
                        claim(`${key}${LIST_SUFFIX}`, filterName);
                        argumentsList.push({ ...base, name: `${key}${LIST_SUFFIX}`, shape: 'list' });
                    }
            }
        }
    }

    return {
        resource: descriptor.name,
        arguments: argumentsList,
        order,
        exists,
        defaultOrder: descriptor.order ?? []
    };
}

function valueCondition(argument: FilterArgument, values: ScalarValue[]): FilterCondition {
    if (TEXT_KINDS.has(argument.kind)) {
        return {
            type: 'match',
            property: argument.property,
            mode: argument.kind === 'start' ? 'start' : argument.kind === 'end' ? 'end' : 'partial',
            values: values.map(String)
        };
    }

    return { type: 'in', property: argument.property, values };
}

function boundConditions(argument: FilterArgument, value: unknown): FilterCondition[] {
    if (!isRecord(value)) {
        throw invalidType(argument.name, 'an object of bounds', value);
    }

    const conditions: FilterCondition[] = [];
    for (const [key, bound] of Object.entries(value)) {
        if (bound === undefined || bound === null) {
            continue;
        }

        const name = `${argument.name}.${key}`;
        const operator = argument.shape === 'date'
            ? (isDateOperator(key) ? DATE_OPERATORS[key] : undefined)
            : (isRangeOperator(key) ? RANGE_OPERATORS[key] : undefined);

        if (!operator) {
            throw new ValidationError(
                'INVALID_RANGE_ARGUMENT',
                `Unknown bound '${key}' for argument '${argument.name}'`,
                argument.shape === 'date'
                    ? 'Use before, strictly_before, after or strictly_after.'
                    : 'Use lt, lte, gt or gte.',
                name
            );
        }

        const coerced = scalarFor(argument, bound, name);
        if (typeof coerced === 'boolean') {
            throw invalidType(name, `a ${argument.valueType}`, bound);
        }
        conditions.push({
            type: 'compare',
            property: argument.property,
            operator,
            value: argument.shape === 'date' ? new Date(String(coerced)).toISOString() : coerced
        });
    }

    return conditions;
}

function toEntryList(argument: string, value: unknown): Record<string, unknown>[] {
    const list = Array.isArray(value) ? value : [value];
    return list.map((entry, index) => {
        if (!isRecord(entry)) {
            throw invalidType(Array.isArray(value) ? `${argument}[${index}]` : argument, 'an object', entry);
        }
        return entry;
    });
}

function translateOrder(schema: ArgumentSchema, value: unknown): OrderClause[] {
    const entries = new Map(schema.order.map((entry) => [entry.key, entry]));
    const clauses: OrderClause[] = [];

    for (const record of toEntryList(ORDER_ARGUMENT, value)) {
        for (const [key, rawDirection] of Object.entries(record)) {
            if (rawDirection === undefined || rawDirection === null) {
                continue;
            }

            const name = `${ORDER_ARGUMENT}.${key}`;
            const entry = entries.get(key);
            if (!entry) {
                throw new ValidationError(
                    'UNKNOWN_ORDER_PROPERTY',
                    `Cannot order ${schema.resource} by '${key}'`,
                    `Order by one of: ${schema.order.map((candidate) => candidate.key).join(', ')}.`,
                    name
                );
            }

            const direction = typeof rawDirection === 'string' ? rawDirection.toUpperCase() : undefined;
            if (direction !== 'ASC' && direction !== 'DESC') {
                throw new ValidationError(
                    'INVALID_ORDER_DIRECTION',
                    `Invalid direction for '${name}'`,
                    'Use ASC or DESC.',
                    name,
                    { received: rawDirection }
                );
            }

            if (!clauses.some((clause) => clause.property === entry.property)) {
                clauses.push({ property: entry.property, direction: direction satisfies OrderDirection });
            }
        }
    }

    return clauses;
}

function translateExists(schema: ArgumentSchema, value: unknown): FilterCondition[] {
    const requested = new Map<string, boolean>();
    const keys = new Set(schema.exists.map((entry) => entry.key));

    for (const record of toEntryList(EXISTS_ARGUMENT, value)) {
        for (const [key, flag] of Object.entries(record)) {
            if (flag === undefined || flag === null) {
                continue;
            }

            const name = `${EXISTS_ARGUMENT}.${key}`;
            if (!keys.has(key)) {
                throw new ValidationError(
                    'UNKNOWN_ARGUMENT',
                    `Unknown argument '${name}'`,
                    `Use one of: ${schema.exists.map((entry) => entry.key).join(', ')}.`,
                    name
                );
            }
            if (typeof flag !== 'boolean') {
                throw invalidType(name, 'a Boolean', flag);
            }
            requested.set(key, flag);
        }
    }

    return schema.exists.flatMap((entry) => {
        const flag = requested.get(entry.key);
        return flag === undefined ? [] : [{ type: 'exists' as const, property: entry.property, exists: flag }];
    });
}

/**
 * Turns caller arguments into a persistence filter spec and ordering. Pagination
 * arguments must be removed by the caller. Conditions follow schema order, so
 * equal inputs always produce equal specs.
 */
export function translateArguments(schema: ArgumentSchema, args: Readonly<Record<string, unknown>>): TranslatedArguments {
    const byName = new Map(schema.arguments.map((argument) => [argument.name, argument]));

    for (const name of Object.keys(args)) {
        const structured = (name === ORDER_ARGUMENT && schema.order.length > 0)
            || (name === EXISTS_ARGUMENT && schema.exists.length > 0);
        if (!byName.has(name) && !structured) {
            throw new ValidationError(
                'UNKNOWN_ARGUMENT',
                `Unknown argument '${name}' for ${schema.resource}`,
                'Remove the argument or use one declared by the resource filters.',
                name
            );
        }
    }

    const conditions: FilterCondition[] = [];
    for (const argument of schema.arguments) {
        const value = args[argument.name];
        if (value === undefined || value === null) {
            continue;
        }

        switch (argument.shape) {
            case 'scalar':
                conditions.push(valueCondition(argument, [scalarFor(argument, value, argument.name)]));
                break;
            case 'list': {
                if (!Array.isArray(value)) {
                    throw invalidType(argument.name, `a list of ${argument.valueType}`, value);
                }
                const values = value.map((entry, index) => scalarFor(argument, entry, `${argument.name}[${index}]`));
                if (values.length > 0) {
                    conditions.push(valueCondition(argument, values));
                }
                break;
            }
            case 'range':
            case 'date':
                conditions.push(...boundConditions(argument, value));
                break;
        }
    }

    const existsValue = args[EXISTS_ARGUMENT];
    if (existsValue !== undefined && existsValue !== null) {
        conditions.push(...translateExists(schema, existsValue));
    }

    const orderValue = args[ORDER_ARGUMENT];
    const requested = orderValue === undefined || orderValue === null ? [] : translateOrder(schema, orderValue);
    const ordering = requested.length > 0 ? requested : [...schema.defaultOrder];
    if (!ordering.some((clause) => clause.property === 'id')) {
        ordering.push({ property: 'id', direction: 'ASC' });
    }

    return { filter: { conditions }, ordering };
}
