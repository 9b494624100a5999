import { FieldDescriptor, MUTATION_KINDS, MutationKind, ResourceDescriptor, ScalarType } from '../interfaces/resource.js';
import { ResourceConfigError } from '../services/errors.js';
import { ArgumentSchema, EXISTS_ARGUMENT, ORDER_ARGUMENT } from '../services/filter-arguments.js';
import { ResourceRegistry } from '../services/resource-registry.js';
import {
    GroupSet,
    inputFields,
    outputFields,
    resolveSerializationContext,
    sameGroups
} from '../services/serialization-context.js';

const GRAPHQL_SCALARS: Record<ScalarType, string> = {
    ID: 'ID',
    String: 'String',
    Int: 'Int',
    Float: 'Float',
    Boolean: 'Boolean',
    DateTime: 'DateTime'
};

const DATE_BOUNDS = ['before', 'strictly_before', 'after', 'strictly_after'];
const RANGE_BOUNDS = ['lt', 'lte', 'gt', 'gte'];

export function lowerFirst(value: string): string {
    return value.charAt(0).toLowerCase() + value.slice(1);
}

export function pluralize(value: string): string {
    if (/[^aeiou]y$/i.test(value)) {
        return `${value.slice(0, -1)}ies`;
    }
    if (/(s|x|z|ch|sh)$/i.test(value)) {
        return `${value}es`;
    }
    return `${value}s`;
}

/** GraphQL field and type names used for one resource. */
export function resourceNames(resource: string) {
    const item = lowerFirst(resource);
    return {
        item,
        collection: pluralize(item),
        connection: `${resource}Connection`,
        edge: `${resource}Edge`,
        filterInput: (argument: string) => `${resource}Filter_${argument}`,
        mutation: (kind: MutationKind) => `${kind}${resource}`,
        input: (kind: MutationKind) => `${kind}${resource}Input`,
        payload: (kind: MutationKind) => `${kind}${resource}Payload`,
        payloadData: (kind: MutationKind) => `${kind}${resource}PayloadData`
    };
}

function description(text: string | undefined, indent: string): string[] {
    return text ? [`${indent}"""${text.replace(/"""/g, '\\"""')}"""`] : [];
}

function block(keyword: 'type' | 'input', name: string, fields: string[], doc?: string): string {
    return [...description(doc, '  '), `  ${keyword} ${name} {`, ...fields.map((field) => `    ${field}`), '  }'].join('\n');
}

class SchemaWriter {
    private readonly blocks: string[] = [];
    private readonly queryFields: string[] = [];
    private readonly mutationFields: string[] = [];

    constructor(private readonly registry: ResourceRegistry) {}

    private outputType(field: FieldDescriptor): string {
        if (field.relation) {
            const target = this.registry.exposes(field.relation.target, 'query') ? field.relation.target : 'ID';
            return field.relation.many ? `[${target}!]` : target;
        }
        return `${GRAPHQL_SCALARS[field.type]}${field.nullable ? '' : '!'}`;
    }

    private inputType(field: FieldDescriptor, required: boolean): string {
        const base = field.relation?.many ? '[ID!]' : GRAPHQL_SCALARS[field.type];
        return `${base}${required && !field.nullable ? '!' : ''}`;
    }

    private objectType(name: string, descriptor: ResourceDescriptor, groups: GroupSet, doc?: string) {
        const fields = outputFields(descriptor, groups).map((field) => [
            ...description(field.description, ''),
            `${field.name}: ${field.name === 'id' ? 'ID!' : this.outputType(field)}`
        ].join('\n    '));
        this.blocks.push(block('type', name, fields, doc));
    }

    private collection(descriptor: ResourceDescriptor, schema: ArgumentSchema) {
        const names = resourceNames(descriptor.name);

        this.blocks.push(block('type', names.connection, [
            `edges: [${names.edge}!]!`,
            'pageInfo: PageInfo!',
            'totalCount: Int!'
        ], `A page of ${descriptor.name} items.`));
        this.blocks.push(block('type', names.edge, [`node: ${descriptor.name}!`, 'cursor: String!']));

        const args = ['first: Int', 'after: String', 'last: Int', 'before: String'];
        for (const argument of schema.arguments) {
            const scalar = GRAPHQL_SCALARS[argument.valueType];
            switch (argument.shape) {
                case 'scalar':
                    args.push(`${argument.name}: ${scalar}`);
                    break;
                case 'list':
                    args.push(`${argument.name}: [${scalar}!]`);
                    break;
                case 'range':
                    this.blocks.push(block('input', names.filterInput(argument.name), RANGE_BOUNDS.map((bound) => `${bound}: ${scalar}`)));
                    args.push(`${argument.name}: ${names.filterInput(argument.name)}`);
                    break;
                case 'date':
                    this.blocks.push(block('input', names.filterInput(argument.name), DATE_BOUNDS.map((bound) => `${bound}: String`)));
                    args.push(`${argument.name}: ${names.filterInput(argument.name)}`);
                    break;
            }
        }

        if (schema.order.length > 0) {
            const type = names.filterInput(ORDER_ARGUMENT);
            this.blocks.push(block('input', type, schema.order.map((entry) => `${entry.key}: String`)));
            args.push(`${ORDER_ARGUMENT}: [${type}!]`);
        }
        if (schema.exists.length > 0) {
            const type = names.filterInput(EXISTS_ARGUMENT);
            this.blocks.push(block('input', type, schema.exists.map((entry) => `${entry.key}: Boolean`)));
            args.push(`${EXISTS_ARGUMENT}: [${type}!]`);
        }

        this.queryFields.push(`${names.collection}(${args.join(', ')}): ${names.connection}!`);
        this.queryFields.push(`${names.item}(id: ID!): ${descriptor.name}`);
    }

    private mutation(descriptor: ResourceDescriptor, kind: MutationKind, queryGroups: GroupSet) {
        const names = resourceNames(descriptor.name);
        const override = this.registry.requireOperation(descriptor.name, kind);
        const context = resolveSerializationContext(descriptor, kind, override);
        const input = context.kind === 'mutation' ? context.input : undefined;

        const inputLines: string[] = kind === 'create' ? [] : ['id: ID!'];
        if (kind !== 'delete') {
            inputLines.push(...inputFields(descriptor, input).map(
                (field) => `${field.name}: ${this.inputType(field, kind === 'create')}`
            ));
        }
        inputLines.push('clientMutationId: String');
        this.blocks.push(block('input', names.input(kind), inputLines));

        let payloadLines: string[];
        if (kind === 'delete') {
            payloadLines = ['deletedId: ID'];
        } else {
            let outputType = descriptor.name;
            if (!sameGroups(context.output, queryGroups)) {
                outputType = names.payloadData(kind);
                this.objectType(outputType, descriptor, context.output);
            }
            payloadLines = [`${names.item}: ${outputType}`];
        }
        payloadLines.push('clientMutationId: String');
        this.blocks.push(block('type', names.payload(kind), payloadLines));

        this.mutationFields.push(`${names.mutation(kind)}(input: ${names.input(kind)}!): ${names.payload(kind)}`);
    }

    write(): string {
        for (const descriptor of this.registry.list()) {
            const name = descriptor.name;
            const queryOverride = this.registry.operations(name).get('query') ?? {};
            const queryGroups = resolveSerializationContext(descriptor, 'query', queryOverride).output;

            this.objectType(descriptor.name, descriptor, queryGroups, descriptor.description);

            if (this.registry.exposes(name, 'query')) {
                this.collection(descriptor, this.registry.argumentSchema(name));
            }
            for (const kind of MUTATION_KINDS) {
                if (this.registry.exposes(name, kind)) {
                    this.mutation(descriptor, kind, queryGroups);
                }
            }
        }

        if (this.queryFields.length === 0) {
            throw new ResourceConfigError(['At least one resource must expose the query operation']);
        }

        const sections = [
            '  """ISO-8601 date-time string."""\n  scalar DateTime',
            block('type', 'PageInfo', [
                'startCursor: String',
                'endCursor: String',
                'hasNextPage: Boolean!',
                'hasPreviousPage: Boolean!'
            ], 'Relay page information.'),
            ...this.blocks,
            block('type', 'Query', this.queryFields)
        ];
        if (this.mutationFields.length > 0) {
            sections.push(block('type', 'Mutation', this.mutationFields));
        }

        return `\n${sections.join('\n\n')}\n`;
    }
}

/** Builds the SDL for every resource in the registry. */
export function buildSchema(registry: ResourceRegistry): string {
    return new SchemaWriter(registry).write();
}
