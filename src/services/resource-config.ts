import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import {
    AccessRule,
    FILTER_KINDS,
    FieldDescriptor,
    OPERATION_NAMES,
    OperationName,
    OperationOverride,
    ResourceDescriptor,
    SCALAR_TYPES
} from '../interfaces/resource.js';
import { AccessExpressionError, compileAccessExpression } from './access-expression.js';
import { ResourceConfigError } from './errors.js';
import { ResourceRegistry } from './resource-registry.js';

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9]*$/;
const FIELD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const AccessRuleSchema = z.union([
    z.string().min(1),
    z.object({
        expression: z.string().min(1),
        message: z.string().optional()
    }).strict()
]);

const GroupsSchema = z.array(z.string().min(1));

const FilterSchema = z.object({
    kind: z.enum(FILTER_KINDS),
    properties: z.array(z.string().min(1)).min(1)
}).strict();

const FiltersSchema = z.record(z.string(), FilterSchema);

const OperationSchema = z.object({
    filters: FiltersSchema.optional(),
    security: AccessRuleSchema.optional(),
    securityPostDenormalize: AccessRuleSchema.optional(),
    normalizationGroups: GroupsSchema.optional(),
    denormalizationGroups: GroupsSchema.optional()
}).strict();

const FieldSchema = z.object({
    name: z.string().regex(FIELD_PATTERN, 'field names must be identifiers'),
    type: z.enum(SCALAR_TYPES).optional(),
    nullable: z.boolean().default(true),
    relation: z.object({
        target: z.string().min(1),
        many: z.boolean().default(false)
    }).strict().optional(),
    groups: GroupsSchema.optional(),
    writable: z.boolean().optional(),
    fromPrincipal: z.boolean().optional(),
    description: z.string().optional()
}).strict().refine((field) => !(field.fromPrincipal && field.relation), {
    message: 'fromPrincipal fields cannot be relations',
    path: ['fromPrincipal']
});

const ResourceSchema = z.object({
    name: z.string().regex(NAME_PATTERN, 'resource names must be alphanumeric and start with a letter'),
    description: z.string().optional(),
    fields: z.array(FieldSchema),
    filters: FiltersSchema.default({}),
    order: z.array(z.object({
        property: z.string().min(1),
        direction: z.enum(['ASC', 'DESC']).default('ASC')
    }).strict()).optional(),
    security: AccessRuleSchema.optional(),
    securityPostDenormalize: AccessRuleSchema.optional(),
    normalizationGroups: GroupsSchema.optional(),
    denormalizationGroups: GroupsSchema.optional(),
    paginationItemsPerPage: z.number().int().positive().optional(),
    operations: z.object({
        query: OperationSchema.optional(),
        create: OperationSchema.optional(),
        update: OperationSchema.optional(),
        delete: OperationSchema.optional()
    }).strict().optional()
}).strict();

const ResourceConfigSchema = z.object({
    defaultOperations: z.array(z.enum(OPERATION_NAMES)).optional(),
    resources: z.array(ResourceSchema).min(1)
}).strict();

type RawAccessRule = z.infer<typeof AccessRuleSchema>;
type RawOperation = z.infer<typeof OperationSchema>;
type RawField = z.infer<typeof FieldSchema>;
type RawResource = z.infer<typeof ResourceSchema>;

export type ResourceConfig = {
    defaultOperations?: OperationName[];
    resources: ResourceDescriptor[];
};

class RuleCompiler {
    readonly issues: string[] = [];

    compile(raw: RawAccessRule | undefined, path: string): AccessRule | undefined {
        if (raw === undefined) {
            return undefined;
        }

        const { expression, message } = typeof raw === 'string' ? { expression: raw, message: undefined } : raw;
        try {
            return compileAccessExpression(expression, message);
        } catch (error) {
            if (error instanceof AccessExpressionError) {
                this.issues.push(`${path}: ${error.message}`);
                return undefined;
            }
            throw error;
        }
    }
}

function toField(raw: RawField): FieldDescriptor {
    return {
        name: raw.name,
        type: raw.type ?? (raw.relation ? 'ID' : 'String'),
        nullable: raw.nullable,
        relation: raw.relation,
        groups: raw.groups,
        writable: raw.writable,
        fromPrincipal: raw.fromPrincipal,
        description: raw.description
    };
}

function toOverride(raw: RawOperation, path: string, rules: RuleCompiler): OperationOverride {
    return {
        filters: raw.filters,
        security: rules.compile(raw.security, `${path}.security`),
        securityPostDenormalize: rules.compile(raw.securityPostDenormalize, `${path}.securityPostDenormalize`),
        normalizationGroups: raw.normalizationGroups,
        denormalizationGroups: raw.denormalizationGroups
    };
}

function toDescriptor(raw: RawResource, index: number, rules: RuleCompiler): ResourceDescriptor {
    const path = `resources.${index}`;
    let operations: Partial<Record<OperationName, OperationOverride>> | undefined;
    if (raw.operations) {
        operations = {};
        for (const operation of OPERATION_NAMES) {
            const override = raw.operations[operation];
            if (override) {
                operations[operation] = toOverride(override, `${path}.operations.${operation}`, rules);
            }
        }
    }

    return {
        name: raw.name,
        description: raw.description,
        fields: raw.fields.map(toField),
        filters: raw.filters,
        order: raw.order,
        security: rules.compile(raw.security, `${path}.security`),
        securityPostDenormalize: rules.compile(raw.securityPostDenormalize, `${path}.securityPostDenormalize`),
        normalizationGroups: raw.normalizationGroups,
        denormalizationGroups: raw.denormalizationGroups,
        paginationItemsPerPage: raw.paginationItemsPerPage,
        operations
    };
}

/** Validates parsed JSON and compiles its access expressions. */
export function parseResourceConfig(input: unknown): ResourceConfig {
    const parsed = ResourceConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new ResourceConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }

    const rules = new RuleCompiler();
    const resources = parsed.data.resources.map((resource, index) => toDescriptor(resource, index, rules));
    if (rules.issues.length > 0) {
        throw new ResourceConfigError(rules.issues);
    }

    return { defaultOperations: parsed.data.defaultOperations, resources };
}

export async function loadResourceConfig(path: string): Promise<ResourceConfig> {
    const text = await readFile(path, 'utf8');
    let input: unknown;
    try {
        input = JSON.parse(text);
    } catch (error) {
        throw new ResourceConfigError([`${path}: ${error instanceof Error ? error.message : String(error)}`]);
    }
    return parseResourceConfig(input);
}

export function createRegistry(config: ResourceConfig): ResourceRegistry {
    return ResourceRegistry.create(config.resources, { defaultOperations: config.defaultOperations });
}
