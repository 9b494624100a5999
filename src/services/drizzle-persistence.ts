import {
    SQL,
    and,
    asc,
    count,
    desc,
    eq,
    gt,
    gte,
    ilike,
    inArray,
    isNotNull,
    isNull,
    lt,
    lte,
    or,
    sql
} from 'drizzle-orm';

import { Database } from '../db/index.js';
import { ResourceRecordRow, resourceRecords } from '../db/schema.js';
import {
    CallOptions,
    CompareOperator,
    FilterCondition,
    FilterSpec,
    MutationInput,
    PersistenceCollaborator,
    WindowSpec
} from '../interfaces/persistence.js';
import { FieldDescriptor, MutationKind, OrderClause, ResourceItem, ScalarType } from '../interfaces/resource.js';
import { PathResolver, PropertyTarget } from './filter-arguments.js';

function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function likePattern(mode: 'partial' | 'start' | 'end', value: string): string {
    const escaped = escapeLike(value);
    switch (mode) {
        case 'start':
            return `${escaped}%`;
        case 'end':
            return `%${escaped}`;
        default:
            return `%${escaped}%`;
    }
}

function typed(expression: SQL, type: ScalarType): SQL {
    switch (type) {
        case 'Int':
        case 'Float':
            return sql`(${expression})::numeric`;
        case 'Boolean':
            return sql`(${expression})::boolean`;
        case 'DateTime':
            return sql`(${expression})::timestamptz`;
        default:
            return expression;
    }
}

function compare(operator: CompareOperator, left: SQL, value: number | string): SQL {
    switch (operator) {
        case 'lt':
            return lt(left, value);
        case 'lte':
            return lte(left, value);
        case 'gt':
            return gt(left, value);
        case 'gte':
            return gte(left, value);
    }
}

type RowRefs = {
    data: SQL;
    id: SQL;
};

/**
 * Compiles filter specs and orderings into SQL over `resource_records`. Each
 * hop through a to-one relation becomes a correlated subquery on a fresh alias.
 * Paths through to-many relations are rejected.
 */
export class RecordQueryCompiler {
    constructor(private readonly paths: PathResolver) {}

    private target(resource: string, property: string): PropertyTarget {
        const target = this.paths.findPath(resource, property);
        if (!target) {
            throw new Error(`Property '${property}' does not resolve on ${resource}`);
        }
        if (target.segments.some((segment) => segment.field.relation?.many)) {
            throw new Error(`Property '${property}' on ${resource} crosses a to-many relation`);
        }
        return target;
    }

    private valueOf(field: FieldDescriptor, refs: RowRefs): SQL {
        return field.name === 'id' ? sql`${refs.id}::text` : sql`${refs.data} ->> ${field.name}`;
    }

    /** Text value of a dotted property for the current row. */
    propertyText(resource: string, property: string): { expression: SQL; type: ScalarType } {
        const target = this.target(resource, property);
        let alias = 0;

        const build = (index: number, refs: RowRefs): SQL => {
            const segment = target.segments[index];
            const relation = segment.field.relation;
            if (index === target.segments.length - 1 || !relation) {
                return this.valueOf(segment.field, refs);
            }

            alias++;
            const name = sql.raw(`"r${alias}"`);
            const inner = build(index + 1, { data: sql`${name}."data"`, id: sql`${name}."id"` });
            return sql`(select ${inner} from ${resourceRecords} ${name} where ${name}."resource" = ${relation.target} and ${name}."id"::text = (${this.valueOf(segment.field, refs)}))`;
        };

        const root: RowRefs = { data: sql`${resourceRecords.data}`, id: sql`${resourceRecords.id}` };
        return { expression: build(0, root), type: target.leaf.type };
    }

    condition(resource: string, condition: FilterCondition): SQL | undefined {
        const { expression, type } = this.propertyText(resource, condition.property);

        switch (condition.type) {
            case 'in':
                return inArray(typed(expression, type), [...condition.values]);
            case 'match':
                return or(...condition.values.map((value) => ilike(expression, likePattern(condition.mode, value))));
            case 'compare':
                return compare(condition.operator, typed(expression, type), condition.value);
            case 'exists':
                return condition.exists ? isNotNull(expression) : isNull(expression);
        }
    }

    where(resource: string, filter: FilterSpec): SQL | undefined {
        return and(
            eq(resourceRecords.resource, resource),
            ...filter.conditions.map((condition) => this.condition(resource, condition))
        );
    }

    orderBy(resource: string, ordering: readonly OrderClause[]): SQL[] {
        return ordering.map((clause) => {
            const column = clause.property === 'id'
                ? sql`${resourceRecords.id}`
                : (() => {
                    const { expression, type } = this.propertyText(resource, clause.property);
                    return typed(expression, type);
                })();
            return clause.direction === 'DESC' ? desc(column) : asc(column);
        });
    }
}

function toItem(row: ResourceRecordRow): ResourceItem {
    return { ...row.data, id: String(row.id) };
}

function toRowId(id: string | undefined): number | undefined {
    if (id === undefined || !/^\d+$/.test(id)) {
        return undefined;
    }
    return Number(id);
}

/** PostgreSQL persistence over a single jsonb table. */
export class DrizzlePersistence implements PersistenceCollaborator {
    readonly persistenceName = 'postgres';
    private readonly compiler: RecordQueryCompiler;

    constructor(private readonly db: Database, paths: PathResolver) {
        this.compiler = new RecordQueryCompiler(paths);
    }

    async count(resource: string, filter: FilterSpec, options?: CallOptions): Promise<number> {
        options?.signal?.throwIfAborted();
        const [result] = await this.db
            .select({ value: count() })
            .from(resourceRecords)
            .where(this.compiler.where(resource, filter));
        return result?.value ?? 0;
    }

    async fetchWindow(
        resource: string,
        filter: FilterSpec,
        ordering: readonly OrderClause[],
        window: WindowSpec,
        options?: CallOptions
    ): Promise<ResourceItem[]> {
        options?.signal?.throwIfAborted();
        const rows = await this.db
            .select()
            .from(resourceRecords)
            .where(this.compiler.where(resource, filter))
            .orderBy(...this.compiler.orderBy(resource, ordering))
            .limit(window.limit)
            .offset(window.offset);
        return rows.map(toItem);
    }

    async fetchOne(resource: string, id: string, options?: CallOptions): Promise<ResourceItem | null> {
        options?.signal?.throwIfAborted();
        const rowId = toRowId(id);
        if (rowId === undefined) {
            return null;
        }
        const [row] = await this.db
            .select()
            .from(resourceRecords)
            .where(and(eq(resourceRecords.resource, resource), eq(resourceRecords.id, rowId)));
        return row ? toItem(row) : null;
    }

    async mutate(resource: string, kind: MutationKind, input: MutationInput, options?: CallOptions): Promise<ResourceItem> {
        options?.signal?.throwIfAborted();

        if (kind === 'create') {
            const [created] = await this.db
                .insert(resourceRecords)
                .values({ resource, data: input.data })
                .returning();
            return toItem(created);
        }

        const rowId = toRowId(input.id);
        if (rowId === undefined) {
            throw new Error(`${resource} '${input.id ?? ''}' does not exist`);
        }
        const match = and(eq(resourceRecords.resource, resource), eq(resourceRecords.id, rowId));

        const [row] = kind === 'delete'
            ? await this.db.delete(resourceRecords).where(match).returning()
            : await this.db
                .update(resourceRecords)
                .set({
                    data: sql`${resourceRecords.data} || ${JSON.stringify(input.data)}::jsonb`,
                    updatedAt: new Date()
                })
                .where(match)
                .returning();

        if (!row) {
            throw new Error(`${resource} '${input.id ?? ''}' does not exist`);
        }
        return toItem(row);
    }
}
