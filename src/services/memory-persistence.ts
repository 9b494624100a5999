import {
    CallOptions,
    FilterCondition,
    FilterSpec,
    MutationInput,
    PersistenceCollaborator,
    WindowSpec
} from '../interfaces/persistence.js';
import { MutationKind, OrderClause, ResourceItem, ScalarType } from '../interfaces/resource.js';
import { PathResolver, PropertyTarget } from './filter-arguments.js';

type StoredRecord = Record<string, unknown> & { id: string };

type Comparable = string | number | boolean;

const NUMERIC_ID = /^\d+$/;

function toComparable(value: unknown, type: ScalarType): Comparable | null {
    if (value === null || value === undefined) {
        return null;
    }
    if (type === 'DateTime' && typeof value === 'string') {
        const time = Date.parse(value);
        return Number.isNaN(time) ? value : time;
    }
    if (type === 'ID') {
        const id = String(value);
        return NUMERIC_ID.test(id) ? Number(id) : id;
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    return String(value);
}

function compareComparable(left: Comparable, right: Comparable): number {
    if (typeof left === 'number' && typeof right === 'number') {
        return left - right;
    }
    if (typeof left === 'boolean' && typeof right === 'boolean') {
        return Number(left) - Number(right);
    }
    const a = String(left);
    const b = String(right);
    return a < b ? -1 : a > b ? 1 : 0;
}

function matchesText(value: unknown, mode: 'partial' | 'start' | 'end', needle: string): boolean {
    if (typeof value !== 'string' && typeof value !== 'number') {
        return false;
    }
    const haystack = String(value).toLowerCase();
    const expected = needle.toLowerCase();
    switch (mode) {
        case 'start':
            return haystack.startsWith(expected);
        case 'end':
            return haystack.endsWith(expected);
        default:
            return haystack.includes(expected);
    }
}

function copy(record: StoredRecord): ResourceItem {
    return { ...record };
}

/**
 * In-process persistence. Nested paths follow relations through the stored
 * items; a path through a to-many relation matches when any related item does.
 * Ascending order puts nulls last, descending puts them first.
 */
export class MemoryPersistence implements PersistenceCollaborator {
    readonly persistenceName = 'memory';

    private readonly stores = new Map<string, Map<string, StoredRecord>>();
    private lastId = 0;

    constructor(private readonly paths: PathResolver) {}

    private store(resource: string): Map<string, StoredRecord> {
        let store = this.stores.get(resource);
        if (!store) {
            store = new Map();
            this.stores.set(resource, store);
        }
        return store;
    }

    private nextId(): string {
        this.lastId++;
        return String(this.lastId);
    }

    /** Adds records as-is. Records without an id receive the next sequential one. */
    seed(resource: string, records: readonly Record<string, unknown>[]): ResourceItem[] {
        const store = this.store(resource);
        return records.map((record) => {
            const id = record.id === undefined || record.id === null ? this.nextId() : String(record.id);
            if (NUMERIC_ID.test(id)) {
                this.lastId = Math.max(this.lastId, Number(id));
            }
            const stored: StoredRecord = { ...record, id };
            store.set(id, stored);
            return copy(stored);
        });
    }

    private target(resource: string, property: string): PropertyTarget {
        const target = this.paths.findPath(resource, property);
        if (!target) {
            throw new Error(`Property '${property}' does not resolve on ${resource}`);
        }
        return target;
    }

    private valuesAt(item: StoredRecord, target: PropertyTarget): unknown[] {
        let current: StoredRecord[] = [item];

        for (const [index, segment] of target.segments.entries()) {
            const values = current.map((entry) => entry[segment.field.name]);
            const relation = segment.field.relation;

            if (index === target.segments.length - 1) {
                return relation?.many
                    ? values.flatMap((value) => (Array.isArray(value) ? value : []))
                    : values.filter((value) => value !== undefined && value !== null);
            }

            if (!relation) {
                return [];
            }

            const related = this.store(relation.target);
            const next: StoredRecord[] = [];
            for (const value of values) {
                const ids = relation.many
                    ? (Array.isArray(value) ? value : [])
                    : (value === undefined || value === null ? [] : [value]);
                for (const id of ids) {
                    const found = related.get(String(id));
                    if (found) {
                        next.push(found);
                    }
                }
            }
            current = next;
        }

        return [];
    }

    private matches(resource: string, item: StoredRecord, condition: FilterCondition): boolean {
        const target = this.target(resource, condition.property);
        const values = this.valuesAt(item, target);
        const type = target.leaf.type;

        switch (condition.type) {
            case 'in':
                return values.some((value) => {
                    const actual = toComparable(value, type);
                    return condition.values.some((expected) => {
                        const wanted = toComparable(expected, type);
                        return actual !== null && wanted !== null && compareComparable(actual, wanted) === 0;
                    });
                });
            case 'match':
                return values.some((value) => condition.values.some((needle) => matchesText(value, condition.mode, needle)));
            case 'compare':
                return values.some((value) => {
                    const actual = toComparable(value, type);
                    const bound = toComparable(condition.value, type);
                    if (actual === null || bound === null) {
                        return false;
                    }
                    const result = compareComparable(actual, bound);
                    switch (condition.operator) {
                        case 'lt':
                            return result < 0;
                        case 'lte':
                            return result <= 0;
                        case 'gt':
                            return result > 0;
                        case 'gte':
                            return result >= 0;
                    }
                });
            case 'exists':
                return condition.exists === values.length > 0;
        }
    }

    private select(resource: string, filter: FilterSpec): StoredRecord[] {
        return Array.from(this.store(resource).values())
            .filter((item) => filter.conditions.every((condition) => this.matches(resource, item, condition)));
    }

    async count(resource: string, filter: FilterSpec, options?: CallOptions): Promise<number> {
        options?.signal?.throwIfAborted();
        return this.select(resource, filter).length;
    }

    async fetchWindow(
        resource: string,
        filter: FilterSpec,
        ordering: readonly OrderClause[],
        window: WindowSpec,
        options?: CallOptions
    ): Promise<ResourceItem[]> {
        options?.signal?.throwIfAborted();

        const keys = ordering.map((clause) => ({ clause, target: this.target(resource, clause.property) }));
        const rows = this.select(resource, filter).map((item) => ({
            item,
            sortValues: keys.map(({ target }) => toComparable(this.valuesAt(item, target)[0], target.leaf.type))
        }));

        rows.sort((left, right) => {
            for (const [index, { clause }] of keys.entries()) {
                const a = left.sortValues[index];
                const b = right.sortValues[index];
                if (a === b) {
                    continue;
                }
                // Nulls rank above every value.
                const result = a === null ? 1 : b === null ? -1 : compareComparable(a, b);
                if (result !== 0) {
                    return clause.direction === 'DESC' ? -result : result;
                }
            }
            return 0;
        });

        return rows.slice(window.offset, window.offset + window.limit).map(({ item }) => copy(item));
    }

    async fetchOne(resource: string, id: string, options?: CallOptions): Promise<ResourceItem | null> {
        options?.signal?.throwIfAborted();
        const found = this.store(resource).get(id);
        return found ? copy(found) : null;
    }

    async mutate(resource: string, kind: MutationKind, input: MutationInput, options?: CallOptions): Promise<ResourceItem> {
        options?.signal?.throwIfAborted();
        const store = this.store(resource);

        if (kind === 'create') {
            const stored: StoredRecord = { ...input.data, id: this.nextId() };
            store.set(stored.id, stored);
            return copy(stored);
        }

        const existing = input.id !== undefined ? store.get(input.id) : undefined;
        if (!existing) {
            throw new Error(`${resource} '${input.id ?? ''}' does not exist`);
        }

        if (kind === 'delete') {
            store.delete(existing.id);
            return copy(existing);
        }

        const updated: StoredRecord = { ...existing, ...input.data, id: existing.id };
        store.set(updated.id, updated);
        return copy(updated);
    }
}
