import { MutationKind, OrderClause, ResourceItem, ScalarValue } from './resource.js';

export type MatchMode = 'partial' | 'start' | 'end';
export type CompareOperator = 'lt' | 'lte' | 'gt' | 'gte';

export type FilterCondition =
    | { readonly type: 'in'; readonly property: string; readonly values: readonly ScalarValue[] }
    | { readonly type: 'match'; readonly property: string; readonly mode: MatchMode; readonly values: readonly string[] }
    | { readonly type: 'compare'; readonly property: string; readonly operator: CompareOperator; readonly value: number | string }
    | { readonly type: 'exists'; readonly property: string; readonly exists: boolean };

/** Conditions are AND-ed; values inside a single condition are OR-ed. */
export interface FilterSpec {
    readonly conditions: readonly FilterCondition[];
}

export interface WindowSpec {
    offset: number;
    limit: number;
}

export interface MutationInput {
    id?: string;
    data: Record<string, unknown>;
}

export interface CallOptions {
    signal?: AbortSignal;
}

/**
 * Storage collaborator used by the resolver. Implementations may throw any
 * error; the resolver wraps it into a PersistenceError.
 */
export interface PersistenceCollaborator {
    readonly persistenceName: string;

    count(resource: string, filter: FilterSpec, options?: CallOptions): Promise<number>;

    /**
     * Returns items in the given ordering, skipping `window.offset` matches and
     * returning at most `window.limit`.
     */
    fetchWindow(
        resource: string,
        filter: FilterSpec,
        ordering: readonly OrderClause[],
        window: WindowSpec,
        options?: CallOptions
    ): Promise<ResourceItem[]>;

    fetchOne(resource: string, id: string, options?: CallOptions): Promise<ResourceItem | null>;

    /** `delete` resolves with the item as it was before removal. */
    mutate(resource: string, kind: MutationKind, input: MutationInput, options?: CallOptions): Promise<ResourceItem>;
}
