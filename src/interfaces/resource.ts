export const OPERATION_NAMES = ['query', 'create', 'update', 'delete'] as const;
export const MUTATION_KINDS = ['create', 'update', 'delete'] as const;

export const SCALAR_TYPES = ['ID', 'String', 'Int', 'Float', 'Boolean', 'DateTime'] as const;

export const FILTER_KINDS = [
    'exact',
    'partial',
    'start',
    'end',
    'numeric',
    'boolean',
    'range',
    'date',
    'exists',
    'order'
] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];
export type MutationKind = (typeof MUTATION_KINDS)[number];
export type ScalarType = (typeof SCALAR_TYPES)[number];
export type FilterKind = (typeof FILTER_KINDS)[number];
export type ScalarValue = string | number | boolean;
export type OrderDirection = 'ASC' | 'DESC';

export type Principal = {
    readonly id: string | null;
    readonly roles: readonly string[];
    readonly claims: Readonly<Record<string, unknown>>;
};

export type ResourceItem = {
    readonly id: string;
    readonly [field: string]: unknown;
};

/**
 * Compiled authorization check. `object` is absent for collection-level and
 * create checks.
 */
export type AccessPredicate = (principal: Principal, object?: ResourceItem) => boolean;

export type AccessRule = {
    readonly test: AccessPredicate;
    readonly message?: string;
    /** True when the predicate reads the target object and must run after fetch. */
    readonly referencesObject: boolean;
    /** Source text, kept for diagnostics. */
    readonly expression?: string;
};

export type RelationDescriptor = {
    readonly target: string;
    readonly many: boolean;
};

export type FieldDescriptor = {
    readonly name: string;
    readonly type: ScalarType;
    readonly nullable: boolean;
    readonly relation?: RelationDescriptor;
    readonly groups?: readonly string[];
    readonly writable?: boolean;
    /** Set to the creating principal's id on `create`. Never accepted as input. */
    readonly fromPrincipal?: boolean;
    readonly description?: string;
};

export type FilterDeclaration = {
    readonly kind: FilterKind;
    readonly properties: readonly string[];
};

export type OrderClause = {
    readonly property: string;
    readonly direction: OrderDirection;
};

export type OperationOverride = {
    readonly filters?: Readonly<Record<string, FilterDeclaration>>;
    readonly security?: AccessRule;
    readonly securityPostDenormalize?: AccessRule;
    readonly normalizationGroups?: readonly string[];
    readonly denormalizationGroups?: readonly string[];
};

export type ResourceDescriptor = {
    readonly name: string;
    readonly description?: string;
    readonly fields: readonly FieldDescriptor[];
    readonly filters: Readonly<Record<string, FilterDeclaration>>;
    readonly order?: readonly OrderClause[];
    readonly security?: AccessRule;
    readonly securityPostDenormalize?: AccessRule;
    readonly normalizationGroups?: readonly string[];
    readonly denormalizationGroups?: readonly string[];
    readonly paginationItemsPerPage?: number;
    /** Absent means the registry's default operation set applies. */
    readonly operations?: Readonly<Partial<Record<OperationName, OperationOverride>>>;
};

export function isMutationKind(value: string): value is MutationKind {
    return (MUTATION_KINDS as readonly string[]).includes(value);
}
