import { createHash } from 'node:crypto';

import { FilterSpec, WindowSpec } from '../interfaces/persistence.js';
import { OrderClause } from '../interfaces/resource.js';
import { PaginationError, ValidationError } from './errors.js';
import { describeValue, isRecord } from './scalars.js';

/** Largest position a cursor may carry; offsets past it are rejected by the database. */
export const MAX_CURSOR_POSITION = 2_147_483_647;

export type CursorWindowRequest =
    | { direction: 'forward'; first: number; after?: string }
    | { direction: 'backward'; last: number; before?: string };

export type PaginationArguments = {
    first?: unknown;
    after?: unknown;
    last?: unknown;
    before?: unknown;
};

export type PageInfo = {
    startCursor: string | null;
    endCursor: string | null;
    hasNextPage: boolean;
    hasPreviousPage: boolean;
};

export type Edge<T> = {
    cursor: string;
    node: T;
};

export type Connection<T> = {
    totalCount: number;
    pageInfo: PageInfo;
    edges: Edge<T>[];
};

export type PaginationOptions = {
    defaultPageSize: number;
    maximumPageSize: number;
};

export type WindowSource<T> = {
    /** Identifies the filter and ordering the cursors belong to. */
    fingerprint: string;
    count: () => Promise<number>;
    fetch: (window: WindowSpec) => Promise<T[]>;
};

type CursorPayload = {
    p: number;
    f: string;
};

function clampLimit(limit: number, max: number): number {
    return Math.max(0, Math.min(limit, max));
}

/**
 * Relay cursor pagination over an ordered collection. Cursors encode an item's
 * position under a given filter and ordering, never its storage key.
 */
export class PaginationEngine {
    constructor(private readonly options: PaginationOptions) {}

    static fingerprint(resource: string, filter: FilterSpec, ordering: readonly OrderClause[]): string {
        return createHash('sha256')
            .update(JSON.stringify({ resource, conditions: filter.conditions, ordering }))
            .digest('hex')
            .slice(0, 16);
    }

    encodeCursor(position: number, fingerprint: string): string {
        const payload: CursorPayload = { p: position, f: fingerprint };
        return Buffer.from(JSON.stringify(payload), 'utf8').toString('base64url');
    }

    decodeCursor(cursor: string, fingerprint: string, argument: 'after' | 'before'): number {
        let decoded: unknown;
        try {
            decoded = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
        } catch {
            decoded = null;
        }

        if (!isRecord(decoded)
            || typeof decoded.p !== 'number'
            || !Number.isInteger(decoded.p)
            || decoded.p < 0
            || decoded.p > MAX_CURSOR_POSITION
            || typeof decoded.f !== 'string') {
            throw new PaginationError('INVALID_CURSOR', `Cursor '${argument}' cannot be decoded`, argument);
        }

        if (decoded.f !== fingerprint) {
            throw new PaginationError(
                'STALE_CURSOR',
                `Cursor '${argument}' belongs to a different filter or ordering`,
                argument
            );
        }

        return decoded.p;
    }

    private readPageSize(value: unknown, argument: 'first' | 'last'): number | undefined {
        if (value === undefined || value === null) {
            return undefined;
        }

        if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
            throw new ValidationError(
                'INVALID_PAGE_SIZE',
                `Argument '${argument}' must be a non-negative integer`,
                `Provide '${argument}' between 0 and ${this.options.maximumPageSize}.`,
                argument,
                { received: describeValue(value) }
            );
        }

        return clampLimit(value, this.options.maximumPageSize);
    }

    private readCursor(value: unknown, argument: 'after' | 'before'): string | undefined {
        if (value === undefined || value === null) {
            return undefined;
        }

        if (typeof value !== 'string') {
            throw new ValidationError(
                'INVALID_ARGUMENT_TYPE',
                `Argument '${argument}' must be a cursor string`,
                'Pass a cursor returned in a previous response.',
                argument
            );
        }

        return value;
    }

    parseWindow(args: PaginationArguments, pageSize: number = this.options.defaultPageSize): CursorWindowRequest {
        const first = this.readPageSize(args.first, 'first');
        const after = this.readCursor(args.after, 'after');
        const last = this.readPageSize(args.last, 'last');
        const before = this.readCursor(args.before, 'before');

        const forward = first !== undefined || after !== undefined;
        const backward = last !== undefined || before !== undefined;

        if (forward && backward) {
            throw new ValidationError(
                'CONFLICTING_PAGINATION',
                'Forward (first/after) and backward (last/before) pagination cannot be combined',
                'Use either first/after or last/before.',
                last !== undefined ? 'last' : 'before'
            );
        }

        const size = clampLimit(pageSize, this.options.maximumPageSize);
        if (backward) {
            return { direction: 'backward', last: last ?? size, before };
        }

        return { direction: 'forward', first: first ?? size, after };
    }

    private connection<T>(
        items: T[],
        start: number,
        totalCount: number,
        flags: Pick<PageInfo, 'hasNextPage' | 'hasPreviousPage'>,
        fingerprint: string
    ): Connection<T> {
        const edges = items.map((node, index) => ({
            cursor: this.encodeCursor(start + index, fingerprint),
            node
        }));

        return {
            totalCount,
            pageInfo: {
                startCursor: edges[0]?.cursor ?? null,
                endCursor: edges[edges.length - 1]?.cursor ?? null,
                ...flags
            },
            edges
        };
    }

    /**
     * Fetches one extra item in the travel direction to derive the has-more
     * flag. Edges always come out in ascending position order.
     */
    async paginate<T>(request: CursorWindowRequest, source: WindowSource<T>): Promise<Connection<T>> {
        if (request.direction === 'forward') {
            const offset = request.after !== undefined
                ? this.decodeCursor(request.after, source.fingerprint, 'after') + 1
                : 0;

            const [totalCount, fetched] = await Promise.all([
                source.count(),
                source.fetch({ offset, limit: request.first + 1 })
            ]);

            return this.connection(
                fetched.slice(0, request.first),
                offset,
                totalCount,
                {
                    hasNextPage: fetched.length > request.first,
                    hasPreviousPage: Math.min(offset, totalCount) > 0
                },
                source.fingerprint
            );
        }

        const before = request.before !== undefined
            ? this.decodeCursor(request.before, source.fingerprint, 'before')
            : undefined;

        // Without `before` the window ends at the last item, so the count is needed first.
        const knownCount = before === undefined ? await source.count() : undefined;
        const end = before ?? knownCount ?? 0;
        const offset = Math.max(0, end - (request.last + 1));
        const limit = end - offset;

        const [totalCount, fetched] = await Promise.all([
            knownCount ?? source.count(),
            limit > 0 ? source.fetch({ offset, limit }) : Promise.resolve<T[]>([])
        ]);

        const hasPreviousPage = fetched.length > request.last;
        const items = hasPreviousPage ? fetched.slice(fetched.length - request.last) : fetched;

        return this.connection(
            items,
            offset + (fetched.length - items.length),
            totalCount,
            { hasNextPage: end < totalCount, hasPreviousPage },
            source.fingerprint
        );
    }
}
