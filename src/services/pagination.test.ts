import { describe, expect, it, vi } from 'vitest';

import { captureError } from '../__tests__/fixtures.js';
import { WindowSpec } from '../interfaces/persistence.js';
import { PaginationError, ValidationError } from './errors.js';
import { Connection, MAX_CURSOR_POSITION, PaginationEngine } from './pagination.js';

const ITEMS = ['a', 'b', 'c', 'd', 'e', 'f', 'g'];

function arraySource(items: string[], fingerprint = 'fp') {
    return {
        fingerprint,
        count: vi.fn(async () => items.length),
        fetch: vi.fn(async (window: WindowSpec) => items.slice(window.offset, window.offset + window.limit))
    };
}

function nodes(connection: Connection<string>): string[] {
    return connection.edges.map((edge) => edge.node);
}

describe('PaginationEngine', () => {
    const engine = new PaginationEngine({ defaultPageSize: 3, maximumPageSize: 5 });

    const positions = (connection: Connection<string>) =>
        connection.edges.map((edge) => engine.decodeCursor(edge.cursor, 'fp', 'after'));

    it('returns the first page with one look-ahead item', async () => {
        const source = arraySource(ITEMS);
        const page = await engine.paginate(engine.parseWindow({}), source);

        expect(source.fetch).toHaveBeenCalledWith({ offset: 0, limit: 4 });
        expect(nodes(page)).toEqual(['a', 'b', 'c']);
        expect(positions(page)).toEqual([0, 1, 2]);
        expect(page.totalCount).toBe(7);
        expect(page.pageInfo.hasNextPage).toBe(true);
        expect(page.pageInfo.hasPreviousPage).toBe(false);
        expect(page.pageInfo.startCursor).toBe(page.edges[0]?.cursor);
        expect(page.pageInfo.endCursor).toBe(page.edges[2]?.cursor);
    });

    it('continues after a cursor', async () => {
        const source = arraySource(ITEMS);
        const after = engine.encodeCursor(2, 'fp');
        const page = await engine.paginate(engine.parseWindow({ after }), source);

        expect(source.fetch).toHaveBeenCalledWith({ offset: 3, limit: 4 });
        expect(nodes(page)).toEqual(['d', 'e', 'f']);
        expect(page.pageInfo.hasNextPage).toBe(true);
        expect(page.pageInfo.hasPreviousPage).toBe(true);
    });

    it('reports no next page on the final page', async () => {
        const page = await engine.paginate(
            engine.parseWindow({ first: 3, after: engine.encodeCursor(5, 'fp') }),
            arraySource(ITEMS)
        );

        expect(nodes(page)).toEqual(['g']);
        expect(page.pageInfo.hasNextPage).toBe(false);
        expect(page.pageInfo.hasPreviousPage).toBe(true);
    });

    it('returns the tail of the collection for last without before', async () => {
        const source = arraySource(ITEMS);
        const page = await engine.paginate(engine.parseWindow({ last: 2 }), source);

        expect(source.fetch).toHaveBeenCalledWith({ offset: 4, limit: 3 });
        expect(nodes(page)).toEqual(['f', 'g']);
        expect(positions(page)).toEqual([5, 6]);
        expect(page.pageInfo.hasNextPage).toBe(false);
        expect(page.pageInfo.hasPreviousPage).toBe(true);
    });

    it('pages backward before a cursor', async () => {
        const before = engine.encodeCursor(3, 'fp');
        const page = await engine.paginate(engine.parseWindow({ last: 2, before }), arraySource(ITEMS));

        expect(nodes(page)).toEqual(['b', 'c']);
        expect(positions(page)).toEqual([1, 2]);
        expect(page.pageInfo.hasNextPage).toBe(true);
        expect(page.pageInfo.hasPreviousPage).toBe(true);
    });

    it('stops at the start of the collection', async () => {
        const before = engine.encodeCursor(1, 'fp');
        const page = await engine.paginate(engine.parseWindow({ last: 3, before }), arraySource(ITEMS));

        expect(nodes(page)).toEqual(['a']);
        expect(page.pageInfo.hasPreviousPage).toBe(false);
    });

    it('visits the same items in both directions', async () => {
        const source = arraySource(ITEMS);

        const forward: string[] = [];
        let after: string | null = null;
        for (;;) {
            const page: Connection<string> = await engine.paginate(engine.parseWindow({ first: 3, after }), source);
            forward.push(...nodes(page));
            if (!page.pageInfo.hasNextPage) {
                break;
            }
            after = page.pageInfo.endCursor;
        }

        const backward: string[] = [];
        let before: string | null = null;
        for (;;) {
            const page: Connection<string> = await engine.paginate(engine.parseWindow({ last: 3, before }), source);
            backward.unshift(...nodes(page));
            if (!page.pageInfo.hasPreviousPage) {
                break;
            }
            before = page.pageInfo.startCursor;
        }

        expect(forward).toEqual(ITEMS);
        expect(backward).toEqual(ITEMS);
    });

    it('handles an empty collection', async () => {
        const source = arraySource([]);
        const forward = await engine.paginate(engine.parseWindow({}), source);
        const backward = await engine.paginate(engine.parseWindow({ last: 2 }), source);

        for (const page of [forward, backward]) {
            expect(page.edges).toEqual([]);
            expect(page.totalCount).toBe(0);
            expect(page.pageInfo).toEqual({
                startCursor: null,
                endCursor: null,
                hasNextPage: false,
                hasPreviousPage: false
            });
        }
    });

    it('still derives hasNextPage for first: 0', async () => {
        const page = await engine.paginate(engine.parseWindow({ first: 0 }), arraySource(ITEMS));
        expect(page.edges).toEqual([]);
        expect(page.pageInfo.hasNextPage).toBe(true);
    });

    it('clamps page sizes to the maximum', () => {
        expect(engine.parseWindow({ first: 50 })).toEqual({ direction: 'forward', first: 5, after: undefined });
        expect(engine.parseWindow({}, 10)).toEqual({ direction: 'forward', first: 5, after: undefined });
        expect(engine.parseWindow({ last: 4 })).toEqual({ direction: 'backward', last: 4, before: undefined });
    });

    it('rejects mixed directions', () => {
        const error = captureError(() => engine.parseWindow({ first: 1, last: 1 }));
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({ code: 'CONFLICTING_PAGINATION', argument: 'last' });
    });

    it('rejects invalid page sizes and cursor types', () => {
        expect(captureError(() => engine.parseWindow({ first: -1 }))).toMatchObject({ code: 'INVALID_PAGE_SIZE' });
        expect(captureError(() => engine.parseWindow({ last: 1.5 }))).toMatchObject({ code: 'INVALID_PAGE_SIZE' });
        expect(captureError(() => engine.parseWindow({ after: 3 }))).toMatchObject({ code: 'INVALID_ARGUMENT_TYPE' });
    });

    it('rejects cursors it cannot decode', async () => {
        const garbage = engine.paginate(engine.parseWindow({ after: 'not-a-cursor' }), arraySource(ITEMS));
        await expect(garbage).rejects.toBeInstanceOf(PaginationError);
        await expect(garbage).rejects.toMatchObject({ code: 'INVALID_CURSOR' });

        const negative = Buffer.from(JSON.stringify({ p: -1, f: 'fp' })).toString('base64url');
        expect(captureError(() => engine.decodeCursor(negative, 'fp', 'before'))).toMatchObject({
            code: 'INVALID_CURSOR',
            context: { argument: 'before' }
        });

        for (const p of [MAX_CURSOR_POSITION + 1, 1e20]) {
            const oversized = Buffer.from(JSON.stringify({ p, f: 'fp' })).toString('base64url');
            expect(captureError(() => engine.decodeCursor(oversized, 'fp', 'after'))).toMatchObject({
                code: 'INVALID_CURSOR',
                context: { argument: 'after' }
            });
        }
        const largest = Buffer.from(JSON.stringify({ p: MAX_CURSOR_POSITION, f: 'fp' })).toString('base64url');
        expect(engine.decodeCursor(largest, 'fp', 'after')).toBe(MAX_CURSOR_POSITION);
    });

    it('rejects cursors issued for another filter or ordering', async () => {
        const source = arraySource(ITEMS);
        const after = engine.encodeCursor(1, 'other');

        await expect(engine.paginate(engine.parseWindow({ after }), source)).rejects.toMatchObject({
            code: 'STALE_CURSOR'
        });
        expect(source.fetch).not.toHaveBeenCalled();
    });

    it('fingerprints the resource, filter and ordering', () => {
        const filter = { conditions: [{ type: 'in' as const, property: 'color', values: ['red'] }] };
        const ordering = [{ property: 'id', direction: 'ASC' as const }];

        const fingerprint = PaginationEngine.fingerprint('Offer', filter, ordering);
        expect(fingerprint).toHaveLength(16);
        expect(PaginationEngine.fingerprint('Offer', filter, ordering)).toBe(fingerprint);
        expect(PaginationEngine.fingerprint('Offer', filter, [{ property: 'id', direction: 'DESC' }])).not.toBe(fingerprint);
        expect(PaginationEngine.fingerprint('Product', filter, ordering)).not.toBe(fingerprint);
    });
});
