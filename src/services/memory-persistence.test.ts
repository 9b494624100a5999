import { beforeEach, describe, expect, it } from 'vitest';

import { catalogRegistry, seedCatalog } from '../__tests__/fixtures.js';
import { FilterCondition } from '../interfaces/persistence.js';
import { OrderClause } from '../interfaces/resource.js';
import { MemoryPersistence } from './memory-persistence.js';

const BY_ID: OrderClause[] = [{ property: 'id', direction: 'ASC' }];
const ALL = { offset: 0, limit: 100 };

describe('MemoryPersistence', () => {
    let persistence: MemoryPersistence;

    const offerIds = async (conditions: FilterCondition[], ordering: OrderClause[] = BY_ID, window = ALL) => {
        const items = await persistence.fetchWindow('Offer', { conditions }, ordering, window);
        return items.map((item) => item.id);
    };

    beforeEach(() => {
        persistence = new MemoryPersistence(catalogRegistry());
        seedCatalog(persistence);
    });

    it('filters through a to-one relation', async () => {
        expect(await offerIds([{ type: 'in', property: 'product.color', values: ['red', 'green'] }])).toEqual(['20', '21']);
        expect(await persistence.count('Offer', {
            conditions: [{ type: 'in', property: 'product.color', values: ['blue'] }]
        })).toBe(1);
    });

    it('matches any item behind a to-many relation', async () => {
        expect(await offerIds([{ type: 'in', property: 'tags.label', values: ['internal'] }])).toEqual(['21', '22']);
        expect(await offerIds([{ type: 'match', property: 'tags.label', mode: 'start', values: ['SA'] }])).toEqual(['22']);
    });

    it('matches text case-insensitively', async () => {
        expect(await offerIds([{ type: 'match', property: 'description', mode: 'partial', values: ['LAMP'] }])).toEqual(['20']);
        expect(await offerIds([{ type: 'match', property: 'description', mode: 'end', values: ['offer'] }])).toEqual(['22']);
    });

    it('compares numbers and dates', async () => {
        expect(await offerIds([{ type: 'compare', property: 'price', operator: 'gte', value: 10 }])).toEqual(['20', '21']);
        expect(await offerIds([
            { type: 'compare', property: 'product.releaseDate', operator: 'lt', value: '2024-01-01T00:00:00.000Z' }
        ])).toEqual(['21']);
    });

    it('checks for present and absent values', async () => {
        expect(await offerIds([{ type: 'exists', property: 'description', exists: false }])).toEqual(['21']);
        expect(await offerIds([{ type: 'exists', property: 'tags', exists: true }])).toEqual(['21', '22']);
    });

    it('ands conditions together', async () => {
        expect(await offerIds([
            { type: 'in', property: 'published', values: [true] },
            { type: 'compare', property: 'price', operator: 'lt', value: 8 }
        ])).toEqual(['22']);
    });

    it('orders nulls last ascending and first descending', async () => {
        const ascending: OrderClause[] = [{ property: 'product.releaseDate', direction: 'ASC' }, ...BY_ID];
        const descending: OrderClause[] = [{ property: 'product.releaseDate', direction: 'DESC' }, ...BY_ID];

        expect(await offerIds([], ascending)).toEqual(['21', '20', '22']);
        expect(await offerIds([], descending)).toEqual(['22', '20', '21']);
    });

    it('returns the requested window', async () => {
        const byPrice: OrderClause[] = [{ property: 'price', direction: 'ASC' }, ...BY_ID];
        expect(await offerIds([], byPrice, { offset: 1, limit: 1 })).toEqual(['20']);
        expect(await offerIds([], byPrice, { offset: 3, limit: 5 })).toEqual([]);
    });

    it('creates, updates and deletes items', async () => {
        const created = await persistence.mutate('Offer', 'create', { data: { price: 12, published: false } });
        expect(created).toEqual({ id: '23', price: 12, published: false });

        const updated = await persistence.mutate('Offer', 'update', { id: '23', data: { price: 13 } });
        expect(updated).toEqual({ id: '23', price: 13, published: false });

        const deleted = await persistence.mutate('Offer', 'delete', { id: '23', data: {} });
        expect(deleted).toEqual(updated);
        expect(await persistence.fetchOne('Offer', '23')).toBeNull();
    });

    it('returns copies of stored items', async () => {
        const item = await persistence.fetchOne('Offer', '20');
        expect(item).toMatchObject({ id: '20', price: 10 });
        if (item) {
            Object.assign(item, { price: 0 });
        }
        expect(await persistence.fetchOne('Offer', '20')).toMatchObject({ price: 10 });
    });

    it('rejects mutations of missing items', async () => {
        await expect(persistence.mutate('Offer', 'update', { id: '99', data: {} })).rejects.toThrowError(
            "Offer '99' does not exist"
        );
    });

    it('honours an aborted signal', async () => {
        const signal = AbortSignal.abort();
        await expect(persistence.count('Offer', { conditions: [] }, { signal })).rejects.toThrow();
    });

    it('assigns sequential ids to seeded records without one', () => {
        const fresh = new MemoryPersistence(catalogRegistry());
        expect(fresh.seed('Tag', [{ label: 'a' }, { label: 'b' }]).map((item) => item.id)).toEqual(['1', '2']);
    });
});
