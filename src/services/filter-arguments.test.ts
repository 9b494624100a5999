import { describe, expect, it } from 'vitest';

import { captureError, catalogRegistry } from '../__tests__/fixtures.js';
import { FilterDeclaration } from '../interfaces/resource.js';
import { ValidationError } from './errors.js';
import { buildArgumentSchema, translateArguments } from './filter-arguments.js';

describe('Filter argument translation', () => {
    const registry = catalogRegistry();
    const offers = registry.argumentSchema('Offer');

    it('exposes nested and list arguments in declaration order', () => {
        expect(offers.arguments.map((argument) => argument.name)).toEqual([
            'product_color',
            'product_color_list',
            'product',
            'product_list',
            'description',
            'description_list',
            'published',
            'price',
            'releaseDate'
        ]);
        expect(offers.order.map((entry) => entry.key)).toEqual(['releaseDate', 'product_releaseDate', 'price']);
        expect(offers.exists.map((entry) => entry.key)).toEqual(['description']);
    });

    it('translates a nested list filter and nested ordering', () => {
        const result = translateArguments(offers, {
            product_color_list: ['red', 'green'],
            order: [{ product_releaseDate: 'DESC' }]
        });

        expect(result.filter.conditions).toEqual([
            { type: 'in', property: 'product.color', values: ['red', 'green'] }
        ]);
        expect(result.ordering).toEqual([
            { property: 'product.releaseDate', direction: 'DESC' },
            { property: 'id', direction: 'ASC' }
        ]);
    });

    it('turns partial filters into match conditions', () => {
        const result = translateArguments(offers, { description: 'lamp' });
        expect(result.filter.conditions).toEqual([
            { type: 'match', property: 'description', mode: 'partial', values: ['lamp'] }
        ]);
    });

    it('coerces integer ids to strings', () => {
        const result = translateArguments(offers, { product: 7 });
        expect(result.filter.conditions).toEqual([{ type: 'in', property: 'product', values: ['7'] }]);
    });

    it('translates range and date bounds', () => {
        const result = translateArguments(offers, {
            price: { gte: 10, lt: 20 },
            releaseDate: { after: '2024-01-01' }
        });

        expect(result.filter.conditions).toEqual([
            { type: 'compare', property: 'price', operator: 'gte', value: 10 },
            { type: 'compare', property: 'price', operator: 'lt', value: 20 },
            { type: 'compare', property: 'releaseDate', operator: 'gte', value: '2024-01-01T00:00:00.000Z' }
        ]);
    });

    it('translates the exists argument', () => {
        const result = translateArguments(offers, { exists: [{ description: false }] });
        expect(result.filter.conditions).toEqual([{ type: 'exists', property: 'description', exists: false }]);
    });

    it('skips empty lists and null values', () => {
        const result = translateArguments(offers, { product_color_list: [], description: null });
        expect(result.filter.conditions).toEqual([]);
        expect(result.ordering).toEqual([
            { property: 'releaseDate', direction: 'ASC' },
            { property: 'id', direction: 'ASC' }
        ]);
    });

    it('accepts lowercase directions and keeps the first clause per property', () => {
        const result = translateArguments(offers, { order: [{ price: 'desc' }, { price: 'ASC' }] });
        expect(result.ordering).toEqual([
            { property: 'price', direction: 'DESC' },
            { property: 'id', direction: 'ASC' }
        ]);
    });

    it('falls back to the declared default order', () => {
        const result = translateArguments(registry.argumentSchema('Product'), {});
        expect(result.ordering).toEqual([
            { property: 'name', direction: 'ASC' },
            { property: 'id', direction: 'ASC' }
        ]);
    });

    it('produces equal specs for equal inputs', () => {
        const args = { description: 'lamp', price: { lte: 12 }, order: [{ releaseDate: 'ASC' }] };
        expect(translateArguments(offers, args)).toEqual(translateArguments(offers, args));
    });

    it('rejects unknown arguments', () => {
        const error = captureError(() => translateArguments(offers, { colour: 'red' }));
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({ code: 'UNKNOWN_ARGUMENT', argument: 'colour' });
    });

    it('rejects values of the wrong type', () => {
        expect(captureError(() => translateArguments(offers, { product_color: 5 }))).toMatchObject({
            code: 'INVALID_ARGUMENT_TYPE',
            message: "Argument 'product_color' expects a String, received number"
        });
        expect(captureError(() => translateArguments(offers, { published: 'yes' }))).toMatchObject({
            code: 'INVALID_ARGUMENT_TYPE',
            argument: 'published'
        });
        expect(captureError(() => translateArguments(offers, { product_color_list: 'red' }))).toMatchObject({
            code: 'INVALID_ARGUMENT_TYPE',
            argument: 'product_color_list'
        });
    });

    it('rejects unknown bounds', () => {
        expect(captureError(() => translateArguments(offers, { price: { between: 1 } }))).toMatchObject({
            code: 'INVALID_RANGE_ARGUMENT',
            argument: 'price.between'
        });
    });

    it('rejects invalid orderings', () => {
        expect(captureError(() => translateArguments(offers, { order: [{ price: 'sideways' }] }))).toMatchObject({
            code: 'INVALID_ORDER_DIRECTION',
            argument: 'order.price'
        });
        expect(captureError(() => translateArguments(offers, { order: [{ description: 'ASC' }] }))).toMatchObject({
            code: 'UNKNOWN_ORDER_PROPERTY',
            argument: 'order.description'
        });
    });
});

describe('Argument schema derivation', () => {
    const registry = catalogRegistry();
    const offer = registry.get('Offer');

    const derive = (filters: Record<string, FilterDeclaration>) =>
        captureError(() => buildArgumentSchema({ ...offer, filters }, filters, registry));

    it('rejects paths that do not resolve', () => {
        expect(derive({ broken: { kind: 'exact', properties: ['product.weight'] } })).toMatchObject({
            code: 'UNRESOLVABLE_FILTER_PATH',
            argument: 'broken'
        });
    });

    it('rejects kinds that do not fit the field type', () => {
        expect(derive({ range: { kind: 'range', properties: ['description'] } })).toMatchObject({
            code: 'INCOMPATIBLE_FILTER_TYPE'
        });
        expect(derive({ order: { kind: 'order', properties: ['tags.label'] } })).toMatchObject({
            code: 'INCOMPATIBLE_FILTER_TYPE'
        });
    });

    it('rejects two filters producing the same argument', () => {
        expect(derive({
            exact: { kind: 'exact', properties: ['description'] },
            partial: { kind: 'partial', properties: ['description'] }
        })).toMatchObject({ code: 'DUPLICATE_FILTER_ARGUMENT', argument: 'partial' });
    });
});
