import { Principal } from '../interfaces/resource.js';
import { buildPrincipal } from '../services/policy-adapters.js';
import { MemoryPersistence } from '../services/memory-persistence.js';
import { createRegistry, parseResourceConfig } from '../services/resource-config.js';
import { ResourceRegistry } from '../services/resource-registry.js';

export const catalogConfig = {
    resources: [
        {
            name: 'Product',
            fields: [
                { name: 'name', type: 'String', nullable: false },
                { name: 'color', type: 'String' },
                { name: 'releaseDate', type: 'DateTime' }
            ],
            filters: {
                'product.order': { kind: 'order', properties: ['name', 'releaseDate'] }
            },
            order: [{ property: 'name' }],
            security: "is_granted('ROLE_USER')",
            operations: { query: {} }
        },
        {
            name: 'Tag',
            fields: [{ name: 'label', type: 'String', nullable: false }],
            filters: {
                'tag.start': { kind: 'start', properties: ['label'] }
            },
            security: "is_granted('ROLE_ADMIN') or object.label != 'internal'"
        },
        {
            name: 'Offer',
            fields: [
                { name: 'price', type: 'Float', nullable: false },
                { name: 'description', type: 'String' },
                { name: 'published', type: 'Boolean', nullable: false },
                { name: 'releaseDate', type: 'DateTime' },
                { name: 'product', relation: { target: 'Product' } },
                { name: 'tags', relation: { target: 'Tag', many: true } },
                { name: 'owner', type: 'String', fromPrincipal: true }
            ],
            filters: {
                'offer.exact': { kind: 'exact', properties: ['product.color', 'product'] },
                'offer.partial': { kind: 'partial', properties: ['description'] },
                'offer.boolean': { kind: 'boolean', properties: ['published'] },
                'offer.range': { kind: 'range', properties: ['price'] },
                'offer.date': { kind: 'date', properties: ['releaseDate'] },
                'offer.exists': { kind: 'exists', properties: ['description'] },
                'offer.order': { kind: 'order', properties: ['releaseDate', 'product.releaseDate', 'price'] }
            },
            order: [{ property: 'releaseDate', direction: 'ASC' }],
            paginationItemsPerPage: 2,
            operations: {
                query: {},
                create: { security: "is_granted('ROLE_USER')" },
                update: {
                    security: "is_granted('ROLE_ADMIN') or object.owner == user",
                    securityPostDenormalize: {
                        expression: "is_granted('ROLE_ADMIN') or object.published == false",
                        message: 'Only administrators can publish offers.'
                    }
                },
                delete: { security: 'object.owner == user' }
            }
        },
        {
            name: 'Book',
            fields: [
                { name: 'title', type: 'String', nullable: false, groups: ['book:read', 'book:write'] },
                { name: 'isbn', type: 'String', groups: ['book:write'] }
            ],
            normalizationGroups: ['book:read'],
            denormalizationGroups: ['book:write'],
            operations: { query: {}, create: {}, delete: {} }
        }
    ]
};

export function catalogRegistry(): ResourceRegistry {
    return createRegistry(parseResourceConfig(catalogConfig));
}

/** Products 1-3, tags 10-11 and offers 20-22. */
export function seedCatalog(persistence: MemoryPersistence) {
    persistence.seed('Product', [
        { id: '1', name: 'Lamp', color: 'red', releaseDate: '2024-03-01' },
        { id: '2', name: 'Chair', color: 'green', releaseDate: '2023-05-01' },
        { id: '3', name: 'Desk', color: 'blue' }
    ]);
    persistence.seed('Tag', [
        { id: '10', label: 'sale' },
        { id: '11', label: 'internal' }
    ]);
    persistence.seed('Offer', [
        { id: '20', price: 10, description: 'Red lamp', published: true, releaseDate: '2024-04-01', product: '1', owner: 'u1' },
        { id: '21', price: 25, description: null, published: false, product: '2', tags: ['11'], owner: 'u2' },
        { id: '22', price: 5, description: 'Blue desk offer', published: true, product: '3', tags: ['10', '11'], owner: 'u1' }
    ]);
}

export const userPrincipal: Principal = buildPrincipal({ sub: 'u1', roles: ['ROLE_USER'] });
export const otherUserPrincipal: Principal = buildPrincipal({ sub: 'u2', roles: ['ROLE_USER'] });
export const adminPrincipal: Principal = buildPrincipal({ sub: 'admin', roles: ['ROLE_ADMIN', 'ROLE_USER'] });

export function captureError(action: () => unknown): unknown {
    try {
        action();
    } catch (error) {
        return error;
    }
    throw new Error('Expected the call to throw');
}
