import type { GraphQLResolveInfo } from 'graphql';
import { FieldsByTypeName, ResolveTree, parseResolveInfo } from 'graphql-parse-resolve-info';

import { Selection } from '../services/operation-resolver.js';

function isResolveTree(value: ResolveTree | FieldsByTypeName): value is ResolveTree {
    return typeof value.name === 'string' && typeof value.fieldsByTypeName === 'object';
}

function merge(left: Selection | undefined, right: Selection): Selection {
    if (!left) {
        return right;
    }
    const merged: Record<string, Selection> = { ...left };
    for (const [field, selection] of Object.entries(right)) {
        merged[field] = merge(merged[field], selection);
    }
    return merged;
}

function fromTree(tree: ResolveTree): Selection {
    const selection: Record<string, Selection> = {};
    for (const fields of Object.values(tree.fieldsByTypeName)) {
        for (const child of Object.values(fields)) {
            selection[child.name] = merge(selection[child.name], fromTree(child));
        }
    }
    return selection;
}

/** Field names requested below the current field. Aliases are folded into their field. */
export function selectionFromInfo(info: GraphQLResolveInfo): Selection {
    const parsed = parseResolveInfo(info, { deep: true });
    if (!parsed || !isResolveTree(parsed)) {
        return {};
    }
    return fromTree(parsed);
}

export function descend(selection: Selection, ...path: string[]): Selection | undefined {
    let current: Selection | undefined = selection;
    for (const field of path) {
        if (!current || !Object.prototype.hasOwnProperty.call(current, field)) {
            return undefined;
        }
        current = current[field];
    }
    return current;
}
