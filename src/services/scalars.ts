import { ScalarType, ScalarValue } from '../interfaces/resource.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Returns the value when it fits the scalar type, `undefined` otherwise.
 * IDs given as integers are turned into strings.
 */
export function coerceScalar(value: unknown, type: ScalarType): ScalarValue | undefined {
    switch (type) {
        case 'ID':
            if (typeof value === 'string') {
                return value;
            }
            return typeof value === 'number' && Number.isInteger(value) ? String(value) : undefined;
        case 'String':
            return typeof value === 'string' ? value : undefined;
        case 'Int':
            return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
        case 'Float':
            return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
        case 'Boolean':
            return typeof value === 'boolean' ? value : undefined;
        case 'DateTime':
            return typeof value === 'string' && !Number.isNaN(Date.parse(value)) ? value : undefined;
    }
}

export function describeValue(value: unknown): string {
    if (value === null) {
        return 'null';
    }
    if (Array.isArray(value)) {
        return 'list';
    }
    return typeof value;
}
