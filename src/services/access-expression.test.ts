import { describe, expect, it } from 'vitest';

import { captureError } from '../__tests__/fixtures.js';
import { AccessExpressionError, compileAccessExpression } from './access-expression.js';
import { ANONYMOUS_PRINCIPAL, buildPrincipal } from './policy-adapters.js';

const editor = buildPrincipal({ sub: '7', roles: ['ROLE_EDITOR'], department: 'sales' });

function check(expression: string, object?: Record<string, unknown>): boolean {
    return compileAccessExpression(expression).test(editor, object ? { id: '1', ...object } : undefined);
}

describe('Access expressions', () => {
    it('checks granted roles', () => {
        expect(check("is_granted('ROLE_EDITOR')")).toBe(true);
        expect(check('is_granted("ROLE_ADMIN")')).toBe(false);
        expect(check("'ROLE_EDITOR' in user.roles")).toBe(true);
    });

    it('compares the principal with the object', () => {
        const rule = compileAccessExpression('object.owner == user');
        expect(rule.referencesObject).toBe(true);
        expect(rule.test(editor, { id: '1', owner: '7' })).toBe(true);
        expect(rule.test(editor, { id: '1', owner: '8' })).toBe(false);
    });

    it('compares numbers and numeric strings by value', () => {
        expect(check('user.id == 7')).toBe(true);
        expect(check('object.price != 10', { price: 10 })).toBe(false);
    });

    it('reads claims and nested object paths', () => {
        expect(check("user.department == 'sales'")).toBe(true);
        expect(check("object.meta.status in ['draft', 'review']", { meta: { status: 'review' } })).toBe(true);
        expect(check('object.meta.status == null', { meta: null })).toBe(true);
    });

    it('applies not, and, or with the usual precedence', () => {
        expect(check('false or true and false')).toBe(false);
        expect(check('(false or true) and true')).toBe(true);
        expect(check("not is_granted('ROLE_ADMIN')")).toBe(true);
        expect(check("!is_granted('ROLE_EDITOR') || user.id == '7'")).toBe(true);
    });

    it('treats an anonymous user as null', () => {
        const rule = compileAccessExpression('user == null');
        expect(rule.referencesObject).toBe(false);
        expect(rule.test(ANONYMOUS_PRINCIPAL)).toBe(true);
        expect(rule.test(editor)).toBe(false);
    });

    it('never matches an absent principal id with an absent value', () => {
        const owner = compileAccessExpression('object.owner == user');
        expect(owner.test(ANONYMOUS_PRINCIPAL, { id: '1', owner: null })).toBe(false);
        expect(owner.test(ANONYMOUS_PRINCIPAL, { id: '1' })).toBe(false);
        expect(owner.test(ANONYMOUS_PRINCIPAL)).toBe(false);
        expect(owner.test(editor, { id: '1' })).toBe(false);

        const notOwner = compileAccessExpression('object.owner != user');
        expect(notOwner.test(ANONYMOUS_PRINCIPAL, { id: '1', owner: null })).toBe(false);
        expect(notOwner.test(ANONYMOUS_PRINCIPAL, { id: '1', owner: '7' })).toBe(false);
        expect(notOwner.test(editor, { id: '1', owner: '8' })).toBe(true);

        const member = compileAccessExpression('user in object.members');
        expect(member.test(ANONYMOUS_PRINCIPAL, { id: '1', members: [null, '7'] })).toBe(false);
        expect(member.test(editor, { id: '1', members: [null, '7'] })).toBe(true);
    });

    it('keeps the source text and message', () => {
        const rule = compileAccessExpression("is_granted('ROLE_ADMIN')", 'Admins only.');
        expect(rule.expression).toBe("is_granted('ROLE_ADMIN')");
        expect(rule.message).toBe('Admins only.');
    });

    it('throws at evaluation when in is given a non-list', () => {
        expect(() => check("'x' in user.department")).toThrowError(TypeError);
    });

    it('reports syntax errors with their column', () => {
        expect(() => compileAccessExpression('owner == user')).toThrowError(AccessExpressionError);
        expect(captureError(() => compileAccessExpression('owner == user'))).toMatchObject({
            message: "Unknown identifier 'owner' at column 1",
            column: 1
        });
        expect(captureError(() => compileAccessExpression('user =='))).toMatchObject({
            message: 'Unexpected end of expression at column 8'
        });
        expect(captureError(() => compileAccessExpression("'abc"))).toMatchObject({
            message: 'Unterminated string at column 1'
        });
        expect(captureError(() => compileAccessExpression('user # 1'))).toMatchObject({
            message: "Unexpected character '#' at column 6"
        });
        expect(captureError(() => compileAccessExpression('is_granted(true'))).toMatchObject({
            message: "Expected ')' but found 'end of input' at column 16"
        });
    });
});
