import { AccessRule, Principal, ResourceItem } from '../interfaces/resource.js';
import { isRecord } from './scalars.js';

export class AccessExpressionError extends Error {
    readonly column: number;

    constructor(message: string, column: number) {
        super(`${message} at column ${column}`);
        this.name = 'AccessExpressionError';
        this.column = column;
    }
}

type TokenType = 'string' | 'number' | 'identifier' | 'symbol' | 'end';

type Token = {
    type: TokenType;
    text: string;
    column: number;
};

type Node =
    | { type: 'literal'; value: unknown }
    | { type: 'list'; items: Node[] }
    | { type: 'path'; root: 'user' | 'object'; segments: string[] }
    | { type: 'granted'; role: Node }
    | { type: 'not'; operand: Node }
    | { type: 'logical'; operator: 'and' | 'or'; left: Node; right: Node }
    | { type: 'compare'; operator: '==' | '!=' | 'in'; left: Node; right: Node };

type Scope = {
    principal: Principal;
    object?: ResourceItem;
};

const SYMBOLS = ['==', '!=', '&&', '||', '!', '(', ')', '[', ']', ',', '.'];
const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

function tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    let index = 0;

    while (index < source.length) {
        const char = source[index];
        const column = index + 1;

        if (/\s/.test(char)) {
            index++;
            continue;
        }

        if (char === '\'' || char === '"') {
            let text = '';
            index++;
            while (index < source.length && source[index] !== char) {
                if (source[index] === '\\' && index + 1 < source.length) {
                    index++;
                }
                text += source[index];
                index++;
            }
            if (index >= source.length) {
                throw new AccessExpressionError('Unterminated string', column);
            }
            index++;
            tokens.push({ type: 'string', text, column });
            continue;
        }

        if (DIGIT.test(char) || (char === '-' && DIGIT.test(source[index + 1] ?? ''))) {
            let end = index + 1;
            while (end < source.length && (DIGIT.test(source[end]) || source[end] === '.')) {
                end++;
            }
            tokens.push({ type: 'number', text: source.slice(index, end), column });
            index = end;
            continue;
        }

        if (IDENTIFIER_START.test(char)) {
            let end = index + 1;
            while (end < source.length && IDENTIFIER_PART.test(source[end])) {
                end++;
            }
            tokens.push({ type: 'identifier', text: source.slice(index, end), column });
            index = end;
            continue;
        }

        const symbol = SYMBOLS.find((candidate) => source.startsWith(candidate, index));
        if (!symbol) {
            throw new AccessExpressionError(`Unexpected character '${char}'`, column);
        }
        tokens.push({ type: 'symbol', text: symbol, column });
        index += symbol.length;
    }

    tokens.push({ type: 'end', text: '', column: source.length + 1 });
    return tokens;
}

class Parser {
    private position = 0;
    referencesObject = false;

    constructor(private readonly tokens: Token[]) {}

    private peek(): Token {
        return this.tokens[Math.min(this.position, this.tokens.length - 1)];
    }

    private next(): Token {
        const token = this.peek();
        this.position++;
        return token;
    }

    private matches(...texts: string[]): boolean {
        const token = this.peek();
        return (token.type === 'symbol' || token.type === 'identifier') && texts.includes(token.text);
    }

    private expect(text: string) {
        const token = this.next();
        if (token.text !== text || (token.type !== 'symbol' && token.type !== 'identifier')) {
            throw new AccessExpressionError(`Expected '${text}' but found '${token.text || 'end of input'}'`, token.column);
        }
    }

    parse(): Node {
        const node = this.parseOr();
        const rest = this.peek();
        if (rest.type !== 'end') {
            throw new AccessExpressionError(`Unexpected '${rest.text}'`, rest.column);
        }
        return node;
    }

    private parseOr(): Node {
        let left = this.parseAnd();
        while (this.matches('or', '||')) {
            this.next();
            left = { type: 'logical', operator: 'or', left, right: this.parseAnd() };
        }
        return left;
    }

    private parseAnd(): Node {
        let left = this.parseNot();
        while (this.matches('and', '&&')) {
            this.next();
            left = { type: 'logical', operator: 'and', left, right: this.parseNot() };
        }
        return left;
    }

    private parseNot(): Node {
        if (this.matches('not', '!')) {
            this.next();
            return { type: 'not', operand: this.parseNot() };
        }
        return this.parseComparison();
    }

    private parseComparison(): Node {
        const left = this.parsePrimary();
        if (this.matches('==', '!=', 'in')) {
            const operator = this.next().text;
            const right = this.parsePrimary();
            return {
                type: 'compare',
                operator: operator === 'in' ? 'in' : operator === '==' ? '==' : '!=',
                left,
                right
            };
        }
        return left;
    }

    private parsePrimary(): Node {
        const token = this.next();

        switch (token.type) {
            case 'string':
                return { type: 'literal', value: token.text };
            case 'number': {
                const value = Number(token.text);
                if (Number.isNaN(value)) {
                    throw new AccessExpressionError(`Invalid number '${token.text}'`, token.column);
                }
                return { type: 'literal', value };
            }
            case 'identifier':
                return this.parseIdentifier(token);
            case 'symbol':
                if (token.text === '(') {
                    const inner = this.parseOr();
                    this.expect(')');
                    return inner;
                }
                if (token.text === '[') {
                    return this.parseList();
                }
                break;
            case 'end':
                throw new AccessExpressionError('Unexpected end of expression', token.column);
        }

        throw new AccessExpressionError(`Unexpected '${token.text}'`, token.column);
    }

    private parseList(): Node {
        const items: Node[] = [];
        if (this.matches(']')) {
            this.next();
            return { type: 'list', items };
        }
        for (;;) {
            items.push(this.parsePrimary());
            if (!this.matches(',')) {
                break;
            }
            this.next();
        }
        this.expect(']');
        return { type: 'list', items };
    }

    private parseIdentifier(token: Token): Node {
        switch (token.text) {
            case 'true':
                return { type: 'literal', value: true };
            case 'false':
                return { type: 'literal', value: false };
            case 'null':
                return { type: 'literal', value: null };
            case 'is_granted': {
                this.expect('(');
                const role = this.parseOr();
                this.expect(')');
                return { type: 'granted', role };
            }
            case 'user':
            case 'object': {
                const segments: string[] = [];
                while (this.matches('.')) {
                    this.next();
                    const segment = this.next();
                    if (segment.type !== 'identifier') {
                        throw new AccessExpressionError('Expected a property name', segment.column);
                    }
                    segments.push(segment.text);
                }
                const root = token.text === 'object' ? 'object' : 'user';
                if (root === 'object') {
                    this.referencesObject = true;
                }
                return { type: 'path', root, segments };
            }
        }

        throw new AccessExpressionError(`Unknown identifier '${token.text}'`, token.column);
    }
}

function readPath(value: unknown, segments: readonly string[]): unknown {
    let current = value;
    for (const segment of segments) {
        if (!isRecord(current)) {
            return undefined;
        }
        current = current[segment];
    }
    return current;
}

function resolveUser(principal: Principal, segments: readonly string[]): unknown {
    const [head, ...rest] = segments;
    switch (head) {
        case undefined:
        case 'id':
            return principal.id;
        case 'roles':
            return rest.length === 0 ? principal.roles : undefined;
        default:
            return readPath(principal.claims, segments);
    }
}

function equals(left: unknown, right: unknown): boolean {
    if (left === null || left === undefined || right === null || right === undefined) {
        return (left ?? null) === (right ?? null);
    }
    if (Array.isArray(left) && Array.isArray(right)) {
        return left.length === right.length && left.every((entry, index) => equals(entry, right[index]));
    }
    if ((typeof left === 'number' || typeof left === 'string') && (typeof right === 'number' || typeof right === 'string')) {
        return String(left) === String(right);
    }
    return left === right;
}

function isIdentity(node: Node): boolean {
    return node.type === 'path'
        && node.root === 'user'
        && (node.segments.length === 0 || (node.segments.length === 1 && node.segments[0] === 'id'));
}

function isNullLiteral(node: Node): boolean {
    return node.type === 'literal' && node.value === null;
}

function isMissing(value: unknown): boolean {
    return value === null || value === undefined;
}

function evaluate(node: Node, scope: Scope): unknown {
    switch (node.type) {
        case 'literal':
            return node.value;
        case 'list':
            return node.items.map((item) => evaluate(item, scope));
        case 'path':
            return node.root === 'user'
                ? resolveUser(scope.principal, node.segments)
                : readPath(scope.object, node.segments);
        case 'granted': {
            const role = evaluate(node.role, scope);
            if (typeof role !== 'string') {
                throw new TypeError('is_granted() expects a role name');
            }
            return scope.principal.roles.includes(role);
        }
        case 'not':
            return !evaluate(node.operand, scope);
        case 'logical':
            return node.operator === 'and'
                ? Boolean(evaluate(node.left, scope)) && Boolean(evaluate(node.right, scope))
                : Boolean(evaluate(node.left, scope)) || Boolean(evaluate(node.right, scope));
        case 'compare': {
            const left = evaluate(node.left, scope);
            const right = evaluate(node.right, scope);
            // Comparing the principal id with an absent value is false under both operators,
            // unless the other side is the literal null.
            const identity = (isIdentity(node.left) && !isNullLiteral(node.right))
                || (isIdentity(node.right) && !isNullLiteral(node.left));
            if (node.operator === 'in') {
                if (!Array.isArray(right)) {
                    throw new TypeError('The right side of \'in\' must be a list');
                }
                if (identity && isMissing(left)) {
                    return false;
                }
                return right.some((entry) => !(identity && isMissing(entry)) && equals(left, entry));
            }
            if (identity && (isMissing(left) || isMissing(right))) {
                return false;
            }
            return node.operator === '==' ? equals(left, right) : !equals(left, right);
        }
    }
}

/**
 * Compiles an access expression such as
 * `is_granted('ROLE_ADMIN') or object.owner == user` into a rule.
 */
export function compileAccessExpression(expression: string, message?: string): AccessRule {
    const parser = new Parser(tokenize(expression));
    const tree = parser.parse();

    return {
        test: (principal, object) => Boolean(evaluate(tree, { principal, object })),
        message,
        referencesObject: parser.referencesObject,
        expression
    };
}
