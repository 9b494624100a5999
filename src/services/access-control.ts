import { AccessRule, OperationOverride, Principal, ResourceDescriptor, ResourceItem } from '../interfaces/resource.js';
import { AuthorizationError, DEFAULT_DENIAL_MESSAGE } from './errors.js';

export type AccessRuleKind = 'security' | 'securityPostDenormalize';

export type ResolvedAccessRule = {
    rule?: AccessRule;
    source: 'operation' | 'resource' | 'default';
};

export type AccessDecision = {
    outcome: 'allow' | 'deny';
    code: string;
    source: ResolvedAccessRule['source'];
    message?: string;
    metadata?: Record<string, unknown>;
};

export class AccessControlEvaluator {

    /**
     * Operation rule first, then the resource's base rule. The base rule is not
     * looked at when the operation declares its own.
     */
    static resolveRule(descriptor: ResourceDescriptor, override: OperationOverride, kind: AccessRuleKind): ResolvedAccessRule {
        const fromOperation = override[kind];
        if (fromOperation) {
            return { rule: fromOperation, source: 'operation' };
        }

        const fromResource = descriptor[kind];
        if (fromResource) {
            return { rule: fromResource, source: 'resource' };
        }

        return { source: 'default' };
    }

    static evaluate(resolved: ResolvedAccessRule, principal: Principal, object?: ResourceItem): AccessDecision {
        const { rule, source } = resolved;
        if (!rule) {
            return { outcome: 'allow', code: 'ALLOWED_DEFAULT', source };
        }

        let allowed: boolean;
        try {
            allowed = rule.test(principal, object ? Object.freeze({ ...object }) : undefined);
        } catch (error) {
            // Fail closed: a broken rule never grants access
            return {
                outcome: 'deny',
                code: 'ACCESS_RULE_EVALUATION_FAILED',
                source,
                message: rule.message ?? DEFAULT_DENIAL_MESSAGE,
                metadata: { error: error instanceof Error ? error.message : String(error) }
            };
        }

        if (allowed) {
            return { outcome: 'allow', code: 'ALLOWED_BY_RULE', source };
        }

        return {
            outcome: 'deny',
            code: 'ACCESS_DENIED',
            source,
            message: rule.message ?? DEFAULT_DENIAL_MESSAGE
        };
    }

    /**
     * Throws on denial. Callers always see `ACCESS_DENIED`, so a failing rule on
     * an existing item reads the same as a missing one; the decision code is
     * kept on the error for logging.
     */
    static assert(resolved: ResolvedAccessRule, principal: Principal, object?: ResourceItem): AccessDecision {
        const decision = this.evaluate(resolved, principal, object);
        if (decision.outcome !== 'allow') {
            throw new AuthorizationError('ACCESS_DENIED', decision.message, decision.code, decision.metadata);
        }
        return decision;
    }

    /** The error used when an item-level target is missing, so it reads like a denial. */
    static denialFor(resolved: ResolvedAccessRule): AuthorizationError {
        return new AuthorizationError('ACCESS_DENIED', resolved.rule?.message ?? DEFAULT_DENIAL_MESSAGE);
    }
}
