export type ErrorCategory = 'validation' | 'authorization' | 'pagination' | 'persistence' | 'cancelled';

export const DEFAULT_DENIAL_MESSAGE = 'Access Denied.';
export const PERSISTENCE_FAILURE_MESSAGE = 'The operation could not be completed.';

export abstract class ResolutionError extends Error {
    abstract readonly category: ErrorCategory;
    readonly code: string;
    readonly remediation: string;
    readonly context?: Record<string, unknown>;

    constructor(code: string, message: string, remediation: string, context?: Record<string, unknown>) {
        super(message);
        this.code = code;
        this.remediation = remediation;
        this.context = context;
    }
}

export class ValidationError extends ResolutionError {
    readonly category = 'validation';
    readonly argument?: string;

    constructor(code: string, message: string, remediation: string, argument?: string, context?: Record<string, unknown>) {
        super(code, message, remediation, argument !== undefined ? { ...context, argument } : context);
        this.name = 'ValidationError';
        this.argument = argument;
    }
}

export class AuthorizationError extends ResolutionError {
    readonly category = 'authorization';
    /** Internal decision code and details. Logged, never sent to callers. */
    readonly decision?: string;
    readonly detail?: Record<string, unknown>;

    constructor(code: string, message: string = DEFAULT_DENIAL_MESSAGE, decision?: string, detail?: Record<string, unknown>) {
        super(code, message, 'The current principal is not allowed to perform this operation.');
        this.name = 'AuthorizationError';
        this.decision = decision;
        this.detail = detail;
    }
}

export class PaginationError extends ResolutionError {
    readonly category = 'pagination';

    constructor(code: string, message: string, argument: string) {
        super(
            code,
            message,
            'Restart pagination without a cursor, or with a cursor returned by the current query.',
            { argument }
        );
        this.name = 'PaginationError';
    }
}

export class PersistenceError extends ResolutionError {
    readonly category = 'persistence';

    constructor(cause: unknown) {
        super('PERSISTENCE_FAILURE', PERSISTENCE_FAILURE_MESSAGE, 'Retry the operation later.');
        this.name = 'PersistenceError';
        this.cause = cause;
    }
}

export class OperationCancelledError extends ResolutionError {
    readonly category = 'cancelled';

    constructor() {
        super('OPERATION_CANCELLED', 'The operation was cancelled', 'Resend the request if the result is still needed.');
        this.name = 'OperationCancelledError';
    }
}

/** Raised at startup when resource metadata is inconsistent. Never reaches callers. */
export class ResourceConfigError extends Error {
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super(`Invalid resource configuration:\n- ${issues.join('\n- ')}`);
        this.name = 'ResourceConfigError';
        this.issues = issues;
    }
}

export function isResolutionError(error: unknown): error is ResolutionError {
    return error instanceof ResolutionError;
}
