import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';

function readRemediation(error: FastifyError): string | undefined {
    return 'remediation' in error && typeof error.remediation === 'string' ? error.remediation : undefined;
}

export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
    const statusCode = error.statusCode || 500;
    if (statusCode >= 500) {
        request.log.error(error);
    } else {
        request.log.warn({ err: error }, 'Request failed');
    }

    let remediation = readRemediation(error);
    if (!remediation) {
        if (error.validation) {
            remediation = 'Review the request payload. Ensure all required fields are present and properly typed.';
        } else if (statusCode === 404) {
            remediation = 'The requested route was not found. Verify the URL path.';
        } else if (statusCode === 429) {
            remediation = 'You have sent too many requests. Please wait a moment and try again.';
        } else if (statusCode >= 500) {
            remediation = 'An internal server error occurred. Retry the request later.';
        } else {
            remediation = 'Check the request parameters and try again.';
        }
    }

    reply.status(statusCode).send({
        error: error.validation ? 'Bad Request' : (statusCode >= 500 ? 'Internal Server Error' : error.message || 'Unknown Error'),
        code: error.validation ? 'VALIDATION_ERROR' : (error.code || 'INTERNAL_SERVER_ERROR'),
        remediation,
        context: {
            ...(error.validation ? { validation: error.validation } : {}),
            requestId: request.id
        }
    });
}
