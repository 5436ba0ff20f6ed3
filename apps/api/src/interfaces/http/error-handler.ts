import { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AiError, AiErrorCode } from '../../domain/ai/schemas';
import { ImageInputError } from '../../domain/errors';

const AI_STATUS: Record<AiErrorCode, number> = {
    [AiErrorCode.PROVIDER_AUTH_ERROR]: 502,
    [AiErrorCode.PROVIDER_RATE_LIMIT]: 503,
    [AiErrorCode.PROVIDER_TIMEOUT]: 504,
    [AiErrorCode.PROVIDER_NETWORK_ERROR]: 503,
    [AiErrorCode.PROVIDER_NOT_CONFIGURED]: 503,
    [AiErrorCode.INTERNAL_ERROR]: 502,
};

export function errorEnvelope(
    request: FastifyRequest,
    code: string,
    message: string,
    details: unknown = null
) {
    return {
        data: null,
        error: { code, message, details },
        meta: { requestId: request.id, timings: null, notices: [] }
    };
}

/**
 * Maps the error taxonomy onto HTTP: invalid input is a 4xx, an unavailable
 * vision provider is a 5xx, everything else is sanitized in production.
 */
export function registerErrorHandler(server: FastifyInstance, options: { exposeInternals: boolean }) {
    server.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
        if (error instanceof ImageInputError) {
            request.log.warn({ code: error.code, details: error.details }, error.message);
            return reply.code(error.statusCode).send(errorEnvelope(request, error.code, error.message, error.details ?? null));
        }

        if (error instanceof AiError) {
            request.log.error({ err: error.originalError ?? error, code: error.code }, error.message);
            return reply.code(AI_STATUS[error.code]).send(errorEnvelope(request, error.code, error.message));
        }

        if (error instanceof ZodError) {
            return reply.code(400).send(errorEnvelope(request, 'VALIDATION_ERROR', 'Validation failed', error.issues));
        }

        // Fastify schema validation
        if (error.validation) {
            return reply.code(400).send(errorEnvelope(request, 'VALIDATION_ERROR', 'Validation failed', error.validation));
        }

        const status = error.statusCode ?? 500;

        if (status === 429) {
            return reply.code(429).send(errorEnvelope(request, 'RATE_LIMIT_EXCEEDED', error.message));
        }

        if (status < 500) {
            return reply.code(status).send(errorEnvelope(request, error.code ?? 'BAD_REQUEST', error.message));
        }

        request.log.error(error);
        return reply.code(status).send(errorEnvelope(
            request,
            'INTERNAL_SERVER_ERROR',
            options.exposeInternals ? error.message : 'Internal Server Error',
            options.exposeInternals ? { stack: error.stack } : null
        ));
    });

    server.setNotFoundHandler((request, reply) => {
        return reply.code(404).send(errorEnvelope(request, 'NOT_FOUND', `Route ${request.method} ${request.url} not found`));
    });
}
