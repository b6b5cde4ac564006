import type { ErrorRequestHandler, RequestHandler } from 'express';
import type { Logger } from '../config/logger.js';
import { ApiError, ValidationError } from '../errors.js';

/** Errors thrown by body-parser carry an HTTP status and a `type`. */
interface HttpParserError {
    status: number;
    type: string;
}

const isParserError = (err: unknown): err is HttpParserError =>
    typeof err === 'object' &&
    err !== null &&
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string';

export const notFoundHandler: RequestHandler = (req, res) => {
    res.status(404).json({ error: 'NotFound', message: `Route ${req.method} ${req.path} not found` });
};

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
    return (err: unknown, req, res, _next) => {
        if (err instanceof ValidationError) {
            res.status(err.status).json({ error: err.code, message: err.message, details: err.details });
            return;
        }

        if (err instanceof ApiError) {
            if (err.status >= 500) {
                logger.error({ err, path: req.path }, err.message);
            }
            res.status(err.status).json({ error: err.code, message: err.message });
            return;
        }

        if (isParserError(err) && err.status >= 400 && err.status < 500) {
            res.status(err.status).json({ error: 'BadRequest', message: 'Malformed request body' });
            return;
        }

        logger.error({ err, path: req.path }, 'Unhandled error');
        res.status(500).json({ error: 'InternalError', message: 'Internal server error' });
    };
}
