import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../config/logger.js';
import {
    ForbiddenError,
    InternalError,
    QuotaExceededError,
    RateLimitedError,
    UnauthenticatedError,
} from '../errors.js';
import type { CredentialResolver } from '../services/credentials.js';
import { chunksUsed, isPermitted, type UsageMeter } from '../services/usage.js';
import type { Principal } from '../types/subscription.js';

// Extend Express Request type to carry the resolved principal
declare global {
    namespace Express {
        interface Request {
            principal?: Principal;
        }
    }
}

export const BEARER_PREFIX = 'Bearer ';

export interface AdmissionDependencies {
    credentials: CredentialResolver;
    usage: UsageMeter;
    logger: Logger;
    publicBaseUrl: string;
}

/**
 * Resolves an Authorization header value to an admitted principal or throws
 * the error that ends the request.
 */
export type Admission = (authorization: string | undefined) => Promise<Principal>;

/**
 * Builds the admission chain. Steps run in order and the first failure is final:
 * header present, Bearer scheme, key resolves, rate limit, monthly quota.
 */
export function createAdmission(deps: AdmissionDependencies): Admission {
    const { credentials, usage, logger, publicBaseUrl } = deps;

    return async (authorization) => {
        if (!authorization) {
            throw new UnauthenticatedError(`Missing API key. Get one at ${publicBaseUrl}`);
        }

        if (!authorization.startsWith(BEARER_PREFIX)) {
            throw new UnauthenticatedError('Invalid auth format. Use: Bearer gs_your_key');
        }

        const principal = await credentials.resolve(authorization.slice(BEARER_PREFIX.length));
        if (!principal) {
            throw new ForbiddenError(credentials.rejectionMessage);
        }

        const rate = await usage.withinRateLimit(principal.userId, principal.rateLimit);
        if (rate.kind === 'unknown') {
            logger.debug({ userId: principal.userId, reason: rate.reason }, 'Rate limit unknown, failing open');
        }
        if (!isPermitted(rate)) {
            throw new RateLimitedError(principal.rateLimit);
        }

        const reading = await usage.monthlyUsage(principal.userId);
        if (chunksUsed(reading) >= principal.chunksLimit) {
            throw new QuotaExceededError(principal.chunksLimit, `${publicBaseUrl}/pricing`);
        }

        return principal;
    };
}

/**
 * Middleware that runs the admission chain on the `Authorization` header
 * and attaches the principal to the request.
 */
export function requireApiKey(admit: Admission): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction): void => {
        admit(req.headers.authorization)
            .then((principal) => {
                req.principal = principal;
                next();
            })
            .catch(next);
    };
}

/** Reads the principal set by `requireApiKey`. */
export function requirePrincipal(req: Request): Principal {
    if (!req.principal) {
        throw new InternalError('Missing principal. Check middleware order.');
    }
    return req.principal;
}
