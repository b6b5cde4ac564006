import { createHash } from 'node:crypto';
import type { Logger } from '../config/logger.js';
import type { ApiKeysRepository } from '../db/repositories/apiKeysRepository.js';
import type { SubscriptionsRepository } from '../db/repositories/subscriptionsRepository.js';
import type { UsersRepository } from '../db/repositories/usersRepository.js';
import { type Principal, SubscriptionTier } from '../types/subscription.js';
import { TIER_LIMITS } from './subscriptions.js';

/** Turns a raw API key into the principal it belongs to. */
export interface CredentialResolver {
    /** Message shown to callers whose key does not resolve. */
    readonly rejectionMessage: string;
    resolve(rawKey: string): Promise<Principal | null>;
}

/** Unsalted SHA-256 hex digest; lookups match on the exact digest. */
export function hashKey(rawKey: string): string {
    return createHash('sha256').update(rawKey, 'utf8').digest('hex');
}

export interface CredentialStoreDependencies {
    apiKeys: ApiKeysRepository;
    users: UsersRepository;
    subscriptions: SubscriptionsRepository;
    logger: Logger;
}

/**
 * Resolves keys against the relational store: key digest, then owning user,
 * then the active subscription. Any missing link means the key is invalid.
 */
export class CredentialStore implements CredentialResolver {
    readonly rejectionMessage = 'Invalid or expired API key';

    constructor(private readonly deps: CredentialStoreDependencies) {}

    public async resolve(rawKey: string): Promise<Principal | null> {
        try {
            return await this.lookup(rawKey);
        } catch (err) {
            this.deps.logger.error({ err }, 'API key lookup failed');
            return null;
        }
    }

    private async lookup(rawKey: string): Promise<Principal | null> {
        const key = await this.deps.apiKeys.findActiveByHash(hashKey(rawKey));
        if (!key) {
            return null;
        }

        const user = await this.deps.users.findById(key.userId);
        if (!user) {
            this.deps.logger.warn({ apiKeyId: key.id, userId: key.userId }, 'API key references a missing user');
            return null;
        }

        const subscription = await this.deps.subscriptions.findActiveByUser(user.id);
        if (!subscription) {
            return null;
        }

        await this.recordLastUsed(key.id);

        return {
            userId: user.id,
            apiKeyId: key.id,
            email: user.email,
            tier: subscription.tier,
            chunksLimit: subscription.chunksLimit,
            rateLimit: subscription.rateLimit,
        };
    }

    private async recordLastUsed(apiKeyId: string): Promise<void> {
        try {
            await this.deps.apiKeys.touchLastUsed(apiKeyId);
        } catch (err) {
            this.deps.logger.warn({ err, apiKeyId }, 'Failed to record API key last use');
        }
    }
}

export const DEMO_API_KEY = 'gs_demo_key_12345';

export const DEMO_PRINCIPAL: Readonly<Principal> = Object.freeze({
    userId: 'demo-user',
    apiKeyId: 'demo-key',
    email: 'demo@goldenseed.io',
    tier: SubscriptionTier.FREE,
    ...TIER_LIMITS[SubscriptionTier.FREE],
});

/** Demo mode: only the sentinel key is accepted. */
export class DemoCredentialResolver implements CredentialResolver {
    readonly rejectionMessage = `Invalid API key. Use ${DEMO_API_KEY} for testing.`;

    public async resolve(rawKey: string): Promise<Principal | null> {
        return rawKey === DEMO_API_KEY ? { ...DEMO_PRINCIPAL } : null;
    }
}
