import { randomBytes } from 'node:crypto';
import type { Logger } from '../config/logger.js';
import type { ApiKeysRepository } from '../db/repositories/apiKeysRepository.js';
import type { SubscriptionsRepository } from '../db/repositories/subscriptionsRepository.js';
import type { UsersRepository } from '../db/repositories/usersRepository.js';
import { hashKey } from './credentials.js';
import { resolveTier } from './subscriptions.js';

export const API_KEY_PREFIX = 'gs_';
export const DISPLAY_PREFIX_LENGTH = 11;
export const DEFAULT_KEY_NAME = 'Default API Key';

export interface ApiKeySummary {
    id: string;
    keyPrefix: string;
    name: string | null;
    active: boolean;
    lastUsedAt: Date | null;
    createdAt: Date;
}

export interface ProvisioningDependencies {
    users: UsersRepository;
    subscriptions: SubscriptionsRepository;
    apiKeys: ApiKeysRepository;
    logger: Logger;
}

/** `gs_` followed by 32 random bytes, base64url encoded (43 characters). */
export function generateRawKey(): string {
    return `${API_KEY_PREFIX}${randomBytes(32).toString('base64url')}`;
}

/**
 * Creates users, subscriptions and API keys. Write failures are logged and
 * reported as `null` / `false`.
 */
export class ProvisioningService {
    constructor(private readonly deps: ProvisioningDependencies) {}

    /**
     * @returns the new user's id, or null if the insert failed
     */
    public async createUser(email: string, billingCustomerId?: string): Promise<string | null> {
        try {
            const user = await this.deps.users.create({ email, billingCustomerId });
            return user.id;
        } catch (err) {
            this.deps.logger.error({ err, email }, 'Failed to create user');
            return null;
        }
    }

    /**
     * Creates an active subscription with the tier's fixed limits.
     * Unknown tier names get the free tier.
     */
    public async createSubscription(
        userId: string,
        tier = 'free',
        billingSubscriptionId?: string,
    ): Promise<boolean> {
        const resolved = resolveTier(tier);
        if (!resolved.recognized) {
            this.deps.logger.warn({ userId, requestedTier: tier }, 'Unknown subscription tier, using free tier limits');
        }

        try {
            await this.deps.subscriptions.create({
                userId,
                tier: resolved.tier,
                chunksLimit: resolved.limits.chunksLimit,
                rateLimit: resolved.limits.rateLimit,
                billingSubscriptionId,
            });
            return true;
        } catch (err) {
            this.deps.logger.error({ err, userId }, 'Failed to create subscription');
            return false;
        }
    }

    /**
     * Issues a new key. The returned raw key is the only plaintext copy;
     * only its digest is stored.
     */
    public async createApiKey(userId: string, name?: string): Promise<string | null> {
        const rawKey = generateRawKey();

        try {
            await this.deps.apiKeys.create({
                userId,
                keyHash: hashKey(rawKey),
                keyPrefix: rawKey.slice(0, DISPLAY_PREFIX_LENGTH),
                name: name || DEFAULT_KEY_NAME,
            });
            return rawKey;
        } catch (err) {
            this.deps.logger.error({ err, userId }, 'Failed to create API key');
            return null;
        }
    }

    public async revokeApiKey(apiKeyId: string): Promise<boolean> {
        try {
            return await this.deps.apiKeys.deactivate(apiKeyId);
        } catch (err) {
            this.deps.logger.error({ err, apiKeyId }, 'Failed to revoke API key');
            return false;
        }
    }

    public async listApiKeys(userId: string): Promise<ApiKeySummary[]> {
        const keys = await this.deps.apiKeys.listByUser(userId);
        return keys.map((key) => ({
            id: key.id,
            keyPrefix: key.keyPrefix,
            name: key.name,
            active: key.active,
            lastUsedAt: key.lastUsedAt,
            createdAt: key.createdAt,
        }));
    }
}
