import { SubscriptionTier, type TierLimits } from '../types/subscription.js';

export const TIER_LIMITS: Record<SubscriptionTier, TierLimits> = {
    [SubscriptionTier.FREE]: { chunksLimit: 10_000, rateLimit: 100 },
    [SubscriptionTier.INDIE]: { chunksLimit: 1_000_000, rateLimit: 1_000 },
    [SubscriptionTier.STUDIO]: { chunksLimit: 10_000_000, rateLimit: 10_000 },
    [SubscriptionTier.ENTERPRISE]: { chunksLimit: 100_000_000, rateLimit: 100_000 },
};

const TIERS: readonly string[] = Object.values(SubscriptionTier);

export function isSubscriptionTier(value: string): value is SubscriptionTier {
    return TIERS.includes(value);
}

/**
 * Maps a tier name to its fixed limits.
 * Unrecognised names fall back to the free tier; `recognized` tells the caller it happened.
 */
export function resolveTier(name: string): { tier: SubscriptionTier; limits: TierLimits; recognized: boolean } {
    if (isSubscriptionTier(name)) {
        return { tier: name, limits: TIER_LIMITS[name], recognized: true };
    }
    return { tier: SubscriptionTier.FREE, limits: TIER_LIMITS[SubscriptionTier.FREE], recognized: false };
}
