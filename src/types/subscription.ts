export enum SubscriptionTier {
    FREE = 'free',
    INDIE = 'indie',
    STUDIO = 'studio',
    ENTERPRISE = 'enterprise',
}

export interface TierLimits {
    chunksLimit: number; // Chunks per calendar month
    rateLimit: number; // Requests per minute
}

/**
 * Identity and entitlements resolved from an API key.
 * Lives for one request only.
 */
export interface Principal {
    userId: string;
    apiKeyId: string;
    email: string;
    tier: SubscriptionTier;
    chunksLimit: number;
    rateLimit: number;
}

export enum Mode {
    PRODUCTION = 'production',
    DEMO = 'demo',
}
