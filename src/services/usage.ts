import type { Logger } from '../config/logger.js';
import type { UsageLogInput, UsageLogsRepository } from '../db/repositories/usageLogsRepository.js';

export type UsageReading =
    | { kind: 'known'; chunks: number }
    | { kind: 'unknown'; reason: string };

export type RateLimitDecision =
    | { kind: 'permit' }
    | { kind: 'deny' }
    | { kind: 'unknown'; reason: string };

export type UsageEntry = UsageLogInput;

/**
 * Usage accounting. Reads report `unknown` instead of throwing when the
 * store cannot answer; callers apply the fail-open defaults below.
 */
export interface UsageMeter {
    monthlyUsage(userId: string): Promise<UsageReading>;
    withinRateLimit(userId: string, limitPerMinute: number): Promise<RateLimitDecision>;
    /** Never rejects. */
    logUsage(entry: UsageEntry): Promise<void>;
}

/** Fail-open: an unknown rate decision admits the request. */
export const isPermitted = (decision: RateLimitDecision): boolean => decision.kind !== 'deny';

/** Fail-open: unknown usage counts as nothing used. */
export const chunksUsed = (reading: UsageReading): number =>
    reading.kind === 'known' ? reading.chunks : 0;

const reasonOf = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export class StoreUsageMeter implements UsageMeter {
    constructor(
        private readonly usageLogs: UsageLogsRepository,
        private readonly logger: Logger,
    ) {}

    public async monthlyUsage(userId: string): Promise<UsageReading> {
        try {
            return { kind: 'known', chunks: await this.usageLogs.monthlyChunks(userId) };
        } catch (err) {
            this.logger.warn({ err, userId }, 'Monthly usage unavailable, treating as zero');
            return { kind: 'unknown', reason: reasonOf(err) };
        }
    }

    public async withinRateLimit(userId: string, limitPerMinute: number): Promise<RateLimitDecision> {
        try {
            const allowed = await this.usageLogs.withinRateLimit(userId, limitPerMinute);
            return allowed ? { kind: 'permit' } : { kind: 'deny' };
        } catch (err) {
            this.logger.warn({ err, userId }, 'Rate limit check unavailable, admitting request');
            return { kind: 'unknown', reason: reasonOf(err) };
        }
    }

    public async logUsage(entry: UsageEntry): Promise<void> {
        try {
            await this.usageLogs.insert(entry);
        } catch (err) {
            this.logger.error({ err, userId: entry.userId, endpoint: entry.endpoint }, 'Failed to log usage');
        }
    }
}

/** Used when no store is configured (demo mode). */
export class OfflineUsageMeter implements UsageMeter {
    private static readonly REASON = 'usage store not configured';

    constructor(private readonly logger: Logger) {}

    public async monthlyUsage(): Promise<UsageReading> {
        return { kind: 'unknown', reason: OfflineUsageMeter.REASON };
    }

    public async withinRateLimit(): Promise<RateLimitDecision> {
        return { kind: 'unknown', reason: OfflineUsageMeter.REASON };
    }

    public async logUsage(entry: UsageEntry): Promise<void> {
        this.logger.debug({ userId: entry.userId, endpoint: entry.endpoint }, 'Usage entry dropped (no store)');
    }
}
