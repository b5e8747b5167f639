// ============================================================
// Rate Limiter — Upstash Redis + @upstash/ratelimit
// Guards the two expensive endpoints: document indexing and quiz
// generation. Controlled fallback:
// - production: fail-closed (503) if Upstash is unavailable/misconfigured
// - dev/test: in-memory limiter with explicit warning
// ============================================================

import { Ratelimit } from "@upstash/ratelimit";
import { Redis } from "@upstash/redis";

export type RateLimitTier = "document_upload" | "quiz_generation";

interface TierPolicy {
    limit: number;
    window: `${number} s`;
    windowMs: number;
}

/** Requests per window per session. */
export const RATE_LIMIT_POLICIES: Record<RateLimitTier, TierPolicy> = {
    document_upload: { limit: 5, window: "60 s", windowMs: 60_000 },
    quiz_generation: { limit: 3, window: "60 s", windowMs: 60_000 },
};

const MISCONFIGURED_REASON = "Rate limit backend misconfigured.";
const EXCEEDED_REASON = "Rate limit exceeded. Try again later.";

const limiters = new Map<RateLimitTier, Ratelimit>();
let upstashErrorLogged = false;
let inMemoryFallbackLogged = false;
let lastUpstashErrorReason: string | null = null;

function getRedis(): Redis | null {
    const url = process.env.UPSTASH_REDIS_REST_URL;
    const token = process.env.UPSTASH_REDIS_REST_TOKEN;
    if (!url || !token) {
        lastUpstashErrorReason = "UPSTASH_REDIS_REST_URL/UPSTASH_REDIS_REST_TOKEN are not set.";
        return null;
    }
    try {
        return new Redis({ url, token });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        lastUpstashErrorReason = `Upstash Redis init failed: ${message}`;
        return null;
    }
}

function getLimiter(tier: RateLimitTier): Ratelimit | null {
    const existing = limiters.get(tier);
    if (existing) return existing;

    const redis = getRedis();
    if (!redis) return null;

    const policy = RATE_LIMIT_POLICIES[tier];
    try {
        const limiter = new Ratelimit({
            redis,
            limiter: Ratelimit.slidingWindow(policy.limit, policy.window),
            prefix: `rl:${tier}`,
        });
        limiters.set(tier, limiter);
        return limiter;
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        lastUpstashErrorReason = `Upstash ${tier} limiter init failed: ${message}`;
        return null;
    }
}

export interface RateLimitResult {
    allowed: boolean;
    remaining?: number;
    resetMs?: number;
    statusCode?: 429 | 503;
    reason?: string;
}

type InMemoryWindowEntry = { count: number; windowStartedAt: number };
const inMemoryBuckets = new Map<string, InMemoryWindowEntry>();

function runInMemoryLimiter(tier: RateLimitTier, identifier: string): RateLimitResult {
    const { limit, windowMs } = RATE_LIMIT_POLICIES[tier];
    const key = `${tier}:${identifier}`;
    const now = Date.now();
    const current = inMemoryBuckets.get(key);

    if (!current || now - current.windowStartedAt >= windowMs) {
        inMemoryBuckets.set(key, { count: 1, windowStartedAt: now });
        return { allowed: true, remaining: limit - 1, resetMs: windowMs };
    }

    const resetMs = Math.max(0, windowMs - (now - current.windowStartedAt));
    if (current.count >= limit) {
        return {
            allowed: false,
            statusCode: 429,
            reason: EXCEEDED_REASON,
            remaining: 0,
            resetMs,
        };
    }

    current.count += 1;
    return { allowed: true, remaining: Math.max(0, limit - current.count), resetMs };
}

function fallback(tier: RateLimitTier, identifier: string): RateLimitResult {
    const reason = lastUpstashErrorReason ?? MISCONFIGURED_REASON;
    if (process.env.NODE_ENV === "production") {
        if (!upstashErrorLogged) {
            console.error(`[rate-limit] ${reason}`);
            upstashErrorLogged = true;
        }
        return { allowed: false, statusCode: 503, reason: MISCONFIGURED_REASON };
    }

    if (!inMemoryFallbackLogged) {
        console.warn(`[rate-limit] Upstash unavailable, using in-memory fallback. ${reason}`);
        inMemoryFallbackLogged = true;
    }
    return runInMemoryLimiter(tier, identifier);
}

/**
 * Check the rate limit for one session against a tier.
 * @param identifier - session id (or client IP before a session exists)
 */
export async function checkRateLimit(
    tier: RateLimitTier,
    identifier: string
): Promise<RateLimitResult> {
    const limiter = getLimiter(tier);
    if (!limiter) {
        return fallback(tier, identifier);
    }

    try {
        const result = await limiter.limit(identifier);
        return {
            allowed: result.success,
            remaining: result.remaining,
            resetMs: Math.max(0, result.reset - Date.now()),
            statusCode: result.success ? undefined : 429,
            reason: result.success ? undefined : EXCEEDED_REASON,
        };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        lastUpstashErrorReason = `Upstash rate-limit request failed: ${message}`;
        limiters.clear();
        return fallback(tier, identifier);
    }
}

/** Clears in-memory windows; the Upstash-backed state is untouched. */
export function resetInMemoryRateLimits(): void {
    inMemoryBuckets.clear();
}
