export interface RetryPolicy {
    /** Extra attempts after the first one. 0 means a single call. */
    maxRetries: number;
    baseDelayMs: number;
}

export const NO_RETRY: RetryPolicy = { maxRetries: 0, baseDelayMs: 0 };

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff with jitter: the delay before retry n (0-based) lies in
 * [base * 2^n / 2, base * 2^n).
 */
export function backoffDelay(retry: number, baseDelayMs: number, random: () => number = Math.random): number {
    const ceiling = baseDelayMs * 2 ** retry;
    return Math.floor(ceiling / 2 + (random() * ceiling) / 2);
}

export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    {
        label = "withRetry",
        wait = sleep,
        random = Math.random,
    }: { label?: string; wait?: (ms: number) => Promise<void>; random?: () => number } = {}
): Promise<T> {
    let attempt = 0;
    for (;;) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (attempt >= policy.maxRetries) {
                throw error;
            }
            const delay = backoffDelay(attempt, policy.baseDelayMs, random);
            console.warn(`[${label}] Attempt ${attempt + 1} failed, retrying in ${delay}ms:`, error);
            await wait(delay);
            attempt++;
        }
    }
}
