import { RetryStrategy, type Backoff } from "@streamrelay/shared";

/**
 * Delay before connection attempt number `attempt` (1-based).
 *
 * Jitter spreads reconnecting relays apart; the result never exceeds
 * `maxDelayMs`.
 */
export function computeBackoffDelay(
    attempt: number,
    config: Backoff,
    random: () => number = Math.random
): number {
    const step = Math.max(1, attempt);

    let base = config.initialDelayMs;
    switch (config.strategy) {
        case RetryStrategy.NONE:
            break;
        case RetryStrategy.LINEAR:
            base = config.initialDelayMs * step;
            break;
        case RetryStrategy.EXPONENTIAL:
            base = config.initialDelayMs * config.multiplier ** (step - 1);
            break;
    }
    base = Math.min(base, config.maxDelayMs);

    const jitter = base * config.jitterRatio * (random() - 0.5);
    return Math.floor(Math.min(config.maxDelayMs, Math.max(0, base + jitter)));
}

/**
 * Timed wait that can be cut short. Resolves `true` when the full delay
 * elapsed and `false` when the signal aborted first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve(false);
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            resolve(false);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve(true);
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}
