/**
 * Retry Utilities
 *
 * Exponential backoff retry logic for transient failures, driven by an
 * explicit RetryPolicy so the schedule can be tested on its own.
 */

export interface RetryPolicy {
    /** Maximum number of attempts, including the first one */
    maxAttempts: number;
    /** Delay before the second attempt in milliseconds */
    initialBackoffMs: number;
    /** Upper bound for any single delay in milliseconds */
    maxBackoffMs: number;
    /** Growth factor between consecutive delays */
    backoffMultiplier: number;
    /** Random spread as a fraction of the delay (0-1) */
    jitter: number;
}

export interface RetryOptions extends Partial<RetryPolicy> {
    /** Function to determine if error is retryable (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Callback for each retry attempt */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
    /** Injectable for tests */
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    jitter: 0.1,
};

/**
 * Delay to wait after the given failed attempt (1-based).
 */
export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
    const base = Math.min(
        policy.initialBackoffMs * Math.pow(policy.backoffMultiplier, attempt - 1),
        policy.maxBackoffMs
    );
    const jitterAmount = base * policy.jitter * (random() * 2 - 1);
    return Math.max(0, Math.min(base + jitterAmount, policy.maxBackoffMs));
}

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @returns The result of the first successful attempt
 * @throws The last error once attempts run out, or the first non-retryable one
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const policy: RetryPolicy = {
        maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
        initialBackoffMs: options.initialBackoffMs ?? DEFAULT_RETRY_POLICY.initialBackoffMs,
        maxBackoffMs: options.maxBackoffMs ?? DEFAULT_RETRY_POLICY.maxBackoffMs,
        backoffMultiplier: options.backoffMultiplier ?? DEFAULT_RETRY_POLICY.backoffMultiplier,
        jitter: options.jitter ?? DEFAULT_RETRY_POLICY.jitter,
    };
    const isRetryable = options.isRetryable ?? (() => true);
    const wait = options.sleep ?? sleep;
    const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (attempt >= maxAttempts || !isRetryable(error)) {
                throw error;
            }

            const delay = computeBackoff(policy, attempt, options.random);
            options.onRetry?.(attempt, error, delay);
            await wait(delay);
        }
    }
}

/**
 * Reads an HTTP status from an axios-style error ({ response: { status } })
 * or a plain { status } object.
 */
export function getHttpStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) {
        return undefined;
    }
    if ('response' in error && typeof error.response === 'object' && error.response !== null
        && 'status' in error.response && typeof error.response.status === 'number') {
        return error.response.status;
    }
    if ('status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

/**
 * Rejects with the error from onTimeout if fn does not settle in time.
 * The signal passed to fn is aborted on timeout, and also when the
 * optional parent signal aborts.
 */
export async function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error,
    parentSignal?: AbortSignal
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const abortFromParent = () => controller.abort();
    if (parentSignal?.aborted) {
        controller.abort();
    } else {
        parentSignal?.addEventListener('abort', abortFromParent, { once: true });
    }

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(onTimeout());
        }, timeoutMs);
    });

    try {
        return await Promise.race([fn(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
        parentSignal?.removeEventListener('abort', abortFromParent);
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
