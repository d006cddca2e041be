/**
 * Shared async helpers for the pipeline's network-bound stages.
 */

export class TimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(timeoutMs: number, context?: string) {
        super(context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export class AbortedError extends Error {
    constructor(message = 'Operation aborted') {
        super(message);
        this.name = 'AbortedError';
    }
}

export function isAbortError(error: unknown): boolean {
    return error instanceof AbortedError || (error instanceof Error && error.name === 'AbortError');
}

/**
 * Runs `task` with its own AbortController that fires when either the timeout
 * elapses or the parent signal aborts. The timeout rejects with TimeoutError,
 * the parent abort with AbortedError; either settles before the task sees the abort.
 */
export async function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    options: { parent?: AbortSignal; context?: string } = {},
): Promise<T> {
    const { parent, context } = options;
    if (parent?.aborted) {
        throw new AbortedError();
    }

    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | null = null;
    let onParentAbort: (() => void) | null = null;

    const guards = new Promise<never>((_, reject) => {
        if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
            timeoutId = setTimeout(() => {
                reject(new TimeoutError(timeoutMs, context));
                controller.abort();
            }, timeoutMs);
        }
        if (parent) {
            onParentAbort = () => {
                reject(new AbortedError());
                controller.abort();
            };
            parent.addEventListener('abort', onParentAbort, { once: true });
        }
    });

    try {
        return await Promise.race([task(controller.signal), guards]);
    } finally {
        if (timeoutId) clearTimeout(timeoutId);
        if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
    }
}

/** Maps `items` through `mapper` with at most `limit` calls in flight; results keep input order. */
export async function runWithConcurrency<T, U>(
    items: readonly T[],
    limit: number,
    mapper: (item: T, index: number) => Promise<U>,
): Promise<U[]> {
    const results = new Array<U>(items.length);
    let nextIndex = 0;

    const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
        while (nextIndex < items.length) {
            const index = nextIndex++;
            results[index] = await mapper(items[index], index);
        }
    });

    await Promise.all(workers);
    return results;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) {
        return signal?.aborted ? Promise.reject(new AbortedError()) : Promise.resolve();
    }
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AbortedError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new AbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
