export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Run async tasks with a concurrency limit.
 * Returns settled results in original order, whichever task finishes first.
 */
export async function runConcurrent<T>(
    tasks: (() => Promise<T>)[],
    concurrency: number
): Promise<Settled<T>[]> {
    const results: Settled<T>[] = new Array(tasks.length);
    let cursor = 0;

    async function worker() {
        while (cursor < tasks.length) {
            const i = cursor++;
            const task = tasks[i];
            if (!task) break;
            try {
                results[i] = { ok: true, value: await task() };
            } catch (error) {
                results[i] = { ok: false, error };
            }
        }
    }

    const workerCount = Math.max(1, Math.min(concurrency, tasks.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
}

export function chunk<T>(items: T[], size: number): T[][] {
    const out: T[][] = [];
    for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
    return out;
}

/**
 * Signal that aborts after `ms`, or as soon as `parent` aborts.
 * Call `clear()` once the guarded work is done.
 */
export function timeoutSignal(ms: number, parent?: AbortSignal): { signal: AbortSignal; clear: () => void } {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error(`timed out after ${ms}ms`)), ms);

    const onParentAbort = () => controller.abort(parent?.reason);
    if (parent) {
        if (parent.aborted) controller.abort(parent.reason);
        else parent.addEventListener("abort", onParentAbort, { once: true });
    }

    return {
        signal: controller.signal,
        clear: () => {
            clearTimeout(timer);
            parent?.removeEventListener("abort", onParentAbort);
        },
    };
}

/**
 * Settles with `work`, or rejects with the signal's reason as soon as it aborts,
 * whether or not `work` itself listens to the signal.
 */
export function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
        // abandoned; a later rejection must not surface as unhandled
        work.catch(() => undefined);
        return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener("abort", onAbort, { once: true });
        work.then(
            (value) => {
                signal.removeEventListener("abort", onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener("abort", onAbort);
                reject(err);
            }
        );
    });
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
