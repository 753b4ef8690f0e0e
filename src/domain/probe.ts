/**
 * Result Pattern for best-effort OS queries (Tri-state)
 * - success: the query produced a value
 * - empty: the query answered with nothing (null/undefined)
 * - degraded: the query failed; the caller decides how to absorb it
 */
export type Probe<T> =
    | { status: 'success'; data: T }
    | { status: 'empty' }
    | { status: 'degraded'; error: Error };

export function present<T>(data: T): Probe<T> { return { status: 'success', data }; }
export function empty<T>(): Probe<T> { return { status: 'empty' }; }
export function degraded<T>(error: unknown): Probe<T> {
    return { status: 'degraded', error: error instanceof Error ? error : new Error(String(error)) };
}

/**
 * Runs one OS query and captures its outcome as a value.
 */
export async function probe<T>(query: () => Promise<T | null | undefined>): Promise<Probe<T>> {
    try {
        const data = await query();
        if (data === null || data === undefined) return empty();
        return present(data);
    } catch (e: unknown) {
        return degraded(e);
    }
}
