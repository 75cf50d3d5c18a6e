/**
 * Outcome of one pipeline stage.
 *
 * - `ok`: the stage produced what it was asked for
 * - `degraded`: the stage failed but produced a usable fallback value
 * - `fatal`: nothing usable was produced
 *
 * Each component documents which variants it can return.
 */
export type StageResult<T> =
    | { status: 'ok'; value: T }
    | { status: 'degraded'; value: T; reason: string }
    | { status: 'fatal'; error: Error };

export function ok<T>(value: T): StageResult<T> {
    return { status: 'ok', value };
}

export function degraded<T>(value: T, reason: string): StageResult<T> {
    return { status: 'degraded', value, reason };
}

export function fatal<T>(error: Error): StageResult<T> {
    return { status: 'fatal', error };
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
