export type Result<T, E> = Success<T> | Failure<E>;

export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

export interface Failure<E> {
    readonly ok: false;
    readonly error: E;
}

export function ok<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail<E>(error: E): Failure<E> {
    return { ok: false, error };
}

// Type guard helpers
export function isSuccess<T, E>(result: Result<T, E>): result is Success<T> {
    return result.ok === true;
}

export function isFailure<T, E>(result: Result<T, E>): result is Failure<E> {
    return result.ok === false;
}

/**
 * Returns the success value or throws the failure's error.
 * Bridges the checked (Result) and throwing variants of an operation.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
    if (!result.ok) {
        throw result.error;
    }
    return result.value;
}
