import { type ErrorMatcher, matches } from './error-matcher.js';

export type Kind = 'success' | 'failure';

export interface Success<V> {
    readonly ok: true;
    readonly kind: 'success';
    readonly value: V;
}

export interface Failure<E extends Error> {
    readonly ok: false;
    readonly kind: 'failure';
    readonly error: E;
}

/**
 * Outcome of a fallible computation: exactly one of a value or a typed error.
 */
export type Result<V, E extends Error> = Success<V> | Failure<E>;

export type Equivalence = (left: unknown, right: unknown) => boolean;

export function success<V>(value: V): Success<V> {
    const result: Success<V> = { ok: true, kind: 'success', value };
    return Object.freeze(result);
}

export function failure<E extends Error>(error: E): Failure<E> {
    const result: Failure<E> = { ok: false, kind: 'failure', error };
    return Object.freeze(result);
}

/**
 * Runs `f` and converts errors accepted by `matcher` into a Failure.
 * Anything else `f` throws is rethrown untouched.
 */
export function intercept<V, E extends Error>(f: () => Result<V, E>, matcher: ErrorMatcher<E>): Result<V, E> {
    try {
        return f();
    } catch (error) {
        if (matches(matcher, error)) {
            return failure(error);
        }
        throw error;
    }
}

/**
 * Evaluates a computation, capturing errors of the expected type.
 *
 * @example
 * ```typescript
 * const parsed = of(() => JSON.parse(body), SyntaxError);
 * // a TypeError thrown inside the callback is not captured and escapes `of`
 * ```
 */
export function of<V, E extends Error>(f: () => V, matcher: ErrorMatcher<E>): Result<V, E> {
    return intercept<V, E>(() => success(f()), matcher);
}

/**
 * Invokes exactly one branch. Errors thrown by either branch reach the caller.
 */
export function fold<V, E extends Error, X>(
    result: Result<V, E>,
    onSuccess: (value: V) => X,
    onFailure: (error: E) => X
): X {
    return result.ok ? onSuccess(result.value) : onFailure(result.error);
}

/**
 * Returns the value of a Success.
 * @throws the stored error when called on a Failure
 */
export function get<V, E extends Error>(result: Result<V, E>): V {
    return fold(result, (value) => value, (error) => {
        throw error;
    });
}

export function isSuccess<V, E extends Error>(result: Result<V, E>): result is Success<V> {
    return result.ok === true;
}

export function isFailure<V, E extends Error>(result: Result<V, E>): result is Failure<E> {
    return result.ok === false;
}

export function kindOf(result: Result<unknown, Error>): Kind {
    return result.kind;
}

/**
 * Destructuring form: `const [value, error] = toPair(result)`.
 * Exactly one side is present; the other is `undefined`.
 */
export function toPair<V, E extends Error>(result: Result<V, E>): [value: V, error: undefined] | [value: undefined, error: E] {
    return result.ok ? [result.value, undefined] : [undefined, result.error];
}

export function getOrNull<V, E extends Error>(result: Result<V, E>): V | null {
    return result.ok ? result.value : null;
}

export function getFailureOrNull<V, E extends Error>(result: Result<V, E>): E | null {
    return result.ok ? null : result.error;
}

export function getOrElse<V, E extends Error>(result: Result<V, E>, fallback: (error: E) => V): V {
    return fold(result, (value) => value, fallback);
}

/**
 * Structural equality. Payloads are compared with `eq` (`Object.is` by default);
 * a Success never equals a Failure.
 */
export function equals(
    left: Result<unknown, Error>,
    right: Result<unknown, Error>,
    eq: Equivalence = Object.is
): boolean {
    if (left === right) {
        return true;
    }
    if (left.ok && right.ok) {
        return eq(left.value, right.value);
    }
    if (!left.ok && !right.ok) {
        return eq(left.error, right.error);
    }
    return false;
}

export function format(result: Result<unknown, Error>): string {
    return result.ok ? `[Success: ${String(result.value)}]` : `[Failure: ${String(result.error)}]`;
}
