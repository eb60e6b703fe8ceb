import type { ErrorMatcher } from './error-matcher.js';
import { type Result, failure, fold, intercept, success } from './result.js';

/**
 * Transforms the value of a Success. A Failure is returned as is and
 * `transform` is never called for it.
 *
 * Errors thrown by `transform` that `matcher` accepts become a Failure;
 * all other errors propagate.
 */
export function map<V, U, E extends Error>(
    result: Result<V, E>,
    transform: (value: V) => U,
    matcher: ErrorMatcher<E>
): Result<U, E> {
    return intercept<U, E>(() => (result.ok ? success(transform(result.value)) : result), matcher);
}

/**
 * Transforms the error of a Failure into another error type. `matcher`
 * selects which errors thrown by `transform` are kept as the new Failure.
 */
export function mapError<V, E extends Error, EE extends Error>(
    result: Result<V, E>,
    transform: (error: E) => EE,
    matcher: ErrorMatcher<EE>
): Result<V, EE> {
    return intercept<V, EE>(() => (result.ok ? result : failure(transform(result.error))), matcher);
}

export function flatMap<V, U, E extends Error>(
    result: Result<V, E>,
    transform: (value: V) => Result<U, E>,
    matcher: ErrorMatcher<E>
): Result<U, E> {
    return intercept<U, E>(() => (result.ok ? transform(result.value) : result), matcher);
}

/**
 * Recovers from a Failure with another computation. A Success passes through.
 */
export function flatMapError<V, E extends Error, EE extends Error>(
    result: Result<V, E>,
    transform: (error: E) => Result<V, EE>,
    matcher: ErrorMatcher<EE>
): Result<V, EE> {
    return intercept<V, EE>(() => (result.ok ? result : transform(result.error)), matcher);
}

/** Runs `f` on a Success and returns the same instance. */
export function onSuccess<V, E extends Error>(result: Result<V, E>, f: (value: V) => void): Result<V, E> {
    ifSuccess(result, f);
    return result;
}

/** Runs `f` on a Failure and returns the same instance. */
export function onFailure<V, E extends Error>(result: Result<V, E>, f: (error: E) => void): Result<V, E> {
    ifFailure(result, f);
    return result;
}

export function ifSuccess<V, E extends Error>(result: Result<V, E>, f: (value: V) => void): void {
    fold<V, E, void>(result, f, () => undefined);
}

export function ifFailure<V, E extends Error>(result: Result<V, E>, f: (error: E) => void): void {
    fold<V, E, void>(result, () => undefined, f);
}

/**
 * Pairs the value of `result` with the value of `other()`.
 * `other` is only evaluated when `result` succeeded; the first Failure wins.
 * Errors thrown by `other` are intercepted through `matcher` like in `flatMap`.
 */
export function fanout<V, U, E extends Error, EO extends Error>(
    result: Result<V, E>,
    other: () => Result<U, EO>,
    matcher: ErrorMatcher<E | EO>
): Result<[V, U], E | EO> {
    return flatMap<V, [V, U], E | EO>(
        result,
        (outer) => map<U, [V, U], E | EO>(other(), (inner) => [outer, inner], matcher),
        matcher
    );
}

/**
 * Collects a sequence of results into one. Iteration stops at the first
 * Failure, which is returned as is.
 */
export function lift<V, E extends Error>(results: Iterable<Result<V, E>>): Result<V[], E> {
    const values: V[] = [];
    for (const result of results) {
        if (!result.ok) {
            return result;
        }
        values.push(result.value);
    }
    return success(values);
}

/**
 * Tests the value of a Success. False for a Failure, and false when
 * `predicate` throws.
 *
 * NOTE: unlike the other combinators this catches every error, whatever its type.
 */
export function any<V, E extends Error>(result: Result<V, E>, predicate: (value: V) => boolean): boolean {
    try {
        return fold(result, predicate, () => false);
    } catch {
        return false;
    }
}
