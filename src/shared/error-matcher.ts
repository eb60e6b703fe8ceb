/**
 * Declares which thrown errors a call site is allowed to turn into a Failure.
 *
 * Generics are erased at runtime, so the expected error type travels as a
 * value: either an error class (checked with `instanceof`) or a type guard.
 *
 * @example
 * ```typescript
 * of(() => JSON.parse(raw), SyntaxError);
 * of(() => load(path), (error): error is NodeJS.ErrnoException => 'code' in error);
 * ```
 */
export type ErrorClass<E extends Error> = abstract new (...args: never[]) => E;

export type ErrorGuard<E extends Error> = (error: Error) => error is E;

export type ErrorMatcher<E extends Error> = ErrorClass<E> | ErrorGuard<E>;

/** Error type accepted by a matcher. */
export type MatchedError<M> =
    M extends ErrorClass<infer E extends Error> ? E
    : M extends ErrorGuard<infer E extends Error> ? E
    : never;

export function isErrorClass<E extends Error>(matcher: ErrorMatcher<E>): matcher is ErrorClass<E> {
    // Arrow-function guards carry no prototype
    const prototype: unknown = matcher.prototype;
    return prototype === Error.prototype || prototype instanceof Error;
}

/**
 * Only `Error` instances can match; thrown strings and other values never do.
 */
export function matches<E extends Error>(matcher: ErrorMatcher<E>, error: unknown): error is E {
    if (!(error instanceof Error)) {
        return false;
    }
    if (isErrorClass(matcher)) {
        return error instanceof matcher;
    }
    return matcher(error);
}

/**
 * Combines matchers into one guard for the union of their error types.
 */
export function anyOf<M extends ErrorMatcher<Error>[]>(...matchers: M): ErrorGuard<MatchedError<M[number]>> {
    return (error: Error): error is MatchedError<M[number]> =>
        matchers.some((matcher) => matches(matcher, error));
}
