export type { Kind, Success, Failure, Result, Equivalence } from './shared/result.js';
export {
    success,
    failure,
    of,
    fold,
    get,
    isSuccess,
    isFailure,
    kindOf,
    toPair,
    getOrNull,
    getFailureOrNull,
    getOrElse,
    equals,
    format
} from './shared/result.js';

export {
    map,
    mapError,
    flatMap,
    flatMapError,
    onSuccess,
    onFailure,
    ifSuccess,
    ifFailure,
    fanout,
    lift,
    any
} from './shared/combinators.js';

export type { ErrorClass, ErrorGuard, ErrorMatcher, MatchedError } from './shared/error-matcher.js';
export { matches, isErrorClass, anyOf } from './shared/error-matcher.js';

export type { Logger, LoggerContext } from './application/ports/logger.js';
export { observe } from './application/observe.js';
