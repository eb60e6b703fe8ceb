import type { Result } from '../shared/result.js';
import { onFailure, onSuccess } from '../shared/combinators.js';
import type { Logger } from './ports/logger.js';

/**
 * Reports the outcome of `result` under a child logger scoped to `operation`
 * and hands back the same instance, so it can sit in the middle of a chain.
 */
export function observe<V, E extends Error>(result: Result<V, E>, logger: Logger, operation: string): Result<V, E> {
    const scoped = logger.child({ operation });

    const reported = onSuccess(result, () => {
        scoped.debug('Operation succeeded');
    });

    return onFailure(reported, (error) => {
        scoped.warn('Operation failed', {
            errorName: error.name,
            errorMessage: error.message
        });
    });
}
