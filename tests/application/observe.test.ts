import { describe, it, expect, vi, beforeEach } from 'vitest';
import { observe } from '@application/observe.js';
import type { Logger } from '@application/ports/logger.js';
import { ValidationError } from '@application/errors.js';
import { failure, success } from '@shared/result.js';

function createFakeLogger() {
    const logger = {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn(),
        child: vi.fn((): Logger => logger)
    };
    return logger;
}

describe('observe', () => {
    let logger: ReturnType<typeof createFakeLogger>;

    beforeEach(() => {
        logger = createFakeLogger();
    });

    it('should log a success at debug level and return the same result', () => {
        const result = success(10);

        expect(observe(result, logger, 'load-order')).toBe(result);
        expect(logger.child).toHaveBeenCalledWith({ operation: 'load-order' });
        expect(logger.debug).toHaveBeenCalledWith('Operation succeeded');
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should log a failure at warn level with the error details', () => {
        const result = failure(new ValidationError('Quantity must be an integer'));

        expect(observe(result, logger, 'parse-quantity')).toBe(result);
        expect(logger.warn).toHaveBeenCalledWith('Operation failed', {
            errorName: 'ValidationError',
            errorMessage: 'Quantity must be an integer'
        });
        expect(logger.debug).not.toHaveBeenCalled();
    });
});
