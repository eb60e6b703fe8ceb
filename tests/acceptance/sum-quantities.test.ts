import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SumQuantitiesUseCase } from '@application/use-cases/sum-quantities.use-case.js';
import type { Logger } from '@application/ports/logger.js';
import { ValidationError } from '@application/errors.js';

describe('SumQuantities - Acceptance Test', () => {
    let logger: Logger;
    let warn: ReturnType<typeof vi.fn>;
    let useCase: SumQuantitiesUseCase;

    beforeEach(() => {
        warn = vi.fn();
        logger = {
            info: vi.fn(),
            error: vi.fn(),
            warn,
            debug: vi.fn(),
            child: () => logger
        };
        useCase = new SumQuantitiesUseCase(logger);
    });

    describe('Happy Path', () => {
        it('should sum every quantity', () => {
            const result = useCase.execute(['3', '4', '5']);

            expect(result.ok).toBe(true);
            if (!result.ok) return;

            expect(result.value).toEqual({ count: 3, total: 12 });
            expect(warn).not.toHaveBeenCalled();
        });

        it('should accept the largest allowed quantity', () => {
            const result = useCase.execute(['1000', '1']);

            expect(result.ok && result.value).toEqual({ count: 2, total: 1001 });
        });
    });

    describe('Validation', () => {
        it('should reject an empty list', () => {
            const result = useCase.execute([]);

            expect(result.ok).toBe(false);
            if (result.ok) return;

            expect(result.error).toBeInstanceOf(ValidationError);
            expect(result.error.message).toBe('At least one quantity is required');
        });

        it('should report the first invalid quantity', () => {
            const result = useCase.execute(['2', 'abc', '0']);

            expect(result.ok).toBe(false);
            if (result.ok) return;

            expect(result.error.message).toBe('Invalid quantity "abc": Quantity must be an integer');
            expect(warn).toHaveBeenCalledWith('Operation failed', {
                errorName: 'ValidationError',
                errorMessage: 'Invalid quantity "abc": Quantity must be an integer'
            });
        });

        it('should reject quantities out of range', () => {
            const tooSmall = useCase.execute(['0']);
            const tooLarge = useCase.execute(['1001']);

            expect(!tooSmall.ok && tooSmall.error.message).toBe('Invalid quantity "0": Quantity must be greater than zero');
            expect(!tooLarge.ok && tooLarge.error.message).toBe('Invalid quantity "1001": Quantity cannot exceed 1000 units');
        });

        it('should reject fractional quantities', () => {
            const result = useCase.execute(['2.5']);

            expect(!result.ok && result.error.message).toBe('Invalid quantity "2.5": Quantity must be an integer');
        });
    });
});
