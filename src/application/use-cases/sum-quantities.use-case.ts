import { Quantity } from '../../domain/value-objects/quantity.js';
import { lift, map, mapError } from '../../shared/combinators.js';
import { type Result, failure, of } from '../../shared/result.js';
import { AppError, ValidationError } from '../errors.js';
import type { SumQuantitiesResponseDto } from '../dto/sum-quantities.dto.js';
import type { Logger } from '../ports/logger.js';
import { observe } from '../observe.js';

export class SumQuantitiesUseCase {
    constructor(private readonly logger: Logger) {}

    execute(inputs: readonly string[]): Result<SumQuantitiesResponseDto, ValidationError> {
        const summary: Result<SumQuantitiesResponseDto, ValidationError> = inputs.length === 0
            ? failure(AppError.validation('At least one quantity is required'))
            : map(lift(inputs.map(parseQuantity)), (quantities) => ({
                count: quantities.length,
                total: quantities.reduce((sum, quantity) => sum + quantity.toNumber(), 0)
            }), ValidationError);

        return observe(summary, this.logger, 'sum-quantities');
    }
}

function parseQuantity(raw: string): Result<Quantity, ValidationError> {
    const quantity = of(() => Quantity.create(Number(raw)), Error);
    return mapError(
        quantity,
        (error) => new ValidationError(`Invalid quantity "${raw}": ${error.message}`),
        ValidationError
    );
}
