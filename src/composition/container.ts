import { SumQuantitiesUseCase } from '../application/use-cases/sum-quantities.use-case.js';
import type { Logger } from '../application/ports/logger.js';
import { PinoLogger, createPinoInstance } from '../infrastructure/observability/pino-logger.js';
import { type Config, isProduction } from './config.js';

export interface Container {
    logger: Logger;
    sumQuantitiesUseCase: SumQuantitiesUseCase;
}

/**
 * Wires the use cases. A logger can be passed in to replace the pino one.
 */
export function buildContainer(config: Config, logger?: Logger): Container {
    const rootLogger = logger ?? new PinoLogger(createPinoInstance({
        name: config.app.name,
        level: config.logging.level,
        // plain JSON in production
        pretty: config.logging.pretty && !isProduction(config.app)
    }));

    return {
        logger: rootLogger,
        sumQuantitiesUseCase: new SumQuantitiesUseCase(rootLogger.child({ component: 'use-cases' }))
    };
}
