import { describe, it, expect, vi } from 'vitest';
import { buildContainer } from '@composition/container.js';
import { get, getOrNull } from '@shared/result.js';
import { loadConfig } from '@composition/config.js';
import type { Logger } from '@application/ports/logger.js';
import { PinoLogger } from '@infrastructure/observability/pino-logger.js';

describe('buildContainer', () => {
    const config = get(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'silent' }));

    it('should build a pino logger from configuration', () => {
        const container = buildContainer(config);

        expect(container.logger).toBeInstanceOf(PinoLogger);
    });

    it('should hand the use cases a child of the given logger', () => {
        const child = vi.fn((): Logger => logger);
        const logger: Logger = {
            info: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            debug: vi.fn(),
            child
        };

        const container = buildContainer(config, logger);

        expect(container.logger).toBe(logger);
        expect(child).toHaveBeenCalledWith({ component: 'use-cases' });
        expect(getOrNull(container.sumQuantitiesUseCase.execute(['1', '2']))).toEqual({ count: 2, total: 3 });
    });
});
