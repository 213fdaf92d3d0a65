import { SummarizeSizesUseCase } from '../application/use-cases/summarize-sizes.use-case.js';
import { type Logger } from '../application/ports/logger.js';
import { PinoLogger, createPinoInstance } from '../infrastructure/observability/pino-logger.js';
import { type Config, createConfig, isProduction } from './config.js';

export interface Container {
    config: Config;
    logger: Logger;
    summarizeSizesUseCase: SummarizeSizesUseCase;
}

export interface ContainerOverrides {
    logger?: Logger;
}

/**
 * Construye el contenedor de dependencias
 */
export function buildContainer(config: Config = createConfig(), overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? new PinoLogger(createPinoInstance({
        name: config.app.name,
        level: config.logging.level,
        // Nunca pino-pretty en producción
        pretty: config.logging.pretty && !isProduction(config.app),
    }));

    logger.debug('Container built', {
        environment: config.app.environment,
        format: config.format,
    });

    return {
        config,
        logger,
        summarizeSizesUseCase: new SummarizeSizesUseCase(logger, config.format),
    };
}
