export { MemorySize, type MemoryCount } from './domain/value-objects/memory-size.js';
export { MemoryTally } from './domain/entities/memory-tally.js';
export {
    BINARY_UNITS,
    DECIMAL_UNITS,
    formatMemorySize,
    formatOptionsSchema,
    resolveFormatOptions,
    type FormatOptions,
    type ResolvedFormatOptions,
} from './domain/services/memory-size-formatter.js';
export {
    MemorySizeError,
    OverflowError,
    UnderflowError,
    ValidationError,
    type MemorySizeErrorType,
} from './domain/errors.js';
export {
    fail,
    isFailure,
    isSuccess,
    ok,
    unwrap,
    type Failure,
    type Result,
    type Success,
} from './shared/result.js';
export {
    summarizeSizesDtoSchema,
    type MemorySizeViewDto,
    type SizeEntryDto,
    type SummarizeSizesDto,
    type SummarizeSizesResponseDto,
} from './application/dto/summarize-sizes.dto.js';
export { SummarizeSizesUseCase } from './application/use-cases/summarize-sizes.use-case.js';
export { type Logger, type LoggerContext } from './application/ports/logger.js';
export { PinoLogger, createPinoInstance, type PinoLoggerOptions } from './infrastructure/observability/pino-logger.js';
export { createConfig, type Config } from './composition/config.js';
export { buildContainer, type Container, type ContainerOverrides } from './composition/container.js';
