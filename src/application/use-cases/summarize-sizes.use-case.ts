import { MemorySize } from '../../domain/value-objects/memory-size.js';
import { MemorySizeError } from '../../domain/errors.js';
import { type ResolvedFormatOptions } from '../../domain/services/memory-size-formatter.js';
import { type Result, fail, ok } from '../../shared/result.js';
import {
    type MemorySizeViewDto,
    type SummarizeSizesDto,
    type SummarizeSizesResponseDto,
    summarizeSizesDtoSchema,
} from '../dto/summarize-sizes.dto.js';
import { type Logger } from '../ports/logger.js';

type ParsedEntry = { bytes: number | string } | { bits: number | string };

function toMemorySize(entry: ParsedEntry): MemorySize {
    if ('bytes' in entry) {
        return MemorySize.fromBytes(BigInt(entry.bytes));
    }
    return MemorySize.fromBits(BigInt(entry.bits));
}

export class SummarizeSizesUseCase {
    private readonly logger: Logger;

    constructor(
        logger: Logger,
        private readonly defaultFormat: ResolvedFormatOptions
    ) {
        this.logger = logger.child({ useCase: 'summarize-sizes' });
    }

    execute(dto: SummarizeSizesDto): Result<SummarizeSizesResponseDto, MemorySizeError> {
        // Validar DTO
        const parsed = summarizeSizesDtoSchema.safeParse(dto);
        if (!parsed.success) {
            const reason = parsed.error.issues.map(issue => {
                const path = issue.path.join('.');
                return `${path}: ${issue.message}`;
            }).join('; ');
            this.logger.warn('Rejected size summary request', { reason });
            return fail(MemorySizeError.validation(`Invalid request: ${reason}`));
        }

        const format: ResolvedFormatOptions = {
            base: parsed.data.format?.base ?? this.defaultFormat.base,
            decimals: parsed.data.format?.decimals ?? this.defaultFormat.decimals,
        };
        this.logger.debug('Summarizing memory sizes', { count: parsed.data.sizes.length });

        let sizes: MemorySize[];
        try {
            sizes = parsed.data.sizes.map(toMemorySize);
        } catch (error) {
            if (error instanceof MemorySizeError) {
                this.logger.warn('Rejected size entry', { reason: error.message });
                return fail(error);
            }
            throw error;
        }

        const totalResult = MemorySize.checkedSum(sizes);
        if (!totalResult.ok) {
            this.logger.warn('Size summary overflowed', { count: sizes.length });
            return fail(totalResult.error);
        }

        const view = (size: MemorySize): MemorySizeViewDto => ({
            bits: size.sizeBits().toString(),
            formatted: size.format(format),
        });

        const smallest = sizes.length > 0 ? sizes.reduce((acc, size) => acc.min(size)) : null;
        const largest = sizes.length > 0 ? sizes.reduce((acc, size) => acc.max(size)) : null;

        const response: SummarizeSizesResponseDto = {
            count: sizes.length,
            total: view(totalResult.value),
            smallest: smallest ? view(smallest) : null,
            largest: largest ? view(largest) : null,
        };

        this.logger.info('Summarized memory sizes', {
            count: response.count,
            totalBits: response.total.bits,
        });

        return ok(response);
    }
}
