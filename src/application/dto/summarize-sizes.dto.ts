import { z } from 'zod';
import { formatOptionsSchema } from '../../domain/services/memory-size-formatter.js';

// Cadenas decimales para admitir valores por encima de 2^53
const countSchema = z.union([
    z.number().int().nonnegative().refine(Number.isSafeInteger, 'Number must be a safe integer'),
    z.string().regex(/^\d+$/, 'String must contain only decimal digits'),
]);

export const sizeEntrySchema = z.union([
    z.object({ bytes: countSchema }).strict(),
    z.object({ bits: countSchema }).strict(),
]);

export const summarizeSizesDtoSchema = z.object({
    sizes: z.array(sizeEntrySchema),
    format: formatOptionsSchema.partial().optional(),
});

export type SizeEntryDto = z.input<typeof sizeEntrySchema>;
export type SummarizeSizesDto = z.input<typeof summarizeSizesDtoSchema>;

export interface MemorySizeViewDto {
    bits: string;
    formatted: string;
}

export interface SummarizeSizesResponseDto {
    count: number;
    total: MemorySizeViewDto;
    smallest: MemorySizeViewDto | null;
    largest: MemorySizeViewDto | null;
}
