import { z } from 'zod';
import { MemorySizeError } from '../errors.js';
import type { MemorySize } from '../value-objects/memory-size.js';

const BITS_IN_BYTE = 8n;

export const DECIMAL_UNITS = ['B', 'kB', 'MB', 'GB', 'TB', 'PB', 'EB'] as const;
export const BINARY_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB'] as const;

export const formatOptionsSchema = z.object({
    base: z.union([z.literal(1000), z.literal(1024)]).default(1000),
    decimals: z.number().int().min(0).max(20).default(0),
});

export type FormatOptions = z.input<typeof formatOptionsSchema>;
export type ResolvedFormatOptions = z.output<typeof formatOptionsSchema>;

export function resolveFormatOptions(options: FormatOptions = {}): ResolvedFormatOptions {
    const parsed = formatOptionsSchema.safeParse(options);
    if (!parsed.success) {
        const messages = parsed.error.issues.map(issue => {
            const path = issue.path.join('.');
            return `${path}: ${issue.message}`;
        }).join('; ');
        throw MemorySizeError.validation(`Invalid format options: ${messages}`);
    }
    return parsed.data;
}

/**
 * Formats a memory size with the largest unit that keeps the value at or above 1.
 *
 * Defaults to decimal units (base 1000: B, kB, MB, ...) and no decimal places;
 * pass `base: 1024` for IEC units (KiB, MiB, ...). When rounding pushes the
 * value up to a full `base`, the next unit is used instead, so 999999 bytes
 * render as "1 MB" rather than "1000 kB". Sizes that are not whole bytes are
 * shown as fractional bytes and rounded like any other value, so with no
 * decimal places 4 bits render as "1 B".
 *
 * @example
 * ```ts
 * formatMemorySize(MemorySize.fromBytes(1024)); // "1 kB"
 * formatMemorySize(MemorySize.fromBytes(1536), { base: 1024, decimals: 1 }); // "1.5 KiB"
 * ```
 */
export function formatMemorySize(size: MemorySize, options?: FormatOptions): string {
    const { base, decimals } = resolveFormatOptions(options);
    const units = base === 1024 ? BINARY_UNITS : DECIMAL_UNITS;
    const bits = size.sizeBits();
    const step = BigInt(base);

    // Unit selection in bigint so the thresholds are exact
    let index = 0;
    let threshold = BITS_IN_BYTE * step;
    while (index < units.length - 1 && bits >= threshold) {
        index++;
        threshold *= step;
    }

    const value = Number(bits) / Number(BITS_IN_BYTE) / base ** index;
    let rendered = value.toFixed(decimals);
    if (Number(rendered) >= base && index < units.length - 1) {
        index++;
        rendered = (value / base).toFixed(decimals);
    }

    return `${rendered} ${units[index]}`;
}
