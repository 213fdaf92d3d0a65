import { type Result, fail, ok, unwrap } from '../../shared/result.js';
import { MemorySizeError, type OverflowError, type UnderflowError } from '../errors.js';
import { type FormatOptions, formatMemorySize } from '../services/memory-size-formatter.js';

const BITS_IN_BYTE = 8n;
const U64_MAX = (1n << 64n) - 1n;

/** A raw bit or byte count: a non-negative safe integer, or a bigint. */
export type MemoryCount = number | bigint;

function toCount(value: MemoryCount, label: string): bigint {
    if (typeof value === 'bigint') {
        if (value < 0n) {
            throw MemorySizeError.validation(`${label} cannot be negative`);
        }
        return value;
    }
    if (!Number.isSafeInteger(value)) {
        throw MemorySizeError.validation(`${label} must be a safe integer`);
    }
    if (value < 0) {
        throw MemorySizeError.validation(`${label} cannot be negative`);
    }
    return BigInt(value);
}

function ensureRepresentable(bits: bigint): bigint {
    if (bits > U64_MAX) {
        throw MemorySizeError.overflow(`Memory size of ${bits} bits exceeds the maximum of ${U64_MAX} bits`);
    }
    return bits;
}

/**
 * Immutable quantity of memory, stored as a bit count.
 *
 * The representable range is that of an unsigned 64-bit integer
 * (`0` to `MemorySize.MAX_BITS` bits, roughly 2.3 exabytes). Arithmetic
 * never wraps or saturates: leaving the range throws an `OverflowError`
 * or `UnderflowError`, and the `checked*` variants return a `Result`.
 *
 * @example
 * ```ts
 * const page = MemorySize.fromBytes(4096);
 * page.add(MemorySize.fromBytes(1024)).toString(); // "5 kB"
 * ```
 */
export class MemorySize {
    static readonly MAX_BITS: bigint = U64_MAX;

    private constructor(private readonly bits: bigint) {}

    static zero(): MemorySize {
        return new MemorySize(0n);
    }

    /**
     * @throws {ValidationError} If `bytes` is negative or not an integer
     * @throws {OverflowError} If `bytes * 8` does not fit in 64 bits
     */
    static fromBytes(bytes: MemoryCount): MemorySize {
        const count = toCount(bytes, 'Bytes');
        return new MemorySize(ensureRepresentable(count * BITS_IN_BYTE));
    }

    static fromBits(bits: MemoryCount): MemorySize {
        return new MemorySize(ensureRepresentable(toCount(bits, 'Bits')));
    }

    /**
     * Rounds `bits` up to the next whole byte, so the result always
     * corresponds to a whole number of bytes: 9 bits become 16.
     */
    static fromBitsCeil(bits: MemoryCount): MemorySize {
        const count = toCount(bits, 'Bits');
        const rounded = ((count + BITS_IN_BYTE - 1n) / BITS_IN_BYTE) * BITS_IN_BYTE;
        return new MemorySize(ensureRepresentable(rounded));
    }

    static sum(sizes: Iterable<MemorySize>): MemorySize {
        return unwrap(MemorySize.checkedSum(sizes));
    }

    static checkedSum(sizes: Iterable<MemorySize>): Result<MemorySize, OverflowError> {
        let total = MemorySize.zero();
        for (const size of sizes) {
            const next = total.checkedAdd(size);
            if (!next.ok) return next;
            total = next.value;
        }
        return ok(total);
    }

    /** Comparator for `Array.prototype.sort`, ascending. */
    static compare(a: MemorySize, b: MemorySize): -1 | 0 | 1 {
        return a.compareTo(b);
    }

    static min(a: MemorySize, b: MemorySize): MemorySize {
        return a.min(b);
    }

    static max(a: MemorySize, b: MemorySize): MemorySize {
        return a.max(b);
    }

    sizeBits(): bigint {
        return this.bits;
    }

    /**
     * @throws {ValidationError} If the size is not a whole number of bytes
     */
    sizeBytes(): bigint {
        if (this.bits % BITS_IN_BYTE !== 0n) {
            throw MemorySizeError.validation(`Memory size of ${this.bits} bits is not a whole number of bytes`);
        }
        return this.bits / BITS_IN_BYTE;
    }

    /** Splits the size into `[remaining bits, whole bytes]`. */
    sizeBitsBytes(): [bigint, bigint] {
        return [this.bits % BITS_IN_BYTE, this.bits / BITS_IN_BYTE];
    }

    add(other: MemorySize): MemorySize {
        return unwrap(this.checkedAdd(other));
    }

    subtract(other: MemorySize): MemorySize {
        return unwrap(this.checkedSubtract(other));
    }

    checkedAdd(other: MemorySize): Result<MemorySize, OverflowError> {
        const total = this.bits + other.bits;
        if (total > U64_MAX) {
            return fail(MemorySizeError.overflow(
                `Adding ${other.bits} bits to ${this.bits} bits exceeds the maximum of ${U64_MAX} bits`
            ));
        }
        return ok(new MemorySize(total));
    }

    checkedSubtract(other: MemorySize): Result<MemorySize, UnderflowError> {
        if (other.bits > this.bits) {
            return fail(MemorySizeError.underflow(
                `Cannot subtract ${other.bits} bits from ${this.bits} bits`
            ));
        }
        return ok(new MemorySize(this.bits - other.bits));
    }

    compareTo(other: MemorySize): -1 | 0 | 1 {
        if (this.bits < other.bits) return -1;
        if (this.bits > other.bits) return 1;
        return 0;
    }

    equals(other: MemorySize): boolean {
        return this.bits === other.bits;
    }

    isGreaterThan(other: MemorySize): boolean {
        return this.bits > other.bits;
    }

    isGreaterThanOrEqual(other: MemorySize): boolean {
        return this.bits >= other.bits;
    }

    isLessThan(other: MemorySize): boolean {
        return this.bits < other.bits;
    }

    isLessThanOrEqual(other: MemorySize): boolean {
        return this.bits <= other.bits;
    }

    // En empate, max devuelve el argumento y min el receptor
    max(other: MemorySize): MemorySize {
        return this.isGreaterThan(other) ? this : other;
    }

    min(other: MemorySize): MemorySize {
        return other.isLessThan(this) ? other : this;
    }

    /**
     * @throws {ValidationError} If `min` is greater than `max`
     */
    clamp(min: MemorySize, max: MemorySize): MemorySize {
        if (min.isGreaterThan(max)) {
            throw MemorySizeError.validation('Clamp minimum cannot be greater than maximum');
        }
        if (this.isLessThan(min)) return min;
        if (this.isGreaterThan(max)) return max;
        return this;
    }

    /**
     * Smallest multiple of `alignment` that is greater than or equal to this size.
     * A zero size is aligned to everything, and a zero alignment means no alignment.
     */
    alignUp(alignment: MemorySize): MemorySize {
        if (this.bits === 0n || alignment.bits === 0n) {
            return this;
        }
        const step = alignment.bits;
        const aligned = ((this.bits + step - 1n) / step) * step;
        return new MemorySize(ensureRepresentable(aligned));
    }

    /** Minimum whole number of bytes able to hold this size. */
    roundUpByte(): MemorySize {
        return this.alignUp(MemorySize.fromBytes(1));
    }

    format(options?: FormatOptions): string {
        return formatMemorySize(this, options);
    }

    toString(): string {
        return formatMemorySize(this);
    }

    toDebugString(): string {
        return `MemorySize { sizeBits: ${this.bits} }`;
    }

    toJSON(): { sizeBits: string } {
        return { sizeBits: this.bits.toString() };
    }
}
