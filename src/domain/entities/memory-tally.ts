import { MemorySize } from '../value-objects/memory-size.js';

/**
 * Mutable running total of memory sizes.
 *
 * `MemorySize` itself is immutable; the tally holds the current total and
 * replaces it on every update, which gives the `+=` / `-=` style of use.
 * A failed update leaves the total untouched.
 */
export class MemoryTally {
    private total: MemorySize;

    constructor(initial: MemorySize = MemorySize.zero()) {
        this.total = initial;
    }

    /**
     * @throws {OverflowError} If the new total does not fit in 64 bits
     */
    addAssign(size: MemorySize): this {
        this.total = this.total.add(size);
        return this;
    }

    /**
     * @throws {UnderflowError} If `size` is larger than the current total
     */
    subtractAssign(size: MemorySize): this {
        this.total = this.total.subtract(size);
        return this;
    }

    getTotal(): MemorySize {
        return this.total;
    }

    reset(): void {
        this.total = MemorySize.zero();
    }
}
