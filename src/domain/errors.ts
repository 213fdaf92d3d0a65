export type MemorySizeErrorType = 'overflow' | 'underflow' | 'validation';

export class MemorySizeError extends Error {
    constructor(
        message: string,
        public readonly type: MemorySizeErrorType
    ) {
        super(message);
        this.name = 'MemorySizeError';
    }

    static overflow(message: string): OverflowError {
        return new OverflowError(message);
    }

    static underflow(message: string): UnderflowError {
        return new UnderflowError(message);
    }

    static validation(message: string): ValidationError {
        return new ValidationError(message);
    }
}

export class OverflowError extends MemorySizeError {
    constructor(message: string) {
        super(message, 'overflow');
        this.name = 'OverflowError';
    }
}

export class UnderflowError extends MemorySizeError {
    constructor(message: string) {
        super(message, 'underflow');
        this.name = 'UnderflowError';
    }
}

export class ValidationError extends MemorySizeError {
    constructor(message: string) {
        super(message, 'validation');
        this.name = 'ValidationError';
    }
}
