export class BwtError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'BwtError';
    }
}

/** Input or output stream is not open, was closed mid-run, or failed. */
export class StreamError extends BwtError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'StreamError';
    }
}

export class CorruptDataError extends BwtError {
    constructor(message: string) {
        super(message);
        this.name = 'CorruptDataError';
    }
}

export class IncompleteDataError extends BwtError {
    constructor(message: string) {
        super(message);
        this.name = 'IncompleteDataError';
    }
}

export class LimitExceededError extends BwtError {
    constructor(message: string) {
        super(message);
        this.name = 'LimitExceededError';
    }
}
