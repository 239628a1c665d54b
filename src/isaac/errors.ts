export class IsaacError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'IsaacError';
    }
}

export class MalformedStateError extends IsaacError {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedStateError';
    }
}

export class EmptySeedRangeError extends IsaacError {
    constructor(message: string) {
        super(message);
        this.name = 'EmptySeedRangeError';
    }
}

export class InvalidWordError extends IsaacError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidWordError';
    }
}

export class ConfigurationError extends IsaacError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class IntegrityError extends IsaacError {
    constructor(message: string) {
        super(message);
        this.name = 'IntegrityError';
    }
}

export class IncompleteDataError extends IsaacError {
    constructor(message: string) {
        super(message);
        this.name = 'IncompleteDataError';
    }
}
