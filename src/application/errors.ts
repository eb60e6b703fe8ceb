export type AppErrorType = 'validation' | 'configuration';

export class AppError extends Error {
    constructor(
        message: string,
        public readonly type: AppErrorType
    ) {
        super(message);
        this.name = 'AppError';
    }

    static validation(message: string): ValidationError {
        return new ValidationError(message);
    }

    static configuration(message: string): ConfigurationError {
        return new ConfigurationError(message);
    }
}

export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 'validation');
        this.name = 'ValidationError';
    }
}

export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 'configuration');
        this.name = 'ConfigurationError';
    }
}

