import type { ProductType } from './types';

export class AppError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Network failure, timeout or non-success response while retrieving a product. */
export class FetchError extends AppError {
    constructor(
        readonly product: ProductType,
        message: string,
        readonly status: number | null = null,
        options?: { cause?: unknown }
    ) {
        super(`[${product}] ${message}`, options);
    }
}

/** A malformed payload, or a malformed record when raised inside a batch. */
export class ParseError extends AppError {
    constructor(
        readonly product: ProductType,
        readonly field: string,
        message: string
    ) {
        super(`[${product}] ${field}: ${message}`);
    }
}

export class StoreError extends AppError {
    constructor(message: string, readonly written = 0, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class ValidationError extends AppError {
    constructor(message: string, readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    }
}

export const errorMessage = (err: unknown): string =>
    err instanceof Error ? err.message : String(err);
