/**
 * Error taxonomy
 *
 * Fatal (whole invocation): ConfigError, MarketDataError and subclasses.
 * Per fund: CalculationError, StorageError.
 */

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly source?: string
    ) {
        super(source ? `[CONFIG] ${source}: ${message}` : `[CONFIG] ${message}`);
        this.name = 'ConfigError';
    }
}

export class CalculationError extends Error {
    constructor(
        public readonly reason: string,
        public readonly context: Record<string, string | number>
    ) {
        super(`[CALCULATION] ${reason}`);
        this.name = 'CalculationError';
    }
}

export class StorageError extends Error {
    constructor(message: string, public readonly path: string) {
        super(`[STORE] ${message}: ${path}`);
        this.name = 'StorageError';
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET DATA
// ═══════════════════════════════════════════════════════════════════════════════

export class MarketDataError extends Error {
    /** Only connection-level failures are worth another attempt */
    readonly retryable: boolean = false;

    constructor(message: string) {
        super(message);
        this.name = 'MarketDataError';
    }
}

export class ApiConnectionError extends MarketDataError {
    override readonly retryable = true;

    constructor(message: string) {
        super(message);
        this.name = 'ApiConnectionError';
    }
}

export class ApiAuthError extends MarketDataError {
    constructor(message: string) {
        super(message);
        this.name = 'ApiAuthError';
    }
}

export class DataNotAvailableError extends MarketDataError {
    constructor(message: string, public readonly date: string) {
        super(message);
        this.name = 'DataNotAvailableError';
    }
}

export class MissingDataError extends MarketDataError {
    constructor(public readonly symbols: string[]) {
        super(`Missing market cap data for: ${symbols.join(', ')}`);
        this.name = 'MissingDataError';
    }
}
