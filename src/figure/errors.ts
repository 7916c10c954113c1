/**
 * Error types raised by the figure plugin.
 *
 * No-match is never an error: these cover bad plugin options and broken
 * invariants only.
 */
export class FigurePluginError extends Error {
    constructor(
        message: string,
        public readonly context?: Record<string, unknown>
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace?.(this, this.constructor);
    }
}

/**
 * Plugin options that cannot be turned into a FigureConfig.
 */
export class FigureConfigError extends FigurePluginError {}

/**
 * A programming error, e.g. a figure without images. Never recovered from.
 */
export class FigureContractError extends FigurePluginError {}
