/**
 * Base class for every error raised by the retrieval engine.
 */
export class RetrievalError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Invalid sizes, dimension mismatches or degenerate vectors.
 * Always raised before any I/O happens.
 */
export class ConfigurationError extends RetrievalError {}

/** The embedding provider failed; the surrounding operation is aborted. */
export class ProviderError extends RetrievalError {}

/**
 * The remote vector service could not be reached, timed out, answered with
 * an unexpected status or returned a body that could not be parsed.
 * The Vector Store absorbs it by degrading to the local index.
 */
export class BackendUnavailableError extends RetrievalError {}

/** Formats an unknown thrown value for log output. */
export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
