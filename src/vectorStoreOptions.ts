import type { RemoteIndexClient } from "./remoteIndexClient.js";
import type { RetryOptions } from "./retryOptions.js";

/**
 * Construction options for {@link VectorStore}.
 */
export interface VectorStoreOptions {
    /** Fixed vector dimension, normally taken from the embedding provider. */
    dimension: number;
    /** Name of the index on the remote vector service. */
    indexName: string;
    /** Remote vector service client. Without one the store runs local-only. */
    remote?: RemoteIndexClient;
    /** Quantization requested when creating the remote index. */
    quantization?: string;
    /** Retry policy for remote inserts. Defaults to a single attempt. */
    remoteInsertRetry?: Partial<RetryOptions>;
}
