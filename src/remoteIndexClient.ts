import { z } from "zod";
import { BackendUnavailableError, describeError } from "./errors.js";
import { DEFAULT_REMOTE_TIMEOUTS, type RemoteIndexClientOptions, type RemoteTimeouts } from "./remoteIndexClientOptions.js";
import type { ScoredId } from "./vectorRecord.js";

/** Vector payload accepted by the remote insert endpoint. */
export interface RemoteVector {
    id: string;
    vector: number[];
}

const searchResponseSchema = z.object({
    results: z.array(z.object({ id: z.string(), score: z.number() })),
});

const statsResponseSchema = z.record(z.unknown());

/** Status codes accepted as "index exists" when creating an index. */
const CREATE_OK_STATUSES = new Set([200, 409]);

/**
 * Thin HTTP/JSON client for the remote vector service.
 * Every call is bounded by a timeout and never retried here; any network,
 * timeout, status or parse failure surfaces as {@link BackendUnavailableError}.
 */
export class RemoteIndexClient {
    private readonly baseUrl: string;
    private readonly authToken?: string;
    private readonly timeouts: RemoteTimeouts;
    private readonly fetchImpl: typeof fetch;

    constructor(options: RemoteIndexClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, "");
        this.authToken = options.authToken;
        this.timeouts = { ...DEFAULT_REMOTE_TIMEOUTS, ...options.timeouts };
        this.fetchImpl = options.fetch ?? fetch;
    }

    /** Service root this client talks to. */
    get url(): string {
        return this.baseUrl;
    }

    /**
     * Probes `GET /health`. Resolves to false on any non-200 status, network
     * error or timeout; never rejects.
     */
    async healthCheck(): Promise<boolean> {
        try {
            const response = await this.send("GET", "/health", this.timeouts.health);
            await this.discard(response);
            return response.status === 200;
        } catch {
            return false;
        }
    }

    /**
     * Creates an index. An index that already exists counts as success.
     */
    async createIndex(name: string, dimension: number, quantization: string = "FLOAT32"): Promise<void> {
        const response = await this.send("POST", "/index/create", this.timeouts.create, {
            index_name: name,
            dimension,
            quantization,
        });
        await this.discard(response);
        if (!CREATE_OK_STATUSES.has(response.status)) {
            throw this.statusError("create index", response);
        }
    }

    /** Inserts a batch of vectors into `name`. */
    async insert(name: string, vectors: readonly RemoteVector[]): Promise<void> {
        const response = await this.send(
            "POST",
            `/index/${encodeURIComponent(name)}/vector/insert`,
            this.timeouts.insert,
            vectors.map(({ id, vector }) => ({ id, vector }))
        );
        await this.discard(response);
        if (response.status !== 200) {
            throw this.statusError("insert vectors", response);
        }
    }

    /**
     * Nearest-neighbour search in `name`.
     * @returns Ids and scores in the order the service ranked them.
     */
    async search(name: string, vector: readonly number[], k: number): Promise<ScoredId[]> {
        const response = await this.send(
            "POST",
            `/index/${encodeURIComponent(name)}/search`,
            this.timeouts.search,
            { vector, k, include_vectors: false }
        );
        if (response.status !== 200) {
            await this.discard(response);
            throw this.statusError("search", response);
        }

        const parsed = searchResponseSchema.safeParse(await this.readJson(response, "search"));
        if (!parsed.success) {
            throw new BackendUnavailableError(`Unexpected search response shape: ${parsed.error.message}`);
        }
        return parsed.data.results.map(({ id, score }) => ({ id, score }));
    }

    async deleteIndex(name: string): Promise<void> {
        const response = await this.send("DELETE", `/index/${encodeURIComponent(name)}`, this.timeouts.delete);
        await this.discard(response);
        if (response.status !== 200) {
            throw this.statusError("delete index", response);
        }
    }

    /**
     * Fetches service statistics from `GET /stats`.
     * @returns The parsed JSON object, or null when unavailable.
     */
    async stats(): Promise<Record<string, unknown> | null> {
        try {
            const response = await this.send("GET", "/stats", this.timeouts.stats);
            if (response.status !== 200) {
                await this.discard(response);
                return null;
            }
            const parsed = statsResponseSchema.safeParse(await this.readJson(response, "stats"));
            return parsed.success ? parsed.data : null;
        } catch (error) {
            console.warn(`Could not read vector service stats: ${describeError(error)}`);
            return null;
        }
    }

    private async send(method: string, path: string, timeoutMs: number, body?: unknown): Promise<Response> {
        const headers: Record<string, string> = { "Content-Type": "application/json" };
        if (this.authToken) {
            headers.Authorization = this.authToken;
        }

        try {
            return await this.fetchImpl(`${this.baseUrl}${path}`, {
                method,
                headers,
                body: body === undefined ? undefined : JSON.stringify(body),
                signal: AbortSignal.timeout(timeoutMs),
            });
        } catch (error) {
            const reason = error instanceof Error && error.name === "TimeoutError"
                ? `timed out after ${timeoutMs}ms`
                : describeError(error);
            throw new BackendUnavailableError(`${method} ${path} failed: ${reason}`, { cause: error });
        }
    }

    private async readJson(response: Response, operation: string): Promise<unknown> {
        try {
            return await response.json();
        } catch (error) {
            throw new BackendUnavailableError(`Could not parse ${operation} response as JSON.`, { cause: error });
        }
    }

    /** Releases a body that will not be read, so the connection can be reused. */
    private async discard(response: Response): Promise<void> {
        if (!response.bodyUsed) {
            await response.body?.cancel();
        }
    }

    private statusError(operation: string, response: Response): BackendUnavailableError {
        return new BackendUnavailableError(`Vector service could not ${operation}: HTTP ${response.status}.`);
    }
}
