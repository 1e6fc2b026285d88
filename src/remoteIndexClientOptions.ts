/**
 * Per-operation timeouts for the remote vector service, in milliseconds.
 * A timeout is reported like any other remote failure.
 */
export interface RemoteTimeouts {
  health: number;
  create: number;
  insert: number;
  search: number;
  delete: number;
  stats: number;
}

/**
 * Connection settings for {@link RemoteIndexClient}.
 */
export interface RemoteIndexClientOptions {
  /** Service root, e.g. `http://localhost:8080/api/v1`. A trailing slash is ignored. */
  baseUrl: string;
  /** Sent verbatim as the `Authorization` header when set. */
  authToken?: string;
  timeouts?: Partial<RemoteTimeouts>;
  /** Fetch implementation; defaults to the global `fetch`. */
  fetch?: typeof fetch;
}

export const DEFAULT_REMOTE_TIMEOUTS: RemoteTimeouts = {
  health: 2_000,
  create: 10_000,
  insert: 30_000,
  search: 10_000,
  delete: 10_000,
  stats: 5_000,
};
