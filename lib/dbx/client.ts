/**
 * Databricks REST client.
 *
 * Holds the workspace host and credentials for one server instance.
 * Supports two authentication modes:
 *   1. **PAT**: DATABRICKS_TOKEN is sent as-is.
 *   2. **OAuth M2M (service principal)**: client credentials are exchanged
 *      at `/oidc/v1/token` and the access token is cached until shortly
 *      before it expires.
 *
 * Responses are validated against a zod schema at the call site, so every
 * optional field the platform may omit has an explicit default there.
 */

import type { z } from "zod/v4";
import type { DatabricksAuth, ServerConfig } from "@/lib/config";
import { DatabricksApiError, GenieApiError } from "@/lib/errors";
import { fetchWithTimeout, TIMEOUTS } from "./fetch-with-timeout";
import { withRetry } from "./retry";

// ---------------------------------------------------------------------------
// OAuth token cache
// ---------------------------------------------------------------------------

interface OAuthToken {
  accessToken: string;
  expiresAt: number; // epoch ms
}

/** Refresh this long before the platform-reported expiry. */
const TOKEN_REFRESH_MARGIN_MS = 60_000;

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export interface ApiRequest {
  /** Human-readable name used in error messages, e.g. "Genie getSpace". */
  operation: string;
  method: HttpMethod;
  /** Path below the host, starting with "/api/". */
  path: string;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  timeoutMs?: number;
  /** Retry transient failures. Only for idempotent calls. */
  retry?: boolean;
}

export interface DatabricksClientOptions {
  host: string;
  auth: DatabricksAuth;
  /** Retries for idempotent reads (default: 2). */
  maxRetries?: number;
  /** Injected for tests so retry backoff does not block. */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class DatabricksClient {
  readonly host: string;
  private readonly auth: DatabricksAuth;
  private readonly maxRetries: number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private oauthToken: OAuthToken | null = null;

  constructor(options: DatabricksClientOptions) {
    this.host = options.host.replace(/\/+$/, "");
    this.auth = options.auth;
    this.maxRetries = options.maxRetries ?? 2;
    this.sleep = options.sleep;
    this.now = options.now ?? Date.now;
  }

  static fromConfig(config: ServerConfig): DatabricksClient {
    return new DatabricksClient({
      host: config.host,
      auth: config.auth,
      maxRetries: config.maxRetries,
    });
  }

  async getHeaders(): Promise<Record<string, string>> {
    const token = await this.getBearerToken();
    return {
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/json",
    };
  }

  /**
   * Send a request and validate the JSON body against `schema`.
   * Non-2xx responses throw `DatabricksApiError`; a body of the wrong shape
   * throws `GenieApiError`. An empty body is treated as `{}`.
   */
  async request<S extends z.ZodType>(schema: S, req: ApiRequest): Promise<z.output<S>> {
    const send = async () => {
      const resp = await this.send(req);
      const text = await resp.text();
      if (!resp.ok) {
        throw new DatabricksApiError(req.operation, resp.status, text);
      }
      return text;
    };

    const text = req.retry
      ? await withRetry(send, { maxRetries: this.maxRetries, label: req.operation, sleep: this.sleep })
      : await send();

    let data: unknown;
    try {
      data = text.trim() ? JSON.parse(text) : {};
    } catch {
      throw new GenieApiError(`${req.operation} returned a body that is not JSON`);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .slice(0, 3)
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new GenieApiError(`${req.operation} returned an unexpected response: ${detail}`);
    }
    return parsed.data;
  }

  private async send(req: ApiRequest): Promise<Response> {
    const url = new URL(`${this.host}${req.path}`);
    for (const [key, value] of Object.entries(req.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }

    const init: RequestInit = {
      method: req.method,
      headers: await this.getHeaders(),
    };
    if (req.body !== undefined) {
      init.body = JSON.stringify(req.body);
    }

    return fetchWithTimeout(url.toString(), init, req.timeoutMs ?? TIMEOUTS.GENIE);
  }

  // -------------------------------------------------------------------------
  // Authentication
  // -------------------------------------------------------------------------

  private async getBearerToken(): Promise<string> {
    if (this.auth.kind === "pat") return this.auth.token;

    if (this.oauthToken && this.now() < this.oauthToken.expiresAt - TOKEN_REFRESH_MARGIN_MS) {
      return this.oauthToken.accessToken;
    }

    const { clientId, clientSecret } = this.auth;
    const resp = await fetchWithTimeout(
      `${this.host}/oidc/v1/token`,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString("base64")}`,
        },
        body: new URLSearchParams({
          grant_type: "client_credentials",
          scope: "all-apis",
        }),
      },
      TIMEOUTS.AUTH,
    );

    if (!resp.ok) {
      const text = await resp.text();
      throw new DatabricksApiError("OAuth token exchange", resp.status, text);
    }

    const data: unknown = await resp.json();
    if (
      typeof data !== "object" ||
      data === null ||
      !("access_token" in data) ||
      typeof data.access_token !== "string"
    ) {
      throw new GenieApiError("OAuth token exchange returned no access_token");
    }
    const expiresIn =
      "expires_in" in data && typeof data.expires_in === "number" ? data.expires_in : 3600;

    this.oauthToken = {
      accessToken: data.access_token,
      expiresAt: this.now() + expiresIn * 1_000,
    };
    return this.oauthToken.accessToken;
  }
}
