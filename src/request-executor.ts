import type { Credential } from "./types.js";
import { RequestError, type RetryableKind } from "./errors.js";
import { Logger, silentLogger } from "./logger.js";
import { sleep } from "./rate-limiter.js";

// ============================================
// Authenticated API Requests
// ============================================
// Every call: valid token -> rate-limit admission -> fetch with timeout.
// The timeout spans headers and body; a stalled body counts as a timeout.
// Failure handling per attempt:
//   401         refresh once and re-send once; a second 401 is fatal
//   429         wait min(2^attempt, 60)s
//   5xx         wait min(2^attempt, 30)s
//   timeout /
//   network     wait 2^attempt s
// After maxRetries retries the call fails with kind "exhausted".
// Every other status is handed back to the caller untouched.

export interface CredentialProvider {
  acquire(): Promise<Credential>;
  refresh(): Promise<Credential>;
}

export interface Admitter {
  admit(): Promise<void>;
}

export type QueryParams = Record<string, string | number | undefined>;

export interface RequestOptions {
  method?: string;
  params?: QueryParams;
}

export interface RequestExecutorOptions {
  apiBase: string;
  authScheme: string;
  tokens: CredentialProvider;
  limiter: Admitter;
  maxRetries: number;
  timeoutMs: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

type SendOutcome =
  | { ok: true; response: Response }
  | { ok: false; kind: "timeout" | "network_error"; error: Error };

const RATE_LIMIT_BACKOFF_CAP_SEC = 60;
const NULL_BODY_STATUSES = [101, 204, 205, 304];
const SERVER_ERROR_BACKOFF_CAP_SEC = 30;

/** Backoff in seconds before the retry that follows `attempt` (0-based) */
export function backoffSeconds(kind: RetryableKind, attempt: number): number {
  const exponential = 2 ** attempt;
  switch (kind) {
    case "rate_limited":
      return Math.min(exponential, RATE_LIMIT_BACKOFF_CAP_SEC);
    case "server_error":
      return Math.min(exponential, SERVER_ERROR_BACKOFF_CAP_SEC);
    case "timeout":
    case "network_error":
      return exponential;
  }
}

function classifyThrown(error: unknown): "timeout" | "network_error" | null {
  if (!(error instanceof Error)) return null;
  if (error.name === "AbortError" || error.name === "TimeoutError") return "timeout";
  // Node's fetch wraps socket/DNS failures in a TypeError("fetch failed")
  if (error.name === "TypeError" || error.message.includes("fetch failed")) return "network_error";
  return null;
}

export class RequestExecutor {
  private readonly options: RequestExecutorOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: RequestExecutorOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  buildUrl(endpoint: string, params?: QueryParams): string {
    const url = new URL(`${this.options.apiBase}/${endpoint.replace(/^\/+/, "")}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async execute(endpoint: string, options: RequestOptions = {}): Promise<Response> {
    const method = options.method ?? "GET";
    const url = this.buildUrl(endpoint, options.params);
    const { maxRetries } = this.options;
    let lastKind: RetryableKind = "network_error";
    let lastStatus: number | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const credential = await this.options.tokens.acquire();
      await this.options.limiter.admit();

      this.logger.debug(`API request attempt ${attempt + 1}: ${method} ${endpoint}`);
      let outcome = await this.send(url, method, credential);

      if (outcome.ok && outcome.response.status === 401) {
        outcome = await this.reauthenticate(endpoint, url, method, outcome.response);
      }

      let kind: RetryableKind;
      if (outcome.ok) {
        const { response } = outcome;
        if (response.status === 429) {
          kind = "rate_limited";
        } else if (response.status >= 500) {
          kind = "server_error";
        } else {
          if (!response.ok) this.logger.debug(`API ${endpoint} returned ${response.status}`);
          return response;
        }
        lastStatus = response.status;
        await this.discard(response);
      } else {
        kind = outcome.kind;
        lastStatus = undefined;
        this.logger.debug(`  ${outcome.error.name}: ${outcome.error.message}`);
      }

      lastKind = kind;
      if (attempt < maxRetries) {
        const waitSeconds = backoffSeconds(kind, attempt);
        this.logger.warn(
          `${describe(kind, lastStatus)} on ${endpoint}. Retrying in ${waitSeconds}s... (attempt ${attempt + 1}/${maxRetries})`
        );
        await this.sleep(waitSeconds * 1000);
      }
    }

    throw new RequestError(
      "exhausted",
      endpoint,
      `${method} ${endpoint} failed after ${maxRetries + 1} attempts (${describe(lastKind, lastStatus)})`,
      { lastKind, status: lastStatus }
    );
  }

  private async reauthenticate(
    endpoint: string,
    url: string,
    method: string,
    rejected: Response
  ): Promise<SendOutcome> {
    await this.discard(rejected);
    this.logger.info("Got 401, attempting to refresh token...");

    let credential: Credential;
    try {
      credential = await this.options.tokens.refresh();
    } catch (error) {
      throw new RequestError("unauthorized", endpoint, "Failed to refresh token after 401 response", {
        status: 401,
        cause: error,
      });
    }

    await this.options.limiter.admit();
    const outcome = await this.send(url, method, credential);
    if (outcome.ok && outcome.response.status === 401) {
      await this.discard(outcome.response);
      throw new RequestError("unauthorized", endpoint, "Request still unauthorized after token refresh", {
        status: 401,
      });
    }
    return outcome;
  }

  private async send(url: string, method: string, credential: Credential): Promise<SendOutcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const startTime = Date.now();

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `${this.options.authScheme} ${credential.accessToken}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        signal: controller.signal,
      });
      // The deadline covers the body too; callers get it already buffered
      const body = NULL_BODY_STATUSES.includes(response.status) ? null : await response.arrayBuffer();
      this.logger.debug(`API: ${response.status} (${Date.now() - startTime}ms)`);
      return {
        ok: true,
        response: new Response(body, { status: response.status, statusText: response.statusText, headers: response.headers }),
      };
    } catch (error) {
      const kind = classifyThrown(error);
      if (!kind || !(error instanceof Error)) throw error;
      return { ok: false, kind, error };
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Drains an unused body so the connection can be reused */
  private async discard(response: Response): Promise<void> {
    try {
      const text = await response.text();
      if (text) this.logger.debug(`  ${response.status}: ${text.slice(0, 200)}`);
    } catch (error) {
      this.logger.debug(`  Could not read ${response.status} body: ${error}`);
    }
  }
}

function describe(kind: RetryableKind, status?: number): string {
  switch (kind) {
    case "rate_limited":
      return "Rate limited (429)";
    case "server_error":
      return `Server error (${status ?? "5xx"})`;
    case "timeout":
      return "Request timeout";
    case "network_error":
      return "Network error";
  }
}
