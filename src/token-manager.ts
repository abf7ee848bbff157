import type { Credential } from "./types.js";
import type { OAuthConfig } from "./config.js";
import { API_TIMEOUT_MS, TOKEN_EXPIRY_MARGIN_MS } from "./config.js";
import type { TokenStore } from "./token-store.js";
import { AuthError, errorMessage } from "./errors.js";
import { Logger, silentLogger } from "./logger.js";

// ============================================
// OAuth Token Lifecycle
// ============================================
// Authorization Code flow against the Zoho accounts server:
//   browser consent -> redirect with ?code -> exchangeCode() -> tokens.json
// Afterwards acquire() hands out the cached access token and silently
// refreshes it once expiresAt (which carries a safety margin) has passed.

export type TokenState = "unloaded" | "valid" | "expired" | "refreshing" | "unauthenticated";

interface TokenResponse {
  access_token?: string;
  refresh_token?: string;
  expires_in?: number | string;
  error?: string;
  error_description?: string;
}

export interface TokenManagerOptions {
  oauth: OAuthConfig;
  store: TokenStore;
  fetch?: typeof fetch;
  now?: () => number;
  logger?: Logger;
  timeoutMs?: number;
  expiryMarginMs?: number;
}

const DEFAULT_EXPIRES_IN_SEC = 3600;

function parseTokenBody(text: string, status: number): TokenResponse {
  if (!text) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === "object" && parsed !== null ? (parsed as TokenResponse) : {};
  } catch {
    throw new Error(`${status} - unexpected response body`);
  }
}

export class TokenManager {
  private credential: Credential | null = null;
  private currentState: TokenState = "unloaded";

  private readonly oauth: OAuthConfig;
  private readonly store: TokenStore;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly expiryMarginMs: number;

  constructor(options: TokenManagerOptions) {
    this.oauth = options.oauth;
    this.store = options.store;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.timeoutMs = options.timeoutMs ?? API_TIMEOUT_MS;
    this.expiryMarginMs = options.expiryMarginMs ?? TOKEN_EXPIRY_MARGIN_MS;
  }

  get state(): TokenState {
    return this.currentState;
  }

  get tokenUrl(): string {
    return `${this.oauth.accountsUrl}/oauth/v2/token`;
  }

  /** Consent page URL; prompt=consent makes Zoho issue a refresh token */
  authorizationUrl(state?: string): string {
    const url = new URL(`${this.oauth.accountsUrl}/oauth/v2/auth`);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("client_id", this.oauth.clientId);
    url.searchParams.set("scope", this.oauth.scopes.join(","));
    url.searchParams.set("redirect_uri", this.oauth.redirectUri);
    url.searchParams.set("access_type", "offline");
    url.searchParams.set("prompt", "consent");
    if (state) url.searchParams.set("state", state);
    return url.toString();
  }

  /** Loads the stored credential once; true when one is available */
  async load(): Promise<boolean> {
    if (this.currentState === "unloaded") {
      this.credential = await this.store.load();
      this.currentState = this.credential ? this.classify(this.credential) : "unauthenticated";
      if (this.credential) this.logger.debug(`Loaded stored token (${this.currentState})`);
    }
    return this.credential !== null;
  }

  /**
   * Returns a credential that is valid right now, refreshing it first when
   * it has expired. Throws AuthError when re-authorization is required.
   */
  async acquire(): Promise<Credential> {
    await this.load();
    if (!this.credential) {
      this.currentState = "unauthenticated";
      throw new AuthError("No stored credentials. Authorization is required.");
    }

    if (this.classify(this.credential) === "expired") {
      this.currentState = "expired";
      this.logger.info("Access token expired, refreshing...");
      return this.refresh();
    }

    this.currentState = "valid";
    return { ...this.credential };
  }

  /** Forces a refresh with the stored refresh token */
  async refresh(): Promise<Credential> {
    await this.load();
    const refreshToken = this.credential?.refreshToken;
    if (!this.credential || !refreshToken) {
      this.currentState = "unauthenticated";
      throw new AuthError("No refresh token available. Authorization is required.");
    }

    this.currentState = "refreshing";
    let tokens: TokenResponse & { access_token: string };
    try {
      tokens = await this.requestToken({
        grant_type: "refresh_token",
        client_id: this.oauth.clientId,
        client_secret: this.oauth.clientSecret,
        refresh_token: refreshToken,
      });
    } catch (error) {
      this.currentState = "unauthenticated";
      throw new AuthError(`Token refresh failed: ${errorMessage(error)}`, { cause: error });
    }

    // Zoho normally omits refresh_token on refresh responses
    this.credential = {
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token || refreshToken,
      expiresAt: this.expiryFrom(tokens.expires_in),
    };
    await this.store.save(this.credential);
    this.currentState = "valid";
    this.logger.debug("Access token refreshed");
    return { ...this.credential };
  }

  /** Exchanges a one-time authorization code for tokens and persists them */
  async exchangeCode(code: string): Promise<Credential> {
    let tokens: TokenResponse & { access_token: string };
    try {
      tokens = await this.requestToken({
        grant_type: "authorization_code",
        client_id: this.oauth.clientId,
        client_secret: this.oauth.clientSecret,
        redirect_uri: this.oauth.redirectUri,
        code,
      });
    } catch (error) {
      this.currentState = "unauthenticated";
      throw new AuthError(`Authorization code exchange failed: ${errorMessage(error)}`, { cause: error });
    }

    this.credential = {
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token || undefined,
      expiresAt: this.expiryFrom(tokens.expires_in),
    };
    await this.store.save(this.credential);
    this.currentState = "valid";

    if (!this.credential.refreshToken) {
      this.logger.warn("No refresh token issued; you will need to re-authorize when this token expires");
    }
    return { ...this.credential };
  }

  /** Drops the in-memory and stored credential */
  async reset(): Promise<void> {
    this.credential = null;
    this.currentState = "unauthenticated";
    await this.store.clear();
  }

  private classify(credential: Credential): TokenState {
    return this.now() > credential.expiresAt ? "expired" : "valid";
  }

  private expiryFrom(expiresIn: number | string | undefined): number {
    const seconds = Number(expiresIn);
    const lifetime = Number.isFinite(seconds) && seconds > 0 ? seconds : DEFAULT_EXPIRES_IN_SEC;
    return this.now() + lifetime * 1000 - this.expiryMarginMs;
  }

  private async requestToken(params: Record<string, string>): Promise<TokenResponse & { access_token: string }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.tokenUrl, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams(params),
        signal: controller.signal,
      });

      const data = parseTokenBody(await response.text(), response.status);
      const accessToken = data.access_token;

      // Zoho reports some failures (e.g. invalid_code) with HTTP 200
      if (!response.ok || data.error || !accessToken) {
        throw new Error(`${response.status} - ${data.error_description || data.error || "no access_token in response"}`);
      }
      return { ...data, access_token: accessToken };
    } finally {
      clearTimeout(timeout);
    }
  }
}
