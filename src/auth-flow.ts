import { randomUUID } from "crypto";
import type { TokenManager } from "./token-manager.js";
import { AuthError, errorMessage } from "./errors.js";
import { callbackAddress, openBrowser, waitForAuthorizationCode, type CallbackListenerOptions } from "./oauth-callback.js";
import { Logger, silentLogger } from "./logger.js";

// ============================================
// Authentication Flow
// ============================================
// cached token -> silent refresh -> browser consent, in that order.

export type AuthOutcome = "cached" | "refreshed" | "authorized";

export interface AuthFlowOptions {
  redirectUri: string;
  timeoutMs: number;
  /** Drop stored credentials and go straight to browser consent */
  forceReauth?: boolean;
  openUrl?: (url: string) => Promise<void>;
  waitForCode?: (options: CallbackListenerOptions) => Promise<string>;
  /** Shown when the browser could not be opened */
  onManualUrl?: (url: string) => void;
  /** Called once the consent flow has started */
  onAuthorize?: () => void;
  logger?: Logger;
}

export async function ensureAuthenticated(tokens: TokenManager, options: AuthFlowOptions): Promise<AuthOutcome> {
  const logger = options.logger ?? silentLogger;

  if (options.forceReauth) {
    await tokens.reset();
  } else if (await tokens.load()) {
    const expired = tokens.state === "expired";
    try {
      await tokens.acquire();
      return expired ? "refreshed" : "cached";
    } catch (error) {
      if (!(error instanceof AuthError)) throw error;
      logger.warn(`${errorMessage(error)} Starting browser authorization.`);
    }
  }

  return authorize(tokens, options, logger);
}

async function authorize(tokens: TokenManager, options: AuthFlowOptions, logger: Logger): Promise<AuthOutcome> {
  const openUrl = options.openUrl ?? openBrowser;
  const waitForCode = options.waitForCode ?? waitForAuthorizationCode;

  const state = randomUUID();
  const url = tokens.authorizationUrl(state);
  const { port, path } = callbackAddress(options.redirectUri);

  options.onAuthorize?.();
  logger.debug(`Waiting for authorization callback on port ${port}${path}`);

  const callback = waitForCode({ port, path, timeoutMs: options.timeoutMs, expectedState: state });
  const opening = openUrl(url).catch((error: unknown) => {
    logger.debug(`Could not open browser: ${errorMessage(error)}`);
    options.onManualUrl?.(url);
  });
  const [code] = await Promise.all([callback, opening]);

  await tokens.exchangeCode(code);
  return "authorized";
}
