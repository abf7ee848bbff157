import { createServer, type IncomingMessage, type ServerResponse } from "http";
import { execFile } from "child_process";
import { AuthError } from "./errors.js";

// ============================================
// OAuth Callback Listener
// ============================================
// One-shot local HTTP endpoint for the authorization-code redirect.
// The server answers the first request on the callback path, then closes.

export type CallbackOutcome =
  | { type: "code"; code: string }
  | { type: "error"; message: string }
  | { type: "ignored" };

export interface CallbackListenerOptions {
  port: number;
  path: string;
  timeoutMs: number;
  host?: string;
  /** When set, a callback whose state differs is rejected */
  expectedState?: string;
  /** Called with the bound port once the server is listening */
  onListening?: (port: number) => void;
}

/**
 * Escapes HTML special characters to prevent XSS attacks
 */
export function escapeHtml(unsafe: string): string {
  return unsafe
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

export function interpretCallback(url: URL | string, path: string, expectedState?: string): CallbackOutcome {
  const parsed = typeof url === "string" ? new URL(url, "http://localhost") : url;
  if (parsed.pathname !== path) return { type: "ignored" };

  const error = parsed.searchParams.get("error");
  if (error) {
    return { type: "error", message: parsed.searchParams.get("error_description") || error };
  }

  const code = parsed.searchParams.get("code");
  if (!code) return { type: "error", message: "Invalid response - no authorization code" };

  if (expectedState !== undefined && parsed.searchParams.get("state") !== expectedState) {
    return { type: "error", message: "Invalid OAuth response - state mismatch" };
  }
  return { type: "code", code };
}

/** Port and path to listen on, taken from the registered redirect URI */
export function callbackAddress(redirectUri: string): { port: number; path: string } {
  const url = new URL(redirectUri);
  const port = url.port ? Number(url.port) : url.protocol === "https:" ? 443 : 80;
  return { port, path: url.pathname || "/" };
}

/**
 * Resolves with the authorization code from the first callback request.
 * Rejects with AuthError on an error callback, a busy port, or timeout.
 */
export function waitForAuthorizationCode(options: CallbackListenerOptions): Promise<string> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
      const outcome = settled ? { type: "ignored" as const } : interpretCallback(req.url ?? "/", options.path, options.expectedState);

      if (outcome.type === "ignored") {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      const html = outcome.type === "code" ? successPage() : errorPage(outcome.message);
      res.writeHead(outcome.type === "code" ? 200 : 400, { "Content-Type": "text/html; charset=utf-8" });
      res.end(html, () => {
        if (outcome.type === "code") {
          finish(() => resolve(outcome.code));
        } else {
          finish(() => reject(new AuthError(`OAuth error: ${outcome.message}`)));
        }
      });
    });

    const timer = setTimeout(() => {
      finish(() => reject(new AuthError(`Authentication timed out after ${Math.round(options.timeoutMs / 1000)} seconds. Please try again.`)));
    }, options.timeoutMs);

    function finish(settle: () => void): void {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      server.close();
      server.closeAllConnections();
      settle();
    }

    server.on("error", (error: NodeJS.ErrnoException) => {
      const message =
        error.code === "EADDRINUSE"
          ? `Port ${options.port} is already in use. Is another contact-ledger instance running?`
          : `Could not start callback listener: ${error.message}`;
      finish(() => reject(new AuthError(message, { cause: error })));
    });

    server.listen(options.port, options.host ?? "127.0.0.1", () => {
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : options.port;
      options.onListening?.(port);
    });
  });
}

// Cross-platform helpers
export function openBrowser(url: string): Promise<void> {
  const [command, args]: [string, string[]] =
    process.platform === "darwin"
      ? ["open", [url]]
      : process.platform === "win32"
        ? ["cmd", ["/c", "start", '""', url]]
        : ["xdg-open", [url]];

  return new Promise((resolve, reject) => {
    execFile(command, args, (error) => (error ? reject(error) : resolve()));
  });
}

function successPage(): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Success</title>
  <style>
    body { font-family: -apple-system, system-ui, sans-serif; text-align: center; padding: 50px; background: #0a0a0a; color: #fff; }
    h1 { color: #22c55e; }
    p { color: #a1a1aa; }
  </style>
</head>
<body>
  <h1>Authorization Successful!</h1>
  <p>You can close this window and return to the terminal.</p>
</body>
</html>`;
}

function errorPage(message: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Error</title>
  <style>
    body { font-family: -apple-system, system-ui, sans-serif; text-align: center; padding: 50px; background: #0a0a0a; color: #fff; }
    h1 { color: #ef4444; }
    p { color: #a1a1aa; }
  </style>
</head>
<body>
  <h1>Authorization Failed</h1>
  <p>${escapeHtml(message)}</p>
</body>
</html>`;
}
