import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { Credential } from "./types.js";
import type { TokenStore } from "./token-store.js";
import type { Requester } from "./mail-api.js";
import type { RequestOptions } from "./request-executor.js";
import { loadConfig, type ExtractorConfig } from "./config.js";

// ============================================
// Test Utilities
// ============================================

/**
 * Creates a temporary directory for test isolation
 */
export async function createTempDir(): Promise<string> {
  return await mkdtemp(join(tmpdir(), "contact-ledger-test-"));
}

/**
 * Cleans up a temporary directory
 */
export async function cleanupTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export class MemoryTokenStore implements TokenStore {
  saved: Credential[] = [];
  cleared = 0;

  constructor(public credential: Credential | null = null) {}

  async load(): Promise<Credential | null> {
    return this.credential ? { ...this.credential } : null;
  }

  async save(credential: Credential): Promise<void> {
    this.credential = { ...credential };
    this.saved.push({ ...credential });
  }

  async clear(): Promise<void> {
    this.credential = null;
    this.cleared++;
  }
}

/** Manual clock; sleep() advances it instead of waiting */
export class FakeClock {
  sleeps: number[] = [];

  constructor(public time = 1_000_000) {}

  now = (): number => this.time;

  sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.time += ms;
  };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export interface RecordedCall {
  url: URL;
  init?: RequestInit;
}

/** fetch stand-in driven by a handler; every call is recorded */
export function createFetchStub(handler: (url: URL, init?: RequestInit) => Response | Promise<Response>) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    calls.push({ url, init });
    return handler(url, init);
  };
  return { fetch: fetchImpl, calls };
}

export interface RequesterCall {
  endpoint: string;
  options?: RequestOptions;
}

/** Requester stand-in for MailApi: handler returns a response or throws */
export class StubRequester implements Requester {
  calls: RequesterCall[] = [];

  constructor(private readonly handler: (endpoint: string, options?: RequestOptions) => Response) {}

  async execute(endpoint: string, options?: RequestOptions): Promise<Response> {
    this.calls.push({ endpoint, options });
    return this.handler(endpoint, options);
  }

  endpoints(): string[] {
    return this.calls.map((c) => c.endpoint);
  }
}

/** Config pointing at a temp dir, with every delay switched off */
export function testConfig(outputDir: string, env: Record<string, string> = {}): ExtractorConfig {
  const config = loadConfig({
    ZOHO_CLIENT_ID: "test-client",
    ZOHO_CLIENT_SECRET: "test-secret",
    ZOHO_API_BASE: "https://mail.example.test/api",
    ZOHO_ACCOUNTS_URL: "https://accounts.example.test",
    OUTPUT_DIR: outputDir,
    ...env,
  });
  return {
    ...config,
    rateLimit: { ...config.rateLimit, spacingMs: 0 },
    pagination: { ...config.pagination, pageDelayMs: 0 },
  };
}
