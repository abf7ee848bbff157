import { join, isAbsolute } from "path";
import { homedir } from "os";
import { ConfigError } from "./errors.js";

// ============================================
// Constants
// ============================================
export const API_TIMEOUT_MS = 30000;
export const TOKEN_EXPIRY_MARGIN_MS = 5 * 60 * 1000;
export const AUTH_TIMEOUT_MS = 5 * 60 * 1000;  // browser consent flow
export const DEFAULT_OUTPUT_DIR = "zoho_email_extraction";

// Zoho documents ~50 requests/min; stay well under it
const REQUESTS_PER_MINUTE = 40;
const RATE_LIMIT_MARGIN = 5;
const REQUEST_SPACING_MS = 1200;
const MAX_RETRIES = 3;

const PAGE_SIZE = 50;
const MAX_MESSAGES = 5000;
const PAGE_DELAY_MS = 1000;
const CHECKPOINT_EVERY_PAGES = 5;

const MAX_ATTACHMENT_BYTES = 10 * 1024 * 1024;
const ATTACHMENT_DISABLE_AFTER = 3;

// File type filter - comma-separated extensions or "*" for all
const DEFAULT_FILE_TYPES = "pdf,doc,docx,xls,xlsx,ppt,pptx,txt,csv,zip,rar,jpg,jpeg,png,gif";

export type ExportFormat = "json" | "csv";
const EXPORT_FORMATS: readonly ExportFormat[] = ["json", "csv"];

export interface OAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  accountsUrl: string;
  scopes: string[];
}

export interface ExtractorConfig {
  oauth: OAuthConfig;
  apiBase: string;
  /** Authorization header scheme, e.g. "Zoho-oauthtoken <token>" */
  authScheme: string;
  outputDir: string;
  tokenPath: string;
  rateLimit: {
    maxPerMinute: number;
    margin: number;
    spacingMs: number;
  };
  requests: {
    maxRetries: number;
    timeoutMs: number;
  };
  pagination: {
    pageSize: number;
    maxMessages: number;
    pageDelayMs: number;
    checkpointEvery: number;
  };
  attachments: {
    enabled: boolean;
    dir: string;
    maxBytes: number;
    /** Lower-case extensions with leading dot; null allows everything */
    allowedExtensions: string[] | null;
    disableAfter: number;
  };
  exportFormats: ExportFormat[];
}

/** Values the CLI may override on top of the environment */
export interface ConfigOverrides {
  outputDir?: string;
  pageSize?: number;
  maxMessages?: number;
  attachments?: boolean;
  formats?: string;
}

export function parseFileTypes(raw: string | undefined): string[] | null {
  const value = raw?.trim() || DEFAULT_FILE_TYPES;
  if (value === "*") return null;
  return value
    .split(",")
    .map((ext) => ext.trim().toLowerCase().replace(/^\./, ""))
    .filter(Boolean)
    .map((ext) => `.${ext}`);
}

export function parseFormats(raw: string | undefined): ExportFormat[] {
  if (!raw) return [...EXPORT_FORMATS];
  const formats: ExportFormat[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim().toLowerCase();
    const format = EXPORT_FORMATS.find((f) => f === name);
    if (!format) {
      throw new ConfigError(`Unknown export format: "${part.trim()}". Use ${EXPORT_FORMATS.join(", ")}.`);
    }
    if (!formats.includes(format)) formats.push(format);
  }
  return formats;
}

function positiveInt(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return value;
}

function expandPath(inputPath: string): string {
  if (inputPath.startsWith("~")) {
    return join(homedir(), inputPath.slice(1));
  }
  if (!isAbsolute(inputPath)) {
    return join(process.cwd(), inputPath);
  }
  return inputPath;
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Builds the run configuration from environment variables (normally
 * populated from .env) and CLI overrides.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): ExtractorConfig {
  const clientId = env.ZOHO_CLIENT_ID?.trim() ?? "";
  const clientSecret = env.ZOHO_CLIENT_SECRET?.trim() ?? "";
  if (!clientId || !clientSecret) {
    throw new ConfigError("ZOHO_CLIENT_ID and ZOHO_CLIENT_SECRET must be set");
  }

  const outputDir = expandPath(overrides.outputDir || env.OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR);

  return {
    oauth: {
      clientId,
      clientSecret,
      redirectUri: env.ZOHO_REDIRECT_URI?.trim() || "http://localhost:5000/oauth/callback",
      accountsUrl: trimSlash(env.ZOHO_ACCOUNTS_URL?.trim() || "https://accounts.zoho.in"),
      scopes: ["ZohoMail.messages.READ", "ZohoMail.folders.READ", "ZohoMail.accounts.READ"],
    },
    apiBase: trimSlash(env.ZOHO_API_BASE?.trim() || "https://mail.zoho.in/api"),
    authScheme: "Zoho-oauthtoken",
    outputDir,
    tokenPath: join(outputDir, "tokens.json"),
    rateLimit: {
      maxPerMinute: REQUESTS_PER_MINUTE,
      margin: RATE_LIMIT_MARGIN,
      spacingMs: REQUEST_SPACING_MS,
    },
    requests: {
      maxRetries: MAX_RETRIES,
      timeoutMs: API_TIMEOUT_MS,
    },
    pagination: {
      pageSize: positiveInt("Page size", overrides.pageSize, PAGE_SIZE),
      maxMessages: positiveInt("Max messages", overrides.maxMessages, MAX_MESSAGES),
      pageDelayMs: PAGE_DELAY_MS,
      checkpointEvery: CHECKPOINT_EVERY_PAGES,
    },
    attachments: {
      enabled: overrides.attachments ?? true,
      dir: join(outputDir, "attachments"),
      maxBytes: MAX_ATTACHMENT_BYTES,
      allowedExtensions: parseFileTypes(env.FILE_TYPES),
      disableAfter: ATTACHMENT_DISABLE_AFTER,
    },
    exportFormats: parseFormats(overrides.formats),
  };
}
