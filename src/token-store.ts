import { mkdir, readFile, rm, writeFile, chmod } from "fs/promises";
import { dirname } from "path";
import type { Credential } from "./types.js";
import { Logger, silentLogger } from "./logger.js";

// ============================================
// Token Cache - Persistent Authentication
// ============================================
// Stores OAuth tokens to avoid the browser consent flow on every run.
// Written after every code exchange and refresh; a file that cannot be
// parsed is deleted and treated as "no token".

const TOKEN_FILE_VERSION = 1;

interface TokenFile {
  version: number;
  accessToken: string;
  refreshToken?: string;
  expiresAt: number;        // Unix timestamp (ms), margin already applied
  cachedAt: string;         // ISO date when written
}

export interface TokenStore {
  load(): Promise<Credential | null>;
  save(credential: Credential): Promise<void>;
  clear(): Promise<void>;
}

function isTokenFile(obj: unknown): obj is TokenFile {
  if (typeof obj !== "object" || obj === null) return false;
  const file = obj as Record<string, unknown>;
  return (
    typeof file.accessToken === "string" &&
    typeof file.expiresAt === "number" &&
    (file.refreshToken === undefined || typeof file.refreshToken === "string")
  );
}

export class FileTokenStore implements TokenStore {
  constructor(
    readonly path: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async load(): Promise<Credential | null> {
    let content: string;
    try {
      content = (await readFile(this.path, "utf-8")).trim();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        this.logger.debug("No token file found");
        return null;
      }
      throw error;
    }

    if (!content) {
      this.logger.warn("Token file is empty");
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn(`Invalid JSON in token file, discarding it: ${error}`);
      await this.clear();
      return null;
    }

    if (!isTokenFile(parsed) || !parsed.accessToken) {
      this.logger.warn("Token file has no usable access token, discarding it");
      await this.clear();
      return null;
    }

    return {
      accessToken: parsed.accessToken,
      refreshToken: parsed.refreshToken || undefined,
      expiresAt: parsed.expiresAt,
    };
  }

  async save(credential: Credential): Promise<void> {
    const file: TokenFile = {
      version: TOKEN_FILE_VERSION,
      accessToken: credential.accessToken,
      refreshToken: credential.refreshToken,
      expiresAt: credential.expiresAt,
      cachedAt: new Date().toISOString(),
    };

    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(file, null, 2));

    // Set restrictive permissions on token cache (Unix only)
    if (process.platform !== "win32") {
      await chmod(this.path, 0o600);
    }
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
  }
}
