import { mkdir, stat, writeFile } from "fs/promises";
import { extname, join, resolve, sep } from "path";
import type { StoredAttachment } from "./types.js";
import type { MailApi } from "./mail-api.js";
import { Logger, silentLogger } from "./logger.js";

// ============================================
// Attachment Downloads
// ============================================
// Optional side channel of message processing. Files land in
// <dir>/<sender_at_domain_com>/<sanitized name>. After `disableAfter`
// consecutive failures to reach the attachment endpoints the fetcher turns
// itself off for the rest of the run.

const MAX_FILENAME_LENGTH = 200;

export interface AttachmentFetcherOptions {
  api: MailApi;
  accountId: string;
  folderId?: string | null;
  dir: string;
  maxBytes: number;
  /** Lower-case extensions with leading dot; null allows everything */
  allowedExtensions: string[] | null;
  disableAfter: number;
  logger?: Logger;
}

export interface AttachmentStats {
  downloaded: number;
  reused: number;
  skipped: number;
  failed: number;
}

/**
 * Sanitizes filename to prevent path traversal attacks
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/[^a-zA-Z0-9._ -]/g, "_")  // Replace unsafe chars
    .replace(/\.{2,}/g, ".")            // Collapse multiple dots
    .trim()
    .substring(0, MAX_FILENAME_LENGTH); // Limit length
}

/**
 * Validates that a filepath doesn't escape the output directory
 */
export function isPathSafe(outputDir: string, filepath: string): boolean {
  const resolvedOutput = resolve(outputDir);
  const resolvedFile = resolve(filepath);
  return resolvedFile.startsWith(resolvedOutput + sep);
}

export function senderDirName(email: string): string {
  return email.replace("@", "_at_").replace(/\./g, "_");
}

export function isAllowedExtension(filename: string, allowed: string[] | null): boolean {
  if (allowed === null) return true;
  return allowed.includes(extname(filename).toLowerCase());
}

async function fileSize(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : null;
  } catch {
    return null;
  }
}

export class AttachmentFetcher {
  readonly stats: AttachmentStats = { downloaded: 0, reused: 0, skipped: 0, failed: 0 };

  private available = true;
  private consecutiveFailures = 0;
  private readonly logger: Logger;

  constructor(private readonly options: AttachmentFetcherOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /** False once the attachment endpoints have been given up on */
  get enabled(): boolean {
    return this.available;
  }

  /** Lists, filters and stores the attachments of one message */
  async collect(messageId: string, senderEmail: string): Promise<StoredAttachment[]> {
    if (!this.available) return [];
    const { api, accountId, folderId } = this.options;

    const listing = await api.getAttachments(accountId, messageId, folderId);
    if (!listing.ok) {
      this.recordFailure(`listing attachments of ${messageId}`);
      return [];
    }
    this.consecutiveFailures = 0;

    const stored: StoredAttachment[] = [];
    for (const info of listing.value) {
      const attachmentId = info.attachmentId != null ? String(info.attachmentId) : "";
      if (!attachmentId) continue;
      const originalName = info.attachmentName || "unknown";

      const saved = await this.store(messageId, attachmentId, originalName, Number(info.size), senderEmail);
      if (saved) stored.push(saved);
      if (!this.available) break;
    }
    return stored;
  }

  private async store(
    messageId: string,
    attachmentId: string,
    originalName: string,
    declaredSize: number,
    senderEmail: string
  ): Promise<StoredAttachment | null> {
    const { api, accountId, folderId, dir, maxBytes, allowedExtensions } = this.options;

    let safeName = sanitizeFilename(originalName);
    if (!safeName || /^[._ ]+$/.test(safeName)) safeName = `attachment_${sanitizeFilename(attachmentId)}`;

    if (!isAllowedExtension(safeName, allowedExtensions)) {
      this.logger.debug(`    Skipped (file type): ${originalName}`);
      this.stats.skipped++;
      return null;
    }
    if (Number.isFinite(declaredSize) && declaredSize > maxBytes) {
      this.logger.debug(`    Skipped (too large, ${declaredSize} bytes): ${originalName}`);
      this.stats.skipped++;
      return null;
    }

    const senderDir = join(dir, senderDirName(senderEmail));
    const filepath = join(senderDir, safeName);
    if (!isPathSafe(dir, filepath)) {
      this.logger.warn(`    Skipped (unsafe path): ${originalName}`);
      this.stats.skipped++;
      return null;
    }

    const existing = await fileSize(filepath);
    if (existing !== null) {
      this.stats.reused++;
      return { filename: originalName, path: filepath, size: existing };
    }

    const download = await api.downloadAttachment(accountId, messageId, attachmentId, maxBytes, folderId);
    if (!download.ok) {
      if (download.reason === "too_large") {
        this.logger.warn(`Attachment too large, skipping: ${safeName} (${download.size} bytes)`);
        this.stats.skipped++;
      } else {
        this.stats.failed++;
        this.recordFailure(`downloading ${originalName}`);
      }
      return null;
    }
    this.consecutiveFailures = 0;

    await mkdir(senderDir, { recursive: true });
    await writeFile(filepath, download.file.content);
    this.stats.downloaded++;
    this.logger.debug(`    Saved: ${filepath} (${download.file.content.length} bytes)`);
    return { filename: originalName, path: filepath, size: download.file.content.length };
  }

  private recordFailure(what: string): void {
    this.consecutiveFailures++;
    this.logger.debug(`  Attachment endpoints unreachable while ${what} (${this.consecutiveFailures}/${this.options.disableAfter})`);
    if (this.consecutiveFailures >= this.options.disableAfter) {
      this.available = false;
      this.logger.warn("Attachment API appears to be unavailable, disabling attachment downloads");
    }
  }
}
