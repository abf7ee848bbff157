import { mkdir, rename, stat, writeFile } from "fs/promises";
import { join } from "path";
import type { ContactRecord } from "./types.js";
import type { ExportFormat } from "./config.js";
import { errorMessage } from "./errors.js";
import { Logger, silentLogger } from "./logger.js";

// ============================================
// Export
// ============================================
// contacts_latest.<ext> always holds the newest run; the file it replaces
// is renamed to contacts_backup_<YYYYMMDD_HHMMSS>.<ext>.
// Dates are rendered as "YYYY-MM-DD HH:MM:SS" in UTC.

export const LATEST_BASENAME = "contacts_latest";
export const BACKUP_PREFIX = "contacts_backup_";

export const CSV_COLUMNS = [
  "email",
  "name",
  "message_count",
  "first_seen",
  "last_seen",
  "latest_subject",
  "domain",
  "has_attachments",
  "attachment_count",
  "attachment_files",
] as const;

export interface ExportOptions {
  outputDir: string;
  formats: ExportFormat[];
  now?: () => Date;
  logger?: Logger;
}

export interface ExportedFile {
  format: ExportFormat;
  path: string;
  backup?: string;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** "2024-01-02 03:04:05"; empty for an unknown time */
export function formatTimestamp(ms: number | null): string {
  if (ms === null || !Number.isFinite(ms)) return "";
  const d = new Date(ms);
  if (Number.isNaN(d.getTime())) return "";
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

export function backupStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function csvEscape(value: string): string {
  const v = (value ?? "").replace(/\r?\n/g, " ").trim();
  if (/[",]/.test(v)) return `"${v.replace(/"/g, '""')}"`;
  return v;
}

function domainOf(email: string): string {
  const at = email.indexOf("@");
  return at >= 0 ? email.slice(at + 1) : "";
}

export function toCsvRow(contact: ContactRecord): string {
  const cells = [
    contact.email,
    contact.name,
    String(contact.messageCount),
    formatTimestamp(contact.firstSeen),
    formatTimestamp(contact.lastSeen),
    contact.subject,
    domainOf(contact.email),
    contact.hasAttachment ? "true" : "false",
    String(contact.attachments.length),
    contact.attachments.map((a) => a.filename).join(", "),
  ];
  return cells.map(csvEscape).join(",");
}

export function renderCsv(contacts: ContactRecord[]): string {
  return [CSV_COLUMNS.join(","), ...contacts.map(toCsvRow)].join("\n") + "\n";
}

export function renderJson(contacts: ContactRecord[], extractedAt: Date): string {
  return JSON.stringify(
    {
      extractionDate: extractedAt.toISOString(),
      totalUniqueEmails: contacts.length,
      totalMessages: contacts.reduce((sum, c) => sum + c.messageCount, 0),
      contacts: contacts.map((c) => ({
        ...c,
        domain: domainOf(c.email),
        firstSeenReadable: formatTimestamp(c.firstSeen),
        lastSeenReadable: formatTimestamp(c.lastSeen),
      })),
    },
    null,
    2
  );
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes the contacts (already in export order) in every requested format.
 * Returns the files written; an empty contact list writes nothing.
 */
export async function exportContacts(contacts: ContactRecord[], options: ExportOptions): Promise<ExportedFile[]> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  if (contacts.length === 0) {
    logger.warn("No contacts to export");
    return [];
  }

  await mkdir(options.outputDir, { recursive: true });
  const extractedAt = now();
  const written: ExportedFile[] = [];

  for (const format of options.formats) {
    const path = join(options.outputDir, `${LATEST_BASENAME}.${format}`);
    let backup: string | undefined;

    if (await exists(path)) {
      const candidate = join(options.outputDir, `${BACKUP_PREFIX}${backupStamp(extractedAt)}.${format}`);
      try {
        await rename(path, candidate);
        backup = candidate;
        logger.info(`Previous ${format.toUpperCase()} file backed up as: ${candidate}`);
      } catch (error) {
        logger.warn(`Could not back up ${path}, overwriting it: ${errorMessage(error)}`);
      }
    }

    const content = format === "json" ? renderJson(contacts, extractedAt) : renderCsv(contacts);
    await writeFile(path, content, "utf-8");
    logger.success(`${format.toUpperCase()} file saved: ${path}`);
    written.push({ format, path, backup });
  }

  return written;
}
