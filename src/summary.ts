import type { ContactRecord } from "./types.js";
import type { ExtractionResult } from "./extractor.js";
import type { ExportedFile } from "./export.js";
import { AuthError, ConfigError, ExitCode, RequestError, errorMessage, isFileSystemError } from "./errors.js";

// ============================================
// Run Summary
// ============================================

// Result summary for --json output
export interface RunSummary {
  accountId: string | null;
  folderId: string | null;
  messagesProcessed: number;
  pages: number;
  uniqueContacts: number;
  discarded: number;
  attachmentsDownloaded: number;
  attachmentsReused: number;
  attachmentBytes: number;
  interrupted: boolean;
  error?: string;
  duration: number;
  files: string[];
  topSenders: { email: string; name: string; messageCount: number }[];
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/** Contacts with the most messages; input is expected in export order */
export function topSenders(contacts: ContactRecord[], limit = 10): ContactRecord[] {
  return contacts.slice(0, limit);
}

export function topAttachmentSenders(contacts: ContactRecord[], limit = 10): ContactRecord[] {
  return contacts
    .filter((c) => c.attachments.length > 0)
    .sort((a, b) => b.attachments.length - a.attachments.length || a.email.localeCompare(b.email))
    .slice(0, limit);
}

export function attachmentBytes(contacts: ContactRecord[]): number {
  return contacts.reduce((sum, c) => sum + c.attachments.reduce((s, a) => s + a.size, 0), 0);
}

export function buildRunSummary(result: ExtractionResult, files: ExportedFile[], duration: number): RunSummary {
  return {
    accountId: result.accountId,
    folderId: result.folderId,
    messagesProcessed: result.processed,
    pages: result.pages,
    uniqueContacts: result.contacts.length,
    discarded: result.stats.discarded,
    attachmentsDownloaded: result.attachments?.downloaded ?? 0,
    attachmentsReused: result.attachments?.reused ?? 0,
    attachmentBytes: attachmentBytes(result.contacts),
    interrupted: result.interrupted,
    error: result.error === undefined ? undefined : errorMessage(result.error),
    duration,
    files: files.map((f) => f.path),
    topSenders: topSenders(result.contacts).map(({ email, name, messageCount }) => ({ email, name, messageCount })),
  };
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return ExitCode.ConfigError;
  if (error instanceof AuthError) return ExitCode.AuthError;
  if (error instanceof RequestError) {
    return error.kind === "unauthorized" ? ExitCode.AuthError : ExitCode.NetworkError;
  }
  if (isFileSystemError(error)) return ExitCode.FileSystemError;
  return ExitCode.NetworkError;
}
