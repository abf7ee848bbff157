import type { MailFolder, Page, PaginationCursor, RawMessageRecord } from "./types.js";
import type { ApiResult, MailApi, MessageListing } from "./mail-api.js";
import { errorMessage, isFatal } from "./errors.js";
import { Logger, silentLogger } from "./logger.js";
import { sleep } from "./rate-limiter.js";

// ============================================
// Pagination
// ============================================
// start/limit paging over messages/view (scoped to the inbox folder) with
// messages/search as the unscoped fallback. Stops on an empty page, a short
// page, or once maxMessages entries have been handed out. The page that
// crosses maxMessages is delivered whole.

export interface PaginationOptions {
  accountId: string;
  pageSize: number;
  maxMessages: number;
  pageDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

type ListingPage = Extract<ApiResult<MessageListing>, { ok: true }>;

const INBOX_NAMES = ["inbox", "inbox folder"];

/**
 * Picks the folder to scope listing to: a folder named Inbox, else a system
 * folder (or folder id 1), else the first folder.
 */
export function selectInboxFolder(folders: MailFolder[]): MailFolder | null {
  const byName = folders.find((f) => INBOX_NAMES.includes((f.folderName ?? "").trim().toLowerCase()));
  if (byName) return byName;

  const system = folders.find((f) => f.systemFolder === true || String(f.folderId) === "1");
  if (system) return system;

  return folders[0] ?? null;
}

export class PaginationController {
  private folderId: string | null = null;
  private started = false;

  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(
    private readonly api: MailApi,
    private readonly options: PaginationOptions
  ) {
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  /** Folder the listing is scoped to, null when listing unscoped */
  get folder(): string | null {
    return this.folderId;
  }

  /**
   * Resolves the inbox folder id. Any failure is logged and leaves the
   * controller on the unscoped endpoint.
   */
  async resolveFolder(): Promise<string | null> {
    try {
      const result = await this.api.getFolders(this.options.accountId);
      if (!result.ok) {
        this.logger.warn(`Could not list folders (${result.status ?? result.error?.message}), listing without folder filter`);
        return (this.folderId = null);
      }

      const folder = selectInboxFolder(result.value);
      if (!folder) {
        this.logger.warn("No folders returned, listing without folder filter");
        return (this.folderId = null);
      }

      this.folderId = String(folder.folderId);
      this.logger.info(`Using folder: ${folder.folderName ?? "Unknown"} (ID: ${this.folderId})`);
      return this.folderId;
    } catch (error) {
      if (isFatal(error)) throw error;
      this.logger.warn(`Folder lookup failed, listing without folder filter: ${errorMessage(error)}`);
      return (this.folderId = null);
    }
  }

  /** Successive pages from index 0; a controller can only be run once */
  async *pages(): AsyncGenerator<Page> {
    if (this.started) throw new Error("Pagination already started; create a new controller for a new run");
    this.started = true;

    const { pageSize, maxMessages, pageDelayMs } = this.options;
    const cursor: PaginationCursor = { start: 0, pageSize };
    let processed = 0;

    while (processed < maxMessages) {
      const page = await this.fetchPage(cursor);
      if (!page) break;

      if (page.value.total !== undefined) cursor.totalKnown = page.value.total;
      const { records, received } = page.value;
      this.logger.debug(`Fetched page: ${received} messages (starting from ${cursor.start})`);
      if (received === 0) break;

      yield {
        cursor: { ...cursor },
        records,
        received,
        endpoint: page.endpoint.endsWith("/search") ? "search" : "folder",
      };

      processed += received;
      cursor.start += pageSize;

      if (received < pageSize) break;
      if (processed >= maxMessages) {
        this.logger.info(`Reached the ${maxMessages} message limit`);
        break;
      }
      if (pageDelayMs > 0) await this.sleep(pageDelayMs);
    }
  }

  /** Flattened view of pages() */
  async *fetchAll(): AsyncGenerator<RawMessageRecord> {
    for await (const page of this.pages()) {
      yield* page.records;
    }
  }

  /**
   * One page via the folder endpoint, retried on the search endpoint when
   * that fails. Returns null when neither endpoint produced the page.
   */
  private async fetchPage(cursor: PaginationCursor): Promise<ListingPage | null> {
    const { accountId } = this.options;

    if (this.folderId) {
      try {
        const scoped = await this.api.listFolderMessages(accountId, this.folderId, cursor.start, cursor.pageSize);
        if (scoped.ok) return scoped;
        this.logger.warn(`Folder listing failed (${scoped.status}), trying search endpoint`);
      } catch (error) {
        if (isFatal(error)) throw error;
        this.logger.warn(`Folder listing failed (${errorMessage(error)}), trying search endpoint`);
      }
    }

    const unscoped = await this.api.searchMessages(accountId, cursor.start, cursor.pageSize);
    if (unscoped.ok) return unscoped;

    this.logger.error(`Failed to fetch messages at index ${cursor.start} (${unscoped.status})`);
    return null;
  }
}
