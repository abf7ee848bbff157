import type { ContactRecord, Ledger } from "./types.js";
import type { ExtractorConfig } from "./config.js";
import type { MailApi } from "./mail-api.js";
import { AttachmentFetcher, type AttachmentStats } from "./attachments.js";
import { DeduplicationAggregator, sortContacts, type AggregatorStats } from "./aggregator.js";
import { PaginationController } from "./pagination.js";
import { checkpointPath, removeCheckpoint, saveCheckpoint } from "./checkpoint.js";
import { errorMessage } from "./errors.js";
import { Logger, silentLogger } from "./logger.js";

// ============================================
// Extraction Run
// ============================================
// account -> inbox folder -> pages -> ledger. The run never throws: whatever
// stops it (end of data, interrupt, error) the ledger built so far is
// returned so it can be exported.

export class AccountLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AccountLookupError";
  }
}

export interface PageProgress {
  page: number;
  processed: number;
  uniqueContacts: number;
  merged: number;
  /** Total messages reported by the API, when it reports one */
  total?: number;
  maxMessages: number;
}

export interface ContactExtractorOptions {
  config: ExtractorConfig;
  api: MailApi;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  onPage?: (progress: PageProgress) => void;
}

export interface RunOptions {
  /** Aborting stops the run after the page in progress */
  signal?: AbortSignal;
}

export interface ExtractionResult {
  accountId: string | null;
  folderId: string | null;
  ledger: Ledger;
  /** Ledger in export order */
  contacts: ContactRecord[];
  processed: number;
  pages: number;
  interrupted: boolean;
  error?: unknown;
  stats: AggregatorStats;
  attachments: AttachmentStats | null;
}

export class ContactExtractor {
  private readonly logger: Logger;

  constructor(private readonly options: ContactExtractorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Resolves the mailbox account; the first account returned is used */
  async resolveAccount(): Promise<string> {
    const result = await this.options.api.getAccounts();
    if (!result.ok) {
      throw new AccountLookupError(`Failed to get account information (${result.status ?? "no response"})`);
    }
    const account = result.value.find((a) => a.accountId != null && String(a.accountId) !== "");
    if (!account) throw new AccountLookupError("No mail accounts found for this user");

    const accountId = String(account.accountId);
    this.logger.info(`Account ID: ${accountId}${account.primaryEmailAddress ? ` (${account.primaryEmailAddress})` : ""}`);
    return accountId;
  }

  async run(runOptions: RunOptions = {}): Promise<ExtractionResult> {
    const { config, api } = this.options;
    const { signal } = runOptions;
    const progressFile = checkpointPath(config.outputDir);

    let accountId: string | null = null;
    let folderId: string | null = null;
    let aggregator: DeduplicationAggregator | null = null;
    let fetcher: AttachmentFetcher | null = null;
    let processed = 0;
    let pages = 0;
    let interrupted = false;
    let failure: unknown;

    this.logger.info("Starting email extraction process...");

    try {
      accountId = await this.resolveAccount();

      const pagination = new PaginationController(api, {
        accountId,
        pageSize: config.pagination.pageSize,
        maxMessages: config.pagination.maxMessages,
        pageDelayMs: config.pagination.pageDelayMs,
        sleep: this.options.sleep,
        logger: this.logger,
      });
      folderId = await pagination.resolveFolder();

      if (config.attachments.enabled) {
        fetcher = new AttachmentFetcher({
          api,
          accountId,
          folderId,
          dir: config.attachments.dir,
          maxBytes: config.attachments.maxBytes,
          allowedExtensions: config.attachments.allowedExtensions,
          disableAfter: config.attachments.disableAfter,
          logger: this.logger,
        });
      }
      aggregator = new DeduplicationAggregator({ api, accountId, folderId, attachments: fetcher, logger: this.logger });

      if (signal?.aborted) {
        interrupted = true;
      } else {
        for await (const page of pagination.pages()) {
          this.logger.debug(`Fetching batch starting at index ${page.cursor.start}...`);
          const merged = await aggregator.absorbPage(page.records);
          processed += page.received;
          pages++;

          this.logger.debug(`Batch complete: ${merged} valid emails found`);
          this.logger.debug(`Progress: ${processed} messages processed, ${aggregator.ledger.size} unique emails found`);
          this.options.onPage?.({
            page: pages,
            processed,
            uniqueContacts: aggregator.ledger.size,
            merged,
            total: page.cursor.totalKnown,
            maxMessages: config.pagination.maxMessages,
          });

          if (pages % config.pagination.checkpointEvery === 0) {
            await this.checkpoint(progressFile, aggregator.ledger, processed);
          }

          if (signal?.aborted) {
            interrupted = true;
            this.logger.info(`Extraction interrupted. Keeping ${aggregator.ledger.size} unique emails found so far`);
            break;
          }
        }
      }
    } catch (error) {
      failure = error;
      this.logger.error(`Extraction stopped: ${errorMessage(error)}`);
    } finally {
      await removeCheckpoint(progressFile).catch((error: unknown) => {
        this.logger.warn(`Could not remove progress file: ${errorMessage(error)}`);
      });
    }

    const ledger: Ledger = aggregator?.ledger ?? new Map();
    if (!failure) this.logger.info(`Extraction complete! Found ${ledger.size} unique email addresses`);

    return {
      accountId,
      folderId,
      ledger,
      contacts: sortContacts(ledger),
      processed,
      pages,
      interrupted,
      error: failure,
      stats: aggregator?.stats ?? { merged: 0, discarded: 0, detailFetches: 0 },
      attachments: fetcher ? { ...fetcher.stats } : null,
    };
  }

  private async checkpoint(path: string, ledger: Ledger, processed: number): Promise<void> {
    try {
      await saveCheckpoint(path, ledger, processed);
      this.logger.debug(`Progress saved (${processed} messages)`);
    } catch (error) {
      this.logger.error(`Error saving progress: ${errorMessage(error)}`);
    }
  }
}
