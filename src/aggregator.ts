import type { ContactRecord, Ledger, MessageSummary, RawMessageRecord, Sighting, StoredAttachment } from "./types.js";
import type { MailApi } from "./mail-api.js";
import { errorMessage, isFatal } from "./errors.js";
import { PLACEHOLDER_NAME, resolveIdentity } from "./identity.js";
import { Logger, silentLogger } from "./logger.js";

// ============================================
// Contact Ledger
// ============================================
// One ContactRecord per normalized email. Merge rules for a known sender:
//   name      replaced by a non-placeholder name that is strictly longer
//   subject   replaced by a non-empty subject that is strictly longer
//   firstSeen minimum, lastSeen maximum; unknown times never win
// Insertion order carries no meaning; sortContacts() orders for export.

export function createLedger(): Ledger {
  return new Map();
}

function earliest(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}

function latest(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

function preferName(current: string, incoming: string): string {
  if (!incoming || incoming === PLACEHOLDER_NAME) return current;
  return incoming.length > current.length ? incoming : current;
}

export function mergeSighting(ledger: Ledger, sighting: Sighting): Ledger {
  const existing = ledger.get(sighting.email);

  if (!existing) {
    ledger.set(sighting.email, {
      email: sighting.email,
      name: sighting.name,
      messageCount: 1,
      firstSeen: sighting.receivedAt,
      lastSeen: sighting.receivedAt,
      subject: sighting.subject,
      hasAttachment: sighting.hasAttachment,
      attachments: [...sighting.attachments],
    });
    return ledger;
  }

  existing.name = preferName(existing.name, sighting.name);
  if (sighting.subject && sighting.subject.length > existing.subject.length) {
    existing.subject = sighting.subject;
  }
  existing.messageCount++;
  existing.firstSeen = earliest(existing.firstSeen, sighting.receivedAt);
  existing.lastSeen = latest(existing.lastSeen, sighting.receivedAt);
  existing.hasAttachment = existing.hasAttachment || sighting.hasAttachment;
  existing.attachments.push(...sighting.attachments);
  return ledger;
}

/** Contacts by descending message count, ties by email */
export function sortContacts(ledger: Ledger): ContactRecord[] {
  return [...ledger.values()].sort(
    (a, b) => b.messageCount - a.messageCount || a.email.localeCompare(b.email)
  );
}

/** Implemented by AttachmentFetcher */
export interface AttachmentCollector {
  readonly enabled: boolean;
  collect(messageId: string, senderEmail: string): Promise<StoredAttachment[]>;
}

export interface AggregatorOptions {
  api: MailApi;
  accountId: string;
  folderId?: string | null;
  attachments?: AttachmentCollector | null;
  logger?: Logger;
}

export interface AggregatorStats {
  merged: number;
  discarded: number;
  detailFetches: number;
}

export type AbsorbOutcome = "merged" | "discarded";

export class DeduplicationAggregator {
  readonly ledger: Ledger = createLedger();
  readonly stats: AggregatorStats = { merged: 0, discarded: 0, detailFetches: 0 };

  private readonly logger: Logger;

  constructor(private readonly options: AggregatorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolves, enriches and merges one page entry. Per-record failures are
   * logged and the record is discarded; authorization failures end the run.
   */
  async absorb(record: RawMessageRecord): Promise<AbsorbOutcome> {
    try {
      const message = await this.materialize(record);
      const sighting = message ? resolveIdentity(message) : null;
      if (!sighting) {
        this.stats.discarded++;
        return "discarded";
      }

      const fetcher = this.options.attachments;
      if (sighting.hasAttachment && sighting.messageId && fetcher?.enabled) {
        sighting.attachments = await this.collectAttachments(fetcher, sighting.messageId, sighting.email);
      }

      mergeSighting(this.ledger, sighting);
      this.stats.merged++;
      return "merged";
    } catch (error) {
      if (isFatal(error)) throw error;
      this.logger.warn(`Skipping message: ${errorMessage(error)}`);
      this.stats.discarded++;
      return "discarded";
    }
  }

  async absorbPage(records: RawMessageRecord[]): Promise<number> {
    let merged = 0;
    for (const record of records) {
      if ((await this.absorb(record)) === "merged") merged++;
    }
    return merged;
  }

  private async collectAttachments(
    fetcher: AttachmentCollector,
    messageId: string,
    email: string
  ): Promise<StoredAttachment[]> {
    try {
      return await fetcher.collect(messageId, email);
    } catch (error) {
      if (isFatal(error)) throw error;
      this.logger.warn(`Attachments of ${messageId} skipped: ${errorMessage(error)}`);
      return [];
    }
  }

  private async materialize(record: RawMessageRecord): Promise<MessageSummary | null> {
    if (record.kind === "inline") return record.message;

    this.stats.detailFetches++;
    const { api, accountId, folderId } = this.options;
    const detail = await api.getMessage(accountId, record.messageId, folderId);
    if (!detail.ok) {
      this.logger.debug(`No details for message ${record.messageId}`);
      return null;
    }
    // The detail payload does not always repeat the id
    return { messageId: record.messageId, ...detail.value };
  }
}
