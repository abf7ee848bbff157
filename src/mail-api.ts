import type {
  ApiEnvelope,
  AttachmentInfo,
  MailAccount,
  MailFolder,
  MessageSummary,
  RawMessageRecord,
} from "./types.js";
import type { RequestOptions } from "./request-executor.js";
import { RequestError, isFatal } from "./errors.js";
import { Logger, silentLogger } from "./logger.js";

// ============================================
// Zoho Mail API Endpoints
// ============================================
// Docs: https://www.zoho.com/mail/help/api/
// The listing endpoints are not consistent about what they return (full
// summaries or bare ids), and the attachment sub-paths differ between API
// revisions, so several calls go through ordered candidate lists.

export interface Requester {
  execute(endpoint: string, options?: RequestOptions): Promise<Response>;
}

export type ApiResult<T> =
  | { ok: true; value: T; endpoint: string }
  | { ok: false; status?: number; endpoint: string; error?: RequestError };

export interface MessageListing {
  records: RawMessageRecord[];
  /** Entries on the page as returned, usable or not */
  received: number;
  total?: number;
}

export interface DownloadedFile {
  content: Buffer;
  endpoint: string;
}

export type DownloadResult =
  | { ok: true; file: DownloadedFile }
  | { ok: false; reason: "too_large"; size: number }
  | { ok: false; reason: "unreachable" };

async function readEnvelope<T>(response: Response): Promise<ApiEnvelope<T> | null> {
  try {
    const body: unknown = await response.json();
    return typeof body === "object" && body !== null ? (body as ApiEnvelope<T>) : null;
  } catch {
    return null;
  }
}

/** Page entries are either summary objects or bare message ids */
export function toRawRecord(entry: unknown): RawMessageRecord | null {
  if (typeof entry === "string" && entry.trim()) {
    return { kind: "reference", messageId: entry.trim() };
  }
  if (typeof entry === "number" && Number.isFinite(entry)) {
    return { kind: "reference", messageId: String(entry) };
  }
  if (typeof entry === "object" && entry !== null && !Array.isArray(entry)) {
    return { kind: "inline", message: entry as MessageSummary };
  }
  return null;
}

function attachmentList(data: unknown): AttachmentInfo[] {
  if (Array.isArray(data)) return data as AttachmentInfo[];
  // attachmentinfo wraps the list: { attachments: [...] }
  if (typeof data === "object" && data !== null && "attachments" in data && Array.isArray(data.attachments)) {
    return data.attachments as AttachmentInfo[];
  }
  return [];
}

export class MailApi {
  constructor(
    private readonly requester: Requester,
    private readonly logger: Logger = silentLogger
  ) {}

  async getAccounts(): Promise<ApiResult<MailAccount[]>> {
    return this.getData<MailAccount[]>("accounts", (data) => (Array.isArray(data) ? data : []));
  }

  async getFolders(accountId: string): Promise<ApiResult<MailFolder[]>> {
    return this.getData<MailFolder[]>(`accounts/${accountId}/folders`, (data) => (Array.isArray(data) ? data : []));
  }

  /** Folder-scoped listing (messages/view) */
  async listFolderMessages(
    accountId: string,
    folderId: string,
    start: number,
    limit: number
  ): Promise<ApiResult<MessageListing>> {
    return this.list(`accounts/${accountId}/messages/view`, { start, limit, folderId });
  }

  /** Unscoped listing across all folders (messages/search) */
  async searchMessages(accountId: string, start: number, limit: number): Promise<ApiResult<MessageListing>> {
    return this.list(`accounts/${accountId}/messages/search`, { start, limit });
  }

  async getMessage(accountId: string, messageId: string, folderId?: string | null): Promise<ApiResult<MessageSummary>> {
    const candidates = [`accounts/${accountId}/messages/${messageId}`];
    if (folderId) candidates.unshift(`accounts/${accountId}/folders/${folderId}/messages/${messageId}/details`);

    return this.firstSuccessful(candidates, async (response) => {
      const envelope = await readEnvelope<MessageSummary>(response);
      const data = envelope?.data;
      return typeof data === "object" && data !== null ? data : null;
    });
  }

  async getAttachments(accountId: string, messageId: string, folderId?: string | null): Promise<ApiResult<AttachmentInfo[]>> {
    const candidates = [
      `accounts/${accountId}/messages/${messageId}/attachments`,
      `accounts/${accountId}/messages/${messageId}/attachment`,
      `accounts/${accountId}/folders/*/messages/${messageId}/attachments`,
    ];
    if (folderId) candidates.unshift(`accounts/${accountId}/folders/${folderId}/messages/${messageId}/attachmentinfo`);

    return this.firstSuccessful(candidates, async (response) => {
      const envelope = await readEnvelope<unknown>(response);
      return envelope ? attachmentList(envelope.data) : null;
    });
  }

  async downloadAttachment(
    accountId: string,
    messageId: string,
    attachmentId: string,
    maxBytes: number,
    folderId?: string | null
  ): Promise<DownloadResult> {
    const candidates = [
      `accounts/${accountId}/messages/${messageId}/attachments/${attachmentId}`,
      `accounts/${accountId}/messages/${messageId}/attachment/${attachmentId}`,
      `accounts/${accountId}/messages/${messageId}/attachments/${attachmentId}/content`,
    ];
    if (folderId) candidates.unshift(`accounts/${accountId}/folders/${folderId}/messages/${messageId}/attachments/${attachmentId}`);

    const result = await this.firstSuccessful<Buffer | { tooLarge: number }>(candidates, async (response) => {
      const declared = Number(response.headers.get("content-length"));
      if (response.headers.has("content-length") && declared > maxBytes) {
        await response.body?.cancel();
        return { tooLarge: declared };
      }
      const content = Buffer.from(await response.arrayBuffer());
      return content.length > maxBytes ? { tooLarge: content.length } : content;
    });

    if (!result.ok) return { ok: false, reason: "unreachable" };
    if (Buffer.isBuffer(result.value)) {
      return { ok: true, file: { content: result.value, endpoint: result.endpoint } };
    }
    return { ok: false, reason: "too_large", size: result.value.tooLarge };
  }

  private async list(endpoint: string, params: Record<string, string | number>): Promise<ApiResult<MessageListing>> {
    const response = await this.requester.execute(endpoint, { params });
    if (response.status !== 200) {
      await this.logFailure(endpoint, response);
      return { ok: false, status: response.status, endpoint };
    }

    const envelope = await readEnvelope<unknown>(response);
    const data = envelope?.data;
    const entries: unknown[] = Array.isArray(data) ? data : [];
    const records: RawMessageRecord[] = [];
    for (const entry of entries) {
      const record = toRawRecord(entry);
      if (record) {
        records.push(record);
      } else {
        this.logger.debug(`Skipping unexpected page entry: ${JSON.stringify(entry)}`);
      }
    }

    const total = Number(envelope?.total);
    return {
      ok: true,
      endpoint,
      value: { records, received: entries.length, total: Number.isFinite(total) && total > 0 ? total : undefined },
    };
  }

  private async getData<T>(endpoint: string, pick: (data: unknown) => T): Promise<ApiResult<T>> {
    const response = await this.requester.execute(endpoint);
    if (response.status !== 200) {
      await this.logFailure(endpoint, response);
      return { ok: false, status: response.status, endpoint };
    }
    const envelope = await readEnvelope<unknown>(response);
    return { ok: true, endpoint, value: pick(envelope?.data) };
  }

  /**
   * Tries each endpoint in order; the first 200 response that `read` accepts
   * wins. Transient RequestErrors from one candidate do not stop the next.
   */
  private async firstSuccessful<T>(
    endpoints: string[],
    read: (response: Response) => Promise<T | null>
  ): Promise<ApiResult<T>> {
    let last: ApiResult<T> = { ok: false, endpoint: endpoints[0] };

    for (const endpoint of endpoints) {
      try {
        const response = await this.requester.execute(endpoint);
        if (response.status === 200) {
          const value = await read(response);
          if (value !== null) return { ok: true, value, endpoint };
          last = { ok: false, status: 200, endpoint };
        } else {
          await response.body?.cancel();
          this.logger.debug(`  ${endpoint}: ${response.status}`);
          last = { ok: false, status: response.status, endpoint };
        }
      } catch (error) {
        if (!(error instanceof RequestError) || isFatal(error)) throw error;
        this.logger.debug(`  ${endpoint}: ${error.message}`);
        last = { ok: false, endpoint, error };
      }
    }

    return last;
  }

  private async logFailure(endpoint: string, response: Response): Promise<void> {
    const text = await response.text().catch((error: unknown) => `<unreadable body: ${error}>`);
    this.logger.warn(`API ${endpoint} returned ${response.status}${text ? `: ${text.slice(0, 200)}` : ""}`);
  }
}
