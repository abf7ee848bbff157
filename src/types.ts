// ============================================
// Types
// ============================================

/** OAuth2 credential as persisted by the token store */
export interface Credential {
  accessToken: string;
  refreshToken?: string;
  /** Epoch ms, already shortened by the expiry safety margin */
  expiresAt: number;
}

// Zoho Mail API shapes. Fields are optional because the listing and
// detail endpoints do not agree on which ones they return.

export interface ApiEnvelope<T> {
  data?: T;
  total?: number;
  status?: { code?: number; description?: string };
}

export interface MailAccount {
  accountId: string;
  displayName?: string;
  primaryEmailAddress?: string;
}

export interface MailFolder {
  folderId: string;
  folderName?: string;
  systemFolder?: boolean;
}

export interface MessageSummary {
  messageId?: string;
  id?: string;
  fromAddress?: string;
  /** Either { name } or a bare display name, depending on the endpoint */
  sender?: { name?: string } | string;
  fromName?: string;
  subject?: string;
  /** Epoch ms, sent as a string by most endpoints */
  receivedTime?: string | number;
  hasAttachment?: boolean | string;
}

export interface AttachmentInfo {
  attachmentId?: string;
  attachmentName?: string;
  size?: number | string;
}

/**
 * One entry of a listing page: either the message summary itself or a bare
 * message id that needs a detail fetch before it can be merged.
 */
export type RawMessageRecord =
  | { kind: "inline"; message: MessageSummary }
  | { kind: "reference"; messageId: string };

export interface StoredAttachment {
  filename: string;
  path: string;
  size: number;
}

/** Normalized sender of a single message, ready to merge */
export interface Sighting {
  email: string;
  name: string;
  subject: string;
  /** Epoch ms, null when the API gave no usable receive time */
  receivedAt: number | null;
  messageId?: string;
  hasAttachment: boolean;
  attachments: StoredAttachment[];
}

export interface ContactRecord {
  email: string;
  name: string;
  messageCount: number;
  firstSeen: number | null;
  lastSeen: number | null;
  subject: string;
  hasAttachment: boolean;
  attachments: StoredAttachment[];
}

/** Identity -> contact, unordered while accumulating */
export type Ledger = Map<string, ContactRecord>;

export interface PaginationCursor {
  start: number;
  pageSize: number;
  totalKnown?: number;
}

export interface Page {
  cursor: PaginationCursor;
  records: RawMessageRecord[];
  /** Entries the API returned, including ones that could not be used */
  received: number;
  endpoint: "folder" | "search";
}
