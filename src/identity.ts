import type { MessageSummary, Sighting } from "./types.js";

// ============================================
// Sender Identity
// ============================================
// Precedence for the sender of one message:
//   address  fromAddress (a "Name <addr>" header is split into both parts)
//   name     sender.name / sender string, then fromName, then the display
//            part of the header, then the title-cased local part
// Messages without a valid address are dropped.

export const PLACEHOLDER_NAME = "Unknown";

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email) && email.length < 254;
}

function text(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/** Splits `"Jane Doe" <jane@example.com>`; null when there are no brackets */
export function parseAddressHeader(raw: string): { name: string; email: string } | null {
  const match = raw.trim().match(/^(.*)<([^<>]+)>\s*$/);
  if (!match) return null;
  return {
    name: match[1].trim().replace(/^"|"$/g, "").trim(),
    email: match[2].trim().toLowerCase(),
  };
}

/** Capitalizes the first letter of every letter run, lower-cases the rest */
export function titleCase(value: string): string {
  return value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/** "jane.doe_smith@x.com" -> "Jane Doe Smith" */
export function deriveDisplayName(email: string): string {
  const local = email.split("@")[0] ?? "";
  return titleCase(local.replace(/[._]/g, " ").replace(/\s+/g, " ").trim());
}

function idText(value: unknown): string {
  return typeof value === "number" && Number.isFinite(value) ? String(value) : text(value);
}

function senderName(sender: MessageSummary["sender"]): string {
  if (typeof sender === "string") return sender.trim();
  if (typeof sender === "object" && sender !== null) return text(sender.name);
  return "";
}

/** Epoch ms from a number, a numeric string, or a date string */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const raw = text(value);
  if (!raw) return null;
  if (/^\d+$/.test(raw)) return Number(raw);
  const parsed = Date.parse(raw);
  return Number.isNaN(parsed) ? null : parsed;
}

function parseFlag(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  const raw = text(value).toLowerCase();
  return raw === "true" || raw === "1";
}

/**
 * Normalizes the sender of one message. Returns null when no valid address
 * can be recovered.
 */
export function resolveIdentity(message: MessageSummary): Sighting | null {
  const rawAddress = text(message.fromAddress);
  let email = rawAddress.toLowerCase();
  let name = senderName(message.sender) || text(message.fromName);

  const header = parseAddressHeader(rawAddress);
  if (header) {
    email = header.email;
    if (!name) name = header.name;
  }

  if (!email || !isValidEmail(email)) return null;
  if (!name) name = deriveDisplayName(email);

  return {
    email,
    name: name || PLACEHOLDER_NAME,
    subject: text(message.subject),
    receivedAt: parseTimestamp(message.receivedTime),
    messageId: idText(message.messageId) || idText(message.id) || undefined,
    hasAttachment: parseFlag(message.hasAttachment),
    attachments: [],
  };
}
