import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { access } from "fs/promises";
import { join } from "path";
import type { ExtractorConfig } from "./config.js";
import type { RequestOptions } from "./request-executor.js";
import type { MessageSummary } from "./types.js";
import { MailApi } from "./mail-api.js";
import { AccountLookupError, ContactExtractor, type PageProgress } from "./extractor.js";
import { RequestError } from "./errors.js";
import { StubRequester, cleanupTempDir, createTempDir, jsonResponse, testConfig } from "./test-helpers.js";

type Override = (endpoint: string, start: number) => Response | null;

function mailbox(pages: Record<number, MessageSummary[]>, override: Override = () => null) {
  return (endpoint: string, options?: RequestOptions): Response => {
    const start = Number(options?.params?.start ?? 0);
    const custom = override(endpoint, start);
    if (custom) return custom;
    if (endpoint === "accounts") return jsonResponse({ data: [{ accountId: "7", primaryEmailAddress: "me@example.com" }] });
    if (endpoint === "accounts/7/folders") return jsonResponse({ data: [{ folderId: "9", folderName: "Inbox" }] });
    if (endpoint === "accounts/7/messages/view") return jsonResponse({ data: pages[start] ?? [] });
    return new Response("", { status: 404 });
  };
}

const PAGES: Record<number, MessageSummary[]> = {
  0: [{ fromAddress: "a@example.com", receivedTime: 1 }, { fromAddress: "b@example.com" }],
  2: [{ fromAddress: "a@example.com", receivedTime: 5 }],
};

describe("ContactExtractor", () => {
  let dir: string;
  let config: ExtractorConfig;

  beforeEach(async () => {
    dir = await createTempDir();
    const base = testConfig(dir);
    config = {
      ...base,
      pagination: { ...base.pagination, pageSize: 2, checkpointEvery: 1 },
      attachments: { ...base.attachments, enabled: false },
    };
  });

  afterEach(async () => {
    await cleanupTempDir(dir);
  });

  function extractor(handler: (endpoint: string, options?: RequestOptions) => Response, onPage?: (p: PageProgress) => void) {
    const requester = new StubRequester(handler);
    return new ContactExtractor({ config, api: new MailApi(requester), onPage });
  }

  test("builds the ledger across pages", async () => {
    const progress: PageProgress[] = [];

    const result = await extractor(mailbox(PAGES), (p) => progress.push(p)).run();

    expect(result.error).toBeUndefined();
    expect(result).toMatchObject({ accountId: "7", folderId: "9", processed: 3, pages: 2, interrupted: false, attachments: null });
    expect(result.contacts.map((c) => [c.email, c.messageCount, c.firstSeen, c.lastSeen])).toEqual([
      ["a@example.com", 2, 1, 5],
      ["b@example.com", 1, null, null],
    ]);
    expect(result.stats).toEqual({ merged: 3, discarded: 0, detailFetches: 0 });
    expect(progress).toEqual([
      { page: 1, processed: 2, uniqueContacts: 2, merged: 2, total: undefined, maxMessages: 5000 },
      { page: 2, processed: 3, uniqueContacts: 2, merged: 1, total: undefined, maxMessages: 5000 },
    ]);
  });

  test("removes the progress file when done", async () => {
    await extractor(mailbox(PAGES)).run();

    await expect(access(join(dir, "extraction_progress.json"))).rejects.toThrow();
  });

  test("does not page when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await extractor(mailbox(PAGES)).run({ signal: controller.signal });

    expect(result).toMatchObject({ interrupted: true, pages: 0, processed: 0 });
    expect(result.contacts).toEqual([]);
  });

  test("keeps what it has when interrupted after a page", async () => {
    const controller = new AbortController();

    const result = await extractor(mailbox(PAGES), () => controller.abort()).run({ signal: controller.signal });

    expect(result).toMatchObject({ interrupted: true, pages: 1, processed: 2 });
    expect(result.contacts.map((c) => c.email)).toEqual(["a@example.com", "b@example.com"]);
  });

  test("reports a failed account lookup", async () => {
    const result = await extractor(
      mailbox(PAGES, (endpoint) => (endpoint === "accounts" ? new Response("", { status: 500 }) : null))
    ).run();

    expect(result.error).toBeInstanceOf(AccountLookupError);
    expect(result.error).toHaveProperty("message", "Failed to get account information (500)");
    expect(result.accountId).toBeNull();
    expect(result.contacts).toEqual([]);
  });

  test("reports a mailbox without accounts", async () => {
    const result = await extractor(
      mailbox(PAGES, (endpoint) => (endpoint === "accounts" ? jsonResponse({ data: [] }) : null))
    ).run();

    expect(result.error).toHaveProperty("message", "No mail accounts found for this user");
  });

  test("stops on an authorization failure and keeps earlier pages", async () => {
    const result = await extractor(
      mailbox(PAGES, (endpoint, start) => {
        if (endpoint.endsWith("/view") && start === 2) {
          throw new RequestError("unauthorized", endpoint, "Request still unauthorized after token refresh", { status: 401 });
        }
        return null;
      })
    ).run();

    expect(result.error).toBeInstanceOf(RequestError);
    expect(result.pages).toBe(1);
    expect(result.ledger.size).toBe(2);
  });

  test("downloads attachments when enabled", async () => {
    config = { ...config, attachments: { ...config.attachments, enabled: true } };
    const pages = { 0: [{ fromAddress: "a@example.com", hasAttachment: true, messageId: "m1" }] };

    const result = await extractor(
      mailbox(pages, (endpoint) => {
        if (endpoint === "accounts/7/folders/9/messages/m1/attachmentinfo") {
          return jsonResponse({ data: { attachments: [{ attachmentId: "a1", attachmentName: "r.pdf", size: 3 }] } });
        }
        if (endpoint === "accounts/7/folders/9/messages/m1/attachments/a1") return new Response("abc");
        return null;
      })
    ).run();

    expect(result.attachments).toEqual({ downloaded: 1, reused: 0, skipped: 0, failed: 0 });
    expect(result.contacts[0].attachments).toEqual([
      { filename: "r.pdf", path: join(dir, "attachments", "a_at_example_com", "r.pdf"), size: 3 },
    ]);
  });
});
