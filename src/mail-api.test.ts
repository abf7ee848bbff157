import { describe, test, expect } from "vitest";
import { MailApi, toRawRecord } from "./mail-api.js";
import { RequestError } from "./errors.js";
import { StubRequester, jsonResponse } from "./test-helpers.js";

function notFound(): Response {
  return new Response("not found", { status: 404 });
}

function exhausted(endpoint: string): RequestError {
  return new RequestError("exhausted", endpoint, `GET ${endpoint} failed`, { lastKind: "server_error", status: 500 });
}

describe("MailApi", () => {
  describe("toRawRecord", () => {
    test("tags summaries and bare ids", () => {
      expect(toRawRecord({ fromAddress: "a@b.co" })).toEqual({ kind: "inline", message: { fromAddress: "a@b.co" } });
      expect(toRawRecord(" 42 ")).toEqual({ kind: "reference", messageId: "42" });
      expect(toRawRecord(1711)).toEqual({ kind: "reference", messageId: "1711" });
    });

    test("rejects anything else", () => {
      expect(toRawRecord(null)).toBeNull();
      expect(toRawRecord("")).toBeNull();
      expect(toRawRecord([1, 2])).toBeNull();
      expect(toRawRecord(Number.NaN)).toBeNull();
    });
  });

  describe("accounts and folders", () => {
    test("unwraps the data envelope", async () => {
      const requester = new StubRequester(() => jsonResponse({ data: [{ accountId: "7" }] }));
      const api = new MailApi(requester);

      const result = await api.getAccounts();

      expect(result).toEqual({ ok: true, endpoint: "accounts", value: [{ accountId: "7" }] });
    });

    test("reports a non-200 status", async () => {
      const requester = new StubRequester(() => new Response("forbidden", { status: 403 }));
      const api = new MailApi(requester);

      expect(await api.getFolders("7")).toEqual({ ok: false, status: 403, endpoint: "accounts/7/folders" });
    });

    test("treats a missing data array as no folders", async () => {
      const api = new MailApi(new StubRequester(() => jsonResponse({ status: { code: 200 } })));
      expect(await api.getFolders("7")).toEqual({ ok: true, endpoint: "accounts/7/folders", value: [] });
    });
  });

  describe("listing", () => {
    test("requests the folder view with paging params", async () => {
      const requester = new StubRequester(() => jsonResponse({ data: [] }));
      const api = new MailApi(requester);

      await api.listFolderMessages("7", "9", 100, 50);

      expect(requester.calls).toEqual([
        { endpoint: "accounts/7/messages/view", options: { params: { start: 100, limit: 50, folderId: "9" } } },
      ]);
    });

    test("maps page entries and skips unusable ones", async () => {
      const requester = new StubRequester(() =>
        jsonResponse({ data: [{ fromAddress: "a@b.co" }, "123", 456, null, [1]], total: 120 })
      );
      const api = new MailApi(requester);

      const result = await api.searchMessages("7", 0, 50);

      expect(result).toEqual({
        ok: true,
        endpoint: "accounts/7/messages/search",
        value: {
          total: 120,
          received: 5,
          records: [
            { kind: "inline", message: { fromAddress: "a@b.co" } },
            { kind: "reference", messageId: "123" },
            { kind: "reference", messageId: "456" },
          ],
        },
      });
      expect(requester.calls[0].options).toEqual({ params: { start: 0, limit: 50 } });
    });

    test("ignores a zero total", async () => {
      const api = new MailApi(new StubRequester(() => jsonResponse({ data: [], total: 0 })));
      const result = await api.searchMessages("7", 0, 50);
      expect(result.ok && result.value.total).toBeUndefined();
    });
  });

  describe("candidate endpoints", () => {
    test("getMessage tries the folder detail path first", async () => {
      const requester = new StubRequester((endpoint) =>
        endpoint.endsWith("/details") ? notFound() : jsonResponse({ data: { fromAddress: "a@b.co" } })
      );
      const api = new MailApi(requester);

      const result = await api.getMessage("7", "5", "9");

      expect(requester.endpoints()).toEqual(["accounts/7/folders/9/messages/5/details", "accounts/7/messages/5"]);
      expect(result).toEqual({ ok: true, endpoint: "accounts/7/messages/5", value: { fromAddress: "a@b.co" } });
    });

    test("getMessage without folder goes straight to the message path", async () => {
      const requester = new StubRequester(() => jsonResponse({ data: { subject: "Hi" } }));
      await new MailApi(requester).getMessage("7", "5");
      expect(requester.endpoints()).toEqual(["accounts/7/messages/5"]);
    });

    test("getAttachments unwraps attachmentinfo and stops at the first success", async () => {
      const requester = new StubRequester(() =>
        jsonResponse({ data: { attachments: [{ attachmentId: "a1", attachmentName: "report.pdf", size: 10 }] } })
      );
      const api = new MailApi(requester);

      const result = await api.getAttachments("7", "5", "9");

      expect(result).toEqual({
        ok: true,
        endpoint: "accounts/7/folders/9/messages/5/attachmentinfo",
        value: [{ attachmentId: "a1", attachmentName: "report.pdf", size: 10 }],
      });
      expect(requester.calls).toHaveLength(1);
    });

    test("moves past a RequestError to the next candidate", async () => {
      const requester = new StubRequester((endpoint) => {
        if (endpoint.endsWith("/attachments")) throw exhausted(endpoint);
        return jsonResponse({ data: [{ attachmentId: "a1" }] });
      });
      const api = new MailApi(requester);

      const result = await api.getAttachments("7", "5");

      expect(requester.endpoints()).toEqual(["accounts/7/messages/5/attachments", "accounts/7/messages/5/attachment"]);
      expect(result.ok).toBe(true);
    });

    test("reports failure when every candidate fails", async () => {
      const requester = new StubRequester(() => notFound());
      const result = await new MailApi(requester).getAttachments("7", "5");

      expect(requester.calls).toHaveLength(3);
      expect(result).toEqual({ ok: false, status: 404, endpoint: "accounts/7/folders/*/messages/5/attachments" });
    });

    test("propagates errors that are not request failures", async () => {
      const requester = new StubRequester(() => {
        throw new RangeError("boom");
      });
      await expect(new MailApi(requester).getAttachments("7", "5")).rejects.toThrow(RangeError);
    });
  });

  describe("downloadAttachment", () => {
    test("returns the content from the first reachable path", async () => {
      const requester = new StubRequester((endpoint) =>
        endpoint.startsWith("accounts/7/folders/") ? notFound() : new Response("file-bytes")
      );

      const result = await new MailApi(requester).downloadAttachment("7", "5", "a1", 100, "9");

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.file.content.toString()).toBe("file-bytes");
        expect(result.file.endpoint).toBe("accounts/7/messages/5/attachments/a1");
      }
    });

    test("rejects a declared size above the limit without reading it", async () => {
      const requester = new StubRequester(() => new Response("x", { headers: { "content-length": "5000" } }));

      const result = await new MailApi(requester).downloadAttachment("7", "5", "a1", 100);

      expect(result).toEqual({ ok: false, reason: "too_large", size: 5000 });
      expect(requester.calls).toHaveLength(1);
    });

    test("rejects content above the limit", async () => {
      const requester = new StubRequester(() => new Response("0123456789"));
      const result = await new MailApi(requester).downloadAttachment("7", "5", "a1", 4);
      expect(result).toEqual({ ok: false, reason: "too_large", size: 10 });
    });

    test("is unreachable when no path answers", async () => {
      const requester = new StubRequester(() => notFound());
      const result = await new MailApi(requester).downloadAttachment("7", "5", "a1", 100);
      expect(result).toEqual({ ok: false, reason: "unreachable" });
      expect(requester.calls).toHaveLength(3);
    });
  });
});
