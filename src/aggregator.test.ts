import { describe, test, expect, vi } from "vitest";
import type { MessageSummary, RawMessageRecord, Sighting } from "./types.js";
import {
  DeduplicationAggregator,
  createLedger,
  mergeSighting,
  sortContacts,
  type AttachmentCollector,
} from "./aggregator.js";
import { MailApi } from "./mail-api.js";
import { RequestError } from "./errors.js";
import { StubRequester, jsonResponse } from "./test-helpers.js";

function sighting(fields: Partial<Sighting> & { email: string }): Sighting {
  return {
    name: "Someone",
    subject: "",
    receivedAt: null,
    hasAttachment: false,
    attachments: [],
    ...fields,
  };
}

function inline(fields: MessageSummary): RawMessageRecord {
  return { kind: "inline", message: fields };
}

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest])
  );
}

function aggregator(handler: (endpoint: string) => Response = () => jsonResponse({ data: {} }), attachments?: AttachmentCollector) {
  const requester = new StubRequester(handler);
  const agg = new DeduplicationAggregator({ api: new MailApi(requester), accountId: "7", folderId: "9", attachments });
  return { agg, requester };
}

describe("Contact Ledger", () => {
  describe("mergeSighting", () => {
    test("creates a record for a new sender", () => {
      const ledger = mergeSighting(createLedger(), sighting({ email: "a@example.com", name: "Ann", subject: "Hello", receivedAt: 5 }));

      expect(ledger.get("a@example.com")).toEqual({
        email: "a@example.com",
        name: "Ann",
        messageCount: 1,
        firstSeen: 5,
        lastSeen: 5,
        subject: "Hello",
        hasAttachment: false,
        attachments: [],
      });
    });

    test("keeps bounds regardless of arrival order", () => {
      const times = [3000, 1000, 2000];
      for (const order of permutations(times)) {
        const ledger = createLedger();
        for (const t of order) mergeSighting(ledger, sighting({ email: "a@example.com", receivedAt: t }));

        const record = ledger.get("a@example.com");
        expect(record?.messageCount).toBe(3);
        expect(record?.firstSeen).toBe(1000);
        expect(record?.lastSeen).toBe(3000);
      }
    });

    test("unknown receive times never replace known ones", () => {
      const ledger = createLedger();
      mergeSighting(ledger, sighting({ email: "a@example.com", receivedAt: null }));
      mergeSighting(ledger, sighting({ email: "a@example.com", receivedAt: 40 }));
      mergeSighting(ledger, sighting({ email: "a@example.com", receivedAt: null }));

      expect(ledger.get("a@example.com")).toMatchObject({ messageCount: 3, firstSeen: 40, lastSeen: 40 });
    });

    test("only a strictly longer name replaces the stored one", () => {
      const ledger = createLedger();
      mergeSighting(ledger, sighting({ email: "a@example.com", name: "Ann" }));
      mergeSighting(ledger, sighting({ email: "a@example.com", name: "Bob" }));
      expect(ledger.get("a@example.com")?.name).toBe("Ann");

      mergeSighting(ledger, sighting({ email: "a@example.com", name: "Ann Smith" }));
      mergeSighting(ledger, sighting({ email: "a@example.com", name: "A" }));
      expect(ledger.get("a@example.com")?.name).toBe("Ann Smith");
    });

    test("a placeholder name gives way only to a longer real name", () => {
      const ledger = createLedger();
      mergeSighting(ledger, sighting({ email: "a@example.com", name: "Unknown" }));
      mergeSighting(ledger, sighting({ email: "a@example.com", name: "Al" }));
      expect(ledger.get("a@example.com")?.name).toBe("Unknown");

      mergeSighting(ledger, sighting({ email: "a@example.com", name: "Alberta" }));
      expect(ledger.get("a@example.com")?.name).toBe("Unknown");

      mergeSighting(ledger, sighting({ email: "a@example.com", name: "Al Jenkins" }));
      expect(ledger.get("a@example.com")?.name).toBe("Al Jenkins");
    });

    test("a placeholder never replaces a real name", () => {
      const ledger = createLedger();
      mergeSighting(ledger, sighting({ email: "a@example.com", name: "Al" }));
      mergeSighting(ledger, sighting({ email: "a@example.com", name: "Unknown" }));
      expect(ledger.get("a@example.com")?.name).toBe("Al");
    });

    test("only a strictly longer subject replaces the stored one", () => {
      const ledger = createLedger();
      mergeSighting(ledger, sighting({ email: "a@example.com", subject: "Invoice" }));
      mergeSighting(ledger, sighting({ email: "a@example.com", subject: "" }));
      mergeSighting(ledger, sighting({ email: "a@example.com", subject: "Receipt" }));
      expect(ledger.get("a@example.com")?.subject).toBe("Invoice");

      mergeSighting(ledger, sighting({ email: "a@example.com", subject: "Invoice #42" }));
      expect(ledger.get("a@example.com")?.subject).toBe("Invoice #42");
    });

    test("accumulates attachment state", () => {
      const ledger = createLedger();
      const file = { filename: "a.pdf", path: "/tmp/a.pdf", size: 3 };
      mergeSighting(ledger, sighting({ email: "a@example.com", hasAttachment: true, attachments: [file] }));
      mergeSighting(ledger, sighting({ email: "a@example.com", hasAttachment: false }));

      expect(ledger.get("a@example.com")).toMatchObject({ hasAttachment: true, attachments: [file] });
    });
  });

  describe("sortContacts", () => {
    test("orders by message count, then email", () => {
      const ledger = createLedger();
      for (const email of ["c@example.com", "b@example.com", "b@example.com", "a@example.com"]) {
        mergeSighting(ledger, sighting({ email }));
      }

      expect(sortContacts(ledger).map((c) => c.email)).toEqual(["b@example.com", "a@example.com", "c@example.com"]);
    });
  });

  describe("DeduplicationAggregator", () => {
    test("merges two sightings of the same sender", async () => {
      const { agg } = aggregator();

      await agg.absorbPage([
        inline({ fromAddress: "Jane.Doe@Example.com", subject: "Hi", receivedTime: 1000, hasAttachment: false }),
        inline({ fromAddress: "jane.doe@example.com", subject: "Hi there", receivedTime: 2000 }),
      ]);

      expect([...agg.ledger.values()]).toEqual([
        {
          email: "jane.doe@example.com",
          name: "Jane Doe",
          messageCount: 2,
          firstSeen: 1000,
          lastSeen: 2000,
          subject: "Hi there",
          hasAttachment: false,
          attachments: [],
        },
      ]);
    });

    test("discards records without a valid address", async () => {
      const { agg } = aggregator();

      const merged = await agg.absorbPage([inline({ fromAddress: "not-an-email" }), inline({ fromAddress: "ok@example.com" })]);

      expect(merged).toBe(1);
      expect(agg.ledger.has("not-an-email")).toBe(false);
      expect(agg.ledger.size).toBe(1);
      expect(agg.stats).toEqual({ merged: 1, discarded: 1, detailFetches: 0 });
    });

    test("resolves references through the detail endpoint", async () => {
      const { agg, requester } = aggregator((endpoint) =>
        endpoint.endsWith("/details") ? jsonResponse({ data: { fromAddress: "ref@example.com", receivedTime: "77" } }) : jsonResponse({})
      );

      expect(await agg.absorb({ kind: "reference", messageId: "m-1" })).toBe("merged");

      expect(requester.endpoints()).toEqual(["accounts/7/folders/9/messages/m-1/details"]);
      expect(agg.ledger.get("ref@example.com")?.firstSeen).toBe(77);
      expect(agg.stats.detailFetches).toBe(1);
    });

    test("discards a reference whose details cannot be fetched", async () => {
      const { agg, requester } = aggregator(() => new Response("", { status: 404 }));

      expect(await agg.absorb({ kind: "reference", messageId: "m-1" })).toBe("discarded");
      expect(requester.calls).toHaveLength(2);
    });

    test("skips a record whose processing fails", async () => {
      const { agg } = aggregator(() => {
        throw new RangeError("bad payload");
      });

      expect(await agg.absorb({ kind: "reference", messageId: "m-1" })).toBe("discarded");
      expect(agg.stats.discarded).toBe(1);
    });

    test("rethrows authorization failures", async () => {
      const { agg } = aggregator((endpoint) => {
        throw new RequestError("unauthorized", endpoint, "Request still unauthorized after token refresh", { status: 401 });
      });

      await expect(agg.absorb({ kind: "reference", messageId: "m-1" })).rejects.toThrow("still unauthorized");
    });

    test("collects attachments for flagged messages", async () => {
      const file = { filename: "report.pdf", path: "/tmp/report.pdf", size: 10 };
      const collector = { enabled: true, collect: vi.fn(async () => [file]) };
      const { agg } = aggregator(undefined, collector);

      await agg.absorbPage([
        inline({ fromAddress: "a@example.com", hasAttachment: true, messageId: "m-1" }),
        inline({ fromAddress: "a@example.com", hasAttachment: false, messageId: "m-2" }),
        inline({ fromAddress: "a@example.com", hasAttachment: true }),
      ]);

      expect(collector.collect).toHaveBeenCalledTimes(1);
      expect(collector.collect).toHaveBeenCalledWith("m-1", "a@example.com");
      expect(agg.ledger.get("a@example.com")?.attachments).toEqual([file]);
    });

    test("does not call a disabled collector", async () => {
      const collector = { enabled: false, collect: vi.fn(async () => []) };
      const { agg } = aggregator(undefined, collector);

      await agg.absorb(inline({ fromAddress: "a@example.com", hasAttachment: true, messageId: "m-1" }));

      expect(collector.collect).not.toHaveBeenCalled();
      expect(agg.ledger.get("a@example.com")?.hasAttachment).toBe(true);
    });

    test("keeps the sender when attachment collection fails", async () => {
      const collector = {
        enabled: true,
        collect: vi.fn(async (): Promise<never> => {
          throw new Error("disk full");
        }),
      };
      const { agg } = aggregator(undefined, collector);

      expect(await agg.absorb(inline({ fromAddress: "a@example.com", hasAttachment: true, messageId: "m-1" }))).toBe("merged");
      expect(agg.ledger.get("a@example.com")?.attachments).toEqual([]);
    });
  });
});
