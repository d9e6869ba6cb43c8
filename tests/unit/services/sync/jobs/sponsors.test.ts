import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { sponsorsJob } from "../../../../../src/services/sync/jobs/sponsors.js";
import { createTestConfig } from "../../../../helpers/config.js";
import { createFakeSource, json, runJob } from "../../../../helpers/source.js";
import {
  createTestStore,
  seedBill,
  seedLegislator,
} from "../../../../helpers/store.js";

import type { Database } from "../../../../../src/db/types.js";
import type { Kysely } from "kysely";

const NOW = new Date("2026-05-10T12:00:00.000Z");
const OLD = "2026-01-01T00:00:00.000Z";
const RECENT = "2026-05-09T00:00:00.000Z";

const DOCUMENTS: Record<string, unknown> = {
  "/v3/bill/119/hr/1": {
    bill: {
      congress: 119,
      type: "HR",
      number: "1",
      title: "First Act",
      introducedDate: "2026-01-03",
      sponsors: [{ bioguideId: "A000001", fullName: "Rep. Doe" }],
      summaries: {
        count: 1,
        url: "https://api.test/v3/bill/119/hr/1/summaries?format=json",
      },
    },
  },
  "/v3/bill/119/hr/1/summaries": {
    summaries: [
      { text: "<p>Draft summary</p>", updateDate: "2026-01-04" },
      { text: "<p>Reported summary</p>", updateDate: "2026-02-04" },
    ],
  },
  "/v3/bill/119/s/5": {
    bill: {
      congress: 119,
      type: "S",
      number: "5",
      title: "Fifth Act",
      sponsors: [{ bioguideId: "Z999999" }],
      summaries: [],
    },
  },
};

describe("sponsorsJob", () => {
  let db: Kysely<Database>;
  let sponsorId: number;

  beforeEach(async () => {
    db = createTestStore();
    sponsorId = await seedLegislator(db, { bioguideId: "A000001" });
    await seedBill(db, {
      billNumber: "HR1",
      congress: 119,
      billType: "HR",
      updatedAt: OLD,
    });
    await seedBill(db, {
      billNumber: "S5",
      congress: 119,
      billType: "S",
      introducedDate: "2026-01-02",
      updatedAt: RECENT,
    });
    await seedBill(db, {
      billNumber: "HR9",
      congress: 119,
      billType: "HR",
      introducedDate: "2026-01-01",
      sponsorId,
      updatedAt: OLD,
    });
    await seedBill(db, { billNumber: "HR404", congress: 119, updatedAt: OLD });
  });

  afterEach(async () => {
    await db.destroy();
  });

  function source() {
    return createFakeSource((url) => {
      const body = DOCUMENTS[url.pathname];
      return body === undefined ? undefined : json(body);
    });
  }

  it("should hydrate recent and never-hydrated bills from their documents", async () => {
    const { fetcher, requests } = source();

    const result = await runJob(sponsorsJob, {
      db,
      config: createTestConfig(),
      fetcher,
      now: NOW,
    });

    expect(result.status).toBe("success");
    expect(result.merged).toEqual({ inserted: 0, updated: 2, ignored: 0 });
    expect(result.skips).toEqual({
      "missing-detail": 1,
      "unresolved-sponsor": 1,
    });
    expect(requests.some((url) => url.includes("/hr/9?"))).toBe(false);

    const rows = await db
      .selectFrom("bills")
      .select([
        "bill_number",
        "introduced_date",
        "sponsor_id",
        "summary",
        "updated_at",
      ])
      .where("bill_number", "in", ["HR1", "S5"])
      .orderBy("bill_number")
      .execute();
    expect(rows).toEqual([
      {
        bill_number: "HR1",
        introduced_date: "2026-01-03",
        sponsor_id: sponsorId,
        summary: "Reported summary",
        updated_at: OLD,
      },
      {
        bill_number: "S5",
        introduced_date: "2026-01-02",
        sponsor_id: null,
        summary: null,
        updated_at: RECENT,
      },
    ]);
  });

  it("should stop picking a bill once it is hydrated and its sponsor resolved", async () => {
    const config = createTestConfig();
    await runJob(sponsorsJob, { db, config, fetcher: source().fetcher, now: NOW });

    const later = new Date("2026-05-11T12:00:00.000Z");
    const { fetcher, requests } = source();
    await runJob(sponsorsJob, { db, config, fetcher, now: later });

    expect(requests.map((url) => new URL(url).pathname)).toEqual([
      "/v3/bill/119/s/5",
      "/v3/bill/119/hr/404",
    ]);
  });

  it("should resolve a sponsor on a later run once the legislator is stored", async () => {
    const config = createTestConfig();
    await runJob(sponsorsJob, { db, config, fetcher: source().fetcher, now: NOW });

    const lateSponsorId = await seedLegislator(db, {
      bioguideId: "Z999999",
      lastName: "Roe",
    });
    const later = new Date("2026-05-11T12:00:00.000Z");
    const result = await runJob(sponsorsJob, {
      db,
      config,
      fetcher: source().fetcher,
      now: later,
    });

    expect(result.skips).toEqual({ "missing-detail": 1 });
    const s5 = await db
      .selectFrom("bills")
      .select("sponsor_id")
      .where("bill_number", "=", "S5")
      .executeTakeFirstOrThrow();
    expect(s5.sponsor_id).toBe(lateSponsorId);
  });

  it("should work through every candidate when they outnumber the batch size", async () => {
    const config = createTestConfig({ SPONSOR_BATCH_SIZE: "1" });
    const { fetcher, requests } = source();

    const result = await runJob(sponsorsJob, { db, config, fetcher, now: NOW });

    expect(result.status).toBe("success");
    expect(result.merged).toEqual({ inserted: 0, updated: 2, ignored: 0 });
    expect(
      requests
        .map((url) => new URL(url).pathname)
        .filter((path) => !path.endsWith("/summaries"))
    ).toEqual(["/v3/bill/119/hr/1", "/v3/bill/119/s/5", "/v3/bill/119/hr/404"]);

    const unhydrated = await db
      .selectFrom("bills")
      .select("bill_number")
      .where("introduced_date", "is", null)
      .execute();
    expect(unhydrated).toEqual([{ bill_number: "HR404" }]);
  });
});
