import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { donationsJob } from "../../../../../src/services/sync/jobs/donations.js";
import { createTestConfig } from "../../../../helpers/config.js";
import {
  binary,
  createFakeSource,
  runJob,
  text,
} from "../../../../helpers/source.js";
import { createTestStore, seedLegislator } from "../../../../helpers/store.js";
import { createZip } from "../../../../helpers/zip.js";

import type { Database } from "../../../../../src/db/types.js";
import type { Kysely } from "kysely";

const NOW = new Date("2026-05-10T12:00:00.000Z");

const COLUMNS = [
  "CMTE_ID",
  "AMNDT_IND",
  "RPT_TP",
  "TRANSACTION_PGI",
  "IMAGE_NUM",
  "TRANSACTION_TP",
  "ENTITY_TP",
  "NAME",
  "CITY",
  "STATE",
  "ZIP_CODE",
  "EMPLOYER",
  "OCCUPATION",
  "TRANSACTION_DT",
  "TRANSACTION_AMT",
  "OTHER_ID",
  "TRAN_ID",
  "FILE_NUM",
  "MEMO_CD",
  "MEMO_TEXT",
  "SUB_ID",
];

function line(values: Record<string, string>): string {
  return COLUMNS.map((column) => values[column] ?? "").join("|");
}

function contribution(overrides: Record<string, string>): string {
  return line({
    CMTE_ID: "C00000001",
    AMNDT_IND: "N",
    TRANSACTION_TP: "15",
    ENTITY_TP: "IND",
    NAME: "SMITH, JANE",
    CITY: "SPRINGFIELD",
    STATE: "IL",
    ZIP_CODE: "62701",
    EMPLOYER: "SCHOOL DISTRICT",
    OCCUPATION: "TEACHER",
    TRANSACTION_DT: "04152026",
    TRANSACTION_AMT: "250",
    SUB_ID: "4000001",
    ...overrides,
  });
}

const ARCHIVE_ROWS = [
  contribution({}),
  contribution({
    TRANSACTION_DT: "05012026",
    TRANSACTION_AMT: "100",
    SUB_ID: "4000002",
  }),
  contribution({ CMTE_ID: "C00000009", SUB_ID: "4000003" }),
  contribution({ TRANSACTION_DT: "03012026", SUB_ID: "4000004" }),
  contribution({ TRANSACTION_AMT: "n/a", SUB_ID: "4000005" }),
  contribution({}),
].join("\n");

describe("donationsJob", () => {
  let db: Kysely<Database>;
  let legislatorId: number;

  beforeEach(async () => {
    db = createTestStore();
    legislatorId = await seedLegislator(db, { fecCommitteeId: "C00000001" });
  });

  afterEach(async () => {
    await db.destroy();
  });

  function source(options: { header?: boolean; archive?: boolean } = {}) {
    return createFakeSource((url) => {
      if (url.pathname === "/indiv_header_file.csv" && options.header !== false) {
        return text(`${COLUMNS.join(",")}\n`);
      }
      if (url.pathname === "/2026/indiv26.zip" && options.archive !== false) {
        return binary(createZip("itcont.txt", `${ARCHIVE_ROWS}\n`));
      }
      return undefined;
    });
  }

  it("should import windowed contributions to tracked committees", async () => {
    const result = await runJob(donationsJob, {
      db,
      config: createTestConfig({ DONATION_BATCH_SIZE: "1" }),
      fetcher: source().fetcher,
      now: NOW,
    });

    expect(result.status).toBe("success");
    expect(result.merged).toEqual({ inserted: 2, updated: 0, ignored: 1 });
    expect(result.skips).toEqual({
      "untracked-recipient": 1,
      "before-window": 1,
      "invalid-row": 1,
    });

    const donors = await db
      .selectFrom("donors")
      .select(["id", "source_key", "donor_type"])
      .execute();
    expect(donors).toHaveLength(1);
    expect(donors[0]?.source_key).toBe("SMITH, JANE_SPRINGFIELD_IL_62701");
    expect(donors[0]?.donor_type).toBe("Individual");

    const donations = await db
      .selectFrom("donations")
      .select([
        "donor_id",
        "legislator_id",
        "amount",
        "transaction_date",
        "dedup_key",
      ])
      .orderBy("dedup_key")
      .execute();
    expect(donations).toEqual([
      {
        donor_id: donors[0]?.id,
        legislator_id: legislatorId,
        amount: 250,
        transaction_date: "2026-04-15",
        dedup_key: "fec:4000001",
      },
      {
        donor_id: donors[0]?.id,
        legislator_id: legislatorId,
        amount: 100,
        transaction_date: "2026-05-01",
        dedup_key: "fec:4000002",
      },
    ]);
  });

  it("should not duplicate donations when the same archive is read again", async () => {
    const config = createTestConfig({ DONATION_BATCH_SIZE: "1" });
    await runJob(donationsJob, {
      db,
      config,
      fetcher: source().fetcher,
      now: NOW,
    });
    // Forget the run so the next one covers the same window
    await db.deleteFrom("sync_watermarks").execute();

    const result = await runJob(donationsJob, {
      db,
      config,
      fetcher: source().fetcher,
      now: NOW,
    });

    expect(result.status).toBe("success");
    expect(result.merged).toEqual({ inserted: 0, updated: 0, ignored: 3 });
    const count = await db
      .selectFrom("donations")
      .select((eb) => eb.fn.countAll<number>().as("rows"))
      .executeTakeFirstOrThrow();
    expect(Number(count.rows)).toBe(2);
  });

  it("should fail when the archive is missing", async () => {
    const result = await runJob(donationsJob, {
      db,
      config: createTestConfig(),
      fetcher: source({ archive: false }).fetcher,
      now: NOW,
    });

    expect(result.status).toBe("error");
    expect(result.error).toBe(
      "Archive unavailable: https://bulk.test/2026/indiv26.zip"
    );
  });

  it("should fail when the header definition is missing", async () => {
    const result = await runJob(donationsJob, {
      db,
      config: createTestConfig(),
      fetcher: source({ header: false }).fetcher,
      now: NOW,
    });

    expect(result.status).toBe("error");
    expect(result.error).toBe(
      "Header definition unavailable: https://bulk.test/indiv_header_file.csv"
    );
  });
});
