import { sql, type Kysely } from "kysely";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  EmbeddingInputTooLargeError,
  SyncCancelledError,
} from "../../../../src/errors.js";
import {
  EmbeddingHydrator,
  embedWithTruncation,
  embeddingText,
  truncateForEmbedding,
} from "../../../../src/services/hydrate/hydrator.js";
import { WatermarkStore } from "../../../../src/services/sync/watermarks.js";
import { createTestConfig } from "../../../helpers/config.js";
import { createTestStore, seedBill } from "../../../helpers/store.js";

import type {
  BillEmbeddingMetadata,
  Database,
} from "../../../../src/db/types.js";
import type { Embedder } from "../../../../src/services/hydrate/embeddings.js";
import type {
  VectorIndex,
  VectorRecord,
} from "../../../../src/services/hydrate/vector-index.js";

const NOW = new Date("2026-05-10T12:00:00.000Z");
const SUMMARY = "Requires annual reporting on rural broadband grants.";

/**
 * Rejects inputs longer than `maxLength` as too large; fails outright on
 * inputs containing `poison`.
 */
class FakeEmbedder implements Embedder {
  readonly model = "test-embedding";
  readonly inputs: string[] = [];

  constructor(
    private maxLength = Number.POSITIVE_INFINITY,
    private poison?: string
  ) {}

  async embed(text: string): Promise<number[]> {
    this.inputs.push(text);
    if (this.poison !== undefined && text.includes(this.poison)) {
      throw new Error("upstream rejected the request");
    }
    if (text.length > this.maxLength) {
      throw new EmbeddingInputTooLargeError(text.length);
    }
    return [text.length, 1];
  }
}

/**
 * Keeps records in memory and mirrors them into bill_embeddings so the
 * never-embedded check sees them.
 */
class MemoryIndex implements VectorIndex {
  readonly records = new Map<string, VectorRecord>();

  constructor(private db: Kysely<Database>) {}

  async upsert(id: string, record: VectorRecord): Promise<void> {
    this.records.set(id, record);
    await this.db
      .insertInto("bill_embeddings")
      .values({
        vector_id: id,
        bill_id: record.billId,
        embedding: JSON.stringify(record.vector),
        model: record.model,
        metadata: sql<BillEmbeddingMetadata>`${JSON.stringify(record.metadata)}`,
      })
      .onConflict((oc) =>
        oc.column("vector_id").doUpdateSet({ model: record.model })
      )
      .execute();
  }
}

describe("truncateForEmbedding", () => {
  it("should leave text within the ceiling alone", () => {
    expect(truncateForEmbedding("short", 5)).toBe("short");
  });

  it("should cut and mark longer text", () => {
    expect(truncateForEmbedding("abcdefgh", 3)).toBe("abc [TRUNCATED]");
  });
});

describe("embeddingText", () => {
  it("should join title and summary", () => {
    expect(embeddingText("Broadband Act", "Grants.")).toBe(
      "Broadband Act \nSummary: Grants."
    );
  });

  it("should tolerate a missing title", () => {
    expect(embeddingText(null, "Grants.")).toBe(" \nSummary: Grants.");
  });
});

describe("embedWithTruncation", () => {
  const text = "x".repeat(30);

  it("should step down tiers until the input fits", async () => {
    const embedder = new FakeEmbedder(25);

    const outcome = await embedWithTruncation(embedder, text, [20, 10, 40]);

    expect(outcome).toEqual({
      ok: true,
      vector: [22, 1],
      tier: 10,
      truncated: true,
    });
    expect(embedder.inputs.map((input) => input.length)).toEqual([30, 32, 22]);
  });

  it("should send text under every tier only once", async () => {
    const embedder = new FakeEmbedder(3);

    const outcome = await embedWithTruncation(embedder, "tiny", [40, 20]);

    expect(outcome).toEqual({
      ok: false,
      reason: "Input too large at every tier",
    });
    expect(embedder.inputs).toEqual(["tiny"]);
  });

  it("should stop at the first failure that is not about size", async () => {
    const embedder = new FakeEmbedder(Number.POSITIVE_INFINITY, "x");

    const outcome = await embedWithTruncation(embedder, text, [40, 20]);

    expect(outcome).toEqual({
      ok: false,
      reason: "upstream rejected the request",
    });
    expect(embedder.inputs).toHaveLength(1);
  });

  it("should rethrow cancellation", async () => {
    const embedder: Embedder = {
      model: "test-embedding",
      embed: () => Promise.reject(new SyncCancelledError("Interrupted")),
    };

    await expect(embedWithTruncation(embedder, text, [40])).rejects.toThrow(
      "Interrupted"
    );
  });
});

describe("EmbeddingHydrator", () => {
  let db: Kysely<Database>;
  let index: MemoryIndex;
  let billId: number;

  beforeEach(async () => {
    db = createTestStore();
    index = new MemoryIndex(db);
    billId = await seedBill(db, {
      billNumber: "HR1",
      congress: 119,
      title: "Rural Broadband Act",
      summary: `  ${SUMMARY}  `,
    });
    await seedBill(db, { billNumber: "HR2", congress: 119, summary: "tiny" });
    await seedBill(db, { billNumber: "HR3", congress: 119, summary: null });
  });

  afterEach(async () => {
    await db.destroy();
  });

  function createHydrator(embedder: Embedder, now = NOW): EmbeddingHydrator {
    return new EmbeddingHydrator(db, createTestConfig(), embedder, index, {
      clock: () => now,
    });
  }

  it("should embed bills with a usable summary", async () => {
    const result = await createHydrator(new FakeEmbedder()).hydrate();

    expect(result).toEqual({
      status: "success",
      candidates: 1,
      embedded: 1,
      skipped: 0,
      tierHits: { 32000: 1 },
      error: null,
    });

    const text = `Rural Broadband Act \nSummary: ${SUMMARY}`;
    expect(index.records.get("HR1-119")).toEqual({
      billId,
      vector: [text.length, 1],
      model: "test-embedding",
      metadata: {
        billNumber: "HR1",
        congress: 119,
        title: "Rural Broadband Act",
        preview: SUMMARY,
      },
    });

    const [run] = await new WatermarkStore(db).history({
      entityType: "embeddings",
    });
    expect(run?.status).toBe("success");
    expect(run?.records_affected).toBe(1);
    expect(run?.notes).toBe('{"skipped":0,"tierHits":{"32000":1}}');
  });

  it("should leave unchanged embedded bills alone on the next run", async () => {
    await createHydrator(new FakeEmbedder()).hydrate();

    const result = await createHydrator(
      new FakeEmbedder(),
      new Date("2026-05-11T12:00:00.000Z")
    ).hydrate();

    expect(result.candidates).toBe(0);
    expect(result.embedded).toBe(0);
  });

  it("should reconsider every bill on a full run", async () => {
    await createHydrator(new FakeEmbedder()).hydrate();

    const result = await createHydrator(
      new FakeEmbedder(),
      new Date("2026-05-11T12:00:00.000Z")
    ).hydrate({ full: true });

    expect(result.candidates).toBe(1);
    expect(result.embedded).toBe(1);
  });

  it("should leave bills past the limit for the next run", async () => {
    await seedBill(db, {
      billNumber: "HR4",
      congress: 119,
      summary: "Extends the broadband grant reporting deadline.",
    });
    await createHydrator(new FakeEmbedder()).hydrate();

    // Both bills change after the first run
    await db
      .updateTable("bills")
      .set({ updated_at: "2026-05-10T13:00:00.000Z" })
      .where("bill_number", "=", "HR1")
      .execute();
    await db
      .updateTable("bills")
      .set({ updated_at: "2026-05-10T14:00:00.000Z" })
      .where("bill_number", "=", "HR4")
      .execute();

    const limited = await createHydrator(
      new FakeEmbedder(),
      new Date("2026-05-11T12:00:00.000Z")
    ).hydrate({ limit: 1 });
    expect(limited.embedded).toBe(1);

    const embedder = new FakeEmbedder();
    const result = await createHydrator(
      embedder,
      new Date("2026-05-12T12:00:00.000Z")
    ).hydrate();

    expect(result.candidates).toBe(2);
    expect(embedder.inputs).toContain(
      " \nSummary: Extends the broadband grant reporting deadline."
    );
  });

  it("should skip a bill the embedder rejects and still succeed", async () => {
    const result = await createHydrator(
      new FakeEmbedder(Number.POSITIVE_INFINITY, "broadband")
    ).hydrate();

    expect(result.status).toBe("success");
    expect(result.embedded).toBe(0);
    expect(result.skipped).toBe(1);
    expect(index.records.size).toBe(0);
  });

  it("should record a cancelled run", async () => {
    const controller = new AbortController();
    controller.abort(new SyncCancelledError("Interrupted"));

    const result = await createHydrator(new FakeEmbedder()).hydrate({
      signal: controller.signal,
    });

    expect(result.status).toBe("cancelled");
    expect(result.error).toBe("Interrupted");

    const [run] = await new WatermarkStore(db).history({
      entityType: "embeddings",
    });
    expect(run?.status).toBe("cancelled");
    expect(run?.notes).toBe("Interrupted");
  });
});
