import { sql, type Kysely } from "kysely";

import { jsonb } from "../../db/connection.js";
import { hydrateLogger } from "../../logger.js";

import type { BillEmbeddingMetadata, Database } from "../../db/types.js";

export interface VectorRecord {
  billId: number;
  vector: readonly number[];
  model: string;
  metadata: BillEmbeddingMetadata;
}

/**
 * Keyed vector storage. `upsert` replaces the vector stored under `id`.
 */
export interface VectorIndex {
  upsert(id: string, record: VectorRecord): Promise<void>;
}

/**
 * pgvector text form, e.g. "[0.1,0.2]".
 */
export function toVectorLiteral(vector: readonly number[]): string {
  return `[${vector.join(",")}]`;
}

/**
 * Vectors in the bill_embeddings table (pgvector column).
 */
export class PgVectorIndex implements VectorIndex {
  constructor(
    private db: Kysely<Database>,
    private clock: () => Date = () => new Date()
  ) {}

  async upsert(id: string, record: VectorRecord): Promise<void> {
    await this.db
      .insertInto("bill_embeddings")
      .values({
        vector_id: id,
        bill_id: record.billId,
        embedding: sql<string>`${toVectorLiteral(record.vector)}::vector`,
        model: record.model,
        metadata: jsonb(record.metadata),
        updated_at: this.clock().toISOString(),
      })
      .onConflict((oc) =>
        oc.column("vector_id").doUpdateSet((eb) => ({
          bill_id: eb.ref("excluded.bill_id"),
          embedding: eb.ref("excluded.embedding"),
          model: eb.ref("excluded.model"),
          metadata: eb.ref("excluded.metadata"),
          updated_at: eb.ref("excluded.updated_at"),
        }))
      )
      .execute();

    hydrateLogger.debug(
      { vectorId: id, dimensions: record.vector.length },
      "Vector stored"
    );
  }
}
