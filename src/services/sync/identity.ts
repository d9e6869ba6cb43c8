/**
 * Identity Resolver - external natural keys to surrogate ids
 *
 * Built once per job from a snapshot of the store and handed to the job's
 * steps explicitly. Legislator, bill and committee lookups are read-only:
 * a miss means the caller skips the record. Donors are the one kind created
 * on first sighting, since no upstream donor registry exists.
 */

import { syncLogger } from "../../logger.js";
import { UpsertEngine, type MergeSpec, type Row } from "./upsert.js";

import type { Database } from "../../db/types.js";
import type { DonorAttributes } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export type IdentityKind =
  | "legislator"
  | "legislator-by-fec-committee"
  | "bill"
  | "committee";

type Snapshot = ReadonlyMap<string, number>;

export const DONOR_MERGE: MergeSpec = {
  table: "donors",
  naturalKey: ["source_key"],
  update: [
    "name",
    "donor_type",
    "city",
    "state",
    "zip_code",
    "employer",
    "occupation",
  ],
};

const DONOR_CACHE_LIMIT = 200_000;

// ============================================================================
// Key Helpers
// ============================================================================

/**
 * Lookup key for a bill: upper-cased official number plus congress,
 * e.g. "HR1234-119".
 */
export function billKey(billNumber: string, congress: number): string {
  return `${billNumber.toUpperCase()}-${String(congress)}`;
}

function donorRow(donor: DonorAttributes): Row {
  return {
    source_key: donor.sourceKey,
    name: donor.name,
    donor_type: donor.donorType,
    city: donor.city,
    state: donor.state,
    zip_code: donor.zipCode,
    employer: donor.employer,
    occupation: donor.occupation,
  };
}

// ============================================================================
// Snapshot Loaders
// ============================================================================

async function loadSnapshot(
  db: Kysely<Database>,
  kind: IdentityKind
): Promise<Snapshot> {
  const map = new Map<string, number>();

  switch (kind) {
    case "legislator": {
      const rows = await db
        .selectFrom("legislators")
        .select(["id", "bioguide_id"])
        .where("bioguide_id", "is not", null)
        .execute();
      for (const row of rows) {
        if (row.bioguide_id !== null) {
          map.set(row.bioguide_id, row.id);
        }
      }
      break;
    }
    case "legislator-by-fec-committee": {
      const rows = await db
        .selectFrom("legislators")
        .select(["id", "fec_committee_id"])
        .where("fec_committee_id", "is not", null)
        .execute();
      for (const row of rows) {
        if (row.fec_committee_id !== null) {
          map.set(row.fec_committee_id, row.id);
        }
      }
      break;
    }
    case "bill": {
      const rows = await db
        .selectFrom("bills")
        .select(["id", "bill_number", "congress"])
        .execute();
      for (const row of rows) {
        map.set(billKey(row.bill_number, row.congress), row.id);
      }
      break;
    }
    case "committee": {
      const rows = await db
        .selectFrom("committees")
        .select(["id", "external_id"])
        .execute();
      for (const row of rows) {
        map.set(row.external_id, row.id);
      }
      break;
    }
  }

  return map;
}

// ============================================================================
// Identity Resolver
// ============================================================================

export class IdentityResolver {
  private readonly donorIds = new Map<string, number>();

  private constructor(
    private db: Kysely<Database>,
    private snapshots: ReadonlyMap<IdentityKind, Snapshot>,
    private upsert: UpsertEngine
  ) {}

  /**
   * Snapshot the requested kinds. Lookups of kinds not loaded throw.
   */
  static async load(
    db: Kysely<Database>,
    kinds: readonly IdentityKind[],
    upsert: UpsertEngine = new UpsertEngine(db)
  ): Promise<IdentityResolver> {
    const snapshots = new Map<IdentityKind, Snapshot>();
    for (const kind of new Set(kinds)) {
      snapshots.set(kind, await loadSnapshot(db, kind));
    }

    syncLogger.debug(
      Object.fromEntries(
        [...snapshots].map(([kind, snapshot]) => [kind, snapshot.size])
      ),
      "Identity snapshot loaded"
    );

    return new IdentityResolver(db, snapshots, upsert);
  }

  resolve(externalKey: string, kind: IdentityKind): number | null {
    const snapshot = this.snapshots.get(kind);
    if (snapshot === undefined) {
      throw new Error(`Identity kind ${kind} was not loaded`);
    }
    return snapshot.get(externalKey.trim()) ?? null;
  }

  size(kind: IdentityKind): number {
    return this.snapshots.get(kind)?.size ?? 0;
  }

  /**
   * Id for one donor, creating or refreshing the donor row.
   */
  async resolveOrCreate(
    attributes: DonorAttributes,
    kind: "donor"
  ): Promise<number> {
    const ids = await this.resolveOrCreateMany([attributes]);
    const id = ids.get(attributes.sourceKey);
    if (id === undefined) {
      throw new Error(`${kind} ${attributes.sourceKey} could not be created`);
    }
    return id;
  }

  /**
   * Ids for a batch of donors keyed by source key. Donors already seen by
   * this resolver are served from its cache without another write.
   */
  async resolveOrCreateMany(
    donors: readonly DonorAttributes[]
  ): Promise<Map<string, number>> {
    const result = new Map<string, number>();
    const pending = new Map<string, DonorAttributes>();

    for (const donor of donors) {
      const cached = this.donorIds.get(donor.sourceKey);
      if (cached !== undefined) {
        result.set(donor.sourceKey, cached);
      } else {
        pending.set(donor.sourceKey, donor);
      }
    }

    if (pending.size === 0) {
      return result;
    }

    await this.upsert.merge([...pending.values()].map(donorRow), DONOR_MERGE);

    const rows = await this.db
      .selectFrom("donors")
      .select(["id", "source_key"])
      .where("source_key", "in", [...pending.keys()])
      .execute();

    if (this.donorIds.size + rows.length > DONOR_CACHE_LIMIT) {
      this.donorIds.clear();
    }
    for (const row of rows) {
      this.donorIds.set(row.source_key, row.id);
      result.set(row.source_key, row.id);
    }

    return result;
  }
}
