import type {
  ColumnType,
  Generated,
  Insertable,
  Selectable,
  Updateable,
} from "kysely";

// ============================================================================
// Enum-like Types (CHECK constraints in sql/schema.sql)
// ============================================================================

export type SyncRunStatus = "success" | "error" | "cancelled";

export type RollCallChamber = "h" | "s";

export type CommitteeSide = "majority" | "minority";

/**
 * Timestamps travel as ISO-8601 strings in both directions; the pg type
 * parsers in connection.ts keep PostgreSQL in line with SQLite.
 */
type Timestamp = ColumnType<string, string | undefined, string>;

// ============================================================================
// Legislators
// ============================================================================

export interface LegislatorsTable {
  id: Generated<number>;
  bioguide_id: string | null;
  fec_candidate_id: string | null;
  fec_committee_id: string | null;
  first_name: string | null;
  last_name: string | null;
  party: string | null;
  state: string | null;
  chamber: string | null;
  is_active: boolean | null;
}

export type Legislator = Selectable<LegislatorsTable>;
export type NewLegislator = Insertable<LegislatorsTable>;

// ============================================================================
// Bills
// ============================================================================

export interface BillsTable {
  id: Generated<number>;
  bill_number: string;
  congress: number;
  bill_type: string | null;
  title: string | null;
  summary: string | null;
  introduced_date: string | null;
  status: string | null;
  sponsor_id: number | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export type Bill = Selectable<BillsTable>;
export type NewBill = Insertable<BillsTable>;
export type BillUpdate = Updateable<BillsTable>;

export interface BillCosponsorsTable {
  id: Generated<number>;
  bill_id: number;
  legislator_id: number;
  sponsorship_date: string | null;
  is_original: boolean;
}

export type BillCosponsor = Selectable<BillCosponsorsTable>;

// ============================================================================
// Votes
// ============================================================================

export interface VoteRollCallsTable {
  id: Generated<number>;
  roll_call_id: string;
  chamber: RollCallChamber;
  congress: number;
  session_year: number;
  roll_number: number;
  vote_date: string | null;
  category: string | null;
  question: string | null;
  result: string | null;
  bill_id: number | null;
  created_at: Timestamp;
}

export type VoteRollCall = Selectable<VoteRollCallsTable>;

export interface VotesTable {
  id: Generated<number>;
  roll_call_id: string;
  legislator_id: number;
  bill_id: number;
  vote_date: string | null;
  position: string;
  category: string | null;
}

export type Vote = Selectable<VotesTable>;

// ============================================================================
// Committees
// ============================================================================

export interface CommitteesTable {
  id: Generated<number>;
  external_id: string;
  name: string;
  chamber: string | null;
  committee_type: string | null;
  url: string | null;
  parent_external_id: string | null;
  updated_at: Timestamp;
}

export type Committee = Selectable<CommitteesTable>;

export interface CommitteeAssignmentsTable {
  id: Generated<number>;
  legislator_id: number;
  committee_id: number;
  congress: number;
  rank: number | null;
  role: string;
  side: CommitteeSide | null;
}

export type CommitteeAssignment = Selectable<CommitteeAssignmentsTable>;

// ============================================================================
// Campaign Finance
// ============================================================================

export interface DonorsTable {
  id: Generated<number>;
  source_key: string;
  name: string;
  donor_type: string | null;
  industry: string | null;
  city: string | null;
  state: string | null;
  zip_code: string | null;
  employer: string | null;
  occupation: string | null;
}

export type Donor = Selectable<DonorsTable>;

export interface DonationsTable {
  id: Generated<number>;
  donor_id: number;
  legislator_id: number;
  recipient_committee_id: string;
  amount: number;
  transaction_date: string | null;
  transaction_type: string | null;
  filing_id: string | null;
  memo_text: string | null;
  dedup_key: string;
  created_at: Timestamp;
}

export type Donation = Selectable<DonationsTable>;

// ============================================================================
// Sync Log
// ============================================================================

export interface SyncWatermarksTable {
  id: Generated<number>;
  entity_type: string;
  synced_through: string;
  records_affected: number;
  status: SyncRunStatus;
  notes: string | null;
  started_at: string;
  finished_at: string;
}

export type SyncWatermark = Selectable<SyncWatermarksTable>;
export type NewSyncWatermark = Insertable<SyncWatermarksTable>;

// ============================================================================
// Vector Index
// ============================================================================

export interface BillEmbeddingMetadata {
  billNumber: string;
  congress: number;
  title: string;
  preview: string;
}

export interface BillEmbeddingsTable {
  vector_id: string;
  bill_id: number;
  embedding: string;
  model: string;
  metadata: ColumnType<
    BillEmbeddingMetadata,
    BillEmbeddingMetadata,
    BillEmbeddingMetadata
  >;
  updated_at: Timestamp;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  legislators: LegislatorsTable;
  bills: BillsTable;
  bill_cosponsors: BillCosponsorsTable;
  vote_roll_calls: VoteRollCallsTable;
  votes: VotesTable;
  committees: CommitteesTable;
  committee_assignments: CommitteeAssignmentsTable;
  donors: DonorsTable;
  donations: DonationsTable;
  sync_watermarks: SyncWatermarksTable;
  bill_embeddings: BillEmbeddingsTable;
}
