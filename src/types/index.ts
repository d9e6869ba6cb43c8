/**
 * Domain types shared by the sync engine, the hydrator and the CLI.
 */

import type { CommitteeSide, RollCallChamber } from "../db/types.js";

// ============================================================================
// Entity Types
// ============================================================================

export const SYNC_ENTITY_TYPES = [
  "bills",
  "sponsors",
  "cosponsors",
  "votes",
  "committees",
  "donations",
] as const;

export type SyncEntityType = (typeof SYNC_ENTITY_TYPES)[number];

/**
 * Every kind of run that writes to the watermark log.
 */
export type EntityType = SyncEntityType | "embeddings";

export function isSyncEntityType(value: string): value is SyncEntityType {
  return SYNC_ENTITY_TYPES.some((entityType) => entityType === value);
}

/**
 * How a source lets a job narrow its fetch window.
 *
 * - source-filtered: the source accepts a "changed since" parameter
 * - store-filtered: candidates are chosen from the store by updated_at
 * - sequence-cursor: the source is scanned forward from the last stored sequence number
 * - snapshot: only the current state is published; every run re-reads it whole
 */
export type WindowingMode =
  | "source-filtered"
  | "store-filtered"
  | "sequence-cursor"
  | "snapshot";

export interface EntityCapability {
  windowing: WindowingMode;
  /** False when history before the first ingestion can never be recovered. */
  coversHistory: boolean;
}

// ============================================================================
// Optional Source Blocks
// ============================================================================

/**
 * A nested section of a source document. Sources either omit the section,
 * point at a separate endpoint for it, or embed it.
 */
export type SourceBlock<T> =
  | { state: "absent" }
  | { state: "linked"; url: string; count: number | null }
  | { state: "inline"; value: T };

// ============================================================================
// Canonical Records
// ============================================================================

export interface SponsorRef {
  bioguideId: string;
  fullName: string | null;
}

export interface CanonicalCosponsor {
  kind: "cosponsor";
  bioguideId: string;
  sponsorshipDate: string | null;
  isOriginal: boolean;
}

export interface CanonicalBill {
  kind: "bill";
  /** Official number as stored, e.g. "HR1234". */
  billNumber: string;
  billType: string;
  congress: number;
  title: string | null;
  status: string | null;
  introducedDate: string | null;
  sponsor: SourceBlock<SponsorRef>;
  summary: SourceBlock<string>;
}

export interface DonorAttributes {
  /** Composite identity key: name, city, state and zip joined by "_". */
  sourceKey: string;
  name: string;
  donorType: string | null;
  city: string | null;
  state: string | null;
  zipCode: string | null;
  employer: string | null;
  occupation: string | null;
}

export interface CanonicalDonation {
  kind: "donation";
  recipientCommitteeId: string;
  amount: number;
  transactionDate: string | null;
  transactionType: string | null;
  filingId: string | null;
  memoText: string | null;
  dedupKey: string;
  donor: DonorAttributes;
}

export type CommitteeType =
  | "standing"
  | "select"
  | "special"
  | "joint"
  | "subcommittee";

export interface CanonicalCommittee {
  kind: "committee";
  externalId: string;
  name: string;
  chamber: string | null;
  committeeType: CommitteeType;
  url: string | null;
  parentExternalId: string | null;
}

export interface CommitteeRoster {
  kind: "committee-roster";
  committees: CanonicalCommittee[];
}

export interface CanonicalAssignment {
  kind: "assignment";
  committeeExternalId: string;
  bioguideId: string;
  rank: number | null;
  role: string;
  side: CommitteeSide | null;
}

export interface MembershipRoster {
  kind: "membership-roster";
  assignments: CanonicalAssignment[];
  /** Entries without a bioguide id; they can never resolve. */
  incomplete: number;
}

export interface BillRef {
  billType: string;
  number: number;
  congress: number;
}

export interface VotePosition {
  bioguideId: string;
  position: string;
}

export interface CanonicalRollCall {
  kind: "roll-call";
  rollCallId: string;
  chamber: RollCallChamber;
  rollNumber: number;
  congress: number;
  sessionYear: number;
  date: string | null;
  category: string | null;
  question: string | null;
  result: string | null;
  bill: BillRef | null;
  positions: VotePosition[];
}

export type CanonicalRecord =
  | CanonicalBill
  | CanonicalCosponsor
  | CanonicalDonation
  | CommitteeRoster
  | MembershipRoster
  | CanonicalRollCall;

// ============================================================================
// Raw Payloads
// ============================================================================

export interface BillDocumentPayload {
  kind: "bill-document";
  body: unknown;
}

export interface CosponsorItemPayload {
  kind: "cosponsor-item";
  body: unknown;
}

export interface DonationRowPayload {
  kind: "donation-row";
  row: Readonly<Record<string, string>>;
}

export interface CommitteeManifestPayload {
  kind: "committee-manifest";
  text: string;
}

export interface MembershipManifestPayload {
  kind: "membership-manifest";
  text: string;
}

export interface VoteRecordPayload {
  kind: "vote-record";
  body: unknown;
}

export type RawPayload =
  | BillDocumentPayload
  | CosponsorItemPayload
  | DonationRowPayload
  | CommitteeManifestPayload
  | MembershipManifestPayload
  | VoteRecordPayload;
