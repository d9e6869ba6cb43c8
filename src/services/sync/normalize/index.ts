/**
 * Format Normalizer - source payloads to canonical records
 *
 * Every source shape funnels through `normalize`. Structurally invalid
 * input yields null and the calling job counts a skip; nothing here throws
 * for bad data.
 */

import { parseBillDocument, parseCosponsorItem } from "./bill-document.js";
import {
  parseCommitteeManifest,
  parseMembershipManifest,
} from "./committees.js";
import { parseDonationRow } from "./donations.js";
import { parseVoteRecord } from "./votes.js";

import type {
  BillDocumentPayload,
  CanonicalBill,
  CanonicalCosponsor,
  CanonicalDonation,
  CanonicalRecord,
  CanonicalRollCall,
  CommitteeManifestPayload,
  CommitteeRoster,
  CosponsorItemPayload,
  DonationRowPayload,
  MembershipManifestPayload,
  MembershipRoster,
  RawPayload,
  VoteRecordPayload,
} from "../../../types/index.js";

export function normalize(payload: BillDocumentPayload): CanonicalBill | null;
export function normalize(
  payload: CosponsorItemPayload
): CanonicalCosponsor | null;
export function normalize(
  payload: DonationRowPayload
): CanonicalDonation | null;
export function normalize(
  payload: CommitteeManifestPayload
): CommitteeRoster | null;
export function normalize(
  payload: MembershipManifestPayload
): MembershipRoster | null;
export function normalize(
  payload: VoteRecordPayload
): CanonicalRollCall | null;
export function normalize(payload: RawPayload): CanonicalRecord | null;
export function normalize(payload: RawPayload): CanonicalRecord | null {
  switch (payload.kind) {
    case "bill-document":
      return parseBillDocument(payload.body);
    case "cosponsor-item":
      return parseCosponsorItem(payload.body);
    case "donation-row":
      return parseDonationRow(payload.row);
    case "committee-manifest":
      return parseCommitteeManifest(payload.text);
    case "membership-manifest":
      return parseMembershipManifest(payload.text);
    case "vote-record":
      return parseVoteRecord(payload.body);
  }
}

export { latestSummary, stripHtml, toDateOnly } from "./bill-document.js";
export {
  parseHeaderDefinition,
  parseTransactionDate,
  streamDelimitedRows,
  type DelimitedRow,
} from "./donations.js";
export { classifyCommittee } from "./committees.js";
