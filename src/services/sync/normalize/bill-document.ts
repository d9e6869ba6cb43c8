/**
 * Hierarchical bill documents: list items from the bill listing, full
 * per-bill status documents, cosponsor list items and summary lists.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type {
  CanonicalBill,
  CanonicalCosponsor,
  SourceBlock,
  SponsorRef,
} from "../../../types/index.js";

// ============================================================================
// Schemas
// ============================================================================

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Optional(Type.Union([schema, Type.Null()]));

const BillCoreSchema = Type.Object({
  congress: Type.Union([
    Type.Integer({ minimum: 1 }),
    Type.String({ pattern: "^[0-9]+$" }),
  ]),
  number: Type.Union([
    Type.String({ pattern: "^[0-9]+$" }),
    Type.Integer({ minimum: 1 }),
  ]),
  type: Type.String({ pattern: "^[A-Za-z]+$" }),
  title: Nullable(Type.String()),
  introducedDate: Nullable(Type.String()),
  latestAction: Nullable(
    Type.Object({
      actionDate: Nullable(Type.String()),
      text: Nullable(Type.String()),
    })
  ),
});

const LinkSchema = Type.Object({
  url: Type.String({ minLength: 1 }),
  count: Nullable(Type.Integer({ minimum: 0 })),
});

const SponsorSchema = Type.Object({
  bioguideId: Type.String({ minLength: 1 }),
  fullName: Nullable(Type.String()),
});

const CosponsorItemSchema = Type.Object({
  bioguideId: Type.String({ minLength: 1 }),
  sponsorshipDate: Nullable(Type.String()),
  isOriginalCosponsor: Nullable(Type.Boolean()),
});

const SummaryItemSchema = Type.Object({
  text: Type.String(),
  actionDate: Nullable(Type.String()),
  updateDate: Nullable(Type.String()),
  versionCode: Nullable(Type.String()),
});

type SummaryItem = Static<typeof SummaryItemSchema>;

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Leading "YYYY-MM-DD" of a date or timestamp string.
 */
export function toDateOnly(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const match = /^(\d{4}-\d{2}-\d{2})/.exec(value.trim());
  return match?.[1] ?? null;
}

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&apos;": "'",
  "&nbsp;": " ",
};

export function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, " ")
    .replace(/&(amp|lt|gt|quot|#39|apos|nbsp);/g, (entity) => {
      return HTML_ENTITIES[entity] ?? entity;
    })
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Most recent summary text, HTML stripped. Null for an empty list.
 */
export function latestSummary(items: readonly unknown[]): string | null {
  const summaries = items.filter((item): item is SummaryItem =>
    Value.Check(SummaryItemSchema, item)
  );
  if (summaries.length === 0) {
    return null;
  }

  const sortKey = (item: SummaryItem): string =>
    item.updateDate ?? item.actionDate ?? "";
  const latest = summaries.reduce((best, item) =>
    sortKey(item) > sortKey(best) ? item : best
  );

  const text = stripHtml(latest.text);
  return text === "" ? null : text;
}

function parseSponsorBlock(value: unknown): SourceBlock<SponsorRef> {
  if (!Array.isArray(value)) {
    return { state: "absent" };
  }
  const first: unknown = value[0];
  if (!Value.Check(SponsorSchema, first)) {
    return { state: "absent" };
  }
  return {
    state: "inline",
    value: {
      bioguideId: first.bioguideId.trim(),
      fullName: first.fullName ?? null,
    },
  };
}

function parseSummaryBlock(value: unknown): SourceBlock<string> {
  if (Array.isArray(value)) {
    const summary = latestSummary(value);
    return summary === null
      ? { state: "absent" }
      : { state: "inline", value: summary };
  }
  if (Value.Check(LinkSchema, value)) {
    return { state: "linked", url: value.url, count: value.count ?? null };
  }
  return { state: "absent" };
}

// ============================================================================
// Parsers
// ============================================================================

/**
 * One entry of a cosponsor list. Null when the bioguide id is missing.
 */
export function parseCosponsorItem(body: unknown): CanonicalCosponsor | null {
  if (!Value.Check(CosponsorItemSchema, body)) {
    return null;
  }
  return {
    kind: "cosponsor",
    bioguideId: body.bioguideId.trim(),
    sponsorshipDate: toDateOnly(body.sponsorshipDate),
    isOriginal: body.isOriginalCosponsor ?? false,
  };
}

/**
 * A bill list item or a per-bill status document (optionally wrapped in
 * `{ bill: ... }`). Number, type and congress are mandatory; the sponsor
 * and summary sections are each optional. Cosponsors are read from their
 * own list endpoint, not from here.
 */
export function parseBillDocument(body: unknown): CanonicalBill | null {
  const document: unknown =
    isRecord(body) && isRecord(body.bill) ? body.bill : body;

  if (!isRecord(document) || !Value.Check(BillCoreSchema, document)) {
    return null;
  }

  const billType = document.type.toUpperCase();
  const number = String(document.number);
  const congress = Number(document.congress);

  return {
    kind: "bill",
    billNumber: `${billType}${number}`,
    billType,
    congress,
    title: document.title?.trim() ?? null,
    status: document.latestAction?.text?.trim() ?? null,
    introducedDate: toDateOnly(document.introducedDate),
    sponsor: parseSponsorBlock(document.sponsors),
    summary: parseSummaryBlock(document.summaries),
  };
}
