/**
 * Bulk contribution rows: pipe-delimited text mapped onto the column
 * names of a separately published header definition.
 */

import { createHash } from "node:crypto";

import { parse } from "csv-parse";
import { parse as parseSync } from "csv-parse/sync";

import type {
  CanonicalDonation,
  DonorAttributes,
} from "../../../types/index.js";
import type { Readable } from "node:stream";

export type DelimitedRow = Readonly<Record<string, string>>;

const ENTITY_TYPES: Record<string, string> = {
  IND: "Individual",
  ORG: "Organization",
  PAC: "PAC",
  PTY: "Party",
  CCM: "Candidate Committee",
  COM: "Committee",
  CAN: "Candidate",
};

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

// ============================================================================
// Helpers
// ============================================================================

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((cell) => typeof cell === "string");
}

function field(row: DelimitedRow, column: string): string | null {
  const value = row[column]?.trim();
  return value === undefined || value === "" ? null : value;
}

/**
 * "MMDDYYYY" to "YYYY-MM-DD"; null for anything that is not a real date.
 */
export function parseTransactionDate(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const match = /^(\d{2})(\d{2})(\d{4})$/.exec(value);
  if (match === null) {
    return null;
  }
  const [, month = "", day = "", year = ""] = match;
  const iso = `${year}-${month}-${day}`;
  const parsed = new Date(`${iso}T00:00:00Z`);
  if (
    Number.isNaN(parsed.getTime()) ||
    parsed.toISOString().slice(0, 10) !== iso
  ) {
    return null;
  }
  return iso;
}

/**
 * Donor identity: name, city, state and zip joined by "_".
 */
export function donorSourceKey(
  name: string,
  city: string | null,
  state: string | null,
  zipCode: string | null
): string {
  return [name, city ?? "", state ?? "", zipCode ?? ""].join("_");
}

function contentHash(row: DelimitedRow): string {
  const parts = [
    "CMTE_ID",
    "NAME",
    "CITY",
    "STATE",
    "ZIP_CODE",
    "TRANSACTION_DT",
    "TRANSACTION_AMT",
    "TRANSACTION_TP",
    "TRAN_ID",
    "IMAGE_NUM",
  ].map((column) => field(row, column) ?? "");
  return createHash("sha256").update(parts.join("|")).digest("hex");
}

// ============================================================================
// Parsers
// ============================================================================

/**
 * One contribution row. Null when the recipient, the donor name or a
 * numeric amount is missing.
 */
export function parseDonationRow(row: DelimitedRow): CanonicalDonation | null {
  const recipientCommitteeId = field(row, "CMTE_ID");
  const name = field(row, "NAME");
  const rawAmount = field(row, "TRANSACTION_AMT");

  if (
    recipientCommitteeId === null ||
    name === null ||
    rawAmount === null ||
    !AMOUNT_PATTERN.test(rawAmount)
  ) {
    return null;
  }

  const city = field(row, "CITY");
  const state = field(row, "STATE");
  const zipCode = field(row, "ZIP_CODE");
  const entityType = field(row, "ENTITY_TP");
  const subId = field(row, "SUB_ID");

  const donor: DonorAttributes = {
    sourceKey: donorSourceKey(name, city, state, zipCode),
    name,
    donorType:
      entityType === null ? null : (ENTITY_TYPES[entityType] ?? entityType),
    city,
    state,
    zipCode,
    employer: field(row, "EMPLOYER"),
    occupation: field(row, "OCCUPATION"),
  };

  return {
    kind: "donation",
    recipientCommitteeId,
    amount: Number.parseFloat(rawAmount),
    transactionDate: parseTransactionDate(field(row, "TRANSACTION_DT")),
    transactionType: field(row, "TRANSACTION_TP"),
    filingId: subId,
    memoText: field(row, "MEMO_TEXT"),
    dedupKey: subId !== null ? `fec:${subId}` : `sha256:${contentHash(row)}`,
    donor,
  };
}

/**
 * Column names from the header definition file (its first line).
 */
export function parseHeaderDefinition(text: string): string[] {
  const records: unknown = parseSync(text, {
    to_line: 1,
    trim: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(records)) {
    return [];
  }
  const first: unknown = records[0];
  if (!Array.isArray(first)) {
    return [];
  }
  return first.filter(
    (column): column is string => typeof column === "string" && column !== ""
  );
}

/**
 * Stream a delimited file row by row without buffering it. Quoting is
 * off: the bulk format never quotes and names carry stray quote marks.
 */
export async function* streamDelimitedRows(
  input: Readable,
  columns: readonly string[],
  delimiter = "|"
): AsyncGenerator<DelimitedRow, void, undefined> {
  const parser = parse({
    columns: [...columns],
    delimiter,
    quote: false,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });

  input.on("error", (error) => {
    parser.destroy(error);
  });

  const rows: AsyncIterable<unknown> = input.pipe(parser);
  for await (const row of rows) {
    if (isStringRecord(row)) {
      yield row;
    }
  }
}
