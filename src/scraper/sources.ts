/**
 * URL builders for the upstream sources.
 */

import type { RollCallChamber } from "../db/types.js";

/**
 * Headers for the legislative source API.
 */
export function congressHeaders(apiKey: string): Record<string, string> {
  return { "X-API-Key": apiKey, Accept: "application/json" };
}

/**
 * Second-precision UTC timestamp as the `fromDateTime` filter expects it.
 */
export function formatSourceTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/**
 * Bills of one congress changed since the given instant, oldest first.
 */
export function billListUrl(
  baseUrl: string,
  congress: number,
  since: Date
): string {
  const url = new URL(`${baseUrl}/bill/${String(congress)}`);
  url.searchParams.set("fromDateTime", formatSourceTimestamp(since));
  url.searchParams.set("sort", "updateDate asc");
  url.searchParams.set("format", "json");
  return url.toString();
}

export function billDetailUrl(
  baseUrl: string,
  congress: number,
  billType: string,
  billNumber: string
): string {
  const number = billNumber.replace(/^[A-Za-z]+/, "");
  return `${baseUrl}/bill/${String(congress)}/${billType.toLowerCase()}/${number}?format=json`;
}

export function billCosponsorsUrl(
  baseUrl: string,
  congress: number,
  billType: string,
  billNumber: string
): string {
  const number = billNumber.replace(/^[A-Za-z]+/, "");
  return `${baseUrl}/bill/${String(congress)}/${billType.toLowerCase()}/${number}/cosponsors?format=json`;
}

/**
 * Fill a roll-call URL template. Placeholders: {congress}, {year},
 * {chamber} ("h" or "s") and {number}.
 */
export function rollCallUrl(
  template: string,
  params: {
    congress: number;
    year: number;
    chamber: RollCallChamber;
    number: number;
  }
): string {
  return template
    .replaceAll("{congress}", String(params.congress))
    .replaceAll("{year}", String(params.year))
    .replaceAll("{chamber}", params.chamber)
    .replaceAll("{number}", String(params.number));
}

/**
 * Individual-contributions archive for a two-year cycle, e.g. indiv26.zip.
 */
export function donationArchiveUrl(baseUrl: string, cycle: number): string {
  const suffix = String(cycle % 100).padStart(2, "0");
  return `${baseUrl}/${String(cycle)}/indiv${suffix}.zip`;
}
