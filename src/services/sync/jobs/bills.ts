import { requireSetting } from "../../../config.js";
import { billListUrl, congressHeaders } from "../../../scraper/sources.js";
import { IdentityResolver } from "../identity.js";
import { normalize } from "../normalize/index.js";

import type { CanonicalBill } from "../../../types/index.js";
import type { JobContext, SyncJob } from "../job.js";
import type { MergeSpec, Row } from "../upsert.js";

export const BILL_MERGE: MergeSpec = {
  table: "bills",
  naturalKey: ["bill_number", "congress"],
  update: [
    "bill_type",
    "title",
    "status",
    "introduced_date",
    "summary",
    "sponsor_id",
  ],
  touch: "updated_at",
};

/**
 * Store row for a canonical bill. Absent sections become null so the
 * merge keeps whatever an earlier, richer document stored.
 */
export function billRow(
  bill: CanonicalBill,
  sponsorId: number | null,
  summary: string | null
): Row {
  return {
    bill_number: bill.billNumber,
    congress: bill.congress,
    bill_type: bill.billType,
    title: bill.title,
    status: bill.status,
    introduced_date: bill.introducedDate,
    summary,
    sponsor_id: sponsorId,
  };
}

/**
 * Sponsor id of an inline sponsor block; counts a skip when the sponsor is
 * not a known legislator.
 */
export function resolveSponsor(
  context: JobContext,
  bill: CanonicalBill,
  resolver: IdentityResolver
): number | null {
  if (bill.sponsor.state !== "inline") {
    return null;
  }
  const { bioguideId } = bill.sponsor.value;
  const sponsorId = resolver.resolve(bioguideId, "legislator");
  if (sponsorId === null) {
    context.skips.add("unresolved-sponsor");
    context.log.debug(
      { bill: bill.billNumber, bioguideId },
      "Sponsor not found"
    );
  }
  return sponsorId;
}

/**
 * Bills changed upstream since the watermark, one listing per configured
 * congress. The listing filters on the source's own update time.
 */
export const billsJob: SyncJob = {
  entityType: "bills",

  async run(context) {
    const { config, fetcher, signal } = context;
    const headers = congressHeaders(
      requireSetting(config.congressApi.apiKey, "CONGRESS_API_KEY")
    );
    const resolver = await IdentityResolver.load(
      context.db,
      ["legislator"],
      context.upsert
    );

    for (const congress of config.congresses) {
      const url = billListUrl(
        config.congressApi.baseUrl,
        congress,
        context.since
      );
      let seen = 0;

      for await (const page of fetcher.fetchAll(url, {
        itemsKey: "bills",
        headers,
        signal,
      })) {
        const rows: Row[] = [];
        for (const item of page.items) {
          const bill = normalize({ kind: "bill-document", body: item });
          if (bill === null) {
            context.skips.add("invalid-bill");
            continue;
          }
          const summary =
            bill.summary.state === "inline" ? bill.summary.value : null;
          const sponsorId = resolveSponsor(context, bill, resolver);
          rows.push(billRow(bill, sponsorId, summary));
        }

        await context.merge(rows, BILL_MERGE);
        seen += page.items.length;
        context.progress(`Congress ${String(congress)}: ${String(seen)} bills`);
      }

      context.log.info({ congress, seen }, "Bill listing complete");
    }
  },
};
