import { requireSetting } from "../../../config.js";
import { billDetailUrl, congressHeaders } from "../../../scraper/sources.js";
import { IdentityResolver } from "../identity.js";
import { latestSummary, normalize } from "../normalize/index.js";
import { billRow, resolveSponsor } from "./bills.js";
import { billCandidatePages, billTypeOf } from "./candidates.js";

import type { CanonicalBill } from "../../../types/index.js";
import type { JobContext, SyncJob } from "../job.js";
import type { MergeSpec, Row } from "../upsert.js";

// No touch: detail hydration leaves updated_at to the bills job
const DETAIL_MERGE: MergeSpec = {
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
};

const FLUSH_EVERY = 25;

async function fetchSummary(
  context: JobContext,
  bill: CanonicalBill,
  headers: Record<string, string>
): Promise<string | null> {
  switch (bill.summary.state) {
    case "inline":
      return bill.summary.value;
    case "absent":
      return null;
    case "linked": {
      await context.fetcher.pause(context.signal);
      const document = await context.fetcher.fetchDocument(bill.summary.url, {
        headers,
        signal: context.signal,
      });
      const items = document?.summaries;
      return Array.isArray(items) ? latestSummary(items) : null;
    }
  }
}

/**
 * Detail hydration: sponsor, introduced date and summary from the per-bill
 * document, for bills touched since the watermark, never hydrated, or still
 * without a resolved sponsor. Candidates are read in pages of
 * SPONSOR_BATCH_SIZE until none are left.
 */
export const sponsorsJob: SyncJob = {
  entityType: "sponsors",

  async run(context) {
    const { config, db, fetcher, signal } = context;
    const headers = congressHeaders(
      requireSetting(config.congressApi.apiKey, "CONGRESS_API_KEY")
    );

    const pages = billCandidatePages(db, {
      congresses: config.congresses,
      pageSize: config.batchSizes.sponsors,
      filter: (eb) =>
        eb.or([
          eb("updated_at", ">=", context.since.toISOString()),
          eb("introduced_date", "is", null),
          eb("sponsor_id", "is", null),
        ]),
    });

    let resolver: IdentityResolver | null = null;
    let pending: Row[] = [];
    let processed = 0;

    for await (const candidates of pages) {
      resolver ??= await IdentityResolver.load(
        db,
        ["legislator"],
        context.upsert
      );

      for (const candidate of candidates) {
        signal.throwIfAborted();
        if (processed > 0) {
          await fetcher.pause(signal);
        }
        processed++;

        const url = billDetailUrl(
          config.congressApi.baseUrl,
          candidate.congress,
          billTypeOf(candidate),
          candidate.bill_number
        );
        const document = await fetcher.fetchDocument(url, { headers, signal });
        if (document === null) {
          context.skips.add("missing-detail");
          continue;
        }

        const bill = normalize({ kind: "bill-document", body: document });
        if (bill === null) {
          context.skips.add("invalid-bill");
          continue;
        }

        const sponsorId = resolveSponsor(context, bill, resolver);
        const summary = await fetchSummary(context, bill, headers);
        pending.push(billRow(bill, sponsorId, summary));

        if (pending.length >= FLUSH_EVERY) {
          await context.merge(pending, DETAIL_MERGE);
          pending = [];
          context.progress(`${String(processed)} bill documents`);
        }
      }
    }

    await context.merge(pending, DETAIL_MERGE);
    context.log.info({ candidates: processed }, "Sponsor candidates processed");
  },
};
