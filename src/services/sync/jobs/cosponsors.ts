import { requireSetting } from "../../../config.js";
import {
  billCosponsorsUrl,
  congressHeaders,
} from "../../../scraper/sources.js";
import { IdentityResolver } from "../identity.js";
import { normalize } from "../normalize/index.js";
import { billCandidatePages, billTypeOf } from "./candidates.js";

import type { SyncJob } from "../job.js";
import type { MergeSpec, Row } from "../upsert.js";

export const COSPONSOR_MERGE: MergeSpec = {
  table: "bill_cosponsors",
  naturalKey: ["bill_id", "legislator_id"],
  update: ["sponsorship_date"],
  overwrite: ["is_original"],
};

/**
 * Cosponsor lists of bills touched since the watermark, plus bills with no
 * stored cosponsor yet, read in pages of COSPONSOR_BATCH_SIZE until none are
 * left. A bill with no cosponsors answers 404, which the fetcher reports as
 * an empty sequence.
 */
export const cosponsorsJob: SyncJob = {
  entityType: "cosponsors",

  async run(context) {
    const { config, db, fetcher, signal } = context;
    const headers = congressHeaders(
      requireSetting(config.congressApi.apiKey, "CONGRESS_API_KEY")
    );

    const pages = billCandidatePages(db, {
      congresses: config.congresses,
      pageSize: config.batchSizes.cosponsors,
      filter: (eb) =>
        eb.or([
          eb("updated_at", ">=", context.since.toISOString()),
          eb.not(
            eb.exists(
              eb
                .selectFrom("bill_cosponsors")
                .select("bill_cosponsors.bill_id")
                .whereRef("bill_cosponsors.bill_id", "=", "bills.id")
            )
          ),
        ]),
    });

    let resolver: IdentityResolver | null = null;
    let fetched = 0;

    for await (const bills of pages) {
      resolver ??= await IdentityResolver.load(
        db,
        ["legislator"],
        context.upsert
      );

      for (const bill of bills) {
        signal.throwIfAborted();
        if (fetched > 0) {
          await fetcher.pause(signal);
        }
        fetched++;

        const url = billCosponsorsUrl(
          config.congressApi.baseUrl,
          bill.congress,
          billTypeOf(bill),
          bill.bill_number
        );

        const rows: Row[] = [];
        for await (const page of fetcher.fetchAll(url, {
          itemsKey: "cosponsors",
          headers,
          signal,
        })) {
          for (const item of page.items) {
            const cosponsor = normalize({ kind: "cosponsor-item", body: item });
            if (cosponsor === null) {
              context.skips.add("invalid-cosponsor");
              continue;
            }
            const legislatorId = resolver.resolve(
              cosponsor.bioguideId,
              "legislator"
            );
            if (legislatorId === null) {
              context.skips.add("unresolved-legislator");
              context.log.debug(
                { bill: bill.bill_number, bioguideId: cosponsor.bioguideId },
                "Cosponsor not found"
              );
              continue;
            }
            rows.push({
              bill_id: bill.id,
              legislator_id: legislatorId,
              sponsorship_date: cosponsor.sponsorshipDate,
              is_original: cosponsor.isOriginal,
            });
          }
        }

        await context.merge(rows, COSPONSOR_MERGE);
        context.progress(`${String(fetched)} cosponsor lists`);
      }
    }

    context.log.info({ bills: fetched }, "Cosponsor lists fetched");
  },
};
