import unzipper from "unzipper";

import { donationArchiveUrl } from "../../../scraper/sources.js";
import { IdentityResolver } from "../identity.js";
import {
  normalize,
  parseHeaderDefinition,
  streamDelimitedRows,
} from "../normalize/index.js";

import type { CanonicalDonation } from "../../../types/index.js";
import type { JobContext, SyncJob } from "../job.js";
import type { MergeSpec, Row } from "../upsert.js";

export const DONATION_MERGE: MergeSpec = {
  table: "donations",
  naturalKey: ["dedup_key"],
  conflict: "ignore",
};

interface PendingDonation {
  donation: CanonicalDonation;
  legislatorId: number;
}

async function flush(
  context: JobContext,
  resolver: IdentityResolver,
  batch: readonly PendingDonation[]
): Promise<void> {
  const donorIds = await resolver.resolveOrCreateMany(
    batch.map(({ donation }) => donation.donor)
  );

  const rows: Row[] = [];
  for (const { donation, legislatorId } of batch) {
    const donorId = donorIds.get(donation.donor.sourceKey);
    if (donorId === undefined) {
      continue;
    }
    rows.push({
      donor_id: donorId,
      legislator_id: legislatorId,
      recipient_committee_id: donation.recipientCommitteeId,
      amount: donation.amount,
      transaction_date: donation.transactionDate,
      transaction_type: donation.transactionType,
      filing_id: donation.filingId,
      memo_text: donation.memoText,
      dedup_key: donation.dedupKey,
    });
  }

  await context.merge(rows, DONATION_MERGE);
}

async function fetchColumns(context: JobContext): Promise<string[]> {
  const url = context.config.sources.fecHeaderUrl;
  const text = await context.fetcher.fetchText(url, {
    signal: context.signal,
  });
  if (text === null) {
    throw new Error(`Header definition unavailable: ${url}`);
  }
  const columns = parseHeaderDefinition(text);
  if (columns.length === 0) {
    throw new Error(`Header definition has no columns: ${url}`);
  }
  return columns;
}

/**
 * Contributions from the cycle's bulk archive, streamed row by row. Only
 * rows dated inside the window and addressed to a tracked legislator's
 * committee are kept; donors are created as they first appear.
 */
export const donationsJob: SyncJob = {
  entityType: "donations",

  async run(context) {
    const { config, fetcher, signal } = context;
    const columns = await fetchColumns(context);

    const archiveUrl = donationArchiveUrl(
      config.sources.fecBulkBaseUrl,
      config.sources.fecCycle
    );
    const download = await fetcher.openStream(archiveUrl, { signal });
    if (download === null) {
      throw new Error(`Archive unavailable: ${archiveUrl}`);
    }

    const entry = download.pipe(unzipper.ParseOne(/\.txt$/i));
    download.on("error", (error) => {
      entry.destroy(error);
    });

    const resolver = await IdentityResolver.load(
      context.db,
      ["legislator-by-fec-committee"],
      context.upsert
    );
    const windowStart = context.since.toISOString().slice(0, 10);
    const batchSize = config.batchSizes.donations;

    let batch: PendingDonation[] = [];
    let rowsRead = 0;

    try {
      for await (const row of streamDelimitedRows(entry, columns)) {
        rowsRead++;

        const donation = normalize({ kind: "donation-row", row });
        if (donation === null) {
          context.skips.add("invalid-row");
          continue;
        }
        if (
          donation.transactionDate !== null &&
          donation.transactionDate < windowStart
        ) {
          context.skips.add("before-window");
          continue;
        }
        const legislatorId = resolver.resolve(
          donation.recipientCommitteeId,
          "legislator-by-fec-committee"
        );
        if (legislatorId === null) {
          context.skips.add("untracked-recipient");
          continue;
        }

        batch.push({ donation, legislatorId });
        if (batch.length >= batchSize) {
          signal.throwIfAborted();
          await flush(context, resolver, batch);
          batch = [];
          context.progress(`${rowsRead.toLocaleString()} rows read`);
        }
      }

      signal.throwIfAborted();
      if (batch.length > 0) {
        await flush(context, resolver, batch);
      }
    } finally {
      entry.destroy();
      download.destroy();
    }

    context.log.info({ rowsRead }, "Archive processed");
  },
};
