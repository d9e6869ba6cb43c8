import { rollCallUrl } from "../../../scraper/sources.js";
import { billKey, IdentityResolver } from "../identity.js";
import { normalize } from "../normalize/index.js";

import type { RollCallChamber } from "../../../db/types.js";
import type { JobContext, SyncJob } from "../job.js";
import type { MergeSpec, Row } from "../upsert.js";

const CHAMBERS: readonly RollCallChamber[] = ["h", "s"];

export const ROLL_CALL_MERGE: MergeSpec = {
  table: "vote_roll_calls",
  naturalKey: ["roll_call_id"],
  update: ["vote_date", "category", "question", "result", "bill_id"],
};

export const VOTE_MERGE: MergeSpec = {
  table: "votes",
  naturalKey: ["roll_call_id", "legislator_id"],
  conflict: "ignore",
};

/**
 * Highest roll number stored for a chamber in the given congress and year.
 */
async function lastRollNumber(
  context: JobContext,
  chamber: RollCallChamber,
  year: number
): Promise<number> {
  const row = await context.db
    .selectFrom("vote_roll_calls")
    .select("roll_number")
    .where("congress", "=", context.config.currentCongress)
    .where("chamber", "=", chamber)
    .where("session_year", "=", year)
    .orderBy("roll_number", "desc")
    .limit(1)
    .executeTakeFirst();
  return row?.roll_number ?? 0;
}

async function ingestRollCall(
  context: JobContext,
  body: unknown,
  resolver: IdentityResolver
): Promise<void> {
  const rollCall = normalize({ kind: "vote-record", body });
  if (rollCall === null) {
    context.skips.add("invalid-vote");
    return;
  }

  let billId: number | null = null;
  if (rollCall.category === "nomination" || rollCall.bill === null) {
    context.skips.add("no-bill");
  } else {
    const { billType, number, congress } = rollCall.bill;
    billId = resolver.resolve(
      billKey(`${billType}${String(number)}`, congress),
      "bill"
    );
    if (billId === null) {
      context.skips.add("unresolved-bill");
    }
  }

  await context.merge(
    [
      {
        roll_call_id: rollCall.rollCallId,
        chamber: rollCall.chamber,
        congress: rollCall.congress,
        session_year: rollCall.sessionYear,
        roll_number: rollCall.rollNumber,
        vote_date: rollCall.date,
        category: rollCall.category,
        question: rollCall.question,
        result: rollCall.result,
        bill_id: billId,
      },
    ],
    ROLL_CALL_MERGE
  );

  if (billId === null) {
    return;
  }

  const rows: Row[] = [];
  for (const { bioguideId, position } of rollCall.positions) {
    const legislatorId = resolver.resolve(bioguideId, "legislator");
    if (legislatorId === null) {
      context.skips.add("unresolved-voter");
      continue;
    }
    rows.push({
      roll_call_id: rollCall.rollCallId,
      legislator_id: legislatorId,
      bill_id: billId,
      vote_date: rollCall.date,
      position,
      category: rollCall.category,
    });
  }

  await context.merge(rows, VOTE_MERGE);
}

/**
 * Roll calls are published one document per number with no listing, so
 * each chamber is scanned forward from the highest stored number until a
 * run of consecutive misses.
 */
export const votesJob: SyncJob = {
  entityType: "votes",

  async run(context) {
    const { config, fetcher, signal } = context;
    const year = context.startedAt.getUTCFullYear();
    const resolver = await IdentityResolver.load(
      context.db,
      ["legislator", "bill"],
      context.upsert
    );

    for (const chamber of CHAMBERS) {
      let next = (await lastRollNumber(context, chamber, year)) + 1;
      let misses = 0;
      let found = 0;

      context.log.debug({ chamber, year, from: next }, "Probing roll calls");

      while (misses < config.voteScanMisses) {
        signal.throwIfAborted();

        const url = rollCallUrl(config.sources.votesUrlTemplate, {
          congress: config.currentCongress,
          year,
          chamber,
          number: next,
        });
        const body = await fetcher.fetchDocument(url, { signal });
        next++;

        if (body === null) {
          misses++;
          continue;
        }

        misses = 0;
        found++;
        await ingestRollCall(context, body, resolver);
        context.progress(`${chamber}: ${String(found)} new roll calls`);
        await fetcher.pause(signal);
      }

      context.log.info({ chamber, year, found }, "Roll-call scan complete");
    }
  },
};
