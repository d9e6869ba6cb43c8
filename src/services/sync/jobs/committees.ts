import { IdentityResolver } from "../identity.js";
import { normalize } from "../normalize/index.js";

import type { JobContext, SyncJob } from "../job.js";
import type { MergeSpec, Row } from "../upsert.js";

export const COMMITTEE_MERGE: MergeSpec = {
  table: "committees",
  naturalKey: ["external_id"],
  update: ["name", "chamber", "committee_type", "url"],
  overwrite: ["parent_external_id"],
  touch: "updated_at",
};

export const ASSIGNMENT_MERGE: MergeSpec = {
  table: "committee_assignments",
  naturalKey: ["legislator_id", "committee_id", "congress"],
  overwrite: ["rank", "role", "side"],
};

async function fetchManifest(
  context: JobContext,
  url: string
): Promise<string> {
  const text = await context.fetcher.fetchText(url, { signal: context.signal });
  if (text === null) {
    throw new Error(`Manifest unavailable: ${url}`);
  }
  return text;
}

/**
 * Both manifests describe only the current state, so every run re-reads
 * them whole. Assignments land under the configured current congress.
 */
export const committeesJob: SyncJob = {
  entityType: "committees",

  async run(context) {
    const { config, db } = context;

    const committeeText = await fetchManifest(
      context,
      config.sources.committeesUrl
    );
    const roster = normalize({
      kind: "committee-manifest",
      text: committeeText,
    });
    if (roster === null) {
      throw new Error("Committee manifest is not a committee list");
    }

    const committeeRows: Row[] = roster.committees.map((committee) => ({
      external_id: committee.externalId,
      name: committee.name,
      chamber: committee.chamber,
      committee_type: committee.committeeType,
      url: committee.url,
      parent_external_id: committee.parentExternalId,
    }));
    await context.merge(committeeRows, COMMITTEE_MERGE);
    context.progress(`${String(committeeRows.length)} committees`);

    const membershipText = await fetchManifest(
      context,
      config.sources.membershipUrl
    );
    const membership = normalize({
      kind: "membership-manifest",
      text: membershipText,
    });
    if (membership === null) {
      throw new Error("Membership manifest is not a committee map");
    }
    context.skips.add("incomplete-member", membership.incomplete);

    // Reloaded after the merge so new committees resolve
    const resolver = await IdentityResolver.load(
      db,
      ["legislator", "committee"],
      context.upsert
    );

    const assignmentRows: Row[] = [];
    for (const assignment of membership.assignments) {
      const committeeId = resolver.resolve(
        assignment.committeeExternalId,
        "committee"
      );
      if (committeeId === null) {
        context.skips.add("unresolved-committee");
        continue;
      }
      const legislatorId = resolver.resolve(
        assignment.bioguideId,
        "legislator"
      );
      if (legislatorId === null) {
        context.skips.add("unresolved-legislator");
        continue;
      }
      assignmentRows.push({
        legislator_id: legislatorId,
        committee_id: committeeId,
        congress: config.currentCongress,
        rank: assignment.rank,
        role: assignment.role,
        side: assignment.side,
      });
    }

    await context.merge(assignmentRows, ASSIGNMENT_MERGE);
    context.progress(`${String(assignmentRows.length)} assignments`);
  },
};
