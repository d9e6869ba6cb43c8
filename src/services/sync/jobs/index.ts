import { billsJob } from "./bills.js";
import { committeesJob } from "./committees.js";
import { cosponsorsJob } from "./cosponsors.js";
import { donationsJob } from "./donations.js";
import { sponsorsJob } from "./sponsors.js";
import { votesJob } from "./votes.js";

import type { SyncEntityType } from "../../../types/index.js";
import type { SyncJob } from "../job.js";

export const SYNC_JOBS: Record<SyncEntityType, SyncJob> = {
  bills: billsJob,
  sponsors: sponsorsJob,
  cosponsors: cosponsorsJob,
  votes: votesJob,
  committees: committeesJob,
  donations: donationsJob,
};

export {
  billsJob,
  committeesJob,
  cosponsorsJob,
  donationsJob,
  sponsorsJob,
  votesJob,
};
