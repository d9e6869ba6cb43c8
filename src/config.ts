import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigurationError } from "./errors.js";
import { DEFAULT_FETCH_POLICY, type FetchPolicy } from "./scraper/fetcher.js";

import type { EntityType } from "./types/index.js";

// ============================================================================
// Environment Schema
// ============================================================================

const Integer = Type.String({ pattern: "^[0-9]+$" });
const IntegerList = Type.String({ pattern: "^[0-9]+(\\s*,\\s*[0-9]+)*$" });
const Url = Type.String({ pattern: "^https?://" });

const EnvSchema = Type.Object({
  DATABASE_URL: Type.Optional(Type.String({ pattern: "^postgres(ql)?://" })),
  CONGRESS_API_KEY: Type.Optional(Type.String()),
  CONGRESS_API_BASE_URL: Type.Optional(Url),
  SYNC_CONGRESSES: Type.Optional(IntegerList),
  CURRENT_CONGRESS: Type.Optional(Integer),
  VOTES_BASE_URL: Type.Optional(Url),
  VOTE_SCAN_MISSES: Type.Optional(Integer),
  COMMITTEES_URL: Type.Optional(Url),
  COMMITTEE_MEMBERSHIP_URL: Type.Optional(Url),
  FEC_BULK_BASE_URL: Type.Optional(Url),
  FEC_HEADER_URL: Type.Optional(Url),
  FEC_CYCLE: Type.Optional(Integer),
  PAGE_SIZE: Type.Optional(Integer),
  PAGE_DELAY_MS: Type.Optional(Integer),
  RATE_LIMIT_COOLDOWN_MS: Type.Optional(Integer),
  NETWORK_RETRY_DELAYS_MS: Type.Optional(IntegerList),
  JOB_TIMEOUT_MINUTES: Type.Optional(Integer),
  SPONSOR_BATCH_SIZE: Type.Optional(Integer),
  COSPONSOR_BATCH_SIZE: Type.Optional(Integer),
  DONATION_BATCH_SIZE: Type.Optional(Integer),
  LOOKBACK_DAYS_BILLS: Type.Optional(Integer),
  LOOKBACK_DAYS_SPONSORS: Type.Optional(Integer),
  LOOKBACK_DAYS_COSPONSORS: Type.Optional(Integer),
  LOOKBACK_DAYS_VOTES: Type.Optional(Integer),
  LOOKBACK_DAYS_COMMITTEES: Type.Optional(Integer),
  LOOKBACK_DAYS_DONATIONS: Type.Optional(Integer),
  LOOKBACK_DAYS_EMBEDDINGS: Type.Optional(Integer),
  OPENAI_API_KEY: Type.Optional(Type.String()),
  EMBEDDING_MODEL: Type.Optional(Type.String({ minLength: 1 })),
  EMBEDDING_TIERS: Type.Optional(IntegerList),
});

type Env = Static<typeof EnvSchema>;

// ============================================================================
// Application Config
// ============================================================================

export interface AppConfig {
  databaseUrl: string;
  congressApi: {
    baseUrl: string;
    apiKey: string | null;
  };
  /** Congresses whose bills are listed by the bills job. */
  congresses: number[];
  /** Congress used for roll-call probing and committee assignments. */
  currentCongress: number;
  sources: {
    votesUrlTemplate: string;
    committeesUrl: string;
    membershipUrl: string;
    fecBulkBaseUrl: string;
    fecHeaderUrl: string;
    fecCycle: number;
  };
  fetchPolicy: FetchPolicy;
  jobTimeoutMs: number;
  batchSizes: {
    sponsors: number;
    cosponsors: number;
    donations: number;
  };
  voteScanMisses: number;
  lookbackDays: Partial<Record<EntityType, number>>;
  embeddings: {
    apiKey: string | null;
    model: string;
    tiers: number[];
    minSummaryLength: number;
  };
}

export const DEFAULT_DATABASE_URL = "postgresql://localhost:5432/legislative";

const DEFAULT_CONGRESS = 119;

function toInt(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number.parseInt(value, 10);
}

function toIntList(value: string | undefined, fallback: number[]): number[] {
  if (value === undefined) {
    return fallback;
  }
  return value.split(",").map((part) => Number.parseInt(part.trim(), 10));
}

function nonEmpty(value: string | undefined): string | null {
  return value === undefined || value.trim() === "" ? null : value.trim();
}

function lookbackDays(env: Env): Partial<Record<EntityType, number>> {
  const entries: [EntityType, string | undefined][] = [
    ["bills", env.LOOKBACK_DAYS_BILLS],
    ["sponsors", env.LOOKBACK_DAYS_SPONSORS],
    ["cosponsors", env.LOOKBACK_DAYS_COSPONSORS],
    ["votes", env.LOOKBACK_DAYS_VOTES],
    ["committees", env.LOOKBACK_DAYS_COMMITTEES],
    ["donations", env.LOOKBACK_DAYS_DONATIONS],
    ["embeddings", env.LOOKBACK_DAYS_EMBEDDINGS],
  ];

  const result: Partial<Record<EntityType, number>> = {};
  for (const [entityType, value] of entries) {
    if (value !== undefined) {
      result[entityType] = Number.parseInt(value, 10);
    }
  }
  return result;
}

/**
 * Build the application config from environment variables.
 *
 * Credentials stay optional here; each job checks the ones it needs so a
 * missing FEC or OpenAI setting never blocks the bill jobs.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  if (!Value.Check(EnvSchema, env)) {
    const first = Value.Errors(EnvSchema, env).First();
    const variable = first?.path.replace(/^\//, "") ?? "environment";
    throw new ConfigurationError(
      `Invalid ${variable}: ${first?.message ?? "unexpected value"}`
    );
  }

  const tiers = toIntList(env.EMBEDDING_TIERS, [32_000, 20_000, 10_000]);
  if (tiers.some((tier) => tier <= 0)) {
    throw new ConfigurationError("EMBEDDING_TIERS must be positive");
  }

  const currentCongress = toInt(env.CURRENT_CONGRESS, DEFAULT_CONGRESS);
  const fecCycle = toInt(env.FEC_CYCLE, 2026);
  if (fecCycle % 2 !== 0) {
    throw new ConfigurationError(
      `FEC_CYCLE must be an even election year, got ${String(fecCycle)}`
    );
  }

  return {
    databaseUrl: env.DATABASE_URL ?? DEFAULT_DATABASE_URL,
    congressApi: {
      baseUrl: env.CONGRESS_API_BASE_URL ?? "https://api.congress.gov/v3",
      apiKey: nonEmpty(env.CONGRESS_API_KEY),
    },
    congresses: toIntList(env.SYNC_CONGRESSES, [currentCongress]),
    currentCongress,
    sources: {
      votesUrlTemplate:
        env.VOTES_BASE_URL ??
        "https://www.govtrack.us/data/congress/{congress}/votes/{year}/{chamber}{number}/data.json",
      committeesUrl:
        env.COMMITTEES_URL ??
        "https://raw.githubusercontent.com/unitedstates/congress-legislators/main/committees-current.yaml",
      membershipUrl:
        env.COMMITTEE_MEMBERSHIP_URL ??
        "https://raw.githubusercontent.com/unitedstates/congress-legislators/main/committee-membership-current.yaml",
      fecBulkBaseUrl:
        env.FEC_BULK_BASE_URL ?? "https://www.fec.gov/files/bulk-downloads",
      fecHeaderUrl:
        env.FEC_HEADER_URL ??
        "https://www.fec.gov/files/bulk-downloads/data_dictionaries/indiv_header_file.csv",
      fecCycle,
    },
    fetchPolicy: {
      pageSize: toInt(env.PAGE_SIZE, DEFAULT_FETCH_POLICY.pageSize),
      pageDelayMs: toInt(env.PAGE_DELAY_MS, DEFAULT_FETCH_POLICY.pageDelayMs),
      rateLimitCooldownMs: toInt(
        env.RATE_LIMIT_COOLDOWN_MS,
        DEFAULT_FETCH_POLICY.rateLimitCooldownMs
      ),
      networkRetryDelaysMs: toIntList(
        env.NETWORK_RETRY_DELAYS_MS,
        DEFAULT_FETCH_POLICY.networkRetryDelaysMs
      ),
    },
    jobTimeoutMs: toInt(env.JOB_TIMEOUT_MINUTES, 120) * 60_000,
    batchSizes: {
      sponsors: toInt(env.SPONSOR_BATCH_SIZE, 500),
      cosponsors: toInt(env.COSPONSOR_BATCH_SIZE, 500),
      donations: toInt(env.DONATION_BATCH_SIZE, 5000),
    },
    voteScanMisses: toInt(env.VOTE_SCAN_MISSES, 3),
    lookbackDays: lookbackDays(env),
    embeddings: {
      apiKey: nonEmpty(env.OPENAI_API_KEY),
      model: env.EMBEDDING_MODEL ?? "text-embedding-3-small",
      tiers,
      minSummaryLength: 10,
    },
  };
}

/**
 * Fail fast when a job needs a credential that is not configured.
 */
export function requireSetting(value: string | null, name: string): string {
  if (value === null) {
    throw new ConfigurationError(`${name} is not set`);
  }
  return value;
}
