/**
 * Committee manifests: a YAML list of committees with nested
 * subcommittees, and a YAML map of committee id to member list.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";

import type { CommitteeSide } from "../../../db/types.js";
import type {
  CanonicalAssignment,
  CanonicalCommittee,
  CommitteeRoster,
  CommitteeType,
  MembershipRoster,
} from "../../../types/index.js";

// ============================================================================
// Schemas
// ============================================================================

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Optional(Type.Union([schema, Type.Null()]));

const SubcommitteeSchema = Type.Object({
  thomas_id: Type.Union([Type.String({ minLength: 1 }), Type.Integer()]),
  name: Type.String({ minLength: 1 }),
  url: Nullable(Type.String()),
});

const CommitteeSchema = Type.Object({
  thomas_id: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  type: Nullable(Type.String()),
  url: Nullable(Type.String()),
  subcommittees: Nullable(Type.Array(Type.Unknown())),
});

const MemberSchema = Type.Object({
  name: Nullable(Type.String()),
  party: Nullable(Type.String()),
  rank: Nullable(Type.Integer()),
  title: Nullable(Type.String()),
  bioguide: Nullable(Type.String()),
});

type CommitteeEntry = Static<typeof CommitteeSchema>;

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readYaml(text: string): unknown {
  try {
    return parseYaml(text);
  } catch {
    return null;
  }
}

export function classifyCommittee(
  name: string,
  chamber: string | null,
  isSubcommittee: boolean
): CommitteeType {
  if (isSubcommittee) {
    return "subcommittee";
  }
  if (chamber === "joint") {
    return "joint";
  }
  if (/\bselect\b/i.test(name)) {
    return "select";
  }
  if (/\bspecial\b/i.test(name)) {
    return "special";
  }
  return "standing";
}

function flattenCommittee(entry: CommitteeEntry): CanonicalCommittee[] {
  const externalId = entry.thomas_id.trim();
  const chamber = entry.type?.trim().toLowerCase() ?? null;

  const rows: CanonicalCommittee[] = [
    {
      kind: "committee",
      externalId,
      name: entry.name.trim(),
      chamber,
      committeeType: classifyCommittee(entry.name, chamber, false),
      url: entry.url ?? null,
      parentExternalId: null,
    },
  ];

  for (const raw of entry.subcommittees ?? []) {
    if (!Value.Check(SubcommitteeSchema, raw)) {
      continue;
    }
    rows.push({
      kind: "committee",
      externalId: `${externalId}${String(raw.thomas_id).trim()}`,
      name: raw.name.trim(),
      chamber,
      committeeType: "subcommittee",
      url: raw.url ?? null,
      parentExternalId: externalId,
    });
  }

  return rows;
}

function toSide(party: string | null | undefined): CommitteeSide | null {
  const normalized = party?.trim().toLowerCase();
  return normalized === "majority" || normalized === "minority"
    ? normalized
    : null;
}

// ============================================================================
// Parsers
// ============================================================================

/**
 * Flatten the committee manifest. Subcommittee ids are the parent id
 * followed by the local id, so the same manifest always yields the same
 * rows in the same order. Null when the text is not a committee list.
 */
export function parseCommitteeManifest(text: string): CommitteeRoster | null {
  const document = readYaml(text);
  if (!Array.isArray(document)) {
    return null;
  }

  const committees: CanonicalCommittee[] = [];
  for (const entry of document) {
    if (Value.Check(CommitteeSchema, entry)) {
      committees.push(...flattenCommittee(entry));
    }
  }

  return { kind: "committee-roster", committees };
}

/**
 * Assignment rows from the membership manifest. Members without a bioguide
 * id are counted in `incomplete`, never emitted.
 */
export function parseMembershipManifest(text: string): MembershipRoster | null {
  const document = readYaml(text);
  if (!isRecord(document)) {
    return null;
  }

  const assignments: CanonicalAssignment[] = [];
  let incomplete = 0;

  for (const [committeeExternalId, members] of Object.entries(document)) {
    if (!Array.isArray(members)) {
      continue;
    }
    for (const member of members) {
      if (!Value.Check(MemberSchema, member)) {
        incomplete++;
        continue;
      }
      const bioguideId = member.bioguide?.trim() ?? "";
      if (bioguideId === "") {
        incomplete++;
        continue;
      }
      assignments.push({
        kind: "assignment",
        committeeExternalId,
        bioguideId,
        rank: member.rank ?? null,
        role: member.title?.trim() ?? "Member",
        side: toSide(member.party),
      });
    }
  }

  return { kind: "membership-roster", assignments, incomplete };
}
