/**
 * Roll-call vote records (one flat JSON document per roll call).
 */

import { Type, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type { RollCallChamber } from "../../../db/types.js";
import type {
  BillRef,
  CanonicalRollCall,
  VotePosition,
} from "../../../types/index.js";

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Optional(Type.Union([schema, Type.Null()]));

const NumberLike = Type.Union([
  Type.Integer({ minimum: 1 }),
  Type.String({ pattern: "^[0-9]+$" }),
]);

const RollCallSchema = Type.Object({
  vote_id: Type.String({ minLength: 1 }),
  chamber: Type.Union([Type.Literal("h"), Type.Literal("s")]),
  number: NumberLike,
  congress: NumberLike,
  session: Nullable(Type.Union([Type.String(), Type.Integer()])),
  date: Nullable(Type.String()),
  category: Nullable(Type.String()),
  question: Nullable(Type.String()),
  result: Nullable(Type.String()),
  bill: Nullable(Type.Unknown()),
  votes: Nullable(Type.Record(Type.String(), Type.Array(Type.Unknown()))),
});

const BillRefSchema = Type.Object({
  type: Type.String({ pattern: "^[A-Za-z]+$" }),
  number: NumberLike,
  congress: NumberLike,
});

const VoterSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
});

function parseBillRef(value: unknown): BillRef | null {
  if (!Value.Check(BillRefSchema, value)) {
    return null;
  }
  return {
    billType: value.type.toUpperCase(),
    number: Number(value.number),
    congress: Number(value.congress),
  };
}

function sessionYear(
  session: string | number | null | undefined,
  date: string | null
): number | null {
  const candidates = [
    session === null || session === undefined ? "" : String(session),
    date?.slice(0, 4) ?? "",
  ];
  const year = candidates.find((candidate) => /^\d{4}$/.test(candidate));
  return year === undefined ? null : Number(year);
}

/**
 * One roll call and its per-legislator positions. Voters that are not
 * objects (the presiding officer appears as a bare string) are dropped.
 * Null when the id, chamber, number, congress or year is missing.
 */
export function parseVoteRecord(body: unknown): CanonicalRollCall | null {
  if (!Value.Check(RollCallSchema, body)) {
    return null;
  }

  const date = body.date?.slice(0, 10) ?? null;
  const year = sessionYear(body.session, date);
  if (year === null) {
    return null;
  }

  const chamber: RollCallChamber = body.chamber;
  const positions: VotePosition[] = [];
  for (const [position, voters] of Object.entries(body.votes ?? {})) {
    for (const voter of voters) {
      if (Value.Check(VoterSchema, voter)) {
        positions.push({ bioguideId: voter.id.trim(), position });
      }
    }
  }

  return {
    kind: "roll-call",
    rollCallId: body.vote_id.trim(),
    chamber,
    rollNumber: Number(body.number),
    congress: Number(body.congress),
    sessionYear: year,
    date,
    category: body.category ?? null,
    question: body.question ?? null,
    result: body.result ?? null,
    bill: parseBillRef(body.bill),
    positions,
  };
}
