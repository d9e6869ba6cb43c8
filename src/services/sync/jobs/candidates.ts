import type { Database } from "../../../db/types.js";
import type { Expression, ExpressionBuilder, Kysely, SqlBool } from "kysely";

export interface BillCandidate {
  id: number;
  bill_number: string;
  bill_type: string | null;
  congress: number;
}

export type CandidateFilter = (
  eb: ExpressionBuilder<Database, "bills">
) => Expression<SqlBool>;

/**
 * Bills of the given congresses matching `filter`, in id order, one page of
 * at most `pageSize` rows at a time until none are left. The cursor is the
 * last id handed out, so rows the caller updates between pages are neither
 * repeated nor skipped.
 */
export async function* billCandidatePages(
  db: Kysely<Database>,
  options: {
    congresses: readonly number[];
    pageSize: number;
    filter: CandidateFilter;
  }
): AsyncGenerator<BillCandidate[]> {
  let afterId = 0;

  for (;;) {
    const page = await db
      .selectFrom("bills")
      .select(["id", "bill_number", "bill_type", "congress"])
      .where("congress", "in", [...options.congresses])
      .where("id", ">", afterId)
      .where(options.filter)
      .orderBy("id", "asc")
      .limit(options.pageSize)
      .execute();

    const last = page.at(-1);
    if (last === undefined) {
      return;
    }
    yield page;

    if (page.length < options.pageSize) {
      return;
    }
    afterId = last.id;
  }
}

export function billTypeOf(candidate: BillCandidate): string {
  return (
    candidate.bill_type ?? /^[A-Za-z]+/.exec(candidate.bill_number)?.[0] ?? ""
  );
}
