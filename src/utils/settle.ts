/**
 * Isolated fan-out
 * Runs independent tasks under a concurrency ceiling and collects an outcome for each
 */

import pLimit from "p-limit";
import type { Outcome } from "../types";

/**
 * Run `task` over every item; a failure never cancels or delays its siblings.
 *
 * Outcomes come back in input order, tagged with the item's subject (usually its URL).
 */
export async function settle<T, R>(
  items: readonly T[],
  subject: (item: T) => string,
  task: (item: T) => Promise<R>,
  concurrency: number = Infinity,
): Promise<Outcome<R>[]> {
  const limit = pLimit(Math.max(1, concurrency));

  return Promise.all(
    items.map((item) =>
      limit(async (): Promise<Outcome<R>> => {
        try {
          return { ok: true, subject: subject(item), value: await task(item) };
        } catch (error) {
          return { ok: false, subject: subject(item), error };
        }
      }),
    ),
  );
}
