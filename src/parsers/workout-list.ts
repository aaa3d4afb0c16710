import * as cheerio from "cheerio";
import type { WorkItemId } from "../types";

const WORKOUT_ID_PATTERN = /\/workouts\/(\d+)(?:[?#&]|$)/;
const PAGE_PATTERN = /[?&]page=(\d+)/;

/**
 * Workout ids linked from a workout list page
 * Pattern: table.content rows linking to /workouts/<id>; pagination, new and edit links are ignored.
 * Returns unique ids, highest first.
 */
export function extractWorkoutIds(html: string): WorkItemId[] {
  const $ = cheerio.load(html);
  const ids = new Set<WorkItemId>();

  $("table.content a[href*='/workouts/']").each((_, element) => {
    const $link = $(element);
    if ($link.closest("div.pagination").length > 0) return;

    const href = $link.attr("href") ?? "";
    if (href.includes("/new") || href.includes("/edit")) return;

    const match = WORKOUT_ID_PATTERN.exec(href);
    if (match) {
      ids.add(Number(match[1]));
    }
  });

  return [...ids].sort((a, b) => b - a);
}

/**
 * Highest page number offered by the pagination controls, 1 when there are none
 */
export function extractLastPage(html: string): number {
  const $ = cheerio.load(html);
  let last = 1;

  $("div.pagination a[href]").each((_, element) => {
    const match = PAGE_PATTERN.exec($(element).attr("href") ?? "");
    if (match) {
      last = Math.max(last, Number(match[1]));
    }
  });

  return last;
}
