/**
 * publication planning: pure categorization of records for the page.
 *
 * thisWeek: live records whose target falls in the current week window.
 * upcoming: live records outside the window with target >= today.
 * live records already past and outside the window appear in neither.
 */

import { weekWindow, type IsoDate, type Weekday, type WeekWindow } from "./dates.js";
import { isExpired } from "./record.js";
import { normalizeText } from "./reconcile.js";
import type { EventRecord, MalformedDocument, StoreSnapshot } from "./schema.js";

export interface PlanOptions {
  weekStart: Weekday;
}

export interface PublicationPlan {
  thisWeek: EventRecord[];
  upcoming: EventRecord[];
  /** expired plus malformed documents. */
  excludedCount: number;
  window: WeekWindow;
  malformed: MalformedDocument[];
}

export function compareForPage(a: EventRecord, b: EventRecord): number {
  if (a.target !== b.target) return a.target < b.target ? -1 : 1;

  const titleA = normalizeText(a.title);
  const titleB = normalizeText(b.title);
  if (titleA === titleB) return 0;
  if (!titleA) return 1;
  if (!titleB) return -1;
  return titleA < titleB ? -1 : 1;
}

export function planPublication(
  today: IsoDate,
  snapshot: StoreSnapshot,
  options: PlanOptions,
): PublicationPlan {
  const window = weekWindow(today, options.weekStart);
  const live = snapshot.records.filter((record) => !isExpired(record, today));

  const thisWeek: EventRecord[] = [];
  const upcoming: EventRecord[] = [];

  for (const record of live) {
    if (record.target >= window.start && record.target <= window.end) {
      thisWeek.push(record);
    } else if (record.target >= today) {
      upcoming.push(record);
    }
  }

  return {
    thisWeek: thisWeek.sort(compareForPage),
    upcoming: upcoming.sort(compareForPage),
    excludedCount: snapshot.records.length - live.length + snapshot.malformed.length,
    window,
    malformed: snapshot.malformed,
  };
}
