import { z } from "zod";
import type { FeedEntry } from "../types/feed";

const TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

export const FeedEntrySchema = z.object({
  updated: z.string().regex(TIMESTAMP, "expected YYYY-MM-DDTHH:MM:SSZ"),
  summary: z.string(),
  title: z.string().optional(),
});

/** The calendar day a feed entry is about, as YYYY-MM-DD */
export function entryDate(updated: string): string {
  return updated.slice(0, 10);
}

/** Local calendar day of `now`, as YYYY-MM-DD */
export function localDateKey(now: Date): string {
  const mm = String(now.getMonth() + 1).padStart(2, "0");
  const dd = String(now.getDate()).padStart(2, "0");
  return `${now.getFullYear()}-${mm}-${dd}`;
}

export function isEntryFor(entry: FeedEntry, now: Date): boolean {
  return entryDate(entry.updated) === localDateKey(now);
}
