import axios from "axios";
import Parser from "rss-parser";
import { FEED } from "./config";
import { FeedEntrySchema, isEntryFor, localDateKey } from "../lib/feed_entry";
import { NotFoundError } from "../lib/errors";
import { logger } from "../lib/logger";
import type { FeedEntry } from "../types/feed";

type AtomItem = { updated?: string; summary?: string; title?: string };

const parser = new Parser<Record<string, unknown>, AtomItem>({
  customFields: { item: ["updated"] },
});

/** Fetch the raw Atom document */
export async function fetchFeedXml(url: string): Promise<string> {
  const { data } = await axios.get<string>(url, {
    timeout: FEED.timeoutMs,
    responseType: "text",
    headers: { "User-Agent": FEED.userAgent },
  });
  return data;
}

/** Parse the Atom document into feed entries, dropping items we can't use */
export async function parseFeedXml(xml: string): Promise<FeedEntry[]> {
  const feed = await parser.parseString(xml);
  const entries: FeedEntry[] = [];
  for (const item of feed.items) {
    const res = FeedEntrySchema.safeParse({
      updated: item.updated,
      summary: item.summary,
      title: item.title,
    });
    if (res.success) entries.push(res.data);
    else logger.warn({ title: item.title }, "[feed] skipping malformed item");
  }
  return entries;
}

/** The "updated" timestamp always carries the day the entry is about */
export function pickEntryForDate(entries: FeedEntry[], now: Date): FeedEntry {
  const match = entries.find((e) => isEntryFor(e, now));
  if (!match) {
    throw new NotFoundError(
      `Could not find feed entry for ${localDateKey(now)} (${entries.length} items in feed)`
    );
  }
  return match;
}

export async function loadEntryForToday(
  url: string,
  now: Date = new Date()
): Promise<FeedEntry> {
  const xml = await fetchFeedXml(url);
  const entries = await parseFeedXml(xml);
  logger.info({ url, items: entries.length }, "[feed] loaded");
  return pickEntryForDate(entries, now);
}
