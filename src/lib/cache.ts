import { promises as fs } from "fs";
import type { FeedEntry } from "../types/feed";
import { FeedEntrySchema, entryDate, isEntryFor, localDateKey } from "./feed_entry";
import { logger } from "./logger";

const log = logger.child({ module: "cache" });

export type CacheRead =
  | { kind: "hit"; entry: FeedEntry }
  | { kind: "miss"; reason: string };

/** Read the single cached feed entry. Any failure is a miss, never a throw. */
export async function readCachedEntry(path: string): Promise<CacheRead> {
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf8");
  } catch (e: unknown) {
    const code = e instanceof Error && "code" in e ? String(e.code) : "unknown";
    return {
      kind: "miss",
      reason: code === "ENOENT" ? "no cache file" : `unreadable (${code})`,
    };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { kind: "miss", reason: "invalid json" };
  }

  const parsed = FeedEntrySchema.safeParse(json);
  if (!parsed.success) return { kind: "miss", reason: "unexpected shape" };
  return { kind: "hit", entry: parsed.data };
}

export async function writeCachedEntry(path: string, entry: FeedEntry) {
  await fs.writeFile(path, JSON.stringify(entry), "utf8");
}

/**
 * Today's feed entry from the cache slot, or a fresh one from `loader`.
 * A fresh entry always overwrites the slot, whatever its date.
 */
export async function getOrRefresh(
  path: string,
  loader: () => Promise<FeedEntry>,
  now: Date = new Date()
): Promise<FeedEntry> {
  const cached = await readCachedEntry(path);
  if (cached.kind === "hit" && isEntryFor(cached.entry, now)) {
    log.debug({ path, updated: cached.entry.updated }, "cache hit");
    return cached.entry;
  }

  log.info(
    {
      path,
      reason:
        cached.kind === "miss"
          ? cached.reason
          : `stale (${entryDate(cached.entry.updated)} != ${localDateKey(now)})`,
    },
    "cache miss, loading feed"
  );
  const entry = await loader();
  await writeCachedEntry(path, entry);
  return entry;
}
