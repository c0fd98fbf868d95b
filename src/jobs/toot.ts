import { parseArgs } from "util";
import { ENV } from "../lib/env";
import { getOrRefresh } from "../lib/cache";
import { ConfigurationError } from "../lib/errors";
import { logger } from "../lib/logger";
import { createMastodonPublisher } from "../lib/mastodon";
import type { Publisher } from "../lib/mastodon";
import type { FeedEntry } from "../types/feed";
import { buildConfig } from "./config";
import type { BotConfig } from "./config";
import { formatPost } from "./format";
import { parseFeedEntry } from "./parse";
import { pickRecord, selectIndex, validateSchedule } from "./selector";
import { loadEntryForToday } from "./wikipedia";

/**
 * One run of the bot:
 * 1) Today's feed entry (cache slot, or the feed if the slot is stale)
 * 2) Parse it into events and check the schedule fits them
 * 3) Pick the event for this hour (or --item)
 * 4) Format and toot it, or just return the text on a dry run
 *
 * Notes:
 * - No process.exit() in runToot(); the CLI runner at the bottom owns exit codes
 * - Every error propagates: a missed slot is picked up by the next scheduled run
 */

export type TootOptions = {
  dryRun: boolean;
  item: number | null;
};

export type TootDeps = {
  loadFeed?: () => Promise<FeedEntry>;
  publisher?: Publisher;
  now?: Date;
};

export type TootResult =
  | { kind: "skipped"; hour: number }
  | { kind: "printed"; index: number; text: string }
  | { kind: "published"; index: number; id: string; text: string };

const log = logger.child({ job: "toot" });

function resolvePublisher(config: BotConfig, deps: TootDeps): Publisher {
  if (deps.publisher) return deps.publisher;
  if (!config.mastodon) {
    throw new ConfigurationError("Mastodon is not configured; cannot toot outside a dry run");
  }
  return createMastodonPublisher(config.mastodon);
}

export async function runToot(
  config: BotConfig,
  opts: TootOptions,
  deps: TootDeps = {}
): Promise<TootResult> {
  const now = deps.now ?? new Date();
  // before any network: no point fetching a feed we can't toot about
  const publisher = opts.dryRun ? null : resolvePublisher(config, deps);

  const loadFeed = deps.loadFeed ?? (() => loadEntryForToday(config.feedUrl, now));
  const entry = await getOrRefresh(config.cachePath, loadFeed, now);

  const records = parseFeedEntry(entry, { baseUrl: config.wikiBaseUrl });
  log.info({ updated: entry.updated, events: records.length }, "feed entry parsed");
  // an explicit --item bypasses the table; pickRecord bounds-checks it
  if (opts.item === null) validateSchedule(config.schedule, records.length);

  const hour = now.getHours();
  const index = selectIndex(opts.item, hour, config.schedule);
  if (index === null) {
    log.info({ hour }, "nothing scheduled");
    return { kind: "skipped", hour };
  }

  const record = pickRecord(records, index);
  const post = formatPost(record, now);

  if (!publisher) return { kind: "printed", index, text: post.text };

  const id = await publisher.publish(post);
  log.info({ index, id, year: record.year, image: !!post.image }, "tooted");
  return { kind: "published", index, id, text: post.text };
}

/** The line the CLI prints for a finished run */
export function describeResult(result: TootResult, stamp: string): string {
  switch (result.kind) {
    case "printed":
      return result.text;
    case "published":
      return `${stamp}: Successfully tooted!`;
    case "skipped":
      return `${stamp}: Nothing to toot about.`;
  }
}

export type CliArgs = TootOptions & { help: boolean };

export const USAGE = `Toot about events on this day

Usage: toot [--dry-run] [--item <index>]

  --dry-run        only print the content of the toot
  --item <index>   event to post; without it the hour-of-day schedule decides
  -h, --help       show this help`;

export function parseCliArgs(argv: string[]): CliArgs {
  let values: { "dry-run"?: boolean; item?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        "dry-run": { type: "boolean" },
        item: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }));
  } catch (e: unknown) {
    throw new ConfigurationError(e instanceof Error ? e.message : String(e));
  }

  let item: number | null = null;
  if (values.item !== undefined) {
    if (!/^\d+$/.test(values.item)) {
      throw new ConfigurationError(`--item expects a non-negative integer, got "${values.item}"`);
    }
    item = parseInt(values.item, 10);
  }

  return { dryRun: values["dry-run"] ?? false, item, help: values.help ?? false };
}

/** CLI runner for `npm run toot:once` */
if (require.main === module) {
  const run = async () => {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
      console.log(USAGE);
      return;
    }
    const config = buildConfig(ENV, { dryRun: args.dryRun });
    const result = await runToot(config, args);
    console.log(describeResult(result, new Date().toISOString()));
  };

  run()
    .then(() => process.exit(0))
    .catch((e: unknown) => {
      logger.error({ err: e }, "[toot] FATAL");
      process.exit(1);
    });
}
