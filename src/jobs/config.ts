import { ConfigurationError } from "../lib/errors";
import type { Env } from "../lib/env";

export const FEED = {
  url: "https://de.wikipedia.org/w/api.php?action=featuredfeed&feed=onthisday&feedformat=atom",
  // hrefs and image sources in the summary are resolved against this
  baseUrl: "https://de.wikipedia.org",
  timeoutMs: 15000,
  userAgent: "onthisday-bot/1.0 (Mastodon bot)",
};

export type ScheduleTable = ReadonlyMap<number, number>; // hour of day -> event index

// Sized for the five events the feed publishes per day.
export const TOOT_SCHEDULE: ScheduleTable = new Map([
  [8, 0],
  [10, 1],
  [12, 2],
  [14, 3],
  [16, 4],
]);

export type Visibility = "public" | "unlisted" | "private" | "direct";

export type MastodonConfig = {
  baseUrl: string;
  accessToken: string;
  visibility: Visibility;
};

export type BotConfig = {
  feedUrl: string;
  wikiBaseUrl: string;
  cachePath: string;
  schedule: ScheduleTable;
  mastodon: MastodonConfig | null; // null only for dry runs
};

/** Turn the raw environment into the config the pipeline runs on */
export function buildConfig(env: Env, opts: { dryRun: boolean }): BotConfig {
  let mastodon: MastodonConfig | null = null;
  if (env.MASTODON_ACCESS_TOKEN) {
    mastodon = {
      baseUrl: env.MASTODON_BASE_URL,
      accessToken: env.MASTODON_ACCESS_TOKEN,
      visibility: "unlisted",
    };
  } else if (!opts.dryRun) {
    throw new ConfigurationError(
      "Mastodon access token missing. Please provide it as environment variable MASTODON_ACCESS_TOKEN"
    );
  }

  return {
    feedUrl: env.FEED_URL || FEED.url,
    wikiBaseUrl: FEED.baseUrl,
    cachePath: env.CACHE_FILE,
    schedule: TOOT_SCHEDULE,
    mastodon,
  };
}

/**
 * npm script the scheduler runs each tick. Compiled builds (dist/*.js) run
 * the compiled job, since tsx is a dev dependency and absent from
 * production installs.
 */
export function tootScriptFor(schedulerFile: string): "toot:prod" | "toot:once" {
  return schedulerFile.endsWith(".js") ? "toot:prod" : "toot:once";
}
