import * as dotenv from "dotenv";
import os from "os";
import path from "path";
dotenv.config();

/** Everything the bot reads from the environment. Nothing here is required up front. */
export const ENV = {
  NODE_ENV: process.env.NODE_ENV ?? "development",
  LOG_LEVEL: process.env.LOG_LEVEL ?? "",
  MASTODON_ACCESS_TOKEN: process.env.MASTODON_ACCESS_TOKEN ?? "",
  MASTODON_BASE_URL: process.env.MASTODON_BASE_URL ?? "https://chaos.social",
  CACHE_FILE:
    process.env.CACHE_FILE ?? path.join(os.tmpdir(), "wikibot.cache"),
  FEED_URL: process.env.FEED_URL ?? "",
};

export type Env = typeof ENV;
