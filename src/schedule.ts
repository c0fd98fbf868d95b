import cron from "node-cron";
import { exec } from "child_process";
import { tootScriptFor } from "./jobs/config";
import { logger } from "./lib/logger";

const script = tootScriptFor(__filename);

/** Run one toot job as a child npm script; resolves with whether it exited cleanly */
function runTootJob(): Promise<boolean> {
  return new Promise((resolve) => {
    exec(`npm run ${script}`, { env: process.env }, (err, stdout, stderr) => {
      if (err) {
        logger.error({ script, code: err.code, stderr: stderr.trim() || stdout.trim() }, "toot run failed");
        resolve(false);
        return;
      }
      logger.info({ script, out: stdout.trim() }, "toot run finished");
      resolve(true);
    });
  });
}

// Stands in for a systemd timer: one toot run at the top of every hour.
// The toot job itself decides whether this hour has anything to post.
logger.info({ script }, "wikibot scheduler starting…");

let running = false;
cron.schedule("0 * * * *", async () => {
  if (running) {
    logger.warn("previous toot run still going, skipping this tick");
    return;
  }
  running = true;
  try {
    await runTootJob();
  } finally {
    running = false;
  }
});

// keep process alive
process.stdin.resume();
