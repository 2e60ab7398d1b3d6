import cron from "node-cron";
import { createPool, verifyDatabase } from "./db/pool";
import { PgStore } from "./db/pg-store";
import { runFollowupSweep } from "./scheduler";
import { gmailReplyFetcher } from "./services/gmail.service";
import { config } from "./utils/config";
import { logger } from "./utils/logger";

async function main() {
  logger.info("Outreach follow-up daemon starting up...");

  const pool = createPool(config.database.url);
  const dbOk = await verifyDatabase(pool);
  if (!dbOk) {
    logger.error("Database verification failed. Please check your schema.");
    await pool.end();
    process.exit(1);
  }

  const store = new PgStore(pool);
  const sweep = () =>
    runFollowupSweep({
      store,
      fetchReplies: gmailReplyFetcher(config.gmail),
      thresholdDays: config.followup.thresholdDays,
      staleDays: config.followup.staleDays,
      replyWindowDays: config.followup.replyWindowDays,
    });

  logger.info("Running initial follow-up sweep...");
  await sweep();

  logger.info(`Scheduling cron: ${config.cron.schedule}`);
  cron.schedule(config.cron.schedule, async () => {
    logger.info("Cron triggered - running follow-up sweep...");
    try {
      await sweep();
    } catch (error) {
      logger.error("Cron run failed", error);
    }
  });

  logger.info("Follow-up daemon is running. Press Ctrl+C to stop.");
}

main().catch((error) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
