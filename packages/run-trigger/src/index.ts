import dotenv from "dotenv";
import { createArrRotatorEventProducer, loadConfig, LoggerService, toError } from "arr-rotator-commons";
import { parseTriggerArgs } from "./args";

dotenv.config();

const logger = new LoggerService("run-trigger");

async function main() {
  const config = loadConfig();
  if (!config.redisUrl) throw new Error("REDIS_URL is not set; the scheduler cannot be reached.");

  const args = parseTriggerArgs(process.argv.slice(2));
  const producer = createArrRotatorEventProducer(config.redisUrl, (e) => logger.warn(`Event bus: ${e.message}`));
  try {
    await producer.produceEvent({
      type: "run_requested",
      data: args,
      timestamp: new Date().toISOString(),
    });
    logger.info(`Requested a run for ${args.apps?.join(", ") ?? "all apps"}`);
  } finally {
    await producer.close();
  }
}

main().catch((e) => {
  logger.error(toError(e).message);
  process.exit(1);
});
