import dotenv from "dotenv";
import {
  ConfigError,
  consumeArrRotatorEvents,
  createArrRotatorEventProducer,
  createRng,
  loadConfig,
  LoggerService,
  MIN_TICK_INTERVAL_MS,
  noopEventPublisher,
  PickerStateStore,
  ShuffleBagPicker,
  toError,
  type AppConfig,
  type AppKey,
  type ArrRotatorEvent,
  type EventPublisher,
} from "arr-rotator-commons";
import { match } from "ts-pattern";
import { runTick, type TickDeps } from "./tick";

dotenv.config();

/** -------------------- Setup -------------------- **/

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    new LoggerService("search-scheduler").error(e.message);
    process.exit(1);
  }
}

const config = loadConfigOrExit();
const logger = new LoggerService("search-scheduler", config.logLevel);
const store = new PickerStateStore(config.statePath, logger);
const rng = createRng(config.randomSeed);
const picker = new ShuffleBagPicker(store.state, { rng });
const publisher: EventPublisher = config.redisUrl
  ? createArrRotatorEventProducer(config.redisUrl, (e) => logger.warn(`Event bus (publish): ${e.message}`))
  : noopEventPublisher;

const deps: TickDeps = { config, logger, store, picker, publisher, rng };

logger.info(`State file: ${store.path} (${store.loadedFormat})`);
if (config.dryRun) logger.info("DRY_RUN enabled: no searches are posted and no cooldowns are recorded.");

/** -------------------- Scheduling -------------------- **/

let running = false;
let timer: NodeJS.Timeout | null = null;

async function runOnce(label: string, apps?: readonly AppKey[]) {
  if (running) {
    logger.info(`Skip tick (already running) [${label}]`);
    return;
  }
  running = true;
  const start = Date.now();
  try {
    const report = await runTick(deps, apps);
    logger.info(`Tick [${label}] finished in ${Date.now() - start}ms`, { picked: report.picked });
  } catch (e) {
    logger.error(`Tick [${label}] failed: ${toError(e).message}`);
  } finally {
    running = false;
  }
}

function intervalMs(): number {
  return Math.max(MIN_TICK_INTERVAL_MS, config.runIntervalMinutes * 60_000);
}

function scheduleNext() {
  if (timer) clearTimeout(timer);
  timer = setTimeout(() => {
    void runOnce("schedule").finally(scheduleNext);
  }, intervalMs());
}

/** -------------------- Event consumer -------------------- **/

async function handleEvent(event: ArrRotatorEvent): Promise<void> {
  await match<ArrRotatorEvent, Promise<void>>(event)
    .with({ type: "run_requested" }, async (e) => {
      logger.info(`run_requested by ${e.data.requestedBy}`, { apps: e.data.apps });
      await runOnce(`event:${e.data.requestedBy}`, e.data.apps);
    })
    .with({ type: "search_dispatched" }, { type: "items_promoted" }, async () => undefined)
    .exhaustive();
}

async function startConsumer(redisUrl: string) {
  await consumeArrRotatorEvents(redisUrl, handleEvent, {
    onInvalid: (message) => logger.warn(`Ignoring invalid event: ${message}`),
    onError: (error, event) => logger.error(`Handling ${event.type} failed: ${toError(error).message}`),
    onConnectionError: (error) => logger.warn(`Event bus (subscribe): ${error.message}`),
  });
  logger.info("Listening for run requests on the event bus.");
}

/** -------------------- Main -------------------- **/

function setupSignals() {
  const stop = (sig: string) => {
    logger.info(`Stopping on ${sig}…`);
    if (timer) clearTimeout(timer);
    store.save();
    process.exit(0);
  };
  process.on("SIGINT", () => stop("SIGINT"));
  process.on("SIGTERM", () => stop("SIGTERM"));
}

async function main() {
  setupSignals();
  if (config.redisUrl) {
    // ticks never wait on the bus
    void startConsumer(config.redisUrl).catch((e) =>
      logger.warn(`Event bus unavailable, running on the timer only: ${toError(e).message}`)
    );
  }

  logger.info(`Starting search scheduler, interval ${Math.ceil(intervalMs() / 60_000)} min.`);
  await runOnce("boot");
  scheduleNext();
}

main().catch((e) => {
  logger.error(`Fatal: ${toError(e).message}`);
  process.exit(1);
});
