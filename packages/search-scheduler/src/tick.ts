import { APP_KEYS, toError, type AppConfig, type AppKey, type ArrAppConfig, type ItemId } from "arr-rotator-commons";
import { v4 as uuidv4 } from "uuid";
import { ARR_APPS, type ArrAppProfile } from "./apps";
import { ArrClient, type ArrApi } from "./services/arrClient";
import { promoteSearchToDone } from "./services/promoter";
import { runSearchPasses, type PassContext } from "./services/searchPasses";

export type ClientFactory = (profile: ArrAppProfile, app: ArrAppConfig) => ArrApi;

export type TickDeps = Omit<PassContext, "settings"> & {
  config: AppConfig;
  store: { save(): boolean };
  clientFor?: ClientFactory;
};

export type TickReport = {
  tickId: string;
  picked: Record<string, ItemId[]>;
  promoted: Partial<Record<AppKey, ItemId[]>>;
  skipped: AppKey[];
  failed: AppKey[];
  saved: boolean;
};

export function defaultClientFactory(httpTimeoutSeconds: number): ClientFactory {
  return (profile, app) => new ArrClient(app.url, app.apiKey, profile.apiPrefix, httpTimeoutSeconds);
}

/**
 * One scheduling tick: search passes (and promotion) for every enabled app,
 * then the picker state is saved, whatever happened before.
 */
export async function runTick(deps: TickDeps, only?: readonly AppKey[]): Promise<TickReport> {
  const { config, logger } = deps;
  const clientFor = deps.clientFor ?? defaultClientFactory(config.httpTimeoutSeconds);
  const ctx: PassContext = {
    picker: deps.picker,
    logger,
    publisher: deps.publisher,
    rng: deps.rng,
    settings: config,
  };
  const report: TickReport = { tickId: uuidv4(), picked: {}, promoted: {}, skipped: [], failed: [], saved: false };

  logger.info(`Tick ${report.tickId} start${config.dryRun ? " (DRY_RUN)" : ""}`);
  try {
    for (const key of APP_KEYS) {
      if (only && !only.includes(key)) continue;
      const app = config.apps[key];
      const profile = ARR_APPS[key];

      if (!app.enabled) continue;
      if (!app.url || !app.apiKey) {
        const prefix = key.toUpperCase();
        logger.warn(`${profile.displayName} enabled but ${prefix}_URL/${prefix}_API_KEY not set; skipping.`);
        report.skipped.push(key);
        continue;
      }

      try {
        const client = clientFor(profile, app);
        for (const pass of await runSearchPasses(client, profile, app, ctx)) {
          report.picked[pass.bucket] = pass.picked;
        }
        if (config.autoPromote) {
          report.promoted[key] = await promoteSearchToDone(client, profile, app.promoteLimit, ctx);
        }
      } catch (e) {
        report.failed.push(key);
        logger.error(`${profile.displayName}: run failed: ${toError(e).message}`);
      }
    }
  } finally {
    report.saved = deps.store.save();
  }

  logger.info(`Tick ${report.tickId} done`, { failed: report.failed, saved: report.saved });
  return report;
}
