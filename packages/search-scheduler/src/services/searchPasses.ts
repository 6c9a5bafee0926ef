import {
  toError,
  type AppConfig,
  type ArrAppConfig,
  type ArrRotatorEvent,
  type EventPublisher,
  type ItemId,
  type Logger,
  type Rng,
  type SearchMode,
  type ShuffleBagPicker,
} from "arr-rotator-commons";
import type { ArrAppProfile } from "../apps";
import type { ArrApi } from "./arrClient";
import { buildIdToTags, getTagIds, wantedIds } from "./records";

export type PassContext = {
  picker: ShuffleBagPicker;
  logger: Logger;
  publisher: EventPublisher;
  rng: Rng;
  settings: Pick<AppConfig, "tagSearch" | "tagDone" | "wantedPageSize" | "dryRun" | "autoPromote">;
};

export type PassResult = {
  mode: SearchMode;
  bucket: string;
  eligible: number;
  picked: ItemId[];
};

const WANTED_PATHS: Record<SearchMode, string> = {
  missing: "/wanted/missing",
  upgrades: "/wanted/cutoff",
};

export function bucketKey(profile: ArrAppProfile, mode: SearchMode): string {
  return `${profile.key}_${mode}`;
}

/** A notification that cannot be delivered never undoes the searches behind it. */
export async function publishEvent(ctx: PassContext, event: ArrRotatorEvent): Promise<boolean> {
  try {
    await ctx.publisher.produceEvent(event);
    return true;
  } catch (e) {
    ctx.logger.warn(`Failed to publish ${event.type}: ${toError(e).message}`);
    return false;
  }
}

async function dispatchSearches(client: ArrApi, profile: ArrAppProfile, ids: ItemId[], ctx: PassContext) {
  for (const payload of profile.searchCommands(ids)) {
    if (ctx.settings.dryRun) {
      ctx.logger.info(`${profile.displayName} DRY_RUN: POST /command ${JSON.stringify(payload)}`);
      continue;
    }
    await client.postJson("/command", payload);
    ctx.logger.info(`${profile.displayName}: triggered ${payload.name}`, { payload });
  }
}

async function runPass(
  client: ArrApi,
  profile: ArrAppProfile,
  mode: SearchMode,
  tagId: number,
  itemTags: Map<ItemId, Set<number>>,
  limit: number,
  cooldownSeconds: number,
  ctx: PassContext
): Promise<PassResult> {
  const records = await client.pagedRecords(WANTED_PATHS[mode], ctx.settings.wantedPageSize, 0);
  const eligible = wantedIds(records, profile.wantedIdKeys).filter((id) => itemTags.get(id)?.has(tagId) ?? false);
  const bucket = bucketKey(profile, mode);

  const picked = ctx.picker.draw({
    bucket,
    eligibleIds: eligible,
    count: limit,
    cooldownSeconds,
    commit: !ctx.settings.dryRun,
  });

  ctx.logger.info(`${profile.displayName}: ${mode} eligible=${eligible.length} picked=${picked.length}`);

  await dispatchSearches(client, profile, picked, ctx);

  if (picked.length) {
    await publishEvent(ctx, {
      type: "search_dispatched",
      data: { app: profile.key, mode, bucket, ids: picked, dryRun: ctx.settings.dryRun },
      timestamp: new Date().toISOString(),
    });
  }

  return { mode, bucket, eligible: eligible.length, picked };
}

/**
 * Missing pass over items tagged with the search tag, upgrades pass over
 * items tagged with the done tag. A pass whose tag does not exist is skipped.
 */
export async function runSearchPasses(
  client: ArrApi,
  profile: ArrAppProfile,
  app: ArrAppConfig,
  ctx: PassContext
): Promise<PassResult[]> {
  const { tagSearch, tagDone } = ctx.settings;
  const { searchTagId, doneTagId } = await getTagIds(client, tagSearch, tagDone);
  if (searchTagId === null) {
    ctx.logger.warn(`${profile.displayName}: tag "${tagSearch}" not found; missing-search pass will do nothing.`);
  }
  if (doneTagId === null) {
    ctx.logger.warn(`${profile.displayName}: tag "${tagDone}" not found; upgrades pass will do nothing.`);
  }

  const itemTags = buildIdToTags(await client.getJson(profile.itemsPath), "id");
  const results: PassResult[] = [];

  if (searchTagId !== null && app.missingLimit > 0) {
    results.push(
      await runPass(client, profile, "missing", searchTagId, itemTags, app.missingLimit, app.cooldownSeconds.missing, ctx)
    );
  }

  if (doneTagId !== null && app.upgradesLimit > 0) {
    results.push(
      await runPass(client, profile, "upgrades", doneTagId, itemTags, app.upgradesLimit, app.cooldownSeconds.upgrades, ctx)
    );
  }

  return results;
}
