import { sample, type ItemId, type Logger } from "arr-rotator-commons";
import type { ArrAppProfile } from "../apps";
import type { ArrApi } from "./arrClient";
import { publishEvent, type PassContext } from "./searchPasses";
import { asRecord, buildIdToTags, getTagIds, toItemId, wantedIds } from "./records";

/** Swaps the search tag for the done tag. Returns false when the item already had the right tags. */
export async function retagItem(
  client: ArrApi,
  profile: ArrAppProfile,
  itemId: ItemId,
  searchTagId: number,
  doneTagId: number,
  dryRun: boolean,
  logger: Logger
): Promise<boolean> {
  const path = `/${profile.itemType}/${itemId}`;
  const obj = asRecord(await client.getJson(path));
  if (!obj) throw new Error(`GET ${path} returned no object`);

  const tags = new Set<number>();
  for (const t of Array.isArray(obj.tags) ? obj.tags : []) {
    const id = toItemId(t);
    if (id !== null) tags.add(id);
  }

  let changed = false;
  if (tags.delete(searchTagId)) changed = true;
  if (!tags.has(doneTagId)) {
    tags.add(doneTagId);
    changed = true;
  }
  if (!changed) return false;

  const updated = { ...obj, tags: [...tags].sort((a, b) => a - b) };

  if (dryRun) {
    logger.info(
      `${profile.displayName} DRY_RUN: would retag id=${itemId} remove=${searchTagId} add=${doneTagId}`
    );
    return true;
  }

  await client.putJson(path, updated);
  logger.info(`${profile.displayName}: retagged id=${itemId} (search->done)`);
  return true;
}

/**
 * Items still tagged for searching that no longer have anything missing are
 * moved to the done tag, where the upgrades pass picks them up.
 */
export async function promoteSearchToDone(
  client: ArrApi,
  profile: ArrAppProfile,
  promoteLimit: number,
  ctx: PassContext
): Promise<ItemId[]> {
  if (promoteLimit <= 0) return [];
  const { tagSearch, tagDone, wantedPageSize, dryRun } = ctx.settings;

  const { searchTagId, doneTagId } = await getTagIds(client, tagSearch, tagDone);
  if (searchTagId === null) {
    ctx.logger.warn(`${profile.displayName}: tag "${tagSearch}" not found; cannot promote search->done.`);
    return [];
  }
  if (doneTagId === null) {
    ctx.logger.warn(`${profile.displayName}: tag "${tagDone}" not found; cannot promote search->done.`);
    return [];
  }

  const missing = new Set(wantedIds(await client.pagedRecords("/wanted/missing", wantedPageSize, 0), profile.wantedIdKeys));
  const itemTags = buildIdToTags(await client.getJson(profile.itemsPath), "id");
  const searchTagged = [...itemTags].filter(([, tags]) => tags.has(searchTagId)).map(([id]) => id);
  const eligible = searchTagged.filter((id) => !missing.has(id));
  const picked = sample(eligible, promoteLimit, ctx.rng);

  ctx.logger.info(
    `${profile.displayName}: promote search->done candidates(tag=search)=${searchTagged.length} eligible(no missing)=${eligible.length} picked=${picked.length}`
  );

  const promoted: ItemId[] = [];
  for (const id of picked) {
    if (await retagItem(client, profile, id, searchTagId, doneTagId, dryRun, ctx.logger)) promoted.push(id);
  }

  if (promoted.length) {
    await publishEvent(ctx, {
      type: "items_promoted",
      data: { app: profile.key, ids: promoted, dryRun },
      timestamp: new Date().toISOString(),
    });
  }
  return promoted;
}
