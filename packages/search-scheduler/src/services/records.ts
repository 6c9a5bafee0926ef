import { isItemId, type ItemId } from "arr-rotator-commons";
import z from "zod";
import type { ArrApi } from "./arrClient";

type JsonRecord = Record<string, unknown>;

const JsonRecordSchema = z.record(z.string(), z.unknown());
const Tag = z.object({ id: z.number().int(), label: z.unknown() });

export function asRecord(value: unknown): JsonRecord | null {
  const parsed = JsonRecordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function asRecordList(value: unknown): JsonRecord[] {
  if (!Array.isArray(value)) return [];
  const out: JsonRecord[] = [];
  for (const v of value) {
    const r = asRecord(v);
    if (r) out.push(r);
  }
  return out;
}

/** Integers and digit strings; everything else is not an id. */
export function toItemId(value: unknown): ItemId | null {
  if (isItemId(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value)) {
    const n = Number(value);
    return isItemId(n) ? n : null;
  }
  return null;
}

/**
 * Wanted records reference their parent item either directly (`seriesId: 12`)
 * or through an embedded object (`movie: { id: 12 }`).
 */
export function extractId(record: JsonRecord, ...keys: string[]): ItemId | null {
  for (const k of keys) {
    const id = toItemId(record[k]);
    if (id !== null) return id;
  }
  for (const k of keys) {
    const inner = asRecord(record[k]);
    if (inner && isItemId(inner.id)) return inner.id;
  }
  return null;
}

export function buildIdToTags(items: unknown, idField = "id"): Map<ItemId, Set<number>> {
  const out = new Map<ItemId, Set<number>>();
  for (const item of asRecordList(items)) {
    const id = toItemId(item[idField]);
    if (id === null) continue;
    const tags = Array.isArray(item.tags) ? item.tags : [];
    const tagIds = new Set<number>();
    for (const t of tags) {
      const tagId = toItemId(t);
      if (tagId !== null) tagIds.add(tagId);
    }
    out.set(id, tagIds);
  }
  return out;
}

export type TagIds = { searchTagId: number | null; doneTagId: number | null };

export async function getTagIds(client: ArrApi, searchLabel: string, doneLabel: string): Promise<TagIds> {
  const raw = await client.getJson("/tag");
  let searchTagId: number | null = null;
  let doneTagId: number | null = null;
  for (const entry of asRecordList(raw)) {
    const parsed = Tag.safeParse(entry);
    if (!parsed.success) continue;
    const t = parsed.data;
    const label = String(t.label ?? "").toLowerCase();
    if (label === searchLabel.toLowerCase()) searchTagId = t.id;
    if (label === doneLabel.toLowerCase()) doneTagId = t.id;
  }
  return { searchTagId, doneTagId };
}

/** Sorted, de-duplicated ids referenced by wanted records. */
export function wantedIds(records: unknown[], keys: readonly string[]): ItemId[] {
  const ids = new Set<ItemId>();
  for (const r of asRecordList(records)) {
    const id = extractId(r, ...keys);
    if (id !== null) ids.add(id);
  }
  return [...ids].sort((a, b) => a - b);
}
