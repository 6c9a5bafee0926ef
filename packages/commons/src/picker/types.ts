export type BucketKey = string;

/** Non-negative safe integer naming a schedulable item inside a bucket. */
export type ItemId = number;

/** Epoch seconds. */
export type Timestamp = number;

export type CycleState = {
  bag: ItemId[];  // not yet drawn this cycle, in draw order
  seen: ItemId[]; // drawn this cycle
};

export type PickerState = {
  cooldowns: Map<BucketKey, Map<ItemId, Timestamp>>;
  cycles: Map<BucketKey, CycleState>;
};

export type Clock = () => Timestamp;

export function emptyPickerState(): PickerState {
  return { cooldowns: new Map(), cycles: new Map() };
}

export function epochSeconds(): Timestamp {
  return Math.floor(Date.now() / 1000);
}

export function isItemId(value: unknown): value is ItemId {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/** Keeps valid ids only, first occurrence wins. */
export function uniqueIds(values: Iterable<unknown>): ItemId[] {
  const seen = new Set<ItemId>();
  const out: ItemId[] = [];
  for (const v of values) {
    if (!isItemId(v) || seen.has(v)) continue;
    seen.add(v);
    out.push(v);
  }
  return out;
}
