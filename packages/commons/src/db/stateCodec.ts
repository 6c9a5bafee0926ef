import z from "zod";
import {
  emptyPickerState,
  uniqueIds,
  type BucketKey,
  type CycleState,
  type ItemId,
  type PickerState,
  type Timestamp,
} from "../picker/types.js";

/* --- On-disk document --- */

export type PersistedCycle = { bag: ItemId[]; seen: ItemId[] };

export type PersistedDocument = {
  cooldowns: Record<BucketKey, Record<string, Timestamp>>;
  shuffle: Record<BucketKey, PersistedCycle>;
};

export type StateFormat = "canonical" | "legacy";

export type DecodedState =
  | { format: StateFormat; state: PickerState }
  | { format: "empty"; reason: string; state: PickerState };

/* --- Field schemas --- */

// Ids come as numbers or digit strings (JSON object keys are always strings)
const ItemIdField = z
  .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER));

const TimestampField = z
  .union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number)])
  .pipe(z.number().finite())
  .transform(Math.trunc);

const JsonObject = z.record(z.string(), z.unknown());

const CanonicalDocument = JsonObject.refine((doc) => "cooldowns" in doc || "shuffle" in doc, {
  message: "neither cooldowns nor shuffle present",
});

/* --- Normalizers: malformed entries are dropped, never fatal --- */

function decodeLedger(value: unknown): Map<ItemId, Timestamp> | null {
  const parsed = JsonObject.safeParse(value);
  if (!parsed.success) return null;

  const out = new Map<ItemId, Timestamp>();
  for (const [rawId, rawTs] of Object.entries(parsed.data)) {
    const id = ItemIdField.safeParse(rawId);
    const ts = TimestampField.safeParse(rawTs);
    if (id.success && ts.success) out.set(id.data, ts.data);
  }
  return out;
}

function decodeLedgers(value: unknown): PickerState["cooldowns"] {
  const out: PickerState["cooldowns"] = new Map();
  const parsed = JsonObject.safeParse(value);
  if (!parsed.success) return out;

  for (const [bucket, entries] of Object.entries(parsed.data)) {
    const ledger = decodeLedger(entries);
    if (ledger) out.set(bucket, ledger);
  }
  return out;
}

function decodeIdList(value: unknown): ItemId[] {
  if (!Array.isArray(value)) return [];
  return uniqueIds(
    value.map((v) => {
      const id = ItemIdField.safeParse(v);
      return id.success ? id.data : null;
    })
  );
}

function decodeCycle(value: unknown): CycleState {
  const parsed = JsonObject.safeParse(value);
  if (!parsed.success) return { bag: [], seen: [] };

  const seen = decodeIdList(parsed.data.seen);
  const seenSet = new Set(seen);
  // an id drawn this cycle must not be drawn again before the cycle ends
  const bag = decodeIdList(parsed.data.bag).filter((id) => !seenSet.has(id));
  return { bag, seen };
}

function decodeCycles(value: unknown): PickerState["cycles"] {
  const out: PickerState["cycles"] = new Map();
  const parsed = JsonObject.safeParse(value);
  if (!parsed.success) return out;

  for (const [bucket, cycle] of Object.entries(parsed.data)) {
    out.set(bucket, decodeCycle(cycle));
  }
  return out;
}

/* --- Decoder chain --- */

type Decoder = (document: unknown) => DecodedState | null;

const decodeCanonical: Decoder = (document) => {
  const parsed = CanonicalDocument.safeParse(document);
  if (!parsed.success) return null;
  return {
    format: "canonical",
    state: {
      cooldowns: decodeLedgers(parsed.data.cooldowns),
      cycles: decodeCycles(parsed.data.shuffle),
    },
  };
};

// Older files were a flat { bucket: { id: timestamp } } map without shuffle data
const decodeLegacy: Decoder = (document) => {
  const parsed = JsonObject.safeParse(document);
  if (!parsed.success) return null;
  return {
    format: "legacy",
    state: { cooldowns: decodeLedgers(parsed.data), cycles: new Map() },
  };
};

const DECODERS: readonly Decoder[] = [decodeCanonical, decodeLegacy];

export function decodeState(document: unknown): DecodedState {
  for (const decoder of DECODERS) {
    const decoded = decoder(document);
    if (decoded) return decoded;
  }
  const kind = Array.isArray(document) ? "array" : document === null ? "null" : typeof document;
  return { format: "empty", reason: `expected a JSON object, got ${kind}`, state: emptyPickerState() };
}

/* --- Encoder --- */

function sortedKeys<V>(map: Map<string, V>): string[] {
  return [...map.keys()].sort();
}

export function encodeState(state: PickerState): PersistedDocument {
  const cooldowns: PersistedDocument["cooldowns"] = {};
  for (const bucket of sortedKeys(state.cooldowns)) {
    const entries = state.cooldowns.get(bucket) ?? new Map<ItemId, Timestamp>();
    const ledger: Record<string, Timestamp> = {};
    for (const id of [...entries.keys()].sort((a, b) => a - b)) {
      const ts = entries.get(id);
      if (ts !== undefined) ledger[String(id)] = ts;
    }
    cooldowns[bucket] = ledger;
  }

  const shuffle: PersistedDocument["shuffle"] = {};
  for (const bucket of sortedKeys(state.cycles)) {
    const cycle = state.cycles.get(bucket);
    if (cycle) shuffle[bucket] = { bag: [...cycle.bag], seen: [...cycle.seen] };
  }

  return { cooldowns, shuffle };
}

export function serializeState(state: PickerState): string {
  return JSON.stringify(encodeState(state), null, 2) + "\n";
}
