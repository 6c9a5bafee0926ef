import { epochSeconds, type BucketKey, type Clock, type ItemId, type Timestamp } from "./types.js";

/** Last-selection timestamps per bucket, shared by reference with the persisted state. */
export class CooldownLedger {
  constructor(
    private entries: Map<BucketKey, Map<ItemId, Timestamp>>,
    private clock: Clock = epochSeconds
  ) {}

  isCooledDown(bucket: BucketKey, id: ItemId, cooldownSeconds: number): boolean {
    if (cooldownSeconds <= 0) return true;
    const last = this.entries.get(bucket)?.get(id);
    if (last === undefined) return true;
    return this.clock() - last >= cooldownSeconds;
  }

  markSelected(bucket: BucketKey, id: ItemId): void {
    let bucketEntries = this.entries.get(bucket);
    if (!bucketEntries) {
      bucketEntries = new Map();
      this.entries.set(bucket, bucketEntries);
    }
    bucketEntries.set(id, this.clock());
  }

  lastSelectedAt(bucket: BucketKey, id: ItemId): Timestamp | undefined {
    return this.entries.get(bucket)?.get(id);
  }
}
