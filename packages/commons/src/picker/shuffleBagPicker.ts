import { CooldownLedger } from "./cooldownLedger.js";
import { CycleBag } from "./cycleBag.js";
import type { Rng } from "./random.js";
import { epochSeconds, uniqueIds, type BucketKey, type Clock, type ItemId, type PickerState } from "./types.js";

export type DrawRequest = {
  bucket: BucketKey;
  eligibleIds: Iterable<ItemId>;
  count: number;
  cooldownSeconds: number;
  /** false previews: the cycle advances but no cooldown is recorded */
  commit: boolean;
};

export type ShuffleBagPickerOptions = {
  rng?: Rng;
  clock?: Clock;
};

/**
 * Draws items without repeating until every eligible item had its turn, and
 * never hands out an item again before its cooldown elapsed.
 *
 * The picker mutates `state` in place; persist it with PickerStateStore.
 */
export class ShuffleBagPicker {
  readonly ledger: CooldownLedger;
  readonly bags: CycleBag;

  constructor(readonly state: PickerState, options: ShuffleBagPickerOptions = {}) {
    this.ledger = new CooldownLedger(state.cooldowns, options.clock ?? epochSeconds);
    this.bags = new CycleBag(state.cycles, options.rng ?? Math.random);
  }

  draw({ bucket, eligibleIds, count, cooldownSeconds, commit }: DrawRequest): ItemId[] {
    const eligible = uniqueIds(eligibleIds);
    if (!(count > 0) || eligible.length === 0) return [];

    let cycle = this.bags.reconcile(bucket, eligible);
    const picked: ItemId[] = [];

    for (let n = 0; n < count; n++) {
      if (cycle.bag.length === 0) {
        cycle = this.bags.reconcile(bucket, eligible);
        if (cycle.bag.length === 0) break;
      }

      const at = this.firstCooledDown(bucket, cycle.bag, cooldownSeconds);
      if (at === -1) break;

      // Same as rotating the `at` skipped items to the tail, then taking the head
      const chosen = cycle.bag[at];
      cycle.bag = [...cycle.bag.slice(at + 1), ...cycle.bag.slice(0, at)];
      cycle.seen.push(chosen);

      if (commit) this.ledger.markSelected(bucket, chosen);
      picked.push(chosen);
    }

    return picked;
  }

  private firstCooledDown(bucket: BucketKey, bag: readonly ItemId[], cooldownSeconds: number): number {
    for (let i = 0; i < bag.length; i++) {
      if (this.ledger.isCooledDown(bucket, bag[i], cooldownSeconds)) return i;
    }
    return -1;
  }
}
