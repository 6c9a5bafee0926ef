import { shuffleInPlace, type Rng } from "./random.js";
import { uniqueIds, type BucketKey, type CycleState, type ItemId } from "./types.js";

/**
 * Per-bucket shuffle bags. Every consultation reconciles the bag against the
 * live eligible set, so items joining or leaving eligibility between ticks
 * never break the no-repeat-within-a-cycle rule for the ones that stay.
 */
export class CycleBag {
  constructor(
    private cycles: Map<BucketKey, CycleState>,
    private rng: Rng
  ) {}

  /** The live cycle state of a bucket, created empty on first use. */
  get(bucket: BucketKey): CycleState {
    let cycle = this.cycles.get(bucket);
    if (!cycle) {
      cycle = { bag: [], seen: [] };
      this.cycles.set(bucket, cycle);
    }
    return cycle;
  }

  reconcile(bucket: BucketKey, eligibleIds: Iterable<ItemId>): CycleState {
    const eligible = new Set(uniqueIds(eligibleIds));
    const cycle = this.get(bucket);

    cycle.bag = cycle.bag.filter((id) => eligible.has(id));
    cycle.seen = cycle.seen.filter((id) => eligible.has(id));

    const known = new Set<ItemId>([...cycle.bag, ...cycle.seen]);
    const newIds = [...eligible].filter((id) => !known.has(id));
    cycle.bag.push(...shuffleInPlace(newIds, this.rng));

    if (cycle.bag.length === 0) {
      // cycle complete (or nothing eligible): start over
      cycle.bag = shuffleInPlace([...eligible], this.rng);
      cycle.seen = [];
    }
    return cycle;
  }
}
