import { emptyPickerState, type PickerState } from "../picker/types.js";
import type { Logger } from "../services/loggerService.js";
import { readJsonFile, toError, writeFileAtomic } from "./jsonFile.js";
import { decodeState, serializeState, type DecodedState } from "./stateCodec.js";

/**
 * File-backed picker state. The state object is loaded once and kept for the
 * life of the process; `save()` writes it back atomically.
 */
export class PickerStateStore {
  private current: PickerState;
  /** Which decoder accepted the file at startup. */
  readonly loadedFormat: DecodedState["format"];

  constructor(
    private statePath: string,
    private logger: Logger
  ) {
    const decoded = this.load();
    this.current = decoded.state;
    this.loadedFormat = decoded.format;
  }

  get state(): PickerState {
    return this.current;
  }

  get path(): string {
    return this.statePath;
  }

  /** Anything short of a usable document degrades to an empty state. */
  private load(): DecodedState {
    const read = readJsonFile(this.statePath);
    let decoded: DecodedState;

    switch (read.kind) {
      case "missing":
        decoded = { format: "empty", reason: "state file not found", state: emptyPickerState() };
        break;
      case "unreadable":
      case "invalid":
        decoded = { format: "empty", reason: read.error.message, state: emptyPickerState() };
        break;
      case "ok":
        decoded = decodeState(read.value);
        break;
    }

    if (decoded.format === "empty") {
      this.logger.warn(`Failed to load state (${decoded.reason}). Starting fresh.`, { path: this.statePath });
    } else if (decoded.format === "legacy" && decoded.state.cooldowns.size > 0) {
      this.logger.warn("Loaded legacy state file: cooldowns kept, shuffle bags start empty.", {
        path: this.statePath,
        buckets: decoded.state.cooldowns.size,
      });
    } else {
      this.logger.debug("Loaded state", {
        path: this.statePath,
        cooldownBuckets: decoded.state.cooldowns.size,
        shuffleBuckets: decoded.state.cycles.size,
      });
    }

    return decoded;
  }

  /** Never throws: a failed write only costs durability until the next successful save. */
  save(): boolean {
    try {
      writeFileAtomic(this.statePath, serializeState(this.current));
      return true;
    } catch (error) {
      this.logger.error(`Failed to save state: ${toError(error).message}`, { path: this.statePath });
      return false;
    }
  }
}
