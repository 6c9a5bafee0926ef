import path from "path";

export const ARR_ROTATOR_EVENTS_CHANNEL_NAME = "arr-rotator-events";

export const USER_AGENT = "arr-rotator/1.0";

// Default root of the persisted picker state (overridden by STATE_DIR)
export const DEFAULT_STATE_DIR = "/data/state";

export const STATE_FILE_NAME = "state.json";

export function stateFilePath(stateDir: string = DEFAULT_STATE_DIR): string {
  return path.join(stateDir, STATE_FILE_NAME);
}

// Lower bound between two scheduled ticks
export const MIN_TICK_INTERVAL_MS = 5_000;
