export * from "./types.js";
export * from "./random.js";
export * from "./cooldownLedger.js";
export * from "./cycleBag.js";
export * from "./shuffleBagPicker.js";
