export * from "./constants.js";
export * from "./config.js";
export * from "./events.js";
export * from "./services/loggerService.js";
export * from "./picker/index.js";
export * from "./db/jsonFile.js";
export * from "./db/stateCodec.js";
export * from "./db/pickerStateStore.js";
