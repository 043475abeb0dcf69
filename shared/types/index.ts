export * from "./config.js";
export * from "./preferences.js";
