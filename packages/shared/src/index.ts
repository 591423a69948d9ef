export * from "./types/port.js";
export * from "./types/hunt.js";
export * from "./types/reconcile.js";
