export * from "./batches.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./fsAtomic.js";
export * from "./ids.js";
export * from "./importLog.js";
export * from "./manifests.js";
export * from "./reconcile.js";
export * from "./retention.js";
export * from "./timeouts.js";
