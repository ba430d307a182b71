export * from "./document.js";
export * from "./escape.js";
export { NamespaceScopeTracker } from "./scope-tracker.js";
export { serialize } from "./serializer.js";
export * from "./sinks.js";
