export * from "./nodes.js";
export * from "./scope.js";
