export const XMLNS_WRITER_VERSION = "0.1.0";

export * from "./core/errors.js";
export type * from "./core/types.js";
export * from "./model/index.js";
export * from "./parser/index.js";
export * from "./serializer/index.js";
