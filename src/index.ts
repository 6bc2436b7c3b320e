export * from "./event/index.ts";
export * from "./format/index.ts";
export * from "./registry/index.ts";
export * from "./serialiser/index.ts";
export * from "./text/index.ts";
