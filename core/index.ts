export * from "./config";
export * from "./dealer";
export * from "./deck";
export * from "./errors";
export * from "./game";
export * from "./hand";
export * from "./log";
export * from "./rng";
export * from "./simulate";
export * from "./stats";
export * from "./strategy";
export * from "./trackers";
export type * from "./types";
