export * from "./types/tag.js";
export * from "./types/port-features.js";
export type * from "./types/interface.js";
export type * from "./types/switch.js";
export * from "./utils/speed.js";
