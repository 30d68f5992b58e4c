export * from "./types";
export * from "./reader";
export * from "./value";
export * from "./print";
