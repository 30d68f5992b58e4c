export * from "./kinds";
export * from "./types";
export * from "./actions";
export * from "./properties";
