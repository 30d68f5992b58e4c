export * from "./tree";
export * from "./wwu";
