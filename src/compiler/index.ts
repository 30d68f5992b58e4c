export * from "./plan";
export * from "./resolve";
export * from "./compiler";
