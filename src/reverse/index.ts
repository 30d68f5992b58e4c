export * from "./complexity";
export * from "./emit";
export * from "./sample";
export * from "./extract";
export * from "./project";
