export * from "./types";
export * from "./runner";
export * from "./validator";
export * from "./dataset";
export { syntaxPass } from "./passes/syntax";
export { semanticPass } from "./passes/semantic";
export { dependencyPass, introducedName } from "./passes/dependency";
