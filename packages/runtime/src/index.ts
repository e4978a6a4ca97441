export * from "./scanner/Scanner";
export * from "./scanner/pairOutcome";
export * from "./notify";
export * from "./gateway";
export * from "./runtimeFactory";
export { runtimeLogger } from "./runtimeShared";
