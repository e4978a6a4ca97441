export * from "./types";
export * from "./trendFilter";
export * from "./triggers";
export * from "./evaluateTriggers";
export * from "./grader";
export * from "./detector";
