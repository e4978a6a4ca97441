export * from "./exchange";
export * from "./provider";
export * from "./utils/ccxtMapper";
