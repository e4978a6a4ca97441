export * from "./ledger";
export * from "./manager";
