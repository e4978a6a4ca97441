export * from "./LogNotifier";
export * from "./CompositeNotifier";
