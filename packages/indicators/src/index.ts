export * from "./atr";
export * from "./bollinger";
export * from "./ema";
export * from "./rsi";
export * from "./sma";
export * from "./swing";
export * from "./snapshot";
