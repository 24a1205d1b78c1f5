export * from "./sma";
export * from "./ema";
export * from "./rsi";
export * from "./macd";
export * from "./bollinger";
export * from "./sentiment";
export * from "./snapshot";
