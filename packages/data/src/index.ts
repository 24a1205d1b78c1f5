export * from "./priceTypes";
export * from "./symbols";
export * from "./adapters";
export { CcxtPriceSource, createCcxtClient, SUPPORTED_EXCHANGES } from "./CcxtPriceSource";
export type { CcxtPriceSourceOptions } from "./CcxtPriceSource";
export { CoinGeckoPriceSource } from "./CoinGeckoPriceSource";
export type { CoinGeckoPriceSourceOptions } from "./CoinGeckoPriceSource";
export { FallbackPriceSource } from "./FallbackPriceSource";
export { BinanceTickerStream, buildMiniTickerStreamUrl } from "./BinanceTickerStream";
export type { BinanceTickerStreamOptions } from "./BinanceTickerStream";
