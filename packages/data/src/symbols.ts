import { normalizeInstrument } from "@coinpulse/core";

/** "btc", "USDT" -> "BTC/USDT" */
export const toExchangePair = (instrument: string, quote: string): string =>
	`${normalizeInstrument(instrument)}/${normalizeInstrument(quote)}`;

/** "BTC", "USDT" -> "btcusdt" */
export const toStreamSymbol = (instrument: string, quote: string): string =>
	`${instrument}${quote}`.toLowerCase().replace(/[^a-z0-9]/g, "");
