import type { PriceQuote } from "@coinpulse/core";

/**
 * Pull-based price feed. Implementations throw TransientSourceError (or any
 * error) on failure; callers treat every failure as transient.
 */
export interface PriceSource {
	readonly name: string;
	fetchQuote(instrument: string): Promise<PriceQuote>;
}

/** The slice of a ccxt exchange that ticker polling needs. */
export interface TickerClient {
	fetchTicker(symbol: string): Promise<unknown>;
}

export type FetchFn = typeof fetch;
