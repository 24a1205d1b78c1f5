import ccxt from "ccxt";
import type { Exchange } from "ccxt";
import {
	TransientSourceError,
	errorMessage,
	normalizeInstrument,
	type PriceQuote,
} from "@coinpulse/core";
import { parseTicker } from "./adapters";
import type { PriceSource, TickerClient } from "./priceTypes";
import { toExchangePair } from "./symbols";

export interface CcxtPriceSourceOptions {
	/** Quote currency of the traded pair, e.g. "USDT" */
	quote?: string;
	name?: string;
	clock?: () => number;
}

export class CcxtPriceSource implements PriceSource {
	readonly name: string;
	private readonly quote: string;
	private readonly clock: () => number;

	constructor(
		private readonly client: TickerClient,
		options: CcxtPriceSourceOptions = {}
	) {
		this.quote = options.quote ?? "USDT";
		this.name = options.name ?? "ccxt";
		this.clock = options.clock ?? Date.now;
	}

	async fetchQuote(instrument: string): Promise<PriceQuote> {
		const symbol = normalizeInstrument(instrument);
		const pair = toExchangePair(symbol, this.quote);
		let ticker: unknown;
		try {
			ticker = await this.client.fetchTicker(pair);
		} catch (error) {
			throw new TransientSourceError(
				this.name,
				symbol,
				`fetchTicker ${pair} failed: ${errorMessage(error)}`,
				{ cause: error }
			);
		}
		return parseTicker(ticker, symbol, this.name, this.clock());
	}
}

export const SUPPORTED_EXCHANGES = ["binance", "bybit", "coinbase", "kraken", "okx"] as const;

export const createCcxtClient = (exchangeId: string): Exchange => {
	const options = { enableRateLimit: true };
	switch (exchangeId) {
		case "binance":
			return new ccxt.binance(options);
		case "bybit":
			return new ccxt.bybit(options);
		case "coinbase":
			return new ccxt.coinbase(options);
		case "kraken":
			return new ccxt.kraken(options);
		case "okx":
			return new ccxt.okx(options);
		default:
			throw new Error(
				`Unsupported exchange "${exchangeId}" (expected one of ${SUPPORTED_EXCHANGES.join(", ")})`
			);
	}
};
