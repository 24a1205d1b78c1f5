import { TransientSourceError } from "@coinpulse/core";
import { describe, expect, it } from "vitest";
import {
	miniTickerToQuote,
	parseCoinGeckoSimplePrice,
	parseMiniTickerMessage,
	parseTicker,
} from "./adapters";

const miniTickerFrame = (data: Record<string, unknown>): string =>
	JSON.stringify({ stream: "btcusdt@miniTicker", data });

describe("parseTicker", () => {
	it("maps a ccxt ticker onto a quote", () => {
		const quote = parseTicker(
			{
				symbol: "BTC/USDT",
				last: 50_000,
				timestamp: 1_700_000_000_000,
				percentage: 2.5,
				high: 51_000,
				low: 49_000,
				baseVolume: 1_234,
				info: { ignored: true },
			},
			"BTC",
			"ccxt",
			999
		);
		expect(quote).toEqual({
			instrument: "BTC",
			source: "ccxt",
			timestamp: 1_700_000_000_000,
			price: 50_000,
			change24hPct: 2.5,
			high24h: 51_000,
			low24h: 49_000,
			volume24h: 1_234,
		});
	});

	it("falls back to the receive time when the exchange sends no timestamp", () => {
		const quote = parseTicker(
			{ symbol: "ETH/USDT", last: 3_000, timestamp: undefined, percentage: null },
			"ETH",
			"ccxt",
			42
		);
		expect(quote.timestamp).toBe(42);
		expect(quote.change24hPct).toBeUndefined();
	});

	it("rejects a ticker without a positive last price", () => {
		expect(() =>
			parseTicker({ symbol: "BTC/USDT", last: 0 }, "BTC", "ccxt", 1)
		).toThrow(TransientSourceError);
		expect(() =>
			parseTicker({ symbol: "BTC/USDT", last: 0 }, "BTC", "ccxt", 1)
		).toThrow(/^ccxt BTC: malformed ticker \(last: /);
	});
});

describe("parseCoinGeckoSimplePrice", () => {
	it("reads price, change and volume for the coin id", () => {
		const quote = parseCoinGeckoSimplePrice(
			{
				bitcoin: {
					usd: 50_000,
					usd_24h_change: -1.5,
					usd_24h_vol: 1_000_000,
					last_updated_at: 1_700_000_000,
				},
			},
			"bitcoin",
			"usd",
			"BTC",
			"coingecko",
			5
		);
		expect(quote).toEqual({
			instrument: "BTC",
			source: "coingecko",
			timestamp: 1_700_000_000_000,
			price: 50_000,
			change24hPct: -1.5,
			volume24h: 1_000_000,
		});
	});

	it("fails when the coin is missing from the response", () => {
		expect(() =>
			parseCoinGeckoSimplePrice({}, "bitcoin", "usd", "BTC", "coingecko", 5)
		).toThrow("coingecko BTC: no usd price for bitcoin");
	});
});

describe("mini ticker frames", () => {
	it("parses decimal strings and derives the 24h change", () => {
		const update = parseMiniTickerMessage(
			miniTickerFrame({
				e: "24hrMiniTicker",
				E: 1_700_000_000_000,
				s: "BTCUSDT",
				c: "110.0",
				o: "100.0",
				h: "112.5",
				l: "99.5",
				v: "10.25",
			})
		);
		expect(update).toEqual({
			symbol: "BTCUSDT",
			eventTime: 1_700_000_000_000,
			close: 110,
			open: 100,
			high: 112.5,
			low: 99.5,
			volume: 10.25,
		});
		if (!update) {
			throw new Error("expected an update");
		}
		const quote = miniTickerToQuote(update, "BTC", "binance-ws");
		expect(quote?.price).toBe(110);
		expect(quote?.change24hPct).toBeCloseTo(10, 10);
	});

	it("ignores frames that are not mini tickers", () => {
		expect(parseMiniTickerMessage("not json")).toBeNull();
		expect(
			parseMiniTickerMessage(miniTickerFrame({ e: "trade", E: 1, s: "BTCUSDT" }))
		).toBeNull();
	});
});
