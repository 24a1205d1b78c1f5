import { TransientSourceError } from "@coinpulse/core";
import { describe, expect, it, vi } from "vitest";
import { CcxtPriceSource, createCcxtClient } from "./CcxtPriceSource";
import type { TickerClient } from "./priceTypes";

describe("CcxtPriceSource", () => {
	it("requests the pair against the quote currency", async () => {
		const fetchTicker = vi.fn(async (symbol: string) => ({
			symbol,
			last: 3_000,
			timestamp: null,
		}));
		const client: TickerClient = { fetchTicker };
		const source = new CcxtPriceSource(client, { clock: () => 42 });

		const quote = await source.fetchQuote(" eth ");

		expect(fetchTicker).toHaveBeenCalledWith("ETH/USDT");
		expect(quote).toMatchObject({
			instrument: "ETH",
			source: "ccxt",
			price: 3_000,
			timestamp: 42,
		});
	});

	it("wraps client failures as transient", async () => {
		const client: TickerClient = {
			fetchTicker: async () => {
				throw new Error("exchange unavailable");
			},
		};
		const source = new CcxtPriceSource(client, { name: "binance" });

		const attempt = source.fetchQuote("BTC");
		await expect(attempt).rejects.toBeInstanceOf(TransientSourceError);
		await expect(attempt).rejects.toThrow(
			"binance BTC: fetchTicker BTC/USDT failed: exchange unavailable"
		);
	});
});

describe("createCcxtClient", () => {
	it("rejects exchanges outside the supported set", () => {
		expect(() => createCcxtClient("mtgox")).toThrow(/Unsupported exchange "mtgox"/);
	});
});
