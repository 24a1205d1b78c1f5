import { describe, expect, it, vi } from "vitest";
import { CoinGeckoPriceSource } from "./CoinGeckoPriceSource";
import type { FetchFn } from "./priceTypes";

const jsonResponse = (body: unknown, status = 200): Response =>
	new Response(JSON.stringify(body), {
		status,
		headers: { "content-type": "application/json" },
	});

describe("CoinGeckoPriceSource", () => {
	it("queries simple/price for the mapped coin id", async () => {
		const fetchFn = vi.fn<FetchFn>(async () =>
			jsonResponse({
				bitcoin: { usd: 64_000.5, usd_24h_change: 1.25, last_updated_at: 1_700_000_000 },
			})
		);
		const source = new CoinGeckoPriceSource({ fetchFn, apiKey: "test-key" });

		const quote = await source.fetchQuote("btc");

		expect(fetchFn).toHaveBeenCalledTimes(1);
		const [url, init] = fetchFn.mock.calls[0];
		expect(url).toBe(
			"https://api.coingecko.com/api/v3/simple/price?ids=bitcoin&vs_currencies=usd&include_24hr_change=true&include_24hr_vol=true&include_last_updated_at=true"
		);
		expect(init).toEqual({
			headers: { accept: "application/json", "x-cg-demo-api-key": "test-key" },
		});
		expect(quote).toMatchObject({
			instrument: "BTC",
			source: "coingecko",
			price: 64_000.5,
			change24hPct: 1.25,
			timestamp: 1_700_000_000_000,
		});
	});

	it("turns HTTP errors into transient failures", async () => {
		const fetchFn = vi.fn<FetchFn>(async () => new Response("slow down", { status: 429 }));
		const source = new CoinGeckoPriceSource({ fetchFn });

		await expect(source.fetchQuote("ETH")).rejects.toThrow("coingecko ETH: HTTP 429");
	});

	it("rejects instruments without a coin id", async () => {
		const fetchFn = vi.fn<FetchFn>();
		const source = new CoinGeckoPriceSource({ fetchFn, coinIds: { BTC: "bitcoin" } });

		await expect(source.fetchQuote("ETH")).rejects.toThrow(
			"coingecko ETH: no CoinGecko id mapped"
		);
		expect(fetchFn).not.toHaveBeenCalled();
	});
});
