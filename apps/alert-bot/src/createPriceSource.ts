import type { EnvConfig, MonitorConfig } from "@coinpulse/core";
import {
	CcxtPriceSource,
	CoinGeckoPriceSource,
	FallbackPriceSource,
	createCcxtClient,
	type FetchFn,
	type PriceSource,
	type TickerClient,
} from "@coinpulse/data";

export interface PriceSourceDeps {
	ccxtClient?: TickerClient;
	fetchFn?: FetchFn;
}

/**
 * Builds the polling source named by PRICE_SOURCE. The fallback chain asks
 * CoinGecko first and the exchange second.
 */
export const createPriceSource = (
	env: Pick<EnvConfig, "priceSource" | "exchangeId" | "coinGeckoApiKey">,
	monitorConfig: Pick<MonitorConfig, "quoteCurrency">,
	deps: PriceSourceDeps = {}
): PriceSource => {
	const exchange = (): PriceSource =>
		new CcxtPriceSource(deps.ccxtClient ?? createCcxtClient(env.exchangeId), {
			quote: monitorConfig.quoteCurrency,
			name: env.exchangeId,
		});
	const coinGecko = (): PriceSource =>
		new CoinGeckoPriceSource({ apiKey: env.coinGeckoApiKey, fetchFn: deps.fetchFn });

	switch (env.priceSource) {
		case "ccxt":
			return exchange();
		case "coingecko":
			return coinGecko();
		case "fallback":
			return new FallbackPriceSource([coinGecko(), exchange()]);
	}
};
