import {
	TransientSourceError,
	errorMessage,
	normalizeInstrument,
	type PriceQuote,
} from "@coinpulse/core";
import coinGeckoIds from "./coingeckoIds.json";
import { parseCoinGeckoSimplePrice } from "./adapters";
import type { FetchFn, PriceSource } from "./priceTypes";

const DEFAULT_BASE_URL = "https://api.coingecko.com/api/v3";

const DEFAULT_COIN_IDS: Readonly<Record<string, string>> = coinGeckoIds;

export interface CoinGeckoPriceSourceOptions {
	baseUrl?: string;
	apiKey?: string;
	/** CoinGecko `vs_currencies` value */
	vsCurrency?: string;
	coinIds?: Readonly<Record<string, string>>;
	fetchFn?: FetchFn;
	clock?: () => number;
}

export class CoinGeckoPriceSource implements PriceSource {
	readonly name = "coingecko";
	private readonly baseUrl: string;
	private readonly apiKey?: string;
	private readonly vsCurrency: string;
	private readonly coinIds: Readonly<Record<string, string>>;
	private readonly fetchFn: FetchFn;
	private readonly clock: () => number;

	constructor(options: CoinGeckoPriceSourceOptions = {}) {
		this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
		this.apiKey = options.apiKey;
		this.vsCurrency = (options.vsCurrency ?? "usd").toLowerCase();
		this.coinIds = options.coinIds ?? DEFAULT_COIN_IDS;
		this.fetchFn = options.fetchFn ?? fetch;
		this.clock = options.clock ?? Date.now;
	}

	async fetchQuote(instrument: string): Promise<PriceQuote> {
		const symbol = normalizeInstrument(instrument);
		const coinId = this.coinIds[symbol];
		if (!coinId) {
			throw new TransientSourceError(this.name, symbol, "no CoinGecko id mapped");
		}

		const params = new URLSearchParams({
			ids: coinId,
			vs_currencies: this.vsCurrency,
			include_24hr_change: "true",
			include_24hr_vol: "true",
			include_last_updated_at: "true",
		});
		const headers: Record<string, string> = { accept: "application/json" };
		if (this.apiKey) {
			headers["x-cg-demo-api-key"] = this.apiKey;
		}

		let body: unknown;
		try {
			const res = await this.fetchFn(`${this.baseUrl}/simple/price?${params}`, {
				headers,
			});
			if (!res.ok) {
				throw new Error(`HTTP ${res.status}`);
			}
			body = await res.json();
		} catch (error) {
			throw new TransientSourceError(this.name, symbol, errorMessage(error), {
				cause: error,
			});
		}

		return parseCoinGeckoSimplePrice(
			body,
			coinId,
			this.vsCurrency,
			symbol,
			this.name,
			this.clock()
		);
	}
}
