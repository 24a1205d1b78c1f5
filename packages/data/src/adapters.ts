import { z } from "zod";
import { TransientSourceError, type PriceQuote } from "@coinpulse/core";

const positive = z.number().finite().positive();
const optionalNumber = z.number().finite().nullish();

const decimalString = z
	.string()
	.regex(/^\d+(\.\d+)?$/, "expected a decimal string")
	.transform(Number);

const formatIssues = (error: z.ZodError): string =>
	error.issues
		.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
		.join("; ");

const orUndefined = (value: number | null | undefined): number | undefined =>
	value ?? undefined;

export const tickerSchema = z.object({
	symbol: z.string(),
	last: positive,
	timestamp: optionalNumber,
	percentage: optionalNumber,
	high: optionalNumber,
	low: optionalNumber,
	baseVolume: optionalNumber,
});

/**
 * Validates a ccxt ticker. A missing exchange timestamp falls back to
 * `receivedAt`.
 */
export const parseTicker = (
	raw: unknown,
	instrument: string,
	source: string,
	receivedAt: number
): PriceQuote => {
	const parsed = tickerSchema.safeParse(raw);
	if (!parsed.success) {
		throw new TransientSourceError(
			source,
			instrument,
			`malformed ticker (${formatIssues(parsed.error)})`
		);
	}
	const ticker = parsed.data;
	return {
		instrument,
		source,
		timestamp: ticker.timestamp ?? receivedAt,
		price: ticker.last,
		change24hPct: orUndefined(ticker.percentage),
		high24h: orUndefined(ticker.high),
		low24h: orUndefined(ticker.low),
		volume24h: orUndefined(ticker.baseVolume),
	};
};

const coinGeckoEntrySchema = z.record(z.string(), z.number().nullish());

export const coinGeckoSimplePriceSchema = z.record(z.string(), coinGeckoEntrySchema);

/**
 * Validates a CoinGecko `simple/price` response for one coin id.
 * `last_updated_at` is in seconds.
 */
export const parseCoinGeckoSimplePrice = (
	raw: unknown,
	coinId: string,
	vsCurrency: string,
	instrument: string,
	source: string,
	receivedAt: number
): PriceQuote => {
	const parsed = coinGeckoSimplePriceSchema.safeParse(raw);
	if (!parsed.success) {
		throw new TransientSourceError(
			source,
			instrument,
			`malformed response (${formatIssues(parsed.error)})`
		);
	}
	const entry = parsed.data[coinId];
	const price = entry?.[vsCurrency];
	if (!entry || typeof price !== "number" || !(price > 0)) {
		throw new TransientSourceError(
			source,
			instrument,
			`no ${vsCurrency} price for ${coinId}`
		);
	}
	const updatedAt = entry.last_updated_at;
	return {
		instrument,
		source,
		timestamp: typeof updatedAt === "number" ? updatedAt * 1_000 : receivedAt,
		price,
		change24hPct: orUndefined(entry[`${vsCurrency}_24h_change`]),
		volume24h: orUndefined(entry[`${vsCurrency}_24h_vol`]),
	};
};

export const miniTickerMessageSchema = z.object({
	stream: z.string(),
	data: z.object({
		e: z.literal("24hrMiniTicker"),
		E: z.number(),
		s: z.string(),
		c: decimalString,
		o: decimalString,
		h: decimalString,
		l: decimalString,
		v: decimalString,
	}),
});

export interface MiniTickerUpdate {
	/** Exchange symbol as sent, e.g. "BTCUSDT" */
	symbol: string;
	eventTime: number;
	close: number;
	open: number;
	high: number;
	low: number;
	volume: number;
}

/** Returns null for frames that are not mini-ticker updates. */
export const parseMiniTickerMessage = (raw: string): MiniTickerUpdate | null => {
	let payload: unknown;
	try {
		payload = JSON.parse(raw);
	} catch {
		return null;
	}
	const parsed = miniTickerMessageSchema.safeParse(payload);
	if (!parsed.success) {
		return null;
	}
	const { data } = parsed.data;
	return {
		symbol: data.s,
		eventTime: data.E,
		close: data.c,
		open: data.o,
		high: data.h,
		low: data.l,
		volume: data.v,
	};
};

export const miniTickerToQuote = (
	update: MiniTickerUpdate,
	instrument: string,
	source: string
): PriceQuote | null => {
	if (!(update.close > 0)) {
		return null;
	}
	return {
		instrument,
		source,
		timestamp: update.eventTime,
		price: update.close,
		change24hPct:
			update.open > 0 ? ((update.close - update.open) / update.open) * 100 : undefined,
		high24h: update.high,
		low24h: update.low,
		volume24h: update.volume,
	};
};
