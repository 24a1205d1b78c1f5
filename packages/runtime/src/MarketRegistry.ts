import {
	PriceSeries,
	UnsupportedInstrumentError,
	normalizeInstrument,
	type PriceQuote,
} from "@coinpulse/core";
import type { AlertBook } from "@coinpulse/alerts";

export interface MarketRegistryOptions {
	/** Watch list; anything else is rejected */
	instruments: readonly string[];
	seriesCapacity: number;
}

/**
 * Process-wide market state, passed around explicitly: one PriceSeries per
 * watched instrument (created on first use), the latest quote per instrument
 * and the alert book.
 */
export class MarketRegistry {
	private readonly watchList: ReadonlySet<string>;
	private readonly seriesCapacity: number;
	private readonly series = new Map<string, PriceSeries>();
	private readonly quotes = new Map<string, PriceQuote>();

	constructor(
		readonly book: AlertBook,
		options: MarketRegistryOptions
	) {
		this.watchList = new Set(options.instruments.map(normalizeInstrument));
		this.seriesCapacity = options.seriesCapacity;
	}

	get instruments(): string[] {
		return Array.from(this.watchList);
	}

	isWatched(instrument: string): boolean {
		return this.watchList.has(normalizeInstrument(instrument));
	}

	/** Normalized symbol of a watched instrument. */
	requireWatched(instrument: string): string {
		const symbol = normalizeInstrument(instrument);
		if (!this.watchList.has(symbol)) {
			throw new UnsupportedInstrumentError(symbol || instrument);
		}
		return symbol;
	}

	seriesFor(instrument: string): PriceSeries {
		const symbol = this.requireWatched(instrument);
		let series = this.series.get(symbol);
		if (!series) {
			series = new PriceSeries(symbol, { capacity: this.seriesCapacity });
			this.series.set(symbol, series);
		}
		return series;
	}

	/**
	 * Appends a quote to its instrument's series. Returns false, leaving the
	 * series untouched, when the quote is not newer than the last point.
	 */
	record(quote: PriceQuote): boolean {
		const series = this.seriesFor(quote.instrument);
		const last = series.latest();
		if (last && quote.timestamp <= last.timestamp) {
			return false;
		}
		series.append(quote.timestamp, quote.price);
		this.quotes.set(series.instrument, { ...quote, instrument: series.instrument });
		return true;
	}

	latestQuote(instrument: string): PriceQuote | undefined {
		const quote = this.quotes.get(this.requireWatched(instrument));
		return quote ? { ...quote } : undefined;
	}
}
