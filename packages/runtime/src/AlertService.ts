import {
	DEFAULT_INDICATOR_SETTINGS,
	InsufficientDataError,
	type AlertDirection,
	type AlertRule,
	type IndicatorSettings,
	type PriceQuote,
} from "@coinpulse/core";
import { computeIndicatorSnapshot, type IndicatorSnapshot } from "@coinpulse/indicators";
import type { MarketRegistry } from "./MarketRegistry";

export interface AlertServiceOptions {
	indicators?: IndicatorSettings;
}

/**
 * What a messaging transport may ask of the engine. Every call is
 * synchronous, so rule mutations never interleave.
 */
export class AlertService {
	private readonly indicators: IndicatorSettings;

	constructor(
		private readonly registry: MarketRegistry,
		options: AlertServiceOptions = {}
	) {
		this.indicators = options.indicators ?? DEFAULT_INDICATOR_SETTINGS;
	}

	get instruments(): string[] {
		return this.registry.instruments;
	}

	createRule(
		userId: string,
		instrument: string,
		direction: AlertDirection,
		threshold: number
	): number {
		const symbol = this.registry.requireWatched(instrument);
		return this.registry.book.create({
			userId,
			instrument: symbol,
			direction,
			threshold,
		}).id;
	}

	listRules(userId: string): AlertRule[] {
		return this.registry.book.list(userId);
	}

	removeRule(userId: string, ruleId: number): boolean {
		return this.registry.book.remove(userId, ruleId);
	}

	/** @throws InsufficientDataError when no price has been seen yet */
	analyze(instrument: string): IndicatorSnapshot {
		const series = this.registry.seriesFor(instrument);
		return computeIndicatorSnapshot(series.instrument, series.snapshot(), this.indicators);
	}

	latestQuote(instrument: string): PriceQuote {
		const symbol = this.registry.requireWatched(instrument);
		const quote = this.registry.latestQuote(symbol);
		if (!quote) {
			throw new InsufficientDataError(symbol, 1, 0);
		}
		return quote;
	}
}
