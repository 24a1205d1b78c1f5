import {
	DEFAULT_INDICATOR_SETTINGS,
	InsufficientDataError,
	type IndicatorSettings,
	type PricePoint,
} from "@coinpulse/core";
import { bollinger, type BollingerBands } from "./bollinger";
import { ema } from "./ema";
import { macd, macdRequiredHistory, type MacdResult } from "./macd";
import { rsi, rsiRequiredHistory } from "./rsi";
import { describeSentiment, describeTrend, type Sentiment, type Trend } from "./sentiment";
import { sma } from "./sma";

export interface IndicatorShortfall {
	/** e.g. "rsi(14)" or "sma(50)" */
	indicator: string;
	required: number;
	available: number;
}

export interface IndicatorSnapshot {
	instrument: string;
	price: number;
	timestamp: number;
	sampleSize: number;
	rsi: number | null;
	macd: MacdResult | null;
	sma: Readonly<Record<number, number | null>>;
	ema: Readonly<Record<number, number | null>>;
	bollinger: BollingerBands | null;
	sentiment: Sentiment;
	trend: Trend;
	/** Indicators that lacked history, and how much they need */
	unavailable: readonly IndicatorShortfall[];
}

/**
 * Recomputes every configured indicator from a price window. Pure: the same
 * points and settings always produce the same snapshot.
 *
 * @throws InsufficientDataError when `points` is empty
 */
export const computeIndicatorSnapshot = (
	instrument: string,
	points: readonly PricePoint[],
	settings: IndicatorSettings = DEFAULT_INDICATOR_SETTINGS
): IndicatorSnapshot => {
	const latest = points[points.length - 1];
	if (!latest) {
		throw new InsufficientDataError(instrument, 1, 0);
	}

	const closes = points.map((point) => point.price);
	const available = closes.length;
	const unavailable: IndicatorShortfall[] = [];

	const track = <T>(indicator: string, required: number, value: T | null): T | null => {
		if (value === null) {
			unavailable.push({ indicator, required, available });
		}
		return value;
	};

	const smaValues: Record<number, number | null> = {};
	for (const period of settings.smaPeriods) {
		smaValues[period] = track(`sma(${period})`, period, sma(closes, period));
	}

	const emaValues: Record<number, number | null> = {};
	for (const period of settings.emaPeriods) {
		emaValues[period] = track(`ema(${period})`, period, ema(closes, period));
	}

	const { rsiPeriod } = settings;
	const rsiValue = track(
		`rsi(${rsiPeriod})`,
		rsiRequiredHistory(rsiPeriod),
		rsi(closes, rsiPeriod)
	);

	const { fast, slow, signal } = settings.macd;
	const macdValue = track(
		`macd(${fast},${slow},${signal})`,
		macdRequiredHistory(slow, signal),
		macd(closes, fast, slow, signal)
	);

	const { period: bandPeriod, stdDevs } = settings.bollinger;
	const bands = track(
		`bollinger(${bandPeriod})`,
		bandPeriod,
		bollinger(closes, bandPeriod, stdDevs)
	);

	const trend = describeTrend(
		smaValues[settings.trend.short] ?? sma(closes, settings.trend.short),
		smaValues[settings.trend.long] ?? sma(closes, settings.trend.long)
	);

	return Object.freeze({
		instrument,
		price: latest.price,
		timestamp: latest.timestamp,
		sampleSize: available,
		rsi: rsiValue,
		macd: macdValue,
		sma: Object.freeze(smaValues),
		ema: Object.freeze(emaValues),
		bollinger: bands,
		sentiment: describeSentiment(rsiValue),
		trend,
		unavailable: Object.freeze(unavailable),
	});
};
