export type RsiZone = "overbought" | "oversold" | "neutral";

export type Sentiment =
	| "overbought"
	| "oversold"
	| "mildly_bullish"
	| "mildly_bearish"
	| "neutral"
	| "unknown";

export type Trend = "uptrend" | "downtrend" | "sideways" | "unknown";

export const RSI_OVERBOUGHT = 70;
export const RSI_OVERSOLD = 30;

export const classifyRsi = (rsi: number): RsiZone => {
	if (rsi > RSI_OVERBOUGHT) {
		return "overbought";
	}
	if (rsi < RSI_OVERSOLD) {
		return "oversold";
	}
	return "neutral";
};

export const describeSentiment = (rsi: number | null): Sentiment => {
	if (rsi === null) {
		return "unknown";
	}
	const zone = classifyRsi(rsi);
	if (zone !== "neutral") {
		return zone;
	}
	if (rsi > 50) {
		return "mildly_bullish";
	}
	if (rsi < 50) {
		return "mildly_bearish";
	}
	return "neutral";
};

export const describeTrend = (
	shortAverage: number | null,
	longAverage: number | null
): Trend => {
	if (shortAverage === null || longAverage === null) {
		return "unknown";
	}
	if (shortAverage > longAverage) {
		return "uptrend";
	}
	if (shortAverage < longAverage) {
		return "downtrend";
	}
	return "sideways";
};
