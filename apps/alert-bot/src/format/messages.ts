import {
	DEFAULT_INDICATOR_SETTINGS,
	type AlertRule,
	type FiredAlert,
	type IndicatorSettings,
	type PriceQuote,
} from "@coinpulse/core";
import {
	classifyRsi,
	type IndicatorSnapshot,
	type Sentiment,
	type Trend,
} from "@coinpulse/indicators";

const HTML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
};

export const escapeHtml = (text: string): string =>
	text.replace(/[&<>"]/g, (char) => HTML_ESCAPES[char] ?? char);

const usdFormat = new Intl.NumberFormat("en-US", {
	minimumFractionDigits: 2,
	maximumFractionDigits: 2,
});
// sub-dollar coins keep their significant digits
const smallUsdFormat = new Intl.NumberFormat("en-US", {
	minimumFractionDigits: 2,
	maximumFractionDigits: 6,
});

/** 1234.56 -> "$1,234.56" */
export const formatUsd = (value: number): string => {
	const abs = Math.abs(value);
	const text = (abs < 1 ? smallUsdFormat : usdFormat).format(abs);
	return value < 0 ? `-$${text}` : `$${text}`;
};

export const formatPercent = (value: number): string =>
	`${value > 0 ? "+" : ""}${value.toFixed(2)}%`;

/** Epoch ms -> "2024-01-01 09:30 UTC" */
export const formatTimestamp = (ms: number): string =>
	`${new Date(ms).toISOString().slice(0, 16).replace("T", " ")} UTC`;

const SENTIMENT_LABELS: Record<Sentiment, string> = {
	overbought: "Overbought",
	oversold: "Oversold",
	mildly_bullish: "Mildly bullish",
	mildly_bearish: "Mildly bearish",
	neutral: "Neutral",
	unknown: "Unknown",
};

const TREND_LABELS: Record<Trend, string> = {
	uptrend: "Uptrend",
	downtrend: "Downtrend",
	sideways: "Sideways",
	unknown: "Unknown",
};

const RSI_ZONE_LABELS = {
	overbought: "Overbought",
	oversold: "Oversold",
	neutral: "Neutral",
} as const;

const COMMAND_LINES = [
	"/price [coin] - Latest price (e.g. /price BTC)",
	"/analyze [coin] - Technical indicators (e.g. /analyze BTC)",
	"/setalert [coin] [above|below] [price] - Set a price alert",
	"   Example: /setalert BTC above 50000",
	"/myalerts - Your alerts",
	"/removealert [id] - Remove an alert by ID",
	"/help - Show help information",
];

export const formatWelcome = (): string =>
	[
		"👋 Welcome to coinpulse!",
		"",
		"I watch crypto prices and message you when one crosses a threshold you set.",
		"",
		"<b>Commands:</b>",
		...COMMAND_LINES,
	].join("\n");

export const formatHelp = (instruments: readonly string[]): string =>
	[
		"📖 <b>How to use coinpulse</b>",
		"",
		"<b>Commands:</b>",
		...COMMAND_LINES,
		"",
		`<b>Tracked coins:</b> ${instruments.map(escapeHtml).join(", ")}`,
	].join("\n");

export const formatQuote = (quote: PriceQuote): string => {
	const lines = [`💰 <b>${escapeHtml(quote.instrument)}</b> ${formatUsd(quote.price)}`];
	if (quote.change24hPct !== undefined) {
		lines.push(`24h change: ${formatPercent(quote.change24hPct)}`);
	}
	if (quote.low24h !== undefined && quote.high24h !== undefined) {
		lines.push(`24h range: ${formatUsd(quote.low24h)} - ${formatUsd(quote.high24h)}`);
	}
	lines.push(
		`<i>as of ${formatTimestamp(quote.timestamp)} via ${escapeHtml(quote.source)}</i>`
	);
	return lines.join("\n");
};

const formatAverages = (
	label: string,
	values: Readonly<Record<number, number | null>>,
	periods: readonly number[]
): string[] =>
	periods.map((period) => {
		const value = values[period];
		return `• ${label}(${period}): ${value === null || value === undefined ? "n/a" : formatUsd(value)}`;
	});

export const formatSnapshot = (
	snapshot: IndicatorSnapshot,
	quote?: PriceQuote,
	settings: IndicatorSettings = DEFAULT_INDICATOR_SETTINGS
): string => {
	const instrument = escapeHtml(snapshot.instrument);
	const lines = [
		`📊 <b>${instrument} Analysis Report</b>`,
		"",
		`<b>Current Price:</b> ${formatUsd(snapshot.price)}`,
	];
	if (quote?.change24hPct !== undefined) {
		lines.push(`<b>24h Change:</b> ${formatPercent(quote.change24hPct)}`);
	}
	lines.push(
		`<b>Market Sentiment:</b> ${SENTIMENT_LABELS[snapshot.sentiment]}`,
		`<b>Trend:</b> ${TREND_LABELS[snapshot.trend]}`,
		"",
		"<b>Key Indicators:</b>"
	);

	const { rsiPeriod, macd: macdSettings, bollinger: bandSettings } = settings;
	lines.push(
		snapshot.rsi === null
			? `• RSI(${rsiPeriod}): n/a`
			: `• RSI(${rsiPeriod}): ${snapshot.rsi.toFixed(2)} (${RSI_ZONE_LABELS[classifyRsi(snapshot.rsi)]})`
	);
	const macdLabel = `MACD(${macdSettings.fast},${macdSettings.slow},${macdSettings.signal})`;
	lines.push(
		snapshot.macd === null
			? `• ${macdLabel}: n/a`
			: `• ${macdLabel}: ${snapshot.macd.macd.toFixed(4)} (signal ${snapshot.macd.signal.toFixed(4)}, histogram ${snapshot.macd.histogram.toFixed(4)})`
	);
	lines.push(...formatAverages("SMA", snapshot.sma, settings.smaPeriods));
	lines.push(...formatAverages("EMA", snapshot.ema, settings.emaPeriods));
	lines.push(
		snapshot.bollinger === null
			? `• Bollinger(${bandSettings.period}): n/a`
			: `• Bollinger(${bandSettings.period}): ${formatUsd(snapshot.bollinger.lower)} - ${formatUsd(snapshot.bollinger.upper)}`
	);

	lines.push("", `<i>Based on ${snapshot.sampleSize} price point(s).</i>`);
	if (snapshot.unavailable.length) {
		const waiting = snapshot.unavailable
			.map((shortfall) => `${shortfall.indicator} needs ${shortfall.required}`)
			.join(", ");
		lines.push(`<i>Waiting for more history: ${waiting}.</i>`);
	}
	return lines.join("\n");
};

const describeCondition = (
	rule: Pick<AlertRule, "direction" | "threshold">
): string => `Price ${rule.direction} ${formatUsd(rule.threshold)}`;

export const formatRuleCreated = (
	rule: Pick<AlertRule, "id" | "instrument" | "direction" | "threshold">
): string =>
	[
		"✅ Alert set successfully!",
		`<b>ID:</b> ${rule.id}`,
		`<b>Coin:</b> ${escapeHtml(rule.instrument)}`,
		`<b>Condition:</b> ${describeCondition(rule)}`,
	].join("\n");

export const formatRules = (rules: readonly AlertRule[]): string => {
	if (!rules.length) {
		return "You don't have any alerts.";
	}
	const blocks = rules.map((rule) => {
		const status =
			rule.status === "fired" && rule.firedAt !== undefined
				? `fired at ${formatUsd(rule.firedPrice ?? rule.threshold)} on ${formatTimestamp(rule.firedAt)}`
				: rule.status;
		return [
			`<b>ID:</b> ${rule.id}`,
			`<b>Coin:</b> ${escapeHtml(rule.instrument)}`,
			`<b>Condition:</b> ${describeCondition(rule)}`,
			`<b>Status:</b> ${status}`,
			`<b>Created:</b> ${formatTimestamp(rule.createdAt)}`,
		].join("\n");
	});
	return ["🔔 <b>Your Alerts</b>", ...blocks].join("\n\n");
};

export const formatFiredAlert = (alert: FiredAlert): string =>
	[
		"🚨 <b>Price Alert Triggered!</b>",
		"",
		`<b>Coin:</b> ${escapeHtml(alert.instrument)}`,
		`<b>Condition:</b> ${describeCondition(alert)}`,
		`<b>Current Price:</b> ${formatUsd(alert.observedPrice)}`,
		"",
		`<i>Alert ${alert.ruleId} has fired and will not trigger again.</i>`,
	].join("\n");
