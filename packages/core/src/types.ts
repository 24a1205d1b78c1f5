export type Instrument = string;

export interface PricePoint {
	/** Epoch milliseconds */
	timestamp: number;
	price: number;
}

export interface PriceQuote extends PricePoint {
	instrument: Instrument;
	source: string;
	change24hPct?: number;
	high24h?: number;
	low24h?: number;
	volume24h?: number;
}

export type AlertDirection = "above" | "below";

export const isAlertDirection = (value: string): value is AlertDirection =>
	value === "above" || value === "below";

export type AlertRuleStatus = "active" | "fired" | "removed";

export interface AlertRule {
	id: number;
	userId: string;
	instrument: Instrument;
	direction: AlertDirection;
	threshold: number;
	createdAt: number;
	status: AlertRuleStatus;
	firedAt?: number;
	firedPrice?: number;
}

export interface FiredAlert {
	ruleId: number;
	userId: string;
	instrument: Instrument;
	observedPrice: number;
	threshold: number;
	direction: AlertDirection;
	firedAt: number;
}

/**
 * Durable key-value storage for alert rules, keyed by rule id.
 * Writes must be durable by the time save/delete return.
 */
export interface RuleStore {
	save(rule: AlertRule): void;
	load(userId: string): AlertRule[];
	loadAll(): AlertRule[];
	delete(ruleId: number): boolean;
}

export interface MacdSettings {
	fast: number;
	slow: number;
	signal: number;
}

export interface BollingerSettings {
	period: number;
	stdDevs: number;
}

export interface IndicatorSettings {
	rsiPeriod: number;
	macd: MacdSettings;
	smaPeriods: number[];
	emaPeriods: number[];
	bollinger: BollingerSettings;
	/** SMA periods compared to call the trend */
	trend: { short: number; long: number };
}

export const DEFAULT_INDICATOR_SETTINGS: IndicatorSettings = {
	rsiPeriod: 14,
	macd: { fast: 12, slow: 26, signal: 9 },
	smaPeriods: [20, 50, 200],
	emaPeriods: [12, 26],
	bollinger: { period: 20, stdDevs: 2 },
	trend: { short: 50, long: 200 },
};

export const normalizeInstrument = (value: string): Instrument =>
	value.trim().toUpperCase();
