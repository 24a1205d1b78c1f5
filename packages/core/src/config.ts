import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import {
	DEFAULT_INDICATOR_SETTINGS,
	type IndicatorSettings,
	normalizeInstrument,
} from "./types";
import { createLogger } from "./utils/logger";

const configLogger = createLogger("config");

const WORKSPACE_SENTINELS = ["tsconfig.json", ".git"];

let cachedWorkspaceRoot: string | undefined;

export const getWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export type PriceSourceKind = "ccxt" | "coingecko" | "fallback";

export interface EnvConfig {
	telegramBotToken: string;
	priceSource: PriceSourceKind;
	exchangeId: string;
	coinGeckoApiKey?: string;
	rulesFile: string;
	monitorProfile: string;
	binanceStream: boolean;
}

export interface DeliveryConfig {
	maxAttempts: number;
	retryDelayMs: number;
	timeoutMs: number;
}

export interface MonitorConfig {
	instruments: string[];
	quoteCurrency: string;
	pollIntervalMs: number;
	fetchTimeoutMs: number;
	seriesCapacity: number;
	firedRetentionMs: number;
	delivery: DeliveryConfig;
	indicators: IndicatorSettings;
}

const getEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string,
	fallback?: string
): string => {
	const value = env[key];
	if (value !== undefined && value !== "") {
		return value;
	}
	if (fallback !== undefined) {
		return fallback;
	}
	throw new Error(`Missing required environment variable: ${key}`);
};

const readOptionalEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const trimmed = env[key]?.trim();
	return trimmed ? trimmed : undefined;
};

const normalizePriceSource = (value: string): PriceSourceKind => {
	const normalized = value.toLowerCase();
	if (
		normalized === "ccxt" ||
		normalized === "coingecko" ||
		normalized === "fallback"
	) {
		return normalized;
	}
	throw new Error(
		`PRICE_SOURCE must be one of ccxt, coingecko, fallback (got "${value}")`
	);
};

/**
 * Reads process configuration. `.env` files under `projectRoot` are applied
 * first unless `env` is given explicitly.
 */
export const loadEnvConfig = (
	options: { projectRoot?: string; env?: NodeJS.ProcessEnv } = {}
): EnvConfig => {
	if (!options.env) {
		const files = loadEnvFiles(options.projectRoot ?? getWorkspaceRoot());
		if (files.length) {
			configLogger.info("env_files_loaded", { files });
		}
	}
	const env = options.env ?? process.env;

	return {
		telegramBotToken: getEnvVar(env, "TELEGRAM_BOT_TOKEN"),
		priceSource: normalizePriceSource(getEnvVar(env, "PRICE_SOURCE", "fallback")),
		exchangeId: getEnvVar(env, "EXCHANGE_ID", "binance").toLowerCase(),
		coinGeckoApiKey: readOptionalEnvVar(env, "COINGECKO_API_KEY"),
		rulesFile: getEnvVar(env, "RULES_FILE", "data/alert-rules.json"),
		monitorProfile: getEnvVar(env, "MONITOR_PROFILE", "default"),
		binanceStream: readOptionalEnvVar(env, "BINANCE_STREAM") === "true",
	};
};

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const ensureNumber = (value: unknown, field: string): number => {
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new Error(`Required numeric field missing in ${field}`);
	}
	return value;
};

const ensurePositiveInteger = (value: unknown, field: string): number => {
	const num = ensureNumber(value, field);
	if (!Number.isInteger(num) || num < 1) {
		throw new Error(`${field} must be a positive integer (got ${num})`);
	}
	return num;
};

const optionalNumber = (
	value: unknown,
	field: string,
	fallback: number
): number => (value === undefined ? fallback : ensureNumber(value, field));

const ensureObject = (value: unknown, field: string): JsonObject => {
	if (value === undefined) {
		return {};
	}
	if (!isObject(value)) {
		throw new Error(`${field} must be an object`);
	}
	return value;
};

const ensurePeriodList = (
	value: unknown,
	field: string,
	fallback: number[]
): number[] => {
	if (value === undefined) {
		return [...fallback];
	}
	if (!Array.isArray(value)) {
		throw new Error(`${field} must be an array of periods`);
	}
	return value.map((entry, index) =>
		ensurePositiveInteger(entry, `${field}[${index}]`)
	);
};

const parseIndicatorSettings = (raw: unknown): IndicatorSettings => {
	const file = ensureObject(raw, "indicators");
	const defaults = DEFAULT_INDICATOR_SETTINGS;
	const macd = ensureObject(file.macd, "indicators.macd");
	const bollinger = ensureObject(file.bollinger, "indicators.bollinger");
	const trend = ensureObject(file.trend, "indicators.trend");

	const settings: IndicatorSettings = {
		rsiPeriod:
			file.rsiPeriod === undefined
				? defaults.rsiPeriod
				: ensurePositiveInteger(file.rsiPeriod, "indicators.rsiPeriod"),
		macd: {
			fast:
				macd.fast === undefined
					? defaults.macd.fast
					: ensurePositiveInteger(macd.fast, "indicators.macd.fast"),
			slow:
				macd.slow === undefined
					? defaults.macd.slow
					: ensurePositiveInteger(macd.slow, "indicators.macd.slow"),
			signal:
				macd.signal === undefined
					? defaults.macd.signal
					: ensurePositiveInteger(macd.signal, "indicators.macd.signal"),
		},
		smaPeriods: ensurePeriodList(
			file.smaPeriods,
			"indicators.smaPeriods",
			defaults.smaPeriods
		),
		emaPeriods: ensurePeriodList(
			file.emaPeriods,
			"indicators.emaPeriods",
			defaults.emaPeriods
		),
		bollinger: {
			period:
				bollinger.period === undefined
					? defaults.bollinger.period
					: ensurePositiveInteger(bollinger.period, "indicators.bollinger.period"),
			stdDevs: optionalNumber(
				bollinger.stdDevs,
				"indicators.bollinger.stdDevs",
				defaults.bollinger.stdDevs
			),
		},
		trend: {
			short:
				trend.short === undefined
					? defaults.trend.short
					: ensurePositiveInteger(trend.short, "indicators.trend.short"),
			long:
				trend.long === undefined
					? defaults.trend.long
					: ensurePositiveInteger(trend.long, "indicators.trend.long"),
		},
	};

	if (settings.macd.fast >= settings.macd.slow) {
		throw new Error("indicators.macd.fast must be shorter than indicators.macd.slow");
	}
	return settings;
};

/** Validates a parsed monitor profile document. */
export const parseMonitorConfig = (raw: unknown): MonitorConfig => {
	if (!isObject(raw)) {
		throw new Error("Monitor config must be a JSON object");
	}
	if (!Array.isArray(raw.instruments) || raw.instruments.length === 0) {
		throw new Error("Monitor config must list at least one instrument");
	}
	const instruments = raw.instruments.map((entry, index) => {
		if (typeof entry !== "string" || !entry.trim()) {
			throw new Error(`instruments[${index}] must be a non-empty string`);
		}
		return normalizeInstrument(entry);
	});
	const delivery = ensureObject(raw.delivery, "delivery");

	return {
		instruments: Array.from(new Set(instruments)),
		quoteCurrency:
			typeof raw.quoteCurrency === "string" && raw.quoteCurrency.trim()
				? normalizeInstrument(raw.quoteCurrency)
				: "USDT",
		pollIntervalMs: ensurePositiveInteger(raw.pollIntervalMs, "pollIntervalMs"),
		fetchTimeoutMs: ensurePositiveInteger(raw.fetchTimeoutMs, "fetchTimeoutMs"),
		seriesCapacity: ensurePositiveInteger(raw.seriesCapacity, "seriesCapacity"),
		firedRetentionMs: optionalNumber(
			raw.firedRetentionMs,
			"firedRetentionMs",
			24 * 60 * 60 * 1000
		),
		delivery: {
			maxAttempts:
				delivery.maxAttempts === undefined
					? 3
					: ensurePositiveInteger(delivery.maxAttempts, "delivery.maxAttempts"),
			retryDelayMs: optionalNumber(
				delivery.retryDelayMs,
				"delivery.retryDelayMs",
				1_000
			),
			timeoutMs: optionalNumber(delivery.timeoutMs, "delivery.timeoutMs", 10_000),
		},
		indicators: parseIndicatorSettings(raw.indicators),
	};
};

export const loadMonitorConfig = (
	profile = "default",
	configDir = path.join(getWorkspaceRoot(), "config")
): MonitorConfig => {
	const configPath = path.join(configDir, "monitor", `${profile}.json`);
	const contents = fs.readFileSync(configPath, "utf-8");
	const parsed: unknown = JSON.parse(contents);
	return parseMonitorConfig(parsed);
};
