import path from "node:path";
import { AlertBook, AlertEvaluator } from "@coinpulse/alerts";
import {
	createLogger,
	errorMessage,
	getWorkspaceRoot,
	loadEnvConfig,
	loadMonitorConfig,
} from "@coinpulse/core";
import { BinanceTickerStream } from "@coinpulse/data";
import { JsonFileRuleStore } from "@coinpulse/persistence";
import {
	AlertMonitor,
	AlertService,
	MarketRegistry,
	NotificationDispatcher,
} from "@coinpulse/runtime";
import { CommandHandler } from "./commands/CommandHandler";
import { createPriceSource } from "./createPriceSource";
import { TelegramClient } from "./telegram/TelegramClient";
import { TelegramNotificationSink } from "./telegram/TelegramNotificationSink";
import { TelegramPoller } from "./telegram/TelegramPoller";

const logger = createLogger("alert-bot");

const main = async (): Promise<void> => {
	const env = loadEnvConfig();
	const monitorConfig = loadMonitorConfig(env.monitorProfile);
	const rulesFile = path.resolve(getWorkspaceRoot(), env.rulesFile);

	logger.info("bot_starting", {
		pid: process.pid,
		priceSource: env.priceSource,
		exchange: env.exchangeId,
		profile: env.monitorProfile,
		rulesFile,
		instruments: monitorConfig.instruments,
	});

	const book = new AlertBook(new JsonFileRuleStore(rulesFile));
	book.hydrate();

	const registry = new MarketRegistry(book, {
		instruments: monitorConfig.instruments,
		seriesCapacity: monitorConfig.seriesCapacity,
	});
	const service = new AlertService(registry, {
		indicators: monitorConfig.indicators,
	});

	const telegram = new TelegramClient(env.telegramBotToken);
	const me = await telegram.getMe();

	const monitor = new AlertMonitor({
		registry,
		evaluator: new AlertEvaluator(book),
		source: createPriceSource(env, monitorConfig),
		dispatcher: new NotificationDispatcher(
			new TelegramNotificationSink(telegram),
			monitorConfig.delivery
		),
		pollIntervalMs: monitorConfig.pollIntervalMs,
		fetchTimeoutMs: monitorConfig.fetchTimeoutMs,
		firedRetentionMs: monitorConfig.firedRetentionMs,
	});
	const poller = new TelegramPoller(
		telegram,
		new CommandHandler(service, {
			botUsername: me.username,
			indicators: monitorConfig.indicators,
		})
	);

	const stream = env.binanceStream
		? new BinanceTickerStream({
				instruments: monitorConfig.instruments,
				quote: monitorConfig.quoteCurrency,
			})
		: null;
	stream?.start((quote) => {
		void monitor.ingest(quote).catch((error: unknown) => {
			logger.error("stream_quote_failed", {
				instrument: quote.instrument,
				message: errorMessage(error),
			});
		});
	});

	monitor.start();
	poller.start();
	logger.info("bot_started", {
		username: me.username,
		binanceStream: Boolean(stream),
	});

	let stopping = false;
	const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
		logger.info("bot_stopping", { signal });
		stream?.stop();
		await Promise.all([poller.stop(), monitor.stop()]);
		logger.info("bot_stopped", {});
	};

	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.once(signal, () => {
			if (stopping) {
				return;
			}
			stopping = true;
			shutdown(signal).then(
				() => process.exit(0),
				(error: unknown) => {
					logger.error("shutdown_failed", { message: errorMessage(error) });
					process.exit(1);
				}
			);
		});
	}
};

main().catch((error: unknown) => {
	logger.error("bot_failed", {
		message: errorMessage(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
