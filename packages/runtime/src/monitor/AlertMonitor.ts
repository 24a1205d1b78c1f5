import {
	TransientSourceError,
	errorMessage,
	normalizeInstrument,
	withTimeout,
	type FiredAlert,
	type PriceQuote,
} from "@coinpulse/core";
import type { AlertEvaluator } from "@coinpulse/alerts";
import type { PriceSource } from "@coinpulse/data";
import type { MarketRegistry } from "../MarketRegistry";
import type { DeliveryOutcome, NotificationDispatcher } from "../notify/NotificationDispatcher";
import { runtimeLogger } from "../runtimeShared";

export const DEFAULT_POLL_INTERVAL_MS = 60_000;

export interface AlertMonitorOptions {
	registry: MarketRegistry;
	evaluator: AlertEvaluator;
	source: PriceSource;
	dispatcher: NotificationDispatcher;
	/** Defaults to the registry's watch list */
	instruments?: readonly string[];
	pollIntervalMs?: number;
	fetchTimeoutMs: number;
	firedRetentionMs: number;
	clock?: () => number;
}

export type InstrumentStatus = "updated" | "stale" | "failed";

export interface InstrumentOutcome {
	instrument: string;
	status: InstrumentStatus;
	price?: number;
	fired: number;
	error?: string;
}

export interface CycleReport {
	startedAt: number;
	finishedAt: number;
	instruments: InstrumentOutcome[];
	fired: FiredAlert[];
	deliveries: DeliveryOutcome[];
	pruned: number[];
}

interface QuoteResult {
	outcome: InstrumentOutcome;
	fired: FiredAlert[];
}

/**
 * Periodic price poll -> series append -> alert evaluation -> delivery.
 *
 * Instruments are processed in parallel and isolated from each other; a
 * failing source or a bad quote only skips that instrument for the cycle.
 * The append and the evaluation of one quote run without an await between
 * them.
 */
export class AlertMonitor {
	private readonly registry: MarketRegistry;
	private readonly evaluator: AlertEvaluator;
	private readonly source: PriceSource;
	private readonly dispatcher: NotificationDispatcher;
	private readonly instruments: string[];
	private readonly pollIntervalMs: number;
	private readonly fetchTimeoutMs: number;
	private readonly firedRetentionMs: number;
	private readonly clock: () => number;

	private running = false;
	// bumped by start(); a cycle from an earlier run never reschedules
	private generation = 0;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private inFlight: Promise<void> | null = null;

	constructor(options: AlertMonitorOptions) {
		this.registry = options.registry;
		this.evaluator = options.evaluator;
		this.source = options.source;
		this.dispatcher = options.dispatcher;
		this.instruments = (options.instruments ?? options.registry.instruments).map(
			(instrument) => options.registry.requireWatched(instrument)
		);
		this.pollIntervalMs = Math.max(
			options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
			1_000
		);
		this.fetchTimeoutMs = options.fetchTimeoutMs;
		this.firedRetentionMs = options.firedRetentionMs;
		this.clock = options.clock ?? Date.now;
	}

	get isRunning(): boolean {
		return this.running;
	}

	async runCycle(): Promise<CycleReport> {
		const startedAt = this.clock();

		const settled = await Promise.allSettled(
			this.instruments.map((instrument) => this.pollInstrument(instrument))
		);
		const outcomes: InstrumentOutcome[] = [];
		const fired: FiredAlert[] = [];
		settled.forEach((result, idx) => {
			if (result.status === "fulfilled") {
				outcomes.push(result.value.outcome);
				fired.push(...result.value.fired);
				return;
			}
			outcomes.push({
				instrument: this.instruments[idx],
				status: "failed",
				fired: 0,
				error: errorMessage(result.reason),
			});
		});

		const deliveries = fired.length ? await this.dispatcher.dispatch(fired) : [];
		const pruned = this.registry.book.pruneFired(this.clock(), this.firedRetentionMs);

		const report: CycleReport = {
			startedAt,
			finishedAt: this.clock(),
			instruments: outcomes,
			fired,
			deliveries,
			pruned,
		};
		runtimeLogger.info("monitor_cycle", {
			durationMs: report.finishedAt - report.startedAt,
			updated: outcomes.filter((outcome) => outcome.status === "updated").length,
			stale: outcomes.filter((outcome) => outcome.status === "stale").length,
			failed: outcomes.filter((outcome) => outcome.status === "failed").length,
			fired: fired.length,
			delivered: deliveries.filter((delivery) => delivery.delivered).length,
			pruned: pruned.length,
		});
		return report;
	}

	/**
	 * Push path: records one quote, evaluates its instrument and delivers
	 * whatever fired. Quotes for unwatched instruments are ignored.
	 */
	async ingest(quote: PriceQuote): Promise<FiredAlert[]> {
		if (!this.registry.isWatched(quote.instrument)) {
			return [];
		}
		const { fired } = this.applyQuote(quote);
		if (fired.length) {
			await this.dispatcher.dispatch(fired);
		}
		return fired;
	}

	start(): void {
		if (this.running) {
			throw new Error("AlertMonitor already running");
		}
		this.running = true;
		this.generation += 1;
		runtimeLogger.info("monitor_started", {
			source: this.source.name,
			instruments: this.instruments,
			pollIntervalMs: this.pollIntervalMs,
		});
		this.scheduleCycle(0);
	}

	/** Resolves once the in-flight cycle, if any, has finished. */
	async stop(): Promise<void> {
		if (!this.running) {
			return;
		}
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		if (this.inFlight) {
			await this.inFlight;
		}
		runtimeLogger.info("monitor_stopped", {});
	}

	private scheduleCycle(delayMs: number): void {
		if (!this.running) {
			return;
		}
		const generation = this.generation;
		this.timer = setTimeout(() => {
			this.timer = null;
			const cycle: Promise<void> = this.runCycle()
				.then(
					() => undefined,
					(error: unknown) => {
						runtimeLogger.error("monitor_cycle_failed", {
							message: errorMessage(error),
						});
					}
				)
				.finally(() => {
					if (this.inFlight === cycle) {
						this.inFlight = null;
					}
					if (generation === this.generation) {
						this.scheduleCycle(this.pollIntervalMs);
					}
				});
			this.inFlight = cycle;
		}, delayMs);
	}

	private async pollInstrument(instrument: string): Promise<QuoteResult> {
		let quote: PriceQuote;
		try {
			quote = await withTimeout(
				this.source.fetchQuote(instrument),
				this.fetchTimeoutMs,
				`${this.source.name} ${instrument}`
			);
		} catch (error) {
			const failure =
				error instanceof TransientSourceError
					? error
					: new TransientSourceError(this.source.name, instrument, errorMessage(error), {
							cause: error,
						});
			runtimeLogger.warn("price_fetch_failed", {
				source: this.source.name,
				instrument,
				message: failure.message,
			});
			return {
				outcome: { instrument, status: "failed", fired: 0, error: failure.message },
				fired: [],
			};
		}

		try {
			return this.applyQuote({ ...quote, instrument });
		} catch (error) {
			runtimeLogger.error("quote_rejected", {
				instrument,
				price: quote.price,
				timestamp: quote.timestamp,
				message: errorMessage(error),
			});
			return {
				outcome: {
					instrument,
					status: "failed",
					price: quote.price,
					fired: 0,
					error: errorMessage(error),
				},
				fired: [],
			};
		}
	}

	private applyQuote(quote: PriceQuote): QuoteResult {
		const instrument = normalizeInstrument(quote.instrument);
		if (!this.registry.record(quote)) {
			runtimeLogger.debug("quote_stale", {
				instrument,
				timestamp: quote.timestamp,
			});
			return {
				outcome: { instrument, status: "stale", price: quote.price, fired: 0 },
				fired: [],
			};
		}
		const fired = this.evaluator.evaluate(instrument, quote.price, this.clock());
		return {
			outcome: { instrument, status: "updated", price: quote.price, fired: fired.length },
			fired,
		};
	}
}
