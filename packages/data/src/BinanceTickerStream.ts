import WebSocket from "ws";
import {
	createLogger,
	errorMessage,
	normalizeInstrument,
	type PriceQuote,
} from "@coinpulse/core";
import { miniTickerToQuote, parseMiniTickerMessage } from "./adapters";
import { toStreamSymbol } from "./symbols";

const STREAM_ENDPOINT = "wss://stream.binance.com:9443/stream";

const streamLogger = createLogger("binance-stream");

export interface BinanceTickerStreamOptions {
	instruments: string[];
	quote?: string;
	endpoint?: string;
	reconnectDelayMs?: number;
}

export const buildMiniTickerStreamUrl = (
	endpoint: string,
	streamSymbols: string[]
): string =>
	`${endpoint}?streams=${streamSymbols.map((symbol) => `${symbol}@miniTicker`).join("/")}`;

/**
 * Push-based price feed over Binance's combined mini-ticker streams.
 * Reconnects after the socket closes until stop() is called.
 */
export class BinanceTickerStream {
	readonly name = "binance-ws";
	private readonly endpoint: string;
	private readonly reconnectDelayMs: number;
	private readonly instrumentBySymbol = new Map<string, string>();

	private ws: WebSocket | null = null;
	private running = false;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private onQuoteCallback: ((quote: PriceQuote) => void) | null = null;

	constructor(options: BinanceTickerStreamOptions) {
		if (!options.instruments.length) {
			throw new Error("BinanceTickerStream needs at least one instrument");
		}
		const quote = options.quote ?? "USDT";
		for (const instrument of options.instruments) {
			const symbol = normalizeInstrument(instrument);
			this.instrumentBySymbol.set(toStreamSymbol(symbol, quote).toUpperCase(), symbol);
		}
		this.endpoint = options.endpoint ?? STREAM_ENDPOINT;
		this.reconnectDelayMs = Math.max(options.reconnectDelayMs ?? 1_000, 100);
	}

	get url(): string {
		return buildMiniTickerStreamUrl(
			this.endpoint,
			Array.from(this.instrumentBySymbol.keys(), (symbol) => symbol.toLowerCase())
		);
	}

	start(onQuote: (quote: PriceQuote) => void): void {
		if (this.running) {
			throw new Error("BinanceTickerStream already running");
		}
		this.onQuoteCallback = onQuote;
		this.running = true;
		this.connect();
	}

	stop(): void {
		if (!this.running) {
			return;
		}
		this.running = false;
		this.cleanupWs();
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
		this.onQuoteCallback = null;
	}

	/** Maps one raw frame to a quote for a tracked instrument, or null. */
	toQuote(raw: string): PriceQuote | null {
		const update = parseMiniTickerMessage(raw);
		if (!update) {
			streamLogger.debug("binance_stream_frame_ignored", { length: raw.length });
			return null;
		}
		const instrument = this.instrumentBySymbol.get(update.symbol.toUpperCase());
		if (!instrument) {
			return null;
		}
		return miniTickerToQuote(update, instrument, this.name);
	}

	private handleMessage(raw: string): void {
		const quote = this.toQuote(raw);
		if (quote && this.running && this.onQuoteCallback) {
			this.onQuoteCallback(quote);
		}
	}

	private connect(): void {
		if (!this.running) {
			return;
		}

		this.ws = new WebSocket(this.url);

		this.ws.on("open", () => {
			streamLogger.info("binance_stream_connected", {
				instruments: Array.from(this.instrumentBySymbol.values()),
			});
		});

		this.ws.on("message", (payload) => {
			this.handleMessage(payload.toString());
		});

		this.ws.on("close", () => {
			streamLogger.warn("binance_stream_disconnected", {});
			this.scheduleReconnect();
		});

		this.ws.on("error", (error) => {
			streamLogger.error("binance_stream_error", {
				message: errorMessage(error),
			});
		});
	}

	private scheduleReconnect(): void {
		if (!this.running || this.reconnectTimer) {
			return;
		}
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.cleanupWs();
			this.connect();
		}, this.reconnectDelayMs);
	}

	private cleanupWs(): void {
		if (!this.ws) {
			return;
		}
		this.ws.removeAllListeners();
		// terminate() on a socket still connecting emits "error" a tick later
		this.ws.on("error", (error) => {
			streamLogger.debug("binance_stream_aborted", {
				message: errorMessage(error),
			});
		});
		try {
			this.ws.terminate();
		} catch (error) {
			streamLogger.debug("binance_stream_terminate_failed", {
				message: errorMessage(error),
			});
		}
		this.ws = null;
	}
}
