import { createLogger, errorMessage, sleep } from "@coinpulse/core";
import type { CommandHandler } from "../commands/CommandHandler";
import type { TelegramClient } from "./TelegramClient";
import type { TelegramUpdate } from "./types";

const pollerLogger = createLogger("telegram-poller");

export interface TelegramPollerOptions {
	pollTimeoutSec?: number;
	errorBackoffMs?: number;
}

/**
 * Long-polls getUpdates and answers each text message through the command
 * handler. Updates are acknowledged (offset advanced) whether or not the
 * reply could be sent.
 */
export class TelegramPoller {
	private readonly pollTimeoutSec: number;
	private readonly errorBackoffMs: number;

	private running = false;
	private offset: number | undefined;
	private loop: Promise<void> | null = null;
	private abort: AbortController | null = null;

	constructor(
		private readonly client: Pick<TelegramClient, "getUpdates" | "sendMessage">,
		private readonly handler: Pick<CommandHandler, "handle">,
		options: TelegramPollerOptions = {}
	) {
		this.pollTimeoutSec = options.pollTimeoutSec ?? 30;
		this.errorBackoffMs = options.errorBackoffMs ?? 5_000;
	}

	start(): void {
		if (this.running) {
			throw new Error("TelegramPoller already running");
		}
		this.running = true;
		pollerLogger.info("telegram_poller_started", {
			pollTimeoutSec: this.pollTimeoutSec,
		});
		this.loop = this.run();
	}

	async stop(): Promise<void> {
		if (!this.running) {
			return;
		}
		this.running = false;
		this.abort?.abort();
		if (this.loop) {
			await this.loop;
			this.loop = null;
		}
		pollerLogger.info("telegram_poller_stopped", {});
	}

	/** One getUpdates round trip; returns how many updates were handled. */
	async pollOnce(): Promise<number> {
		this.abort = new AbortController();
		const updates = await this.client.getUpdates(
			this.offset,
			this.pollTimeoutSec,
			this.abort.signal
		);
		this.abort = null;

		for (const update of updates) {
			this.offset = Math.max(this.offset ?? 0, update.update_id + 1);
			await this.handleUpdate(update);
		}
		return updates.length;
	}

	private async run(): Promise<void> {
		while (this.running) {
			try {
				await this.pollOnce();
			} catch (error) {
				if (!this.running) {
					break;
				}
				pollerLogger.warn("telegram_poll_failed", {
					message: errorMessage(error),
					retryInMs: this.errorBackoffMs,
				});
				await sleep(this.errorBackoffMs);
			}
		}
	}

	private async handleUpdate(update: TelegramUpdate): Promise<void> {
		const message = update.message;
		if (!message?.text || !message.from || message.from.is_bot) {
			return;
		}

		const userId = String(message.from.id);
		const reply = this.handler.handle(userId, message.text);
		if (reply === null) {
			return;
		}

		try {
			await this.client.sendMessage(message.chat.id, reply);
		} catch (error) {
			pollerLogger.error("telegram_reply_failed", {
				updateId: update.update_id,
				chatId: message.chat.id,
				message: errorMessage(error),
			});
		}
	}
}
