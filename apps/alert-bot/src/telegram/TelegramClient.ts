import { z } from "zod";
import { errorMessage, withTimeout } from "@coinpulse/core";
import type { FetchFn } from "@coinpulse/data";
import {
	telegramEnvelopeSchema,
	telegramMessageSchema,
	telegramUpdateSchema,
	telegramUserSchema,
	type TelegramMessage,
	type TelegramUpdate,
	type TelegramUser,
} from "./types";

const DEFAULT_BASE_URL = "https://api.telegram.org";
const DEFAULT_TIMEOUT_MS = 10_000;

export class TelegramApiError extends Error {
	constructor(
		readonly method: string,
		message: string,
		readonly errorCode?: number,
		options?: { cause?: unknown }
	) {
		super(`telegram ${method}: ${message}`, options);
		this.name = "TelegramApiError";
	}
}

export interface TelegramClientOptions {
	baseUrl?: string;
	fetchFn?: FetchFn;
	/** Per-request bound, added on top of the long-poll window for getUpdates */
	timeoutMs?: number;
}

/** Minimal Bot API client: long polling and HTML messages. */
export class TelegramClient {
	private readonly baseUrl: string;
	private readonly fetchFn: FetchFn;
	private readonly timeoutMs: number;

	constructor(
		private readonly token: string,
		options: TelegramClientOptions = {}
	) {
		if (!token) {
			throw new Error("TelegramClient requires a bot token");
		}
		this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
		this.fetchFn = options.fetchFn ?? fetch;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
	}

	getMe(): Promise<TelegramUser> {
		return this.call("getMe", {}, telegramUserSchema);
	}

	getUpdates(
		offset: number | undefined,
		pollTimeoutSec: number,
		signal?: AbortSignal
	): Promise<TelegramUpdate[]> {
		return this.call(
			"getUpdates",
			{ offset, timeout: pollTimeoutSec, allowed_updates: ["message"] },
			z.array(telegramUpdateSchema),
			{ extraTimeoutMs: pollTimeoutSec * 1_000, signal }
		);
	}

	sendMessage(chatId: number | string, text: string): Promise<TelegramMessage> {
		return this.call(
			"sendMessage",
			{
				chat_id: chatId,
				text,
				parse_mode: "HTML",
				disable_web_page_preview: true,
			},
			telegramMessageSchema
		);
	}

	private async call<T extends z.ZodTypeAny>(
		method: string,
		payload: Record<string, unknown>,
		resultSchema: T,
		options: { extraTimeoutMs?: number; signal?: AbortSignal } = {}
	): Promise<z.infer<T>> {
		let body: unknown;
		let status: number;
		try {
			const res = await withTimeout(
				this.fetchFn(`${this.baseUrl}/bot${this.token}/${method}`, {
					method: "POST",
					headers: { "content-type": "application/json" },
					body: JSON.stringify(payload),
					signal: options.signal,
				}),
				this.timeoutMs + (options.extraTimeoutMs ?? 0),
				`telegram ${method}`
			);
			status = res.status;
			body = await res.json();
		} catch (error) {
			throw new TelegramApiError(method, errorMessage(error), undefined, {
				cause: error,
			});
		}

		const envelope = telegramEnvelopeSchema.safeParse(body);
		if (!envelope.success) {
			throw new TelegramApiError(method, `unexpected response (HTTP ${status})`);
		}
		if (!envelope.data.ok) {
			throw new TelegramApiError(
				method,
				envelope.data.description ?? `HTTP ${status}`,
				envelope.data.error_code
			);
		}

		const result = resultSchema.safeParse(envelope.data.result);
		if (!result.success) {
			throw new TelegramApiError(method, `malformed result: ${result.error.message}`);
		}
		return result.data;
	}
}
