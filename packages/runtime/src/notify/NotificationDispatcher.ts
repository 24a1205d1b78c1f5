import {
	DeliveryError,
	errorMessage,
	sleep,
	withTimeout,
	type DeliveryConfig,
	type FiredAlert,
} from "@coinpulse/core";
import { runtimeLogger } from "../runtimeShared";

export interface NotificationSink {
	deliver(alert: FiredAlert): Promise<void>;
}

export interface DeliveryOutcome {
	ruleId: number;
	userId: string;
	delivered: boolean;
	attempts: number;
	error?: string;
}

/**
 * Hands fired alerts to a sink with bounded retries. Every alert is
 * delivered independently; one failing user never delays or drops another.
 */
export class NotificationDispatcher {
	private readonly maxAttempts: number;
	private readonly retryDelayMs: number;
	private readonly timeoutMs: number;

	constructor(
		private readonly sink: NotificationSink,
		options: DeliveryConfig
	) {
		this.maxAttempts = Math.max(Math.floor(options.maxAttempts), 1);
		this.retryDelayMs = Math.max(options.retryDelayMs, 0);
		this.timeoutMs = options.timeoutMs;
	}

	async dispatch(alerts: readonly FiredAlert[]): Promise<DeliveryOutcome[]> {
		const settled = await Promise.allSettled(
			alerts.map((alert) => this.deliverWithRetry(alert))
		);
		return settled.map((result, idx) => {
			if (result.status === "fulfilled") {
				return result.value;
			}
			const alert = alerts[idx];
			return {
				ruleId: alert.ruleId,
				userId: alert.userId,
				delivered: false,
				attempts: 0,
				error: errorMessage(result.reason),
			};
		});
	}

	private async deliverWithRetry(alert: FiredAlert): Promise<DeliveryOutcome> {
		let lastError: DeliveryError | null = null;

		for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
			try {
				await withTimeout(
					this.sink.deliver(alert),
					this.timeoutMs,
					`deliver rule ${alert.ruleId}`
				);
				runtimeLogger.debug("alert_delivered", {
					ruleId: alert.ruleId,
					userId: alert.userId,
					attempt,
				});
				return {
					ruleId: alert.ruleId,
					userId: alert.userId,
					delivered: true,
					attempts: attempt,
				};
			} catch (error) {
				lastError = new DeliveryError(alert.ruleId, attempt, { cause: error });
				runtimeLogger.warn("alert_delivery_failed", {
					ruleId: alert.ruleId,
					userId: alert.userId,
					attempt,
					maxAttempts: this.maxAttempts,
					message: lastError.message,
				});
			}
			if (attempt < this.maxAttempts) {
				await sleep(this.retryDelayMs);
			}
		}

		runtimeLogger.warn("alert_dropped", {
			ruleId: alert.ruleId,
			userId: alert.userId,
			instrument: alert.instrument,
			attempts: this.maxAttempts,
		});
		return {
			ruleId: alert.ruleId,
			userId: alert.userId,
			delivered: false,
			attempts: this.maxAttempts,
			error: lastError?.message,
		};
	}
}
