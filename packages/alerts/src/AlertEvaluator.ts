import {
	InvalidPriceError,
	normalizeInstrument,
	type AlertDirection,
	type FiredAlert,
} from "@coinpulse/core";
import type { AlertBook } from "./AlertBook";
import { alertsLogger } from "./alertsLogger";

export const isTriggered = (
	direction: AlertDirection,
	threshold: number,
	price: number
): boolean => (direction === "above" ? price >= threshold : price <= threshold);

export class AlertEvaluator {
	constructor(
		private readonly book: AlertBook,
		private readonly clock: () => number = Date.now
	) {}

	/**
	 * Fires every active rule of `instrument` whose condition holds at
	 * `latestPrice`, in ascending rule id order. Fired rules are terminal, so
	 * calling again with the same price returns nothing new.
	 */
	evaluate(
		instrument: string,
		latestPrice: number,
		firedAt: number = this.clock()
	): FiredAlert[] {
		const symbol = normalizeInstrument(instrument);
		if (!Number.isFinite(latestPrice) || latestPrice <= 0) {
			throw new InvalidPriceError(
				`${symbol}: cannot evaluate alerts at price ${latestPrice}`,
				{ instrument: symbol, price: latestPrice }
			);
		}

		const fired: FiredAlert[] = [];
		for (const rule of this.book.activeFor(symbol)) {
			if (!isTriggered(rule.direction, rule.threshold, latestPrice)) {
				continue;
			}
			const updated = this.book.markFired(rule.id, latestPrice, firedAt);
			if (!updated) {
				continue;
			}

			const alert: FiredAlert = {
				ruleId: updated.id,
				userId: updated.userId,
				instrument: symbol,
				observedPrice: latestPrice,
				threshold: updated.threshold,
				direction: updated.direction,
				firedAt,
			};
			alertsLogger.info("alert_fired", { ...alert });
			fired.push(alert);
		}
		return fired;
	}
}
