import { InvalidPriceError } from "../errors";
import type { PricePoint } from "../types";

export interface PriceSeriesOptions {
	/** Maximum retained points; the oldest is evicted beyond this */
	capacity: number;
}

/**
 * Rolling price window for one instrument.
 *
 * - Timestamps strictly increase; prices are finite and > 0
 * - Bad input is rejected with InvalidPriceError, never clamped
 * - Reads return frozen copies so a reader never observes a later append
 */
export class PriceSeries {
	readonly instrument: string;
	readonly capacity: number;
	private readonly points: PricePoint[] = [];

	constructor(instrument: string, options: PriceSeriesOptions) {
		if (!Number.isInteger(options.capacity) || options.capacity < 1) {
			throw new RangeError(
				`PriceSeries capacity must be a positive integer (got ${options.capacity})`
			);
		}
		this.instrument = instrument;
		this.capacity = options.capacity;
	}

	get size(): number {
		return this.points.length;
	}

	append(timestamp: number, price: number): PricePoint {
		if (typeof price !== "number" || !Number.isFinite(price) || price <= 0) {
			throw new InvalidPriceError(
				`${this.instrument}: price must be a positive finite number (got ${price})`,
				{ instrument: this.instrument, timestamp, price }
			);
		}
		if (typeof timestamp !== "number" || !Number.isFinite(timestamp)) {
			throw new InvalidPriceError(
				`${this.instrument}: timestamp must be a finite number (got ${timestamp})`,
				{ instrument: this.instrument, timestamp, price }
			);
		}

		const last = this.latest();
		if (last && timestamp <= last.timestamp) {
			throw new InvalidPriceError(
				`${this.instrument}: timestamp ${timestamp} is not after ${last.timestamp}`,
				{ instrument: this.instrument, timestamp, price }
			);
		}

		const point: PricePoint = Object.freeze({ timestamp, price });
		this.points.push(point);
		if (this.points.length > this.capacity) {
			this.points.splice(0, this.points.length - this.capacity);
		}
		return point;
	}

	/**
	 * Last `window` points (all of them when omitted), oldest first.
	 */
	snapshot(window?: number): readonly PricePoint[] {
		if (window === undefined) {
			return Object.freeze(this.points.slice());
		}
		const count = Math.max(Math.floor(window), 0);
		if (count === 0) {
			return Object.freeze([]);
		}
		return Object.freeze(this.points.slice(-count));
	}

	closes(window?: number): number[] {
		return this.snapshot(window).map((point) => point.price);
	}

	latest(): PricePoint | undefined {
		return this.points[this.points.length - 1];
	}
}
