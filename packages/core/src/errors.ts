export type CoinpulseErrorCode =
	| "invalid_price"
	| "insufficient_data"
	| "transient_source"
	| "delivery_failed"
	| "unsupported_instrument"
	| "rule_validation"
	| "timeout";

export class CoinpulseError extends Error {
	readonly code: CoinpulseErrorCode;

	constructor(
		code: CoinpulseErrorCode,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Rejected input to a PriceSeries; never clamped */
export class InvalidPriceError extends CoinpulseError {
	readonly instrument?: string;
	readonly timestamp?: number;
	readonly price?: number;

	constructor(
		message: string,
		details: { instrument?: string; timestamp?: number; price?: number } = {}
	) {
		super("invalid_price", message);
		this.instrument = details.instrument;
		this.timestamp = details.timestamp;
		this.price = details.price;
	}
}

export class InsufficientDataError extends CoinpulseError {
	constructor(
		readonly instrument: string,
		readonly required: number,
		readonly available: number
	) {
		super(
			"insufficient_data",
			`${instrument}: ${available} price point(s) available, ${required} required`
		);
	}
}

export class TransientSourceError extends CoinpulseError {
	constructor(
		readonly source: string,
		readonly instrument: string,
		message: string,
		options?: { cause?: unknown }
	) {
		super("transient_source", `${source} ${instrument}: ${message}`, options);
	}
}

export class DeliveryError extends CoinpulseError {
	constructor(
		readonly ruleId: number,
		readonly attempt: number,
		options?: { cause?: unknown }
	) {
		super(
			"delivery_failed",
			`delivery of rule ${ruleId} failed on attempt ${attempt}: ${errorMessage(
				options?.cause
			)}`,
			options
		);
	}
}

export class UnsupportedInstrumentError extends CoinpulseError {
	constructor(readonly instrument: string) {
		super("unsupported_instrument", `Instrument ${instrument} is not tracked`);
	}
}

export class RuleValidationError extends CoinpulseError {
	constructor(message: string) {
		super("rule_validation", message);
	}
}

export class TimeoutError extends CoinpulseError {
	constructor(
		readonly label: string,
		readonly timeoutMs: number
	) {
		super("timeout", `${label} timed out after ${timeoutMs}ms`);
	}
}

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
