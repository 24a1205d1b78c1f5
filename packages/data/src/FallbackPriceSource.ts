import {
	TransientSourceError,
	errorMessage,
	normalizeInstrument,
	type PriceQuote,
} from "@coinpulse/core";
import type { PriceSource } from "./priceTypes";

/** Tries each source in order and returns the first quote. */
export class FallbackPriceSource implements PriceSource {
	readonly name: string;

	constructor(private readonly sources: readonly PriceSource[]) {
		if (!sources.length) {
			throw new Error("FallbackPriceSource needs at least one source");
		}
		this.name = sources.map((source) => source.name).join("|");
	}

	async fetchQuote(instrument: string): Promise<PriceQuote> {
		const failures: string[] = [];
		for (const source of this.sources) {
			try {
				return await source.fetchQuote(instrument);
			} catch (error) {
				failures.push(`${source.name}: ${errorMessage(error)}`);
			}
		}
		throw new TransientSourceError(
			this.name,
			normalizeInstrument(instrument),
			`all sources failed (${failures.join("; ")})`
		);
	}
}
