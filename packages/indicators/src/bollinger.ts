import { sma } from "./sma";

export interface BollingerBands {
	upper: number;
	middle: number;
	lower: number;
}

/** SMA of the last `period` values ± `stdDevs` population deviations. */
export function bollinger(
	values: readonly number[],
	period = 20,
	stdDevs = 2
): BollingerBands | null {
	const middle = sma(values, period);
	if (middle === null) {
		return null;
	}

	const window = values.slice(values.length - period);
	const variance =
		window.reduce((acc, value) => acc + (value - middle) ** 2, 0) / period;
	const width = Math.sqrt(variance) * stdDevs;

	return {
		upper: middle + width,
		middle,
		lower: middle - width,
	};
}
