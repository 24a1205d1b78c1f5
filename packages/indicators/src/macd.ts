import { emaSeries } from './ema';

export interface MacdResult {
  macd: number;
  signal: number;
  histogram: number;
}

/** Prices needed before `macd` returns a value. */
export const macdRequiredHistory = (slow: number, signalLength: number): number =>
  slow + signalLength;

/**
 * MACD line, signal line and histogram for every point where the signal
 * line exists. Empty until `slow + signalLength` prices are available.
 */
export function macdSeries(
  closes: readonly number[],
  fast: number,
  slow: number,
  signalLength: number
): MacdResult[] {
  if (slow <= 0 || fast <= 0 || signalLength <= 0) {
    return [];
  }
  if (closes.length < macdRequiredHistory(slow, signalLength)) {
    return [];
  }

  const fastSeries = emaSeries(closes, fast);
  const slowSeries = emaSeries(closes, slow);

  const macdValues: number[] = [];
  fastSeries.forEach((fastValue, index) => {
    const slowValue = slowSeries[index];
    if (fastValue !== null && slowValue !== null) {
      macdValues.push(fastValue - slowValue);
    }
  });

  const signalSeries = emaSeries(macdValues, signalLength);
  const results: MacdResult[] = [];

  signalSeries.forEach((signal, index) => {
    if (signal === null) {
      return;
    }
    const macdValue = macdValues[index];
    results.push({
      macd: macdValue,
      signal,
      histogram: macdValue - signal
    });
  });

  return results;
}

export function macd(
  closes: readonly number[],
  fast = 12,
  slow = 26,
  signalLength = 9
): MacdResult | null {
  const series = macdSeries(closes, fast, slow, signalLength);
  return series.length ? series[series.length - 1] : null;
}
