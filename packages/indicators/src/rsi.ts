const toRsi = (avgGain: number, avgLoss: number): number => {
  if (avgLoss === 0) {
    return 100;
  }
  const rsi = 100 - 100 / (1 + avgGain / avgLoss);
  return Math.min(Math.max(rsi, 0), 100);
};

/**
 * Wilder RSI for every price from the first computable one onwards.
 *
 * The first value averages the opening deltas: `period` of them when the
 * input holds more than `period` prices, otherwise the `period - 1` deltas
 * that `period` prices give. Each later delta is folded in with Wilder's
 * smoothing `(avg * (period - 1) + x) / period`.
 */
export function rsiSeries(values: readonly number[], period = 14): number[] {
  if (!Number.isInteger(period) || period <= 0) {
    throw new RangeError('RSI period must be a positive integer');
  }

  if (values.length < Math.max(period, 2)) {
    return [];
  }

  const seedCount = Math.min(period, values.length - 1);
  let gains = 0;
  let losses = 0;

  for (let i = 1; i <= seedCount; i += 1) {
    const change = values[i] - values[i - 1];
    if (change >= 0) {
      gains += change;
    } else {
      losses -= change;
    }
  }

  let avgGain = gains / seedCount;
  let avgLoss = losses / seedCount;
  const rsis: number[] = [toRsi(avgGain, avgLoss)];

  for (let i = seedCount + 1; i < values.length; i += 1) {
    const change = values[i] - values[i - 1];
    const gain = Math.max(change, 0);
    const loss = Math.max(-change, 0);
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
    rsis.push(toRsi(avgGain, avgLoss));
  }

  return rsis;
}

/** RSI over the last `period` deltas only; older history is ignored. */
export function rsi(values: readonly number[], period = 14): number | null {
  const series = rsiSeries(values.slice(-(period + 1)), period);
  return series.length ? series[series.length - 1] : null;
}

/** Prices needed before `rsi` returns a value. */
export const rsiRequiredHistory = (period: number): number => Math.max(period, 2);
