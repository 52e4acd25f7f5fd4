/**
 * Wilder's relative strength index on closing prices.
 *
 * Needs period + 1 closes; anything shorter returns the neutral 50.
 * A series with gains and no losses is 100; a flat series is 50.
 */
export function rsi(closes: readonly number[], period: number = 14): number {
  if (period < 1 || closes.length < period + 1) return 50;

  let gainSum = 0;
  let lossSum = 0;
  for (let i = 1; i <= period; i++) {
    const delta = closes[i] - closes[i - 1];
    if (delta > 0) gainSum += delta;
    else lossSum -= delta;
  }

  let avgGain = gainSum / period;
  let avgLoss = lossSum / period;

  for (let i = period + 1; i < closes.length; i++) {
    const delta = closes[i] - closes[i - 1];
    const gain = delta > 0 ? delta : 0;
    const loss = delta < 0 ? -delta : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
  }

  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }

  const rs = avgGain / avgLoss;
  const value = 100 - 100 / (1 + rs);
  return Math.min(Math.max(value, 0), 100);
}
