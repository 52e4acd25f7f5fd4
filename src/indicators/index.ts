export { returnOverWindow, acceleration } from './returns';
export { rsi } from './rsi';
export { sma, movingAverageStack, breakout } from './averages';
export type { MovingAverageStack, BreakoutResult } from './averages';
export {
  periodReturns,
  realizedVolatility,
  averageTrueRange,
  atrExpansion,
  atrPercent,
  bandScore,
} from './volatility';
export type { VolatilityBand } from './volatility';
export {
  averageVolume,
  volumeRatio,
  volumeTrend,
  highVolumeClusterPct,
  averageDollarVolume,
} from './volume';
export { relativeStrength } from './relative_strength';
export type { RelativeStrength } from './relative_strength';
