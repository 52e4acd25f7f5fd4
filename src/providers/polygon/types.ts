/**
 * Polygon.io payload fields read by the adapter
 */

export interface PolygonOptionContract {
  contractType: 'call' | 'put' | null;
  strikePrice: number | null;
  expirationDate: string | null;
  dayVolume: number;
  impliedVolatility: number | null;
  delta: number | null;
  underlyingPrice: number | null;
}

export interface PolygonShortInterestRecord {
  settlementDate: string;
  shortInterest: number;
  avgDailyVolume: number | null;
  daysToCover: number | null;
}
