/**
 * Financial Modeling Prep payload fields read by the adapter.
 * All list endpoints return arrays; ratio fields are fractions.
 */

export interface FmpQuote {
  symbol: string;
  price: number;
  volume: number;
  changesPercentage: number;
  sharesOutstanding: number | null;
}

export interface FmpHistoricalBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface FmpProfile {
  companyName: string | null;
  sector: string | null;
  industry: string | null;
  mktCap: number | null;
}

export interface FmpNewsItem {
  title: string;
  text: string;
  publishedDate: string | null;
}

export interface FmpEarningsEvent {
  date: string;
  epsEstimated: number | null;
}

export interface FmpKeyMetrics {
  roic: number | null;
  freeCashFlowYield: number | null;
}

export interface FmpRatios {
  returnOnCapitalEmployed: number | null;
  debtEquityRatio: number | null;
}

export interface FmpFinancialGrowth {
  revenueGrowth: number | null;
  epsgrowth: number | null;
  fiveYRevenueGrowthPerShare: number | null;
}
