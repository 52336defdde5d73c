export const QUOTE_SOURCE = Symbol('QUOTE_SOURCE');

export type HistoryInterval = '1m' | '1d';

// One OHLC bar; only the close is consumed. Providers report null for gaps.
export interface PriceBar {
  date: Date;
  close: number | null;
}

/**
 * Market-data provider. Implementations may throw on transport or
 * unknown-symbol errors; MarketPriceService treats that as "no data".
 */
export interface QuoteSource {
  /** Cached last-traded price, if the provider has one */
  getFastPrice(ticker: string): Promise<number | undefined>;

  /** Recent bars at the given resolution, oldest first */
  getHistory(ticker: string, interval: HistoryInterval): Promise<PriceBar[]>;
}
