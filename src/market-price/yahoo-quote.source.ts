import { Inject, Injectable } from '@nestjs/common';
import { HistoryInterval, PriceBar, QuoteSource } from './quote-source.interface';
import { quotesConfig, QuotesConfig } from '../config/quotes.config';

export const YAHOO_FINANCE = Symbol('YAHOO_FINANCE');

const DAY_MS = 24 * 60 * 60 * 1000;

// The slice of the yahoo-finance2 default export this adapter calls.
export interface YahooFinanceClient {
  quote(symbol: string): Promise<{ regularMarketPrice?: number }>;
  chart(
    symbol: string,
    options: { period1: Date; interval: HistoryInterval },
  ): Promise<{ quotes: Array<{ date: Date; close: number | null }> }>;
}

@Injectable()
export class YahooQuoteSource implements QuoteSource {
  constructor(
    @Inject(YAHOO_FINANCE) private readonly yahoo: YahooFinanceClient,
    @Inject(quotesConfig.KEY) private readonly config: QuotesConfig,
  ) {}

  async getFastPrice(ticker: string): Promise<number | undefined> {
    const quote = await this.yahoo.quote(ticker);
    return quote?.regularMarketPrice;
  }

  async getHistory(ticker: string, interval: HistoryInterval): Promise<PriceBar[]> {
    const period1 = new Date(Date.now() - this.config.historyLookbackDays * DAY_MS);
    const chart = await this.yahoo.chart(ticker, { period1, interval });
    return (chart?.quotes ?? []).map(bar => ({ date: bar.date, close: bar.close }));
  }
}
