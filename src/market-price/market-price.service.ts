import { Inject, Injectable, Logger } from '@nestjs/common';
import { HistoryInterval, QUOTE_SOURCE, QuoteSource } from './quote-source.interface';
import { attempt, describeFailure } from '../common/utils/attempt.util';

interface PriceStep {
  label: string;
  run: (ticker: string) => Promise<number | undefined>;
}

/**
 * Current price for a ticker with a three-step fallback:
 * fast quote field -> last 1m close -> last 1d close.
 * A step runs only when the previous one produced nothing; errors at any
 * step count as "nothing". Never throws.
 */
@Injectable()
export class MarketPriceService {
  private readonly logger = new Logger(MarketPriceService.name);

  private readonly steps: PriceStep[] = [
    { label: 'fast quote', run: ticker => this.getFastPrice(ticker) },
    { label: 'intraday history', run: ticker => this.getLastClose(ticker, '1m') },
    { label: 'daily history', run: ticker => this.getLastClose(ticker, '1d') },
  ];

  constructor(@Inject(QUOTE_SOURCE) private readonly quoteSource: QuoteSource) {}

  /** Returns undefined once every step is exhausted */
  async fetchPrice(ticker: string): Promise<number | undefined> {
    for (const step of this.steps) {
      const result = await attempt(() => step.run(ticker));
      if (result.ok) {
        this.logger.debug(`${ticker}: price ${result.value} from ${step.label}`);
        return result.value;
      }
      this.logger.debug(`${ticker}: ${step.label} unavailable (${describeFailure(result)})`);
    }

    this.logger.debug(`${ticker}: no price from any source`);
    return undefined;
  }

  // Zero is what the provider reports when it has no cached trade.
  private async getFastPrice(ticker: string): Promise<number | undefined> {
    const price = await this.quoteSource.getFastPrice(ticker);
    return isUsablePrice(price) && price !== 0 ? price : undefined;
  }

  /** Last non-missing close in the series */
  private async getLastClose(ticker: string, interval: HistoryInterval): Promise<number | undefined> {
    const bars = await this.quoteSource.getHistory(ticker, interval);
    for (let i = bars.length - 1; i >= 0; i--) {
      const close = bars[i].close;
      if (isUsablePrice(close)) {
        return close;
      }
    }
    return undefined;
  }
}

function isUsablePrice(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
