import { Injectable, Logger } from '@nestjs/common';
import { SymbolSearchService } from '../symbol-search/symbol-search.service';
import { MarketPriceService } from '../market-price/market-price.service';
import { SearchMatch } from '../symbol-search/entities/search-match.entity';
import { createPriceResult, PriceResult } from './entities/price-result.entity';

export interface LookupQuery {
  ticker?: string;
  name?: string;
}

export type LookupOutcome =
  | { status: 'found'; result: PriceResult }
  | { status: 'not-found'; name: string };

// Resolves the query to a ticker (searching by name when no ticker is given)
// and fetches its price. A missing price is a normal 'found' outcome.
@Injectable()
export class PriceLookupService {
  private readonly logger = new Logger(PriceLookupService.name);

  constructor(
    private readonly symbolSearch: SymbolSearchService,
    private readonly marketPrice: MarketPriceService,
  ) {}

  /**
   * @throws Error if neither ticker nor name is given; callers check this first
   */
  async run(query: LookupQuery): Promise<LookupOutcome> {
    let ticker: string;
    let match: SearchMatch | undefined;

    if (query.ticker) {
      ticker = query.ticker;
    } else if (query.name) {
      match = await this.symbolSearch.resolve(query.name);
      if (!match) {
        return { status: 'not-found', name: query.name };
      }
      ticker = match.symbol;
    } else {
      throw new Error('A ticker or a name is required');
    }

    const price = await this.marketPrice.fetchPrice(ticker);
    if (price === undefined) {
      this.logger.warn(`No price available for ${ticker}`);
    }

    const displayName = match?.name || query.name || ticker;
    return { status: 'found', result: createPriceResult(ticker, displayName, price) };
  }
}
