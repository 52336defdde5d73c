import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { SearchMatch } from './entities/search-match.entity';
import { YahooSearchResponseDto } from './dto/yahoo-search-response.dto';
import { searchConfig, SearchConfig } from '../config/search.config';
import { attempt, describeFailure } from '../common/utils/attempt.util';

export const SEARCH_HTTP_CLIENT = Symbol('SEARCH_HTTP_CLIENT');

export type SearchHttpClient = Pick<AxiosInstance, 'get'>;

/**
 * Resolves a free-text company/asset name to its best-matching ticker.
 * Transport errors, non-2xx statuses, malformed bodies, empty result lists
 * and candidates without a symbol all come back as undefined.
 */
@Injectable()
export class SymbolSearchService {
  private readonly logger = new Logger(SymbolSearchService.name);

  constructor(
    @Inject(SEARCH_HTTP_CLIENT) private readonly http: SearchHttpClient,
    @Inject(searchConfig.KEY) private readonly config: SearchConfig,
  ) {}

  async resolve(name: string): Promise<SearchMatch | undefined> {
    const result = await attempt(() => this.searchTopMatch(name));
    if (!result.ok) {
      this.logger.debug(`No match for "${name}" (${describeFailure(result)})`);
      return undefined;
    }

    const match = result.value;
    this.logger.debug(`"${name}" -> ${match.symbol} (${match.assetType ?? '?'} on ${match.exchange ?? '?'})`);
    return match;
  }

  private async searchTopMatch(name: string): Promise<SearchMatch | undefined> {
    const response = await this.http.get<unknown>(this.config.url, {
      params: { q: name, quotesCount: 1, newsCount: 0, listsCount: 0 },
      timeout: this.config.timeoutMs,
    });

    const body = this.parseBody(response.data);
    const top = body.quotes?.[0];
    if (!top || !top.symbol) {
      return undefined;
    }

    return {
      symbol: top.symbol,
      name: top.shortname || top.longname || top.symbol,
      assetType: top.quoteType,
      exchange: top.exchange,
      score: top.score,
    };
  }

  /** @throws Error when the body is not a search response */
  private parseBody(data: unknown): YahooSearchResponseDto {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new Error(`Malformed search response: expected an object, got ${typeof data}`);
    }

    const body = plainToInstance(YahooSearchResponseDto, data);
    const errors = validateSync(body);
    if (errors.length > 0) {
      throw new Error(`Malformed search response: ${errors.map(e => e.toString()).join('; ')}`);
    }
    return body;
  }
}
