import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import yahooFinance from 'yahoo-finance2';
import { MarketPriceService } from './market-price.service';
import { QUOTE_SOURCE } from './quote-source.interface';
import { YAHOO_FINANCE, YahooQuoteSource } from './yahoo-quote.source';
import { configureYahooFinance } from './yahoo-finance.factory';
import { quotesConfig } from '../config/quotes.config';

@Module({
  imports: [ConfigModule.forFeature(quotesConfig)],
  providers: [
    {
      provide: YAHOO_FINANCE,
      useFactory: () => {
        configureYahooFinance(yahooFinance);
        return yahooFinance;
      },
    },
    { provide: QUOTE_SOURCE, useClass: YahooQuoteSource },
    MarketPriceService,
  ],
  exports: [MarketPriceService],
})
export class MarketPriceModule {}
