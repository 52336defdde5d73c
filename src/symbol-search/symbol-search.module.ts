import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import axios from 'axios';
import { SEARCH_HTTP_CLIENT, SymbolSearchService } from './symbol-search.service';
import { searchConfig, SearchConfig } from '../config/search.config';

@Module({
  imports: [ConfigModule.forFeature(searchConfig)],
  providers: [
    {
      provide: SEARCH_HTTP_CLIENT,
      inject: [searchConfig.KEY],
      useFactory: (config: SearchConfig) =>
        axios.create({
          timeout: config.timeoutMs,
          headers: { 'User-Agent': config.userAgent, Accept: 'application/json' },
        }),
    },
    SymbolSearchService,
  ],
  exports: [SymbolSearchService],
})
export class SymbolSearchModule {}
