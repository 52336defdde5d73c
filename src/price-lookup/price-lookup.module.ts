import { Module } from '@nestjs/common';
import { PriceLookupService } from './price-lookup.service';
import { SearchCommand } from './search.command';
import { JsonPresenter } from './presenters/json.presenter';
import { TablePresenter } from './presenters/table.presenter';
import { BannerPresenter } from './presenters/banner.presenter';
import { SymbolSearchModule } from '../symbol-search/symbol-search.module';
import { MarketPriceModule } from '../market-price/market-price.module';

@Module({
  imports: [SymbolSearchModule, MarketPriceModule],
  providers: [
    PriceLookupService,  // resolve name -> ticker -> price
    JsonPresenter,
    TablePresenter,
    BannerPresenter,
    SearchCommand,
  ],
})
export class PriceLookupModule {}
