import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { OutputModule } from './common/output/output.module';
import { PriceLookupModule } from './price-lookup/price-lookup.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, cache: true }), OutputModule, PriceLookupModule],
})
export class AppModule {}
