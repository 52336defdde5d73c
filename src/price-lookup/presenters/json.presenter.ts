import { Injectable } from '@nestjs/common';
import { PriceResult } from '../entities/price-result.entity';

@Injectable()
export class JsonPresenter {
  render(result: PriceResult): string {
    const payload = {
      ticker: result.ticker,
      name: result.name,
      price: result.price,
      success: result.success,
    };
    return JSON.stringify(payload, null, 2);
  }
}
