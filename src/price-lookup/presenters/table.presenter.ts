import { Injectable } from '@nestjs/common';
import chalk from 'chalk';
import Table from 'cli-table3';
import { PriceResult } from '../entities/price-result.entity';
import { formatPrice } from '../../common/utils/decimal.util';

export const TABLE_TITLE = 'TradedeskCLI – Price Lookup';

@Injectable()
export class TablePresenter {
  render(result: PriceResult): string {
    const table = new Table({
      head: ['Name', 'Ticker', 'Current Price'],
      colAligns: ['left', 'left', 'right'],
      style: { head: [], border: [] },
    });

    const price = result.price === null ? chalk.red('N/A') : formatPrice(result.price);
    table.push([chalk.bold(result.name), result.ticker || '-', price]);

    return `${TABLE_TITLE}\n${table.toString()}`;
  }
}
