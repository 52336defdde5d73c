import { Injectable } from '@nestjs/common';
import chalk from 'chalk';
import figlet from 'figlet';

export const BANNER_TEXT = 'TradeDeskCLI';

@Injectable()
export class BannerPresenter {
  render(): string {
    return chalk.bold.green(figlet.textSync(BANNER_TEXT));
  }
}
