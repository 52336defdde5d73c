import { Inject } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { Command, CommandRunner, Option } from 'nest-commander';
import { PriceLookupService } from './price-lookup.service';
import { SearchOptionsDto } from './dto/search-options.dto';
import { JsonPresenter } from './presenters/json.presenter';
import { TablePresenter } from './presenters/table.presenter';
import { BannerPresenter } from './presenters/banner.presenter';
import { CLI_OUTPUT, CliOutput, ExitCode } from '../common/interfaces/cli-output.interface';

export const USAGE_MESSAGE = 'Provide --ticker or --name (see --help).';

/**
 * tradedesk search --ticker AAPL
 * tradedesk search --name "Apple" --json
 *
 * Exit codes: 0 ok (including "price unavailable"), 1 name not found, 2 usage.
 */
@Command({
  name: 'search',
  description: 'Search by ticker OR company name and print the current price.',
})
export class SearchCommand extends CommandRunner {
  constructor(
    private readonly lookup: PriceLookupService,
    private readonly jsonPresenter: JsonPresenter,
    private readonly tablePresenter: TablePresenter,
    private readonly bannerPresenter: BannerPresenter,
    @Inject(CLI_OUTPUT) private readonly output: CliOutput,
  ) {
    super();
  }

  async run(_passedParams: string[], rawOptions: Record<string, unknown> = {}): Promise<void> {
    const options = plainToInstance(SearchOptionsDto, rawOptions);
    const errors = validateSync(options);
    if (errors.length > 0 || (!options.ticker && !options.name)) {
      this.output.error(USAGE_MESSAGE);
      this.output.setExitCode(ExitCode.USAGE);
      return;
    }

    const outcome = await this.lookup.run({ ticker: options.ticker, name: options.name });
    if (outcome.status === 'not-found') {
      this.output.error(`No results for name: "${outcome.name}".`);
      this.output.setExitCode(ExitCode.NOT_FOUND);
      return;
    }

    if (options.json) {
      this.output.write(this.jsonPresenter.render(outcome.result));
    } else {
      this.output.write(this.bannerPresenter.render());
      this.output.write(this.tablePresenter.render(outcome.result));
    }
    this.output.setExitCode(ExitCode.SUCCESS);
  }

  @Option({
    flags: '-t, --ticker <symbol>',
    description: 'Ticker symbol, e.g. AAPL, TSLA, BTC-USD',
  })
  parseTicker(value: string): string {
    return value;
  }

  @Option({
    flags: '-n, --name <text>',
    description: 'Company/asset name, e.g. "Apple", "Tesla"',
  })
  parseName(value: string): string {
    return value;
  }

  @Option({
    flags: '--json',
    description: 'Output JSON instead of a table.',
  })
  parseJson(): boolean {
    return true;
  }
}
