import { ConfigType, registerAs } from '@nestjs/config';
import { readPositiveInt } from './env.util';

// Calendar days of history requested so weekends and holidays still
// contain the most recent trading session.
export const DEFAULT_HISTORY_LOOKBACK_DAYS = 5;

export const quotesConfig = registerAs('quotes', () => ({
  historyLookbackDays: readPositiveInt(
    process.env.TRADEDESK_HISTORY_LOOKBACK_DAYS,
    DEFAULT_HISTORY_LOOKBACK_DAYS,
  ),
}));

export type QuotesConfig = ConfigType<typeof quotesConfig>;
