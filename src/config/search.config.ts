import { ConfigType, registerAs } from '@nestjs/config';
import { readPositiveInt } from './env.util';

export const DEFAULT_SEARCH_URL = 'https://query1.finance.yahoo.com/v1/finance/search';
export const DEFAULT_SEARCH_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) tradedesk-cli/1.0';

export const searchConfig = registerAs('search', () => ({
  url: process.env.TRADEDESK_SEARCH_URL || DEFAULT_SEARCH_URL,
  timeoutMs: readPositiveInt(process.env.TRADEDESK_SEARCH_TIMEOUT_MS, DEFAULT_SEARCH_TIMEOUT_MS),
  userAgent: process.env.TRADEDESK_USER_AGENT || DEFAULT_USER_AGENT,
}));

export type SearchConfig = ConfigType<typeof searchConfig>;
